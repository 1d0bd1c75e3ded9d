import config from '../config/index.js';
import { ReferenceDataStore } from '../data/store.js';
import { logger } from '../utils/logger.js';
import { toErrorPayload, type ErrorPayload } from '../utils/errors.js';
import { ComparisonEngine, type CareerComparison, type ComparisonRules, type DetailedComparison } from './comparison.js';
import { ExplanationGenerator, type Explanation } from './explainer.js';
import { MatchScorer, type MatchScorerOptions } from './match-scorer.js';
import { PersonalityTest, type PersonalityResult } from './personality.js';
import { ProfileBuilder } from './profile-builder.js';
import { Ranker, type VisualizationData } from './ranker.js';
import { RealityCheckService, type RealityCheckResult } from './reality-check.js';
import {
  parseName,
  parseNames,
  parseQuickRiskFlags,
  parseRecommendRequest,
  parseRegion,
  parseRegionOrAll,
  parseRiskInput,
  parseSkillsGapRequest,
  parseTipRequest,
  parseTrendingRequest,
  type RequestDefaults,
} from './requests.js';
import { RiskAssessor, type QuickRiskResult, type RiskReport } from './risk-assessor.js';
import {
  RoleModelService,
  type InspirationQuote,
  type RoleModelServiceOptions,
} from './role-models.js';
import {
  SimulationMetricsEngine,
  type CareerInsights,
  type SimulationComparison,
  type SimulationInsightRules,
  type SimulationResult,
  type SimulationSummary,
  type StressTimeline,
} from './simulation.js';
import { SkillsGapAnalyzer, type GapAnalysisRules, type SkillsGapReport } from './skills-gap.js';
import { TrendingCareersService, type TrendingCareersView } from './trending-careers.js';
import type {
  Career,
  CareerTip,
  Mode,
  PersonalityQuestion,
  Region,
  RegionDescriptor,
  RoleModel,
} from '../types/index.js';

/** Either the result or the structured error it failed with. */
export type Outcome<T> = T | ErrorPayload;

export interface CareerAdvisorOptions {
  recommendationLimit?: number;
  visualizationLimit?: number;
  defaults?: Partial<RequestDefaults>;
  scorer?: MatchScorerOptions;
  roleModels?: RoleModelServiceOptions;
  gapRules?: GapAnalysisRules;
  comparisonRules?: ComparisonRules;
  insightRules?: SimulationInsightRules;
}

export interface RecommendedCareer {
  career: Career;
  explanation: Explanation;
  skills_gap: SkillsGapReport;
}

export interface RecommendationResponse {
  recommendations: RecommendedCareer[];
  visualization: VisualizationData;
  role_models: RoleModel[];
  daily_tip: CareerTip | null;
  inspiration: InspirationQuote | null;
  region_info: RegionDescriptor;
  region: Region;
  mode: Mode;
}

export interface DailyTipResponse {
  tip: CareerTip | null;
  inspiration: InspirationQuote | null;
  region: Region;
  mode: Mode;
}

export interface WeeklyTipsResponse {
  tips: CareerTip[];
  region: Region;
  mode: Mode;
}

export interface RoleModelsResponse {
  role_models: readonly RoleModel[];
  region: Region;
}

export interface CareersByRegionResponse {
  careers: readonly Career[];
  region_info: RegionDescriptor;
  region: Region;
}

export interface ComparableCareersResponse {
  careers: string[];
  region: Region | 'all';
}

/**
 * The engine's outer boundary. Wires every component to one reference data
 * store, parses loosely-typed requests and turns any failure into an
 * {@link ErrorPayload} instead of throwing.
 */
export class CareerAdvisor {
  readonly profiles: ProfileBuilder;
  readonly scorer: MatchScorer;
  readonly ranker: Ranker;
  readonly explainer: ExplanationGenerator;
  readonly skillsGap: SkillsGapAnalyzer;
  readonly comparisons: ComparisonEngine;
  readonly simulations: SimulationMetricsEngine;
  readonly risk: RiskAssessor;
  readonly personality: PersonalityTest;
  readonly roleModels: RoleModelService;
  readonly realityChecks: RealityCheckService;
  readonly trending: TrendingCareersService;

  private readonly defaults: RequestDefaults;
  private readonly recommendationLimit: number;

  constructor(
    readonly store: ReferenceDataStore,
    options: CareerAdvisorOptions = {}
  ) {
    this.defaults = {
      region: options.defaults?.region ?? config.app.defaultRegion,
      mode: options.defaults?.mode ?? config.app.defaultMode,
    };
    this.recommendationLimit = options.recommendationLimit ?? config.recommendations.limit;

    this.profiles = new ProfileBuilder(store);
    this.scorer = new MatchScorer(store, options.scorer);
    this.ranker = new Ranker(this.scorer, options.visualizationLimit ?? config.recommendations.visualizationLimit);
    this.explainer = new ExplanationGenerator();
    this.skillsGap = new SkillsGapAnalyzer(store, options.gapRules);
    this.comparisons = new ComparisonEngine(store, options.comparisonRules);
    this.simulations = new SimulationMetricsEngine(store, options.insightRules);
    this.risk = new RiskAssessor(store);
    this.personality = new PersonalityTest(store);
    this.roleModels = new RoleModelService(store, options.roleModels);
    this.realityChecks = new RealityCheckService(store);
    this.trending = new TrendingCareersService(store);
  }

  static fromDataDir(dataDir: string = config.paths.dataDir, options: CareerAdvisorOptions = {}): CareerAdvisor {
    return new CareerAdvisor(ReferenceDataStore.load(dataDir), options);
  }

  recommend(body: unknown): Outcome<RecommendationResponse> {
    return this.guard('recommend', () => {
      const request = parseRecommendRequest(body, this.defaults);
      const { region, mode } = request;
      const profile = this.profiles.build(request.profile, region, mode);
      const careers = this.store.getCareers(region);
      const top = this.ranker.recommend(profile, careers, this.recommendationLimit);
      const lead = top[0];

      logger.info(`Recommended ${top.length} of ${careers.length} careers`, { region, mode });

      return {
        recommendations: top.map((career) => ({
          career,
          explanation: this.explainer.explain(career, request.profile),
          skills_gap: this.skillsGap.analyze(
            {
              user_skills: request.profile.skills ?? [],
              user_subjects: request.profile.subjects ?? [],
              user_interests: request.profile.interests ?? [],
            },
            career
          ),
        })),
        visualization: this.ranker.visualize(profile, careers),
        role_models: this.roleModels.forCareers(
          region,
          top.map((career) => career.name)
        ),
        daily_tip: lead
          ? this.roleModels.dailyTip({ careerFocus: lead.name, userId: request.user_id ?? 'anonymous', mode })
          : null,
        inspiration: this.roleModels.inspirationQuote(region, lead?.name),
        region_info: this.store.getRegionInfo(region),
        region,
        mode,
      };
    });
  }

  personalityQuestions(): Outcome<readonly PersonalityQuestion[]> {
    return this.guard('personalityQuestions', () => this.personality.questions());
  }

  personalityResult(answers: unknown): Outcome<PersonalityResult> {
    return this.guard('personalityResult', () => this.personality.calculate(answers));
  }

  compare(careers: unknown, region?: unknown): Outcome<CareerComparison> {
    return this.guard('compare', () =>
      this.comparisons.compareCareers(parseNames(careers, 'careers'), parseRegion(region, this.defaults.region))
    );
  }

  detailedComparison(first: unknown, second: unknown, region?: unknown): Outcome<DetailedComparison> {
    return this.guard('detailedComparison', () =>
      this.comparisons.detailedComparison(
        parseName(first, 'career1'),
        parseName(second, 'career2'),
        parseRegion(region, this.defaults.region)
      )
    );
  }

  comparableCareers(region?: unknown): Outcome<ComparableCareersResponse> {
    return this.guard('comparableCareers', () => {
      const selected = parseRegionOrAll(region, this.defaults.region);
      return { careers: this.comparisons.availableCareers(selected), region: selected };
    });
  }

  careerSimulation(name: unknown, region?: unknown): Outcome<SimulationResult> {
    return this.guard('careerSimulation', () =>
      this.simulations.getSimulation(parseName(name, 'career'), parseRegion(region, this.defaults.region))
    );
  }

  simulationSummary(name: unknown, region?: unknown): Outcome<SimulationSummary> {
    return this.guard('simulationSummary', () =>
      this.simulations.summary(parseName(name, 'career'), parseRegion(region, this.defaults.region))
    );
  }

  simulationInsights(name: unknown, region?: unknown): Outcome<CareerInsights> {
    return this.guard('simulationInsights', () =>
      this.simulations.insights(parseName(name, 'career'), parseRegion(region, this.defaults.region))
    );
  }

  stressTimeline(name: unknown, region?: unknown): Outcome<StressTimeline> {
    return this.guard('stressTimeline', () =>
      this.simulations.stressTimeline(parseName(name, 'career'), parseRegion(region, this.defaults.region))
    );
  }

  compareSimulations(careers: unknown, region?: unknown): Outcome<SimulationComparison> {
    return this.guard('compareSimulations', () =>
      this.simulations.compareSimulations(parseNames(careers, 'careers'), parseRegion(region, this.defaults.region))
    );
  }

  simulationCareers(): Outcome<{ careers: string[] }> {
    return this.guard('simulationCareers', () => ({ careers: this.simulations.availableCareers() }));
  }

  skillsGapAnalysis(body: unknown): Outcome<SkillsGapReport> {
    return this.guard('skillsGap', () => {
      const request = parseSkillsGapRequest(body, this.defaults);
      const career = this.skillsGap.findCareer(request.career_name, request.region);
      return this.skillsGap.analyze(request, career);
    });
  }

  realityCheck(name: unknown): Outcome<RealityCheckResult> {
    return this.guard('realityCheck', () => this.realityChecks.lookup(parseName(name, 'career')));
  }

  riskAssessment(body: unknown): Outcome<RiskReport> {
    return this.guard('riskAssessment', () => this.risk.analyze(parseRiskInput(body)));
  }

  quickRiskAssessment(body: unknown): Outcome<QuickRiskResult> {
    return this.guard('quickRiskAssessment', () => this.risk.quickAssessment(parseQuickRiskFlags(body)));
  }

  dailyTip(query: unknown): Outcome<DailyTipResponse> {
    return this.guard('dailyTip', () => {
      const { region, mode, career, user_id } = parseTipRequest(query, this.defaults);
      return {
        tip: this.roleModels.dailyTip({ careerFocus: career, userId: user_id ?? 'anonymous', mode }),
        inspiration: this.roleModels.inspirationQuote(region, career),
        region,
        mode,
      };
    });
  }

  weeklyTips(query: unknown): Outcome<WeeklyTipsResponse> {
    return this.guard('weeklyTips', () => {
      const { region, mode, career } = parseTipRequest(query, this.defaults);
      return { tips: this.roleModels.weeklyTips({ careerFocus: career, mode }), region, mode };
    });
  }

  roleModelsFor(query: unknown): Outcome<RoleModelsResponse> {
    return this.guard('roleModels', () => {
      const { region, career } = parseTipRequest(query, this.defaults);
      return {
        role_models: career ? this.roleModels.forCareer(region, career) : this.store.getRoleModels(region),
        region,
      };
    });
  }

  trendingCareers(query: unknown): Outcome<TrendingCareersView> {
    return this.guard('trendingCareers', () => {
      const { region, horizon } = parseTrendingRequest(query, this.defaults);
      return this.trending.overview(region, horizon);
    });
  }

  careersByRegion(region?: unknown): Outcome<CareersByRegionResponse> {
    return this.guard('careersByRegion', () => {
      const selected = parseRegion(region, this.defaults.region);
      return {
        careers: this.store.getCareers(selected),
        region_info: this.store.getRegionInfo(selected),
        region: selected,
      };
    });
  }

  private guard<T>(operation: string, run: () => T): Outcome<T> {
    try {
      return run();
    } catch (error) {
      const payload = toErrorPayload(error);
      if (payload.code === 'UNEXPECTED_ERROR') {
        logger.error(`${operation} failed`, { error: error instanceof Error ? error.stack : String(error) });
      } else {
        logger.warn(`${operation} rejected: ${payload.error}`, { code: payload.code });
      }
      return payload;
    }
  }
}
