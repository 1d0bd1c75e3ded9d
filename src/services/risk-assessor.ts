import type { ReferenceDataStore } from '../data/store.js';
import {
  RISK_DIMENSIONS,
  RISK_LEVELS,
  type CareerRiskProfile,
  type RiskDimension,
  type RiskLevel,
  type WarningBand,
} from '../types/index.js';

export interface AcademicHistory {
  grades?: number[];
  attendance_rate?: number;
  /** 1-10 */
  study_consistency_score?: number;
  failed_subjects?: number;
}

export interface InterestHistory {
  career_changes_count?: number;
  /** 1-10 */
  career_research_score?: number;
  /** 1-10 */
  external_pressure_score?: number;
  /** 1-10 */
  passion_indicators_score?: number;
}

export interface StressIndicators {
  /** 1-10 */
  anxiety_level?: number;
  pressure_performance_score?: number;
  coping_skills_score?: number;
  resilience_score?: number;
}

export interface StudentRiskInput {
  academic_history?: AcademicHistory;
  interest_history?: InterestHistory;
  stress_indicators?: StressIndicators;
  career_preferences?: string[];
}

export interface DimensionRisk {
  score: number;
  level: RiskLevel;
  risk_factors: string[];
  recommendations: string[];
}

export interface OverallRisk {
  score: number;
  level: RiskLevel;
  primary_concerns: string[];
}

export type CareerFit =
  | 'High Risk - Not Recommended'
  | 'Moderate Risk - Proceed with Caution'
  | 'Good Fit - Low Risk'
  | 'Moderate Fit - Monitor Progress';

export interface CareerWarning {
  career: string;
  career_stress_level: number;
  dropout_rate: string;
  common_failure_reasons: string[];
  risk_assessment: CareerFit;
  specific_warnings: string[];
}

export interface SuccessProbability {
  probability: number;
  percentage: string;
  outlook: 'Excellent' | 'Good' | 'Fair' | 'Challenging';
  confidence_level: 'High' | 'Moderate';
}

export interface AlternativePath {
  path: string;
  description: string;
  duration: string;
  benefits: string[];
}

export interface RiskReport {
  overall_risk_score: number;
  overall_risk_level: RiskLevel;
  primary_concerns: string[];
  risk_breakdown: Record<RiskDimension, DimensionRisk>;
  career_warnings: CareerWarning[];
  recommendations: string[];
  intervention_strategies: string[];
  success_probability: SuccessProbability;
  alternative_paths: AlternativePath[];
}

export interface QuickRiskFlags {
  recent_grade_drop?: boolean;
  career_uncertainty?: boolean;
  high_stress_levels?: boolean;
  external_pressure?: boolean;
}

export interface QuickRiskResult {
  risk_level: RiskLevel;
  risk_indicators_count: number;
  warnings: string[];
  recommendation: string;
}

const OVERALL_WEIGHTS: Record<RiskDimension, number> = {
  academic_consistency: 0.4,
  interest_stability: 0.3,
  stress_tolerance: 0.3,
};

const CONCERN_THRESHOLD = 0.5;

const CONCERNS: Record<RiskDimension, string> = {
  academic_consistency: 'Academic Performance',
  interest_stability: 'Career Interest Stability',
  stress_tolerance: 'Stress Management',
};

const DIMENSION_RECOMMENDATIONS: Record<RiskDimension, string[]> = {
  academic_consistency: [
    'Focus on improving study habits and time management',
    'Consider academic tutoring or support services',
    'Address attendance and engagement issues',
  ],
  interest_stability: [
    'Spend more time exploring career options through internships',
    'Talk to professionals in your field of interest',
    'Consider career counseling to clarify your interests',
  ],
  stress_tolerance: [
    'Learn stress management and relaxation techniques',
    'Consider careers with better work-life balance',
    'Seek counseling for anxiety management',
  ],
};

const HIGH_RISK_PATHS: AlternativePath[] = [
  {
    path: 'Gap Year with Skill Development',
    description: 'Take time to build foundational skills and explore interests',
    duration: '1 year',
    benefits: ['Reduced pressure', 'Skill building', 'Career exploration'],
  },
  {
    path: 'Community College Start',
    description: 'Begin with community college to build academic confidence',
    duration: '2 years',
    benefits: ['Lower cost', 'Smaller classes', 'Academic support'],
  },
  {
    path: 'Trade/Vocational Training',
    description: 'Consider skilled trades with good job prospects',
    duration: '6 months - 2 years',
    benefits: ['Hands-on learning', 'Job security', 'Good wages'],
  },
];

const MODERATE_RISK_PATHS: AlternativePath[] = [
  {
    path: 'Structured Support Program',
    description: 'Enroll in programs with built-in academic and career support',
    duration: 'Throughout education',
    benefits: ['Mentorship', 'Academic support', 'Career guidance'],
  },
  {
    path: 'Part-time Study Option',
    description: 'Reduce course load to manage stress and improve performance',
    duration: 'Extended timeline',
    benefits: ['Reduced stress', 'Work experience', 'Better balance'],
  },
];

/**
 * Least-squares slope of the grades over their index, divided by the best
 * grade. Negative means declining.
 */
export function gradeTrend(grades: readonly number[]): number {
  const n = grades.length;
  if (n < 2) return 0;

  let sumX = 0;
  let sumY = 0;
  let sumXY = 0;
  let sumX2 = 0;
  grades.forEach((y, x) => {
    sumX += x;
    sumY += y;
    sumXY += x * y;
    sumX2 += x * x;
  });

  const denominator = n * sumX2 - sumX ** 2;
  const best = Math.max(...grades);
  if (denominator === 0 || best === 0) return 0;
  return (n * sumXY - sumX * sumY) / denominator / best;
}

/** First band whose closed range contains the score. */
export function bandFor(score: number, bands: Record<RiskLevel, WarningBand>): RiskLevel {
  const level = RISK_LEVELS.find((candidate) => {
    const [min, max] = bands[candidate].score_range;
    return min <= score && score <= max;
  });
  return level ?? 'moderate_risk';
}

export function overallLevel(score: number): RiskLevel {
  if (score <= 0.3) return 'low_risk';
  if (score <= 0.6) return 'moderate_risk';
  return 'high_risk';
}

export function assessCareerFit(careerStress: number, risk: number): CareerFit {
  if (risk > 0.6 && careerStress > 3.0) return 'High Risk - Not Recommended';
  if (risk > 0.4 && careerStress > 3.5) return 'Moderate Risk - Proceed with Caution';
  if (risk < 0.3) return 'Good Fit - Low Risk';
  return 'Moderate Fit - Monitor Progress';
}

export function successProbability(risk: number): SuccessProbability {
  const probability = Math.max(0.1, 1 - risk);
  let outlook: SuccessProbability['outlook'] = 'Challenging';
  if (probability > 0.8) outlook = 'Excellent';
  else if (probability > 0.6) outlook = 'Good';
  else if (probability > 0.4) outlook = 'Fair';

  return {
    probability,
    percentage: `${(probability * 100).toFixed(1)}%`,
    outlook,
    confidence_level: risk < 0.3 || risk > 0.7 ? 'High' : 'Moderate',
  };
}

export function alternativePaths(risk: number): AlternativePath[] {
  if (risk > 0.6) return HIGH_RISK_PATHS.map((path) => ({ ...path, benefits: [...path.benefits] }));
  if (risk > 0.4) return MODERATE_RISK_PATHS.map((path) => ({ ...path, benefits: [...path.benefits] }));
  return [];
}

/**
 * Rule-based dropout / failure warning. Each dimension adds fixed penalties
 * for its indicators, capped at 1, and reads its level from the criteria
 * bands.
 */
export class RiskAssessor {
  constructor(private readonly store: ReferenceDataStore) {}

  analyze(input: StudentRiskInput): RiskReport {
    const breakdown: Record<RiskDimension, DimensionRisk> = {
      academic_consistency: this.academicConsistency(input.academic_history ?? {}),
      interest_stability: this.interestStability(input.interest_history ?? {}),
      stress_tolerance: this.stressTolerance(input.stress_indicators ?? {}),
    };
    const overall = this.overall(breakdown);

    return {
      overall_risk_score: overall.score,
      overall_risk_level: overall.level,
      primary_concerns: overall.primary_concerns,
      risk_breakdown: breakdown,
      career_warnings: this.careerWarnings(input.career_preferences ?? [], overall.score),
      recommendations: recommendationsFor(breakdown),
      intervention_strategies: this.interventionStrategies(overall.level),
      success_probability: successProbability(overall.score),
      alternative_paths: alternativePaths(overall.score),
    };
  }

  academicConsistency(history: AcademicHistory): DimensionRisk {
    const factors: string[] = [];
    let score = 0;

    const grades = history.grades ?? [];
    if (grades.length >= 2 && gradeTrend(grades) <= -0.1) {
      score += 0.3;
      factors.push('Declining academic performance');
    }
    if ((history.attendance_rate ?? 100) < 75) {
      score += 0.2;
      factors.push('Poor attendance record');
    }
    if ((history.study_consistency_score ?? 5) < 4) {
      score += 0.25;
      factors.push('Inconsistent study habits');
    }
    const failed = history.failed_subjects ?? 0;
    if (failed > 0) {
      score += Math.min(0.25, failed * 0.1);
      factors.push(`Failed ${failed} subjects`);
    }

    return this.dimension('academic_consistency', score, factors);
  }

  interestStability(history: InterestHistory): DimensionRisk {
    const factors: string[] = [];
    let score = 0;

    const changes = history.career_changes_count ?? 0;
    if (changes >= 3) {
      score += 0.35;
      factors.push(`Changed career goals ${changes} times`);
    }
    if ((history.career_research_score ?? 5) < 4) {
      score += 0.25;
      factors.push('Limited career research');
    }
    if ((history.external_pressure_score ?? 3) > 7) {
      score += 0.2;
      factors.push('High external pressure in career choice');
    }
    if ((history.passion_indicators_score ?? 5) < 4) {
      score += 0.2;
      factors.push('Low passion for chosen field');
    }

    return this.dimension('interest_stability', score, factors);
  }

  stressTolerance(indicators: StressIndicators): DimensionRisk {
    const factors: string[] = [];
    let score = 0;

    if ((indicators.anxiety_level ?? 3) > 7) {
      score += 0.3;
      factors.push('High anxiety levels');
    }
    if ((indicators.pressure_performance_score ?? 5) < 4) {
      score += 0.25;
      factors.push('Poor performance under pressure');
    }
    if ((indicators.coping_skills_score ?? 5) < 4) {
      score += 0.25;
      factors.push('Lack of healthy coping mechanisms');
    }
    if ((indicators.resilience_score ?? 5) < 4) {
      score += 0.2;
      factors.push('Low resilience to setbacks');
    }

    return this.dimension('stress_tolerance', score, factors);
  }

  /** Screening from four yes/no indicators. */
  quickAssessment(flags: QuickRiskFlags): QuickRiskResult {
    const warnings: string[] = [];
    if (flags.recent_grade_drop) warnings.push('Recent decline in academic performance');
    if (flags.career_uncertainty) warnings.push('Uncertainty about career direction');
    if (flags.high_stress_levels) warnings.push('High stress and anxiety levels');
    if (flags.external_pressure) warnings.push('External pressure influencing career choice');

    const count = warnings.length;
    let level: RiskLevel = 'low_risk';
    if (count >= 3) level = 'high_risk';
    else if (count >= 2) level = 'moderate_risk';

    return {
      risk_level: level,
      risk_indicators_count: count,
      warnings,
      recommendation: count > 1 ? 'Complete full assessment for detailed analysis' : 'Continue with current path',
    };
  }

  careerWarnings(preferences: readonly string[], risk: number): CareerWarning[] {
    const warnings: CareerWarning[] = [];
    for (const career of preferences) {
      const profile = this.riskProfile(career);
      if (!profile) continue;

      const specific: string[] = [];
      if (risk > 0.5) {
        specific.push(`High dropout rate (${profile.dropout_rate}) in this field`);
        specific.push('Your risk profile suggests challenges in this career');
      }
      if (profile.stress_level > 3.0 && risk > 0.4) {
        specific.push('This is a high-stress career that may not suit your stress tolerance');
      }

      warnings.push({
        career,
        career_stress_level: profile.stress_level,
        dropout_rate: profile.dropout_rate,
        common_failure_reasons: [...profile.common_reasons],
        risk_assessment: assessCareerFit(profile.stress_level, risk),
        specific_warnings: specific,
      });
    }
    return warnings;
  }

  interventionStrategies(level: RiskLevel): string[] {
    const strategies = this.store.getRiskCriteria().intervention_strategies;
    const list = (name: string) => strategies[name] ?? [];

    switch (level) {
      case 'high_risk':
        return [...list('academic_support'), ...list('stress_management'), ...list('career_alternatives')];
      case 'moderate_risk':
        return [...list('interest_exploration'), ...list('academic_support').slice(0, 2)];
      default:
        return list('interest_exploration').slice(0, 2);
    }
  }

  private overall(breakdown: Record<RiskDimension, DimensionRisk>): OverallRisk {
    let score = 0;
    const concerns: string[] = [];
    for (const dimension of RISK_DIMENSIONS) {
      score += breakdown[dimension].score * OVERALL_WEIGHTS[dimension];
      if (breakdown[dimension].score > CONCERN_THRESHOLD) concerns.push(CONCERNS[dimension]);
    }
    return {
      score,
      level: overallLevel(score),
      primary_concerns: concerns.length > 0 ? concerns : ['Overall Career Readiness'],
    };
  }

  private dimension(dimension: RiskDimension, rawScore: number, factors: string[]): DimensionRisk {
    const bands = this.store.getRiskCriteria().failure_warning_criteria[dimension].warning_levels;
    const score = Math.min(1, rawScore);
    const level = bandFor(score, bands);
    return {
      score,
      level,
      risk_factors: factors,
      recommendations: [...bands[level].recommendations],
    };
  }

  private riskProfile(career: string): CareerRiskProfile | undefined {
    const profiles = Object.values(this.store.getRiskCriteria().career_risk_mapping).flat();
    const lower = career.toLowerCase();
    return (
      profiles.find((profile) => profile.career === career) ??
      profiles.find((profile) => profile.career.toLowerCase() === lower)
    );
  }
}

function recommendationsFor(breakdown: Record<RiskDimension, DimensionRisk>): string[] {
  return RISK_DIMENSIONS.filter((dimension) => breakdown[dimension].score > CONCERN_THRESHOLD)
    .flatMap((dimension) => DIMENSION_RECOMMENDATIONS[dimension]);
}
