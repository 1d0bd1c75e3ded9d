export * from './types/index.js';
export * from './utils/errors.js';
export { ReferenceDataStore, findKey, normalizeWeights } from './data/store.js';
export { loadReferenceData, REFERENCE_FILES } from './data/loaders.js';
export { auditReferenceData, type AuditFinding } from './data/audit.js';
export { ProfileBuilder } from './services/profile-builder.js';
export { MatchScorer, coverage, identityAdjustment, type ExperienceAdjustment } from './services/match-scorer.js';
export { Ranker, rankBy, type VisualizationData } from './services/ranker.js';
export { ExplanationGenerator, EXPLANATION_WEIGHTS, type Explanation } from './services/explainer.js';
export {
  SkillsGapAnalyzer,
  DEFAULT_GAP_RULES,
  normalizeSkill,
  type GapAnalysisRules,
  type SkillsGapReport,
} from './services/skills-gap.js';
export {
  ComparisonEngine,
  DEFAULT_COMPARISON_RULES,
  normalizeSalary,
  type ComparisonRules,
  type CareerComparison,
  type DetailedComparison,
} from './services/comparison.js';
export {
  SimulationMetricsEngine,
  DEFAULT_INSIGHT_RULES,
  peakStress,
  stressDistribution,
  workIntensity,
  type SimulationInsightRules,
  type SimulationResult,
} from './services/simulation.js';
export { RiskAssessor, type RiskReport, type StudentRiskInput, type QuickRiskFlags } from './services/risk-assessor.js';
export { PersonalityTest, type PersonalityResult } from './services/personality.js';
export { RoleModelService, stableHash } from './services/role-models.js';
export { RealityCheckService } from './services/reality-check.js';
export { TrendingCareersService, type TrendingCareersView } from './services/trending-careers.js';
export { CareerAdvisor, type CareerAdvisorOptions, type Outcome } from './services/career-advisor.js';
export { createApp } from './app.js';
