/**
 * Shared record shapes. Field names mirror the reference data files and the
 * JSON responses, so they stay snake_case.
 */

export const REGIONS = ['global', 'india'] as const;
export type Region = (typeof REGIONS)[number];

export const MODES = ['student', 'professional'] as const;
export type Mode = (typeof MODES)[number];

// ---------------------------------------------------------------------------
// Careers and profiles
// ---------------------------------------------------------------------------

export interface Career {
  name: string;
  required_skills: string[];
  interests: string[];
  subjects: string[];
  personality_traits: string[];
  description: string;
  growth_rate: string;
  median_salary: string;
  job_outlook?: string;
}

/** A career as seen by comparisons: global entry with the India overlay merged in. */
export interface ComparableCareer extends Career {
  region: Region;
  india_salary?: string;
  india_outlook?: string;
}

export interface PersonalityInput {
  traits?: string[];
  type?: string;
}

export interface UserProfile {
  interests: string[];
  skills: string[];
  subjects: string[];
  personality: {
    traits: string[];
    type?: string;
  };
  experience_level: string | null;
  region: Region;
  mode: Mode;
}

export interface ProfileInput {
  interests?: string[];
  skills?: string[];
  subjects?: string[];
  personality?: PersonalityInput;
  experience_level?: string | null;
}

// ---------------------------------------------------------------------------
// Mode and region configuration
// ---------------------------------------------------------------------------

export interface DimensionWeights {
  interests: number;
  skills: number;
  subjects: number;
  personality: number;
}

export interface RegionDescriptor {
  career_file: string;
  role_model_file: string;
  currency: string;
  salary_prefix: string;
}

export interface ModeDescriptor {
  assessment_weight: DimensionWeights;
  description?: string;
  tip_categories?: string[];
}

export interface ModeConfig {
  regions: Record<Region, RegionDescriptor>;
  modes: Record<Mode, ModeDescriptor>;
}

// ---------------------------------------------------------------------------
// Skill taxonomy
// ---------------------------------------------------------------------------

export interface LearningResource {
  beginner: string[];
  intermediate?: string[];
  advanced?: string[];
  time_estimate: string;
}

export interface SkillTaxonomy {
  subjects_to_skills: Record<string, string[]>;
  skill_categories: Record<string, string[]>;
  learning_resources: Record<string, LearningResource>;
}

// ---------------------------------------------------------------------------
// Personality
// ---------------------------------------------------------------------------

export const PERSONALITY_DIMENSIONS = [
  'extraversion',
  'introversion',
  'sensing',
  'intuition',
  'thinking',
  'feeling',
  'judging',
  'perceiving',
] as const;
export type PersonalityDimension = (typeof PERSONALITY_DIMENSIONS)[number];

export interface PersonalityQuestion {
  id: number;
  question: string;
  dimension: PersonalityDimension;
  weight: number;
}

export interface PersonalityArchetype {
  name: string;
  traits: string[];
  careers: string[];
  description: string;
}

export interface PersonalityCatalog {
  questions: PersonalityQuestion[];
  types: Record<string, PersonalityArchetype>;
}

// ---------------------------------------------------------------------------
// Role models and tips
// ---------------------------------------------------------------------------

export interface RoleModel {
  name: string;
  career: string;
  title: string;
  key_skills: string[];
  inspiration_quote: string;
  advice: string;
  achievements: string[];
  career_path?: string[];
  region_context?: string;
}

export interface CareerTip {
  id: string;
  title: string;
  tip: string;
  category: string;
  career_focus: string[];
}

// ---------------------------------------------------------------------------
// Reality checks
// ---------------------------------------------------------------------------

export interface RealityCheckEntry {
  reality_check: {
    stress_level: string;
    work_life_balance: string;
    challenges: string[];
    success_rate?: string;
    time_to_establish?: string;
  };
  common_myths?: string[];
  backup_careers?: string[];
}

export interface RealityCheckTable {
  career_reality_data: Record<string, RealityCheckEntry>;
  general_insights: string[];
}

// ---------------------------------------------------------------------------
// Simulations
// ---------------------------------------------------------------------------

export interface ScheduledTask {
  time: string;
  task: string;
  duration: number;
  stress_level: number;
  description: string;
}

export interface WorkingHours {
  start: string;
  end: string;
  total_hours: number;
  flexible?: boolean;
}

export interface RegionalSimulationOverride {
  salary?: string;
  work_culture?: string;
}

export interface SimulationRecord {
  career_title: string;
  overview: string;
  daily_schedule: ScheduledTask[];
  working_hours: WorkingHours;
  average_stress_level: number;
  work_life_balance: string;
  salary_range: string;
  education_required: string;
  stress_factors: string[];
  rewards: string[];
  region_specific?: Partial<Record<Region, RegionalSimulationOverride>>;
}

export interface SimulationTable {
  career_simulations: Record<string, SimulationRecord>;
  stress_scale: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Risk criteria
// ---------------------------------------------------------------------------

export const RISK_LEVELS = ['low_risk', 'moderate_risk', 'high_risk'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export const RISK_DIMENSIONS = ['academic_consistency', 'interest_stability', 'stress_tolerance'] as const;
export type RiskDimension = (typeof RISK_DIMENSIONS)[number];

export interface WarningBand {
  score_range: [number, number];
  description: string;
  recommendations: string[];
}

export interface RiskDimensionCriteria {
  warning_levels: Record<RiskLevel, WarningBand>;
}

export interface CareerRiskProfile {
  career: string;
  stress_level: number;
  dropout_rate: string;
  common_reasons: string[];
}

export interface RiskCriteriaTable {
  failure_warning_criteria: Record<RiskDimension, RiskDimensionCriteria>;
  career_risk_mapping: Record<string, CareerRiskProfile[]>;
  intervention_strategies: Record<string, string[]>;
}

// ---------------------------------------------------------------------------
// Trending careers
// ---------------------------------------------------------------------------

/** One axis of the trend radar. */
export interface TrendCategory {
  id: string;
  name: string;
  description: string;
}

export interface TimeHorizon {
  id: string;
  label: string;
  years: string;
}

export interface TrendingCareer {
  name: string;
  sector: string;
  description: string;
  /** 0-10 per trend category id. */
  trend_scores: Record<string, number>;
  peak_horizon: string;
  projected_growth: string;
  key_skills: string[];
}

export interface TrendingCareersTable {
  trending_careers_2025_2035: Record<Region, TrendingCareer[]>;
  trend_categories: TrendCategory[];
  time_horizons: TimeHorizon[];
}

// ---------------------------------------------------------------------------
// The whole data set
// ---------------------------------------------------------------------------

export interface ReferenceData {
  modeConfig: ModeConfig;
  careers: Record<Region, Career[]>;
  taxonomy: SkillTaxonomy;
  personality: PersonalityCatalog;
  roleModels: Record<Region, RoleModel[]>;
  tips: CareerTip[];
  realityCheck: RealityCheckTable;
  simulations: SimulationTable;
  riskCriteria: RiskCriteriaTable;
  trendingCareers: TrendingCareersTable;
}
