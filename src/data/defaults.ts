/**
 * Minimal built-in tables, used when a reference file is missing from the
 * data directory and as the base that test fixtures override.
 */

import type {
  Career,
  ModeConfig,
  PersonalityCatalog,
  RealityCheckTable,
  ReferenceData,
  RiskCriteriaTable,
  SimulationTable,
  SkillTaxonomy,
  TrendingCareersTable,
  WarningBand,
} from '../types/index.js';

export const DEFAULT_MODE_CONFIG: ModeConfig = {
  regions: {
    global: {
      career_file: 'careers.json',
      role_model_file: 'role_models.json',
      currency: 'USD',
      salary_prefix: '$',
    },
    india: {
      career_file: 'careers_india.json',
      role_model_file: 'role_models_india.json',
      currency: 'INR',
      salary_prefix: '₹',
    },
  },
  modes: {
    student: {
      assessment_weight: { interests: 0.45, subjects: 0.25, skills: 0.2, personality: 0.1 },
    },
    professional: {
      assessment_weight: { skills: 0.4, interests: 0.3, personality: 0.2, subjects: 0.1 },
      tip_categories: ['career_advancement', 'leadership', 'industry_transition', 'networking'],
    },
  },
};

export const DEFAULT_CAREERS: Career[] = [
  {
    name: 'Software Engineer',
    required_skills: ['programming', 'problem_solving', 'logical_thinking', 'mathematics'],
    interests: ['technology', 'computers', 'innovation', 'problem_solving'],
    subjects: ['computer_science', 'mathematics', 'physics'],
    personality_traits: ['analytical', 'detail_oriented', 'creative'],
    description: 'Design and develop software applications and systems',
    growth_rate: '22%',
    median_salary: '$110,000',
    job_outlook: 'Much faster than average',
  },
];

export const DEFAULT_TAXONOMY: SkillTaxonomy = {
  subjects_to_skills: {
    computer_science: ['programming', 'algorithms', 'data_structures', 'system_design'],
    mathematics: ['analytical_thinking', 'problem_solving', 'statistics', 'logical_reasoning'],
    business: ['strategic_thinking', 'communication', 'leadership', 'project_management'],
    psychology: ['empathy', 'research', 'communication', 'analytical_thinking'],
    art: ['creativity', 'design', 'visual_thinking', 'attention_to_detail'],
  },
  skill_categories: {
    technical: ['programming', 'machine_learning', 'data_analysis', 'cybersecurity', 'design'],
    soft: ['communication', 'leadership', 'teamwork', 'problem_solving', 'creativity'],
    business: ['project_management', 'strategic_thinking', 'marketing', 'sales', 'finance'],
  },
  learning_resources: {
    programming: {
      beginner: ['Codecademy Python', 'freeCodeCamp', 'Python.org Tutorial'],
      intermediate: ['LeetCode', 'HackerRank', 'Real Python'],
      advanced: ['System Design Interview', 'Clean Code Book', 'Design Patterns'],
      time_estimate: '3-6 months',
    },
    communication: {
      beginner: ['Public Speaking Basics', 'Writing Skills', 'Active Listening'],
      intermediate: ['Presentation Skills', 'Technical Writing', 'Cross-cultural Communication'],
      advanced: ['Executive Communication', 'Negotiation Skills', 'Crisis Communication'],
      time_estimate: '2-6 months',
    },
  },
};

export const DEFAULT_PERSONALITY: PersonalityCatalog = {
  questions: [
    { id: 1, question: 'I prefer working in teams rather than alone', dimension: 'extraversion', weight: 1 },
    { id: 2, question: 'I enjoy meeting new people and making connections', dimension: 'extraversion', weight: 1 },
    { id: 3, question: 'I prefer concrete facts over abstract theories', dimension: 'sensing', weight: 1 },
    { id: 4, question: 'I focus on details rather than the big picture', dimension: 'sensing', weight: 1 },
    { id: 5, question: 'I make decisions based on logic rather than feelings', dimension: 'thinking', weight: 1 },
    { id: 6, question: 'I analyze problems objectively without emotional bias', dimension: 'thinking', weight: 1 },
    { id: 7, question: 'I prefer to plan ahead rather than be spontaneous', dimension: 'judging', weight: 1 },
    { id: 8, question: 'I like to have things organized and structured', dimension: 'judging', weight: 1 },
    { id: 9, question: 'I get energized by social interactions', dimension: 'extraversion', weight: 1 },
    { id: 10, question: 'I trust my intuition when making decisions', dimension: 'intuition', weight: 1 },
    { id: 11, question: "I consider how decisions affect people's feelings", dimension: 'feeling', weight: 1 },
    { id: 12, question: 'I adapt easily to changing situations', dimension: 'perceiving', weight: 1 },
  ],
  types: {
    INTJ: {
      name: 'The Architect',
      traits: ['analytical', 'strategic', 'independent'],
      careers: ['Software Engineer', 'Data Scientist', 'Research Scientist'],
      description: 'Strategic thinkers who love complex problems',
    },
    ENFP: {
      name: 'The Campaigner',
      traits: ['creative', 'enthusiastic', 'collaborative'],
      careers: ['UX Designer', 'Marketing Manager', 'Teacher'],
      description: 'Creative and enthusiastic people-focused individuals',
    },
    ISTJ: {
      name: 'The Logistician',
      traits: ['detail_oriented', 'organized', 'reliable'],
      careers: ['Accountant', 'Project Manager', 'Engineer'],
      description: 'Practical and fact-minded, reliable individuals',
    },
    ESTP: {
      name: 'The Entrepreneur',
      traits: ['outgoing', 'adaptable', 'practical'],
      careers: ['Sales Manager', 'Marketing Manager', 'Consultant'],
      description: 'Energetic and adaptable, great at improvising',
    },
  },
};

export const DEFAULT_REALITY_CHECK: RealityCheckTable = {
  career_reality_data: {},
  general_insights: [],
};

export const DEFAULT_SIMULATIONS: SimulationTable = {
  career_simulations: {},
  stress_scale: {},
};

function band(min: number, max: number, description: string, recommendations: string[]): WarningBand {
  return { score_range: [min, max], description, recommendations };
}

const DEFAULT_BANDS = {
  low_risk: band(0, 0.3, 'Low risk', ['Keep up your current habits']),
  moderate_risk: band(0.3, 0.6, 'Moderate risk', ['Review your progress with a mentor each term']),
  high_risk: band(0.6, 1, 'High risk', ['Seek structured support before committing to a path']),
};

export const DEFAULT_RISK_CRITERIA: RiskCriteriaTable = {
  failure_warning_criteria: {
    academic_consistency: { warning_levels: DEFAULT_BANDS },
    interest_stability: { warning_levels: DEFAULT_BANDS },
    stress_tolerance: { warning_levels: DEFAULT_BANDS },
  },
  career_risk_mapping: {},
  intervention_strategies: {},
};

export const DEFAULT_TRENDING_CAREERS: TrendingCareersTable = {
  trending_careers_2025_2035: { global: [], india: [] },
  trend_categories: [],
  time_horizons: [],
};

export function builtInReferenceData(): ReferenceData {
  return {
    modeConfig: DEFAULT_MODE_CONFIG,
    careers: { global: DEFAULT_CAREERS, india: DEFAULT_CAREERS },
    taxonomy: DEFAULT_TAXONOMY,
    personality: DEFAULT_PERSONALITY,
    roleModels: { global: [], india: [] },
    tips: [],
    realityCheck: DEFAULT_REALITY_CHECK,
    simulations: DEFAULT_SIMULATIONS,
    riskCriteria: DEFAULT_RISK_CRITERIA,
    trendingCareers: DEFAULT_TRENDING_CAREERS,
  };
}
