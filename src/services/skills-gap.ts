import { findKey, type ReferenceDataStore } from '../data/store.js';
import { NotFoundError } from '../utils/errors.js';
import type { Career, LearningResource, Region } from '../types/index.js';

/** Keyword tables behind prioritization and time estimates. */
export interface GapAnalysisRules {
  criticalSkills: string[];
  mediumPriorityKeywords: string[];
  complexSkills: string[];
  mediumSkills: string[];
  months: { complex: number; medium: number; simple: number };
  minimumMonths: number;
}

export const DEFAULT_GAP_RULES: GapAnalysisRules = {
  criticalSkills: ['programming', 'machine_learning', 'data_analysis', 'leadership', 'communication'],
  mediumPriorityKeywords: ['management', 'strategy'],
  complexSkills: ['machine_learning', 'programming', 'leadership'],
  mediumSkills: ['data_analysis', 'design', 'project_management'],
  months: { complex: 6, medium: 3, simple: 2 },
  minimumMonths: 3,
};

export type SkillCategories = Record<string, string[]>;

export interface SkillPriorities {
  high: string[];
  medium: string[];
  low: string[];
}

export interface LearningStep {
  skill: string;
  resources: LearningResource;
  difficulty: 'beginner';
}

export interface TimeEstimate {
  total_months: number;
  total: string;
  breakdown: string[];
  note: string;
}

export type ReadinessLevelName = 'Ready' | 'Nearly Ready' | 'Developing' | 'Early Stage';

export interface ReadinessLevel {
  level: ReadinessLevelName;
  color: 'success' | 'warning' | 'info' | 'danger';
  description: string;
  percentage: number;
}

export interface DevelopmentPhase {
  phase: number;
  duration: string;
  focus: string;
  skills: string[];
  activities: string[];
}

export interface DevelopmentPlan {
  message?: string;
  phases: DevelopmentPhase[];
}

export interface InterestAlignment {
  matched: string[];
  percentage: number;
}

export interface SkillsGapReport {
  career_name: string;
  skill_match_percentage: number;
  current_skills: { count: number; skills: string[]; categories: SkillCategories };
  missing_skills: { count: number; skills: string[]; categories: SkillCategories; priorities: SkillPriorities };
  learning_path: LearningStep[];
  time_estimate: TimeEstimate;
  readiness_level: ReadinessLevel;
  next_steps: string[];
  skill_development_plan: DevelopmentPlan;
  interest_alignment: InterestAlignment;
}

export interface SkillsGapInput {
  user_skills: readonly string[];
  user_subjects?: readonly string[];
  user_interests?: readonly string[];
}

/** "Machine Learning" and "machine_learning" compare equal after this. */
export function normalizeSkill(skill: string): string {
  return skill.toLowerCase().replace(/ /g, '_');
}

function roundTo1(value: number): number {
  return Math.round(value * 10) / 10;
}

const PHASES: ReadonlyArray<Omit<DevelopmentPhase, 'skills' | 'phase'> & { from: number; to?: number }> = [
  {
    from: 0,
    to: 2,
    duration: 'Months 1-2',
    focus: 'Foundation Building',
    activities: ['Complete beginner courses', 'Practice daily (1-2 hours)', 'Join learning communities'],
  },
  {
    from: 2,
    to: 4,
    duration: 'Months 3-4',
    focus: 'Skill Application',
    activities: ['Work on practical projects', 'Seek feedback from experts', 'Build portfolio pieces'],
  },
  {
    from: 4,
    duration: 'Months 5-6',
    focus: 'Advanced Development',
    activities: ['Take advanced courses', 'Contribute to open source', 'Network with professionals'],
  },
];

export class SkillsGapAnalyzer {
  constructor(
    private readonly store: ReferenceDataStore,
    private readonly rules: GapAnalysisRules = DEFAULT_GAP_RULES
  ) {}

  /** Exact name first, then case-insensitive. */
  findCareer(name: string, region: Region): Career {
    const careers = this.store.getCareers(region);
    const key = findKey(
      careers.map((career) => career.name),
      name
    );
    const career = careers.find((candidate) => candidate.name === key);
    if (!career) {
      throw new NotFoundError(
        `Career '${name}' not found`,
        careers.map((candidate) => candidate.name)
      );
    }
    return career;
  }

  analyze(input: SkillsGapInput, career: Career): SkillsGapReport {
    const required = [...new Set(career.required_skills.map(normalizeSkill))];
    const have = new Set([
      ...input.user_skills.map(normalizeSkill),
      ...this.deriveSkills(input.user_subjects ?? []),
    ]);

    const current = required.filter((skill) => have.has(skill));
    const missing = required.filter((skill) => !have.has(skill));
    const percentage = required.length > 0 ? roundTo1((current.length / required.length) * 100) : 100;

    return {
      career_name: career.name,
      skill_match_percentage: percentage,
      current_skills: {
        count: current.length,
        skills: current,
        categories: this.categorize(current),
      },
      missing_skills: {
        count: missing.length,
        skills: missing,
        categories: this.categorize(missing),
        priorities: this.prioritize(missing),
      },
      learning_path: this.learningPath(missing),
      time_estimate: this.estimateTime(missing),
      readiness_level: readiness(percentage),
      next_steps: nextSteps(missing, percentage),
      skill_development_plan: developmentPlan(missing),
      interest_alignment: this.interestAlignment(input.user_interests ?? [], career),
    };
  }

  deriveSkills(subjects: readonly string[]): string[] {
    const { subjects_to_skills: table } = this.store.getTaxonomy();
    return subjects.flatMap((subject) => table[normalizeSkill(subject)] ?? []).map(normalizeSkill);
  }

  /** First category with a keyword contained in the skill wins. */
  categorize(skills: readonly string[]): SkillCategories {
    const { skill_categories: table } = this.store.getTaxonomy();
    const result: SkillCategories = { technical: [], soft: [], business: [] };
    for (const category of Object.keys(table)) result[category] = [];
    result.other = [];

    for (const skill of skills) {
      const category = Object.keys(table).find((name) =>
        (table[name] ?? []).some((keyword) => skill.includes(keyword))
      );
      (result[category ?? 'other'] ?? []).push(skill);
    }
    return result;
  }

  prioritize(missing: readonly string[]): SkillPriorities {
    const priorities: SkillPriorities = { high: [], medium: [], low: [] };
    for (const skill of missing) {
      if (this.rules.criticalSkills.some((critical) => skill.includes(critical))) {
        priorities.high.push(skill);
      } else if (this.rules.mediumPriorityKeywords.some((keyword) => skill.includes(keyword))) {
        priorities.medium.push(skill);
      } else {
        priorities.low.push(skill);
      }
    }
    return priorities;
  }

  learningPath(missing: readonly string[]): LearningStep[] {
    const { learning_resources: resources } = this.store.getTaxonomy();
    return missing.map((skill) => {
      const key = Object.keys(resources).find(
        (candidate) => skill.includes(candidate) || candidate.split('_').some((word) => skill.includes(word))
      );
      const match = key === undefined ? undefined : resources[key];
      return {
        skill,
        resources: match ?? {
          beginner: [`Online courses for ${skill}`, `${skill} tutorials`, `Books on ${skill}`],
          time_estimate: '2-4 months',
        },
        difficulty: 'beginner',
      };
    });
  }

  /** Sum of per-skill months, halved for parallel learning, with a floor. */
  estimateTime(missing: readonly string[]): TimeEstimate {
    if (missing.length === 0) {
      return { total_months: 0, total: '0 months', breakdown: [], note: 'No skills to learn' };
    }

    const { months } = this.rules;
    let sum = 0;
    const breakdown = missing.map((skill) => {
      let n = months.simple;
      if (this.rules.complexSkills.some((keyword) => skill.includes(keyword))) {
        n = months.complex;
      } else if (this.rules.mediumSkills.some((keyword) => skill.includes(keyword))) {
        n = months.medium;
      }
      sum += n;
      return `${skill}: ${n} months`;
    });

    const total = Math.max(Math.floor(sum / 2), this.rules.minimumMonths);
    return {
      total_months: total,
      total: `${total} months`,
      breakdown,
      note: 'Estimates assume part-time learning with some skills learned in parallel',
    };
  }

  interestAlignment(interests: readonly string[], career: Career): InterestAlignment {
    const wanted = [...new Set(career.interests.map(normalizeSkill))];
    const mine = new Set(interests.map(normalizeSkill));
    const matched = wanted.filter((interest) => mine.has(interest));
    return {
      matched,
      percentage: roundTo1((matched.length / Math.max(wanted.length, 1)) * 100),
    };
  }
}

export function readiness(percentage: number): ReadinessLevel {
  if (percentage >= 80) {
    return {
      level: 'Ready',
      color: 'success',
      description: 'You have most required skills and can start applying',
      percentage,
    };
  }
  if (percentage >= 60) {
    return {
      level: 'Nearly Ready',
      color: 'warning',
      description: 'You have a good foundation and need to develop a few key skills',
      percentage,
    };
  }
  if (percentage >= 40) {
    return {
      level: 'Developing',
      color: 'info',
      description: 'You have some relevant skills; significant development needed',
      percentage,
    };
  }
  return {
    level: 'Early Stage',
    color: 'danger',
    description: 'Substantial skill development required before pursuing this career',
    percentage,
  };
}

export function nextSteps(missing: readonly string[], percentage: number): string[] {
  if (percentage >= 80) {
    return [
      'Start applying for entry-level positions',
      'Build a portfolio showcasing your skills',
      'Network with professionals in the field',
      'Consider internships or freelance projects',
    ];
  }
  if (percentage >= 60) {
    return [
      'Focus on developing 2-3 key missing skills',
      'Take online courses or bootcamps',
      'Build projects to demonstrate new skills',
      'Seek mentorship from industry professionals',
    ];
  }

  const [first, second] = missing;
  if (first === undefined) return [];
  const steps = [
    `Start learning ${first} immediately`,
    'Dedicate 10-15 hours per week to skill development',
    'Join online communities and forums',
    'Consider formal education or certification programs',
  ];
  if (second !== undefined) {
    steps.push(`Plan to learn ${second} after mastering the first skill`);
  }
  return steps;
}

/**
 * Three two-month phases. Skills are split by position in the missing list
 * (first two, next two, the rest), not by priority.
 */
export function developmentPlan(missing: readonly string[]): DevelopmentPlan {
  if (missing.length === 0) {
    return { message: "No skill development needed - you're ready!", phases: [] };
  }
  return {
    phases: PHASES.map(({ from, to, duration, focus, activities }, i) => ({
      phase: i + 1,
      duration,
      focus,
      skills: missing.slice(from, to),
      activities: [...activities],
    })),
  };
}
