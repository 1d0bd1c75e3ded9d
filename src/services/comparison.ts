import { findKey, type ReferenceDataStore } from '../data/store.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { rankBy } from './ranker.js';
import type { ComparableCareer, Region } from '../types/index.js';

export const MIN_COMPARED = 2;
export const MAX_COMPARED = 5;

const LAKH = 100_000;
const AMOUNT = /^\d+(\.\d+)?$/;
const LAKH_SUFFIX = /(lakhs?|lpa|l)$/;
const GROWTH = /(\d+(?:\.\d+)?)%?/;

/** Keyword tables turning reality-check text into 1-5 scores. */
export interface ComparisonRules {
  /** Exact (lower-cased) stress labels. Higher means more stress. */
  stressScores: Record<string, number>;
  /** Checked in order; the first group with a keyword in the text wins. Higher means better balance. */
  balanceKeywords: Array<{ keywords: string[]; score: number }>;
  defaultScore: number;
  defaultStressLevel: string;
  defaultWorkLifeBalance: string;
}

export const DEFAULT_COMPARISON_RULES: ComparisonRules = {
  stressScores: { low: 1, 'medium-low': 2, medium: 3, 'medium-high': 4, high: 5 },
  balanceKeywords: [
    { keywords: ['excellent', 'great'], score: 5 },
    { keywords: ['good', 'flexible'], score: 4 },
    { keywords: ['moderate', 'balanced'], score: 3 },
    { keywords: ['challenging', 'demanding'], score: 2 },
    { keywords: ['poor', 'intense'], score: 1 },
  ],
  defaultScore: 3,
  defaultStressLevel: 'Medium',
  defaultWorkLifeBalance: 'Moderate',
};

export interface ComparedCareer {
  name: string;
  salary: string;
  salary_numeric: number;
  stress_level: string;
  stress_score: number;
  work_life_balance: string;
  work_life_score: number;
  growth_rate: string;
  growth_numeric: number;
  required_skills: string[];
  skills_complexity: number;
  description: string;
  job_outlook: string;
}

export interface ComparisonRankings {
  salary: string[];
  stress_level: string[];
  work_life_balance: string[];
  growth_rate: string[];
  skills_complexity: string[];
}

export interface ComparisonMetrics {
  salary: Record<string, number>;
  stress_level: Record<string, number>;
  work_life_balance: Record<string, number>;
  growth_rate: Record<string, number>;
  skills_complexity: Record<string, number>;
}

export interface CareerComparison {
  careers: ComparedCareer[];
  comparison_metrics: ComparisonMetrics;
  rankings: ComparisonRankings;
  region: Region;
}

export interface DetailedComparison {
  career_a: ComparedCareer;
  career_b: ComparedCareer;
  winner_analysis: {
    salary: string;
    work_life_balance: string;
    low_stress: string;
    growth_potential: string;
    easier_entry: string;
  };
  region: Region;
}

/**
 * Salary text to a number: currency symbols, commas and spaces are dropped,
 * a range becomes the truncated mean of its bounds and a lakh suffix
 * multiplies by 100,000. Anything unparsable is 0.
 */
export function normalizeSalary(salary: string | undefined): number {
  if (!salary || salary === 'N/A') return 0;

  const parts = salary.replace(/[$₹,\s]/g, '').toLowerCase().split('-');
  if (parts.length > 2) return 0;

  const inLakhs = parts.some((part) => LAKH_SUFFIX.test(part));
  const amounts = parts.map((part) => part.replace(LAKH_SUFFIX, ''));
  if (!amounts.every((amount) => AMOUNT.test(amount))) return 0;

  const values = amounts.map((amount) => Number(amount) * (inLakhs ? LAKH : 1));
  return Math.trunc(values.reduce((sum, value) => sum + value, 0) / values.length);
}

export function extractGrowthRate(growth: string | undefined): number {
  if (!growth || growth === 'N/A') return 0;
  const match = GROWTH.exec(growth);
  return match?.[1] === undefined ? 0 : Number(match[1]);
}

export function skillsComplexity(requiredSkills: readonly string[]): number {
  return Math.min(5, Math.max(1, Math.floor(requiredSkills.length / 2)));
}

export class ComparisonEngine {
  constructor(
    private readonly store: ReferenceDataStore,
    private readonly rules: ComparisonRules = DEFAULT_COMPARISON_RULES
  ) {}

  stressScore(stressLevel: string): number {
    return this.rules.stressScores[stressLevel.trim().toLowerCase()] ?? this.rules.defaultScore;
  }

  workLifeScore(balance: string): number {
    const text = balance.toLowerCase();
    const group = this.rules.balanceKeywords.find(({ keywords }) => keywords.some((keyword) => text.includes(keyword)));
    return group?.score ?? this.rules.defaultScore;
  }

  /** Careers comparable in a region; "all" lists every known career. */
  availableCareers(region: Region | 'all' = 'global'): string[] {
    const names: string[] = [];
    for (const [name, career] of this.store.getComparableCareers()) {
      const overlaid = career.india_salary !== undefined;
      if (region === 'all' || career.region === region || overlaid) {
        names.push(name);
      }
    }
    return region === 'all' ? names : names.sort();
  }

  compareCareers(names: readonly string[], region: Region = 'global'): CareerComparison {
    if (names.length < MIN_COMPARED) {
      throw new ValidationError(`Please select at least ${MIN_COMPARED} careers to compare`);
    }
    if (names.length > MAX_COMPARED) {
      throw new ValidationError(`Maximum ${MAX_COMPARED} careers can be compared at once`);
    }

    const resolved = names.map((name) => this.resolve(name));
    const duplicate = resolved.find((career, i) => resolved.findIndex((other) => other.name === career.name) !== i);
    if (duplicate) {
      throw new ValidationError(`Career '${duplicate.name}' was selected more than once`);
    }

    const careers = resolved.map((career) => this.describe(career, region));
    return {
      careers,
      comparison_metrics: metricsOf(careers),
      rankings: rankingsOf(careers),
      region,
    };
  }

  /** Side-by-side view of two careers; on a tie the second career wins the metric. */
  detailedComparison(first: string, second: string, region: Region = 'global'): DetailedComparison {
    const {
      careers: [a, b],
    } = this.compareCareers([first, second], region);
    if (!a || !b) {
      throw new ValidationError('Both careers must be available for comparison');
    }

    return {
      career_a: a,
      career_b: b,
      winner_analysis: {
        salary: a.salary_numeric > b.salary_numeric ? a.name : b.name,
        work_life_balance: a.work_life_score > b.work_life_score ? a.name : b.name,
        low_stress: a.stress_score < b.stress_score ? a.name : b.name,
        growth_potential: a.growth_numeric > b.growth_numeric ? a.name : b.name,
        easier_entry: a.skills_complexity < b.skills_complexity ? a.name : b.name,
      },
      region,
    };
  }

  private resolve(name: string): ComparableCareer {
    const careers = this.store.getComparableCareers();
    const key = findKey(careers.keys(), name);
    const career = key === undefined ? undefined : careers.get(key);
    if (!career) {
      throw new NotFoundError(`Career '${name}' not found`, this.availableCareers('all'));
    }
    return career;
  }

  private describe(career: ComparableCareer, region: Region): ComparedCareer {
    const salary = region === 'india' && career.india_salary !== undefined ? career.india_salary : career.median_salary;
    const reality = this.store.getRealityCheck().career_reality_data[career.name]?.reality_check;
    const stressLevel = reality?.stress_level ?? this.rules.defaultStressLevel;
    const workLifeBalance = reality?.work_life_balance ?? this.rules.defaultWorkLifeBalance;
    const growthRate = career.growth_rate || 'N/A';

    return {
      name: career.name,
      salary: salary || 'N/A',
      salary_numeric: normalizeSalary(salary),
      stress_level: stressLevel,
      stress_score: this.stressScore(stressLevel),
      work_life_balance: workLifeBalance,
      work_life_score: this.workLifeScore(workLifeBalance),
      growth_rate: growthRate,
      growth_numeric: extractGrowthRate(growthRate),
      required_skills: [...career.required_skills],
      skills_complexity: skillsComplexity(career.required_skills),
      description: career.description,
      job_outlook: career.job_outlook ?? 'N/A',
    };
  }
}

function rankingsOf(careers: readonly ComparedCareer[]): ComparisonRankings {
  const names = (sorted: ComparedCareer[]) => sorted.map((career) => career.name);
  return {
    salary: names(rankBy(careers, (c) => c.salary_numeric, 'desc')),
    stress_level: names(rankBy(careers, (c) => c.stress_score, 'asc')),
    work_life_balance: names(rankBy(careers, (c) => c.work_life_score, 'desc')),
    growth_rate: names(rankBy(careers, (c) => c.growth_numeric, 'desc')),
    skills_complexity: names(rankBy(careers, (c) => c.skills_complexity, 'asc')),
  };
}

function metricsOf(careers: readonly ComparedCareer[]): ComparisonMetrics {
  const metric = (value: (career: ComparedCareer) => number) =>
    Object.fromEntries(careers.map((career) => [career.name, value(career)]));
  return {
    salary: metric((c) => c.salary_numeric),
    stress_level: metric((c) => c.stress_score),
    work_life_balance: metric((c) => c.work_life_score),
    growth_rate: metric((c) => c.growth_numeric),
    skills_complexity: metric((c) => c.skills_complexity),
  };
}
