import { findKey, type ReferenceDataStore } from '../data/store.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { rankBy } from './ranker.js';
import type { Region, ScheduledTask, SimulationRecord, WorkingHours } from '../types/index.js';

export interface PeakStress {
  time: string | null;
  task: string | null;
  stress_level: number;
}

export interface WorkIntensity {
  total_work_minutes: number;
  average_intensity: number;
  max_continuous_work_minutes: number;
  work_life_balance_score: number;
}

export interface SimulationResult extends SimulationRecord {
  work_culture?: string;
  total_tasks: number;
  peak_stress_time: PeakStress;
  stress_distribution: Record<string, number>;
  work_intensity: WorkIntensity;
}

export interface SimulationSummary {
  career_title: string;
  overview: string;
  working_hours: WorkingHours;
  average_stress_level: number;
  work_life_balance: string;
  salary_range: string;
  key_stress_factors: string[];
  key_rewards: string[];
  peak_stress_time: PeakStress;
  work_intensity: WorkIntensity;
}

export interface StressTimeline {
  career_title: string;
  timeline: Array<Pick<ScheduledTask, 'time' | 'task' | 'stress_level' | 'duration' | 'description'>>;
  stress_scale: Record<string, string>;
  average_stress: number;
}

export interface SimulationComparison {
  careers: SimulationSummary[];
  rankings: {
    lowest_stress: string[];
    best_work_life_balance: string[];
    shortest_hours: string[];
    highest_intensity: string[];
  };
  region: Region;
}

export type Period = 'Morning' | 'Afternoon' | 'Evening';

export interface DailyPatterns {
  morning_stress_avg: number;
  afternoon_stress_avg: number;
  evening_stress_avg: number;
  most_stressful_period: Period;
}

export interface CareerInsights {
  career_title: string;
  daily_patterns: DailyPatterns;
  work_characteristics: {
    total_working_hours: number;
    flexibility: 'High' | 'Medium';
    physical_demands: 'High' | 'Low';
    mental_demands: 'High' | 'Medium';
  };
  career_progression: {
    entry_barrier: 'High' | 'Medium';
    learning_curve: 'Steep' | 'Moderate';
    growth_potential: 'High' | 'Medium';
  };
  lifestyle_impact: {
    work_life_balance_rating: number;
    social_impact: 'High' | 'Medium';
    financial_stability: 'High' | 'Medium';
  };
}

/** Career lists and markers behind the qualitative insight ratings. */
export interface SimulationInsightRules {
  physicallyDemanding: string[];
  highGrowth: string[];
  highSocialImpact: string[];
  /** Case-insensitive markers in a salary range that signal a well-paid career. */
  highSalaryMarkers: string[];
  entryBarrierKeyword: string;
}

export const DEFAULT_INSIGHT_RULES: SimulationInsightRules = {
  physicallyDemanding: ['Doctor', 'IAS Officer'],
  highGrowth: ['Doctor', 'IAS Officer', 'Software Engineer'],
  highSocialImpact: ['Doctor', 'IAS Officer', 'Teacher'],
  highSalaryMarkers: ['high', '$'],
  entryBarrierKeyword: 'degree',
};

const MORNING_TASKS = 3;
const AFTERNOON_TASKS = 3;

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Highest-stress task; strict comparison, so the earliest one wins a tie. */
export function peakStress(schedule: readonly ScheduledTask[]): PeakStress {
  const peak: PeakStress = { time: null, task: null, stress_level: 0 };
  for (const task of schedule) {
    if (task.stress_level > peak.stress_level) {
      peak.time = task.time;
      peak.task = task.task;
      peak.stress_level = task.stress_level;
    }
  }
  return peak;
}

export function stressDistribution(schedule: readonly ScheduledTask[]): Record<string, number> {
  const distribution: Record<string, number> = { '1': 0, '2': 0, '3': 0, '4': 0, '5': 0 };
  for (const task of schedule) {
    const level = String(task.stress_level);
    distribution[level] = (distribution[level] ?? 0) + 1;
  }
  return distribution;
}

/** 1-5, higher is better. */
export function workLifeBalanceScore(schedule: readonly ScheduledTask[]): number {
  const total = schedule.length;
  if (total === 0) return 3;

  const highStress = schedule.filter((task) => task.stress_level >= 4).length / total;
  const breaks = schedule.filter((task) => task.stress_level <= 1).length / total;
  if (highStress > 0.4) return 2;
  if (highStress > 0.2) return 3;
  if (breaks > 0.2) return 4;
  return 3;
}

/**
 * Duration-weighted mean stress, plus the longest unbroken stretch of tasks
 * at stress 2 or above.
 */
export function workIntensity(schedule: readonly ScheduledTask[]): WorkIntensity {
  let totalMinutes = 0;
  let weighted = 0;
  let longest = 0;
  let current = 0;

  for (const task of schedule) {
    totalMinutes += task.duration;
    weighted += task.duration * task.stress_level;
    if (task.stress_level >= 2) {
      current += task.duration;
      longest = Math.max(longest, current);
    } else {
      current = 0;
    }
  }

  return {
    total_work_minutes: totalMinutes,
    average_intensity: totalMinutes > 0 ? round(weighted / totalMinutes, 2) : 0,
    max_continuous_work_minutes: longest,
    work_life_balance_score: workLifeBalanceScore(schedule),
  };
}

/**
 * Morning is the first three tasks, afternoon the next three, evening the
 * rest. An empty period averages 0; ties go to the earlier period.
 */
export function dailyPatterns(schedule: readonly ScheduledTask[]): DailyPatterns {
  const levels = schedule.map((task) => task.stress_level);
  const morning = mean(levels.slice(0, MORNING_TASKS));
  const afternoon = mean(levels.slice(MORNING_TASKS, MORNING_TASKS + AFTERNOON_TASKS));
  const evening = mean(levels.slice(MORNING_TASKS + AFTERNOON_TASKS));

  let period: Period = 'Evening';
  if (morning >= Math.max(afternoon, evening)) period = 'Morning';
  else if (afternoon >= evening) period = 'Afternoon';

  return {
    morning_stress_avg: round(morning, 1),
    afternoon_stress_avg: round(afternoon, 1),
    evening_stress_avg: round(evening, 1),
    most_stressful_period: period,
  };
}

export class SimulationMetricsEngine {
  constructor(
    private readonly store: ReferenceDataStore,
    private readonly rules: SimulationInsightRules = DEFAULT_INSIGHT_RULES
  ) {}

  availableCareers(): string[] {
    return Object.keys(this.store.getSimulations().career_simulations);
  }

  getSimulation(careerName: string, region: Region = 'global'): SimulationResult {
    const record = this.find(careerName);
    const simulation: SimulationResult = {
      ...record,
      daily_schedule: [...record.daily_schedule],
      total_tasks: record.daily_schedule.length,
      peak_stress_time: peakStress(record.daily_schedule),
      stress_distribution: stressDistribution(record.daily_schedule),
      work_intensity: workIntensity(record.daily_schedule),
    };

    const override = record.region_specific?.[region];
    if (override) {
      simulation.salary_range = override.salary ?? record.salary_range;
      simulation.work_culture = override.work_culture ?? 'Standard work culture';
    }
    return simulation;
  }

  summary(careerName: string, region: Region = 'global'): SimulationSummary {
    const simulation = this.getSimulation(careerName, region);
    return {
      career_title: simulation.career_title,
      overview: simulation.overview,
      working_hours: simulation.working_hours,
      average_stress_level: simulation.average_stress_level,
      work_life_balance: simulation.work_life_balance,
      salary_range: simulation.salary_range,
      key_stress_factors: simulation.stress_factors.slice(0, 3),
      key_rewards: simulation.rewards.slice(0, 3),
      peak_stress_time: simulation.peak_stress_time,
      work_intensity: simulation.work_intensity,
    };
  }

  stressTimeline(careerName: string, region: Region = 'global'): StressTimeline {
    const simulation = this.getSimulation(careerName, region);
    return {
      career_title: simulation.career_title,
      timeline: simulation.daily_schedule.map(({ time, task, stress_level, duration, description }) => ({
        time,
        task,
        stress_level,
        duration,
        description,
      })),
      stress_scale: { ...this.store.getSimulations().stress_scale },
      average_stress: simulation.average_stress_level,
    };
  }

  /** Unknown careers are skipped; at least two must remain. */
  compareSimulations(careerNames: readonly string[], region: Region = 'global'): SimulationComparison {
    if (careerNames.length < 2) {
      throw new ValidationError('Please select at least 2 careers to compare');
    }

    const summaries: SimulationSummary[] = [];
    for (const name of careerNames) {
      try {
        summaries.push(this.summary(name, region));
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error;
        logger.debug(`Skipping simulation comparison for unknown career: ${name}`);
      }
    }
    if (summaries.length < 2) {
      throw new ValidationError('Not enough valid careers for comparison');
    }

    const titles = (sorted: SimulationSummary[]) => sorted.map((summary) => summary.career_title);
    return {
      careers: summaries,
      rankings: {
        lowest_stress: titles(rankBy(summaries, (s) => s.average_stress_level, 'asc')),
        best_work_life_balance: titles(rankBy(summaries, (s) => s.work_intensity.work_life_balance_score, 'desc')),
        shortest_hours: titles(rankBy(summaries, (s) => s.working_hours.total_hours, 'asc')),
        highest_intensity: titles(rankBy(summaries, (s) => s.work_intensity.average_intensity, 'desc')),
      },
      region,
    };
  }

  insights(careerName: string, region: Region = 'global'): CareerInsights {
    const simulation = this.getSimulation(careerName, region);
    const name = this.canonicalName(careerName);
    const { rules } = this;
    const salary = simulation.salary_range.toLowerCase();
    const demanding = simulation.average_stress_level > 3;

    return {
      career_title: simulation.career_title,
      daily_patterns: dailyPatterns(simulation.daily_schedule),
      work_characteristics: {
        total_working_hours: simulation.working_hours.total_hours,
        flexibility: simulation.working_hours.flexible ? 'High' : 'Medium',
        physical_demands: rules.physicallyDemanding.includes(name) ? 'High' : 'Low',
        mental_demands: demanding ? 'High' : 'Medium',
      },
      career_progression: {
        entry_barrier: simulation.education_required.toLowerCase().includes(rules.entryBarrierKeyword)
          ? 'High'
          : 'Medium',
        learning_curve: demanding ? 'Steep' : 'Moderate',
        growth_potential: rules.highGrowth.includes(name) ? 'High' : 'Medium',
      },
      lifestyle_impact: {
        work_life_balance_rating: simulation.work_intensity.work_life_balance_score,
        social_impact: rules.highSocialImpact.includes(name) ? 'High' : 'Medium',
        financial_stability: rules.highSalaryMarkers.some((marker) => salary.includes(marker.toLowerCase()))
          ? 'High'
          : 'Medium',
      },
    };
  }

  private canonicalName(careerName: string): string {
    return findKey(this.availableCareers(), careerName) ?? careerName;
  }

  private find(careerName: string): SimulationRecord {
    const simulations = this.store.getSimulations().career_simulations;
    const key = findKey(Object.keys(simulations), careerName);
    const record = key === undefined ? undefined : simulations[key];
    if (!record) {
      throw new NotFoundError(`Simulation not available for ${careerName}`, this.availableCareers());
    }
    return record;
  }
}
