import { RISK_DIMENSIONS, RISK_LEVELS, MODES, REGIONS, type ReferenceData } from '../types/index.js';
import { weightTotal } from './store.js';

const WEIGHT_TOLERANCE = 1e-9;
const TYPE_CODE = /^[EI][SN][TF][JP]$/;

export type FindingSeverity = 'error' | 'warning';

export interface AuditFinding {
  severity: FindingSeverity;
  table: string;
  message: string;
}

export interface TableCounts {
  careers: Record<string, number>;
  role_models: Record<string, number>;
  personality_types: number;
  tips: number;
  reality_checks: number;
  simulations: number;
  trending_careers: Record<string, number>;
}

export function countTables(data: ReferenceData): TableCounts {
  return {
    careers: Object.fromEntries(REGIONS.map((region) => [region, data.careers[region].length])),
    role_models: Object.fromEntries(REGIONS.map((region) => [region, data.roleModels[region].length])),
    personality_types: Object.keys(data.personality.types).length,
    tips: data.tips.length,
    reality_checks: Object.keys(data.realityCheck.career_reality_data).length,
    simulations: Object.keys(data.simulations.career_simulations).length,
    trending_careers: Object.fromEntries(
      REGIONS.map((region) => [region, data.trendingCareers.trending_careers_2025_2035[region].length])
    ),
  };
}

/**
 * Checks the tables against the invariants the engine relies on: weight
 * vectors summing to 1, stress levels in 1-5, risk bands covering [0, 1]
 * and unique keys.
 */
export function auditReferenceData(data: ReferenceData): AuditFinding[] {
  const findings: AuditFinding[] = [];
  const error = (table: string, message: string) => findings.push({ severity: 'error', table, message });
  const warn = (table: string, message: string) => findings.push({ severity: 'warning', table, message });

  for (const mode of MODES) {
    const total = weightTotal(data.modeConfig.modes[mode].assessment_weight);
    if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
      warn('mode_config', `${mode} weights sum to ${total} and are rescaled at load`);
    }
  }

  for (const region of REGIONS) {
    const seen = new Set<string>();
    for (const career of data.careers[region]) {
      if (seen.has(career.name)) error(`careers (${region})`, `duplicate career '${career.name}'`);
      seen.add(career.name);
      if (career.required_skills.length === 0) warn(`careers (${region})`, `'${career.name}' lists no required skills`);
    }
  }

  for (const [name, simulation] of Object.entries(data.simulations.career_simulations)) {
    simulation.daily_schedule.forEach((task, i) => {
      if (!Number.isInteger(task.stress_level) || task.stress_level < 1 || task.stress_level > 5) {
        error('career_simulations', `${name} task ${i + 1} has stress level ${task.stress_level}`);
      }
    });
    if (simulation.daily_schedule.length === 0) warn('career_simulations', `${name} has an empty schedule`);
  }

  for (const dimension of RISK_DIMENSIONS) {
    const bands = RISK_LEVELS.map((level) => data.riskCriteria.failure_warning_criteria[dimension].warning_levels[level]);
    const ranges = bands.map((band) => band.score_range).sort((a, b) => a[0] - b[0]);
    const first = ranges[0];
    const last = ranges[ranges.length - 1];
    if (!first || first[0] > 0) error('failure_warning_criteria', `${dimension} bands do not start at 0`);
    if (!last || last[1] < 1) error('failure_warning_criteria', `${dimension} bands do not reach 1`);
    for (let i = 1; i < ranges.length; i++) {
      const previous = ranges[i - 1];
      const current = ranges[i];
      if (previous && current && current[0] > previous[1]) {
        error('failure_warning_criteria', `${dimension} has a gap between ${previous[1]} and ${current[0]}`);
      }
    }
  }

  for (const code of Object.keys(data.personality.types)) {
    if (!TYPE_CODE.test(code)) error('personality', `'${code}' is not a four-letter type code`);
  }
  const covered = new Set(data.personality.questions.map((question) => question.dimension));
  for (const [a, b] of [
    ['extraversion', 'introversion'],
    ['sensing', 'intuition'],
    ['thinking', 'feeling'],
    ['judging', 'perceiving'],
  ] as const) {
    if (!covered.has(a) && !covered.has(b)) warn('personality', `no question scores ${a}/${b}`);
  }

  const tipIds = new Set<string>();
  for (const tip of data.tips) {
    if (tipIds.has(tip.id)) error('career_tips', `duplicate tip id '${tip.id}'`);
    tipIds.add(tip.id);
  }

  const { trending_careers_2025_2035: trending, trend_categories, time_horizons } = data.trendingCareers;
  const categoryIds = new Set(trend_categories.map((category) => category.id));
  const horizonIds = new Set(time_horizons.map((horizon) => horizon.id));
  for (const region of REGIONS) {
    for (const career of trending[region]) {
      if (!horizonIds.has(career.peak_horizon)) {
        error(`trending_careers (${region})`, `'${career.name}' peaks in unknown horizon '${career.peak_horizon}'`);
      }
      for (const id of Object.keys(career.trend_scores)) {
        if (!categoryIds.has(id)) warn(`trending_careers (${region})`, `'${career.name}' scores unknown category '${id}'`);
      }
    }
  }

  return findings;
}
