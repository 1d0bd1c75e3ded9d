import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { componentLogger } from '../utils/logger.js';
import { ConfigurationMissingError, ReferenceDataError } from '../utils/errors.js';
import { FieldReader } from '../utils/validation.js';
import {
  PERSONALITY_DIMENSIONS,
  REGIONS,
  type Career,
  type CareerRiskProfile,
  type CareerTip,
  type DimensionWeights,
  type LearningResource,
  type ModeConfig,
  type ModeDescriptor,
  type PersonalityArchetype,
  type PersonalityCatalog,
  type RealityCheckEntry,
  type RealityCheckTable,
  type ReferenceData,
  type Region,
  type RegionDescriptor,
  type RegionalSimulationOverride,
  type RiskCriteriaTable,
  type RiskDimensionCriteria,
  type RoleModel,
  type ScheduledTask,
  type SimulationRecord,
  type SimulationTable,
  type SkillTaxonomy,
  type TimeHorizon,
  type TrendCategory,
  type TrendingCareer,
  type TrendingCareersTable,
  type WarningBand,
} from '../types/index.js';
import {
  DEFAULT_CAREERS,
  DEFAULT_MODE_CONFIG,
  DEFAULT_PERSONALITY,
  DEFAULT_REALITY_CHECK,
  DEFAULT_RISK_CRITERIA,
  DEFAULT_SIMULATIONS,
  DEFAULT_TAXONOMY,
  DEFAULT_TRENDING_CAREERS,
} from './defaults.js';

const logger = componentLogger('reference-data');

export const REFERENCE_FILES = {
  modeConfig: 'mode_config.json',
  taxonomy: 'skills_mapping.json',
  personality: 'personality.json',
  tips: 'career_tips.csv',
  realityCheck: 'career_reality_check.json',
  simulations: 'career_simulations.json',
  riskCriteria: 'failure_warning_criteria.json',
  trendingCareers: 'trending_careers.json',
} as const;

function readerFor(file: string): FieldReader {
  return new FieldReader((message) => {
    throw new ReferenceDataError(message, file);
  });
}

function readText(dataDir: string, file: string): string {
  const filePath = path.join(dataDir, file);
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationMissingError(file);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

function readJson(dataDir: string, file: string): unknown {
  const text = readText(dataDir, file);
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ReferenceDataError(error instanceof Error ? error.message : 'invalid JSON', file);
  }
}

function mapRecord<T>(
  r: FieldReader,
  value: unknown,
  where: string,
  read: (item: unknown, key: string) => T
): Record<string, T> {
  const out: Record<string, T> = {};
  for (const [key, item] of Object.entries(r.record(value, where))) {
    out[key] = read(item, `${where}.${key}`);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Parsers, one per reference table
// ---------------------------------------------------------------------------

export function parseModeConfig(raw: unknown, file: string = REFERENCE_FILES.modeConfig): ModeConfig {
  const r = readerFor(file);
  const root = r.record(raw, 'root');
  const regions = r.record(root.regions, 'regions');
  const modes = r.record(root.modes, 'modes');

  const readRegion = (region: Region): RegionDescriptor => {
    const entry = r.record(regions[region], `regions.${region}`);
    return {
      career_file: r.string(entry.career_file, `regions.${region}.career_file`),
      role_model_file: r.string(entry.role_model_file, `regions.${region}.role_model_file`),
      currency: r.string(entry.currency, `regions.${region}.currency`),
      salary_prefix: r.string(entry.salary_prefix, `regions.${region}.salary_prefix`),
    };
  };

  const readWeights = (value: unknown, where: string): DimensionWeights => {
    const w = r.record(value, where);
    return {
      interests: r.number(w.interests, `${where}.interests`),
      skills: r.number(w.skills, `${where}.skills`),
      subjects: r.number(w.subjects, `${where}.subjects`),
      personality: r.number(w.personality, `${where}.personality`),
    };
  };

  const readMode = (value: unknown, where: string): ModeDescriptor => {
    const entry = r.record(value, where);
    const descriptor: ModeDescriptor = {
      assessment_weight: readWeights(entry.assessment_weight, `${where}.assessment_weight`),
    };
    const description = r.optionalString(entry.description, `${where}.description`);
    if (description !== undefined) descriptor.description = description;
    if (entry.tip_categories !== undefined) {
      descriptor.tip_categories = r.stringArray(entry.tip_categories, `${where}.tip_categories`);
    }
    return descriptor;
  };

  return {
    regions: { global: readRegion('global'), india: readRegion('india') },
    modes: {
      student: readMode(modes.student, 'modes.student'),
      professional: readMode(modes.professional, 'modes.professional'),
    },
  };
}

export function parseCareers(raw: unknown, file: string): Career[] {
  const r = readerFor(file);
  return r.array(raw, 'root').map((item, i) => {
    const where = `[${i}]`;
    const entry = r.record(item, where);
    const career: Career = {
      name: r.string(entry.name, `${where}.name`),
      required_skills: r.optionalStringArray(entry.required_skills, `${where}.required_skills`),
      interests: r.optionalStringArray(entry.interests, `${where}.interests`),
      subjects: r.optionalStringArray(entry.subjects, `${where}.subjects`),
      personality_traits: r.optionalStringArray(entry.personality_traits, `${where}.personality_traits`),
      description: r.optionalString(entry.description, `${where}.description`) ?? '',
      growth_rate: r.optionalString(entry.growth_rate, `${where}.growth_rate`) ?? 'N/A',
      median_salary: r.optionalString(entry.median_salary, `${where}.median_salary`) ?? 'N/A',
    };
    const outlook = r.optionalString(entry.job_outlook, `${where}.job_outlook`);
    if (outlook !== undefined) career.job_outlook = outlook;
    return career;
  });
}

export function parseTaxonomy(raw: unknown, file: string = REFERENCE_FILES.taxonomy): SkillTaxonomy {
  const r = readerFor(file);
  const root = r.record(raw, 'root');

  const readResource = (value: unknown, where: string): LearningResource => {
    const entry = r.record(value, where);
    const resource: LearningResource = {
      beginner: r.optionalStringArray(entry.beginner, `${where}.beginner`),
      time_estimate: r.string(entry.time_estimate, `${where}.time_estimate`),
    };
    if (entry.intermediate !== undefined) {
      resource.intermediate = r.stringArray(entry.intermediate, `${where}.intermediate`);
    }
    if (entry.advanced !== undefined) {
      resource.advanced = r.stringArray(entry.advanced, `${where}.advanced`);
    }
    return resource;
  };

  return {
    subjects_to_skills: mapRecord(r, root.subjects_to_skills, 'subjects_to_skills', (v, w) => r.stringArray(v, w)),
    skill_categories: mapRecord(r, root.skill_categories, 'skill_categories', (v, w) => r.stringArray(v, w)),
    learning_resources:
      root.learning_resources === undefined ? {} : mapRecord(r, root.learning_resources, 'learning_resources', readResource),
  };
}

export function parsePersonality(raw: unknown, file: string = REFERENCE_FILES.personality): PersonalityCatalog {
  const r = readerFor(file);
  const root = r.record(raw, 'root');

  const questions = r.array(root.questions, 'questions').map((item, i) => {
    const where = `questions[${i}]`;
    const entry = r.record(item, where);
    return {
      id: r.number(entry.id, `${where}.id`),
      question: r.string(entry.question, `${where}.question`),
      dimension: r.oneOf(entry.dimension, PERSONALITY_DIMENSIONS, `${where}.dimension`),
      weight: r.number(entry.weight ?? 1, `${where}.weight`),
    };
  });

  const types = mapRecord(r, root.types, 'types', (value, where): PersonalityArchetype => {
    const entry = r.record(value, where);
    return {
      name: r.string(entry.name, `${where}.name`),
      traits: r.stringArray(entry.traits, `${where}.traits`),
      careers: r.stringArray(entry.careers, `${where}.careers`),
      description: r.string(entry.description, `${where}.description`),
    };
  });

  return { questions, types };
}

export function parseRoleModels(raw: unknown, file: string): RoleModel[] {
  const r = readerFor(file);
  return r.array(raw, 'root').map((item, i) => {
    const where = `[${i}]`;
    const entry = r.record(item, where);
    const model: RoleModel = {
      name: r.string(entry.name, `${where}.name`),
      career: r.string(entry.career, `${where}.career`),
      title: r.string(entry.title, `${where}.title`),
      key_skills: r.optionalStringArray(entry.key_skills, `${where}.key_skills`),
      inspiration_quote: r.string(entry.inspiration_quote, `${where}.inspiration_quote`),
      advice: r.string(entry.advice, `${where}.advice`),
      achievements: r.optionalStringArray(entry.achievements, `${where}.achievements`),
    };
    if (entry.career_path !== undefined) {
      model.career_path = r.stringArray(entry.career_path, `${where}.career_path`);
    }
    const context = r.optionalString(entry.region_context, `${where}.region_context`);
    if (context !== undefined) model.region_context = context;
    return model;
  });
}

/** Tips are kept as CSV; `career_focus` holds a `|`-separated list. */
export function parseTips(text: string, file: string = REFERENCE_FILES.tips): CareerTip[] {
  const r = readerFor(file);
  let rows: unknown;
  try {
    rows = parse(text, { columns: true, skip_empty_lines: true, trim: true });
  } catch (error) {
    throw new ReferenceDataError(error instanceof Error ? error.message : 'invalid CSV', file);
  }

  return r.array(rows, 'rows').map((row, i) => {
    const where = `row ${i + 2}`;
    const entry = r.record(row, where);
    return {
      id: r.string(entry.id, `${where}.id`),
      title: r.string(entry.title, `${where}.title`),
      tip: r.string(entry.tip, `${where}.tip`),
      category: r.string(entry.category, `${where}.category`),
      career_focus: r
        .string(entry.career_focus, `${where}.career_focus`)
        .split('|')
        .map((focus) => focus.trim())
        .filter((focus) => focus.length > 0),
    };
  });
}

export function parseRealityCheck(raw: unknown, file: string = REFERENCE_FILES.realityCheck): RealityCheckTable {
  const r = readerFor(file);
  const root = r.record(raw, 'root');

  const data = mapRecord(r, root.career_reality_data, 'career_reality_data', (value, where): RealityCheckEntry => {
    const entry = r.record(value, where);
    const check = r.record(entry.reality_check, `${where}.reality_check`);
    const result: RealityCheckEntry = {
      reality_check: {
        stress_level: r.string(check.stress_level, `${where}.reality_check.stress_level`),
        work_life_balance: r.string(check.work_life_balance, `${where}.reality_check.work_life_balance`),
        challenges: r.optionalStringArray(check.challenges, `${where}.reality_check.challenges`),
      },
    };
    const successRate = r.optionalString(check.success_rate, `${where}.reality_check.success_rate`);
    if (successRate !== undefined) result.reality_check.success_rate = successRate;
    const timeToEstablish = r.optionalString(check.time_to_establish, `${where}.reality_check.time_to_establish`);
    if (timeToEstablish !== undefined) result.reality_check.time_to_establish = timeToEstablish;
    if (entry.common_myths !== undefined) {
      result.common_myths = r.stringArray(entry.common_myths, `${where}.common_myths`);
    }
    if (entry.backup_careers !== undefined) {
      result.backup_careers = r.stringArray(entry.backup_careers, `${where}.backup_careers`);
    }
    return result;
  });

  return {
    career_reality_data: data,
    general_insights: r.optionalStringArray(root.general_insights, 'general_insights'),
  };
}

export function parseSimulations(raw: unknown, file: string = REFERENCE_FILES.simulations): SimulationTable {
  const r = readerFor(file);
  const root = r.record(raw, 'root');

  const readTask = (value: unknown, where: string): ScheduledTask => {
    const entry = r.record(value, where);
    return {
      time: r.string(entry.time, `${where}.time`),
      task: r.string(entry.task, `${where}.task`),
      duration: r.integer(entry.duration, `${where}.duration`, 0, 24 * 60),
      stress_level: r.integer(entry.stress_level, `${where}.stress_level`, 1, 5),
      description: r.optionalString(entry.description, `${where}.description`) ?? '',
    };
  };

  const readOverrides = (value: unknown, where: string): SimulationRecord['region_specific'] => {
    const entry = r.record(value, where);
    const overrides: Partial<Record<Region, RegionalSimulationOverride>> = {};
    for (const region of REGIONS) {
      if (entry[region] === undefined) continue;
      const regional = r.record(entry[region], `${where}.${region}`);
      const override: RegionalSimulationOverride = {};
      const salary = r.optionalString(regional.salary, `${where}.${region}.salary`);
      if (salary !== undefined) override.salary = salary;
      const culture = r.optionalString(regional.work_culture, `${where}.${region}.work_culture`);
      if (culture !== undefined) override.work_culture = culture;
      overrides[region] = override;
    }
    return overrides;
  };

  const simulations = mapRecord(r, root.career_simulations, 'career_simulations', (value, where): SimulationRecord => {
    const entry = r.record(value, where);
    const hours = r.record(entry.working_hours, `${where}.working_hours`);
    const record: SimulationRecord = {
      career_title: r.string(entry.career_title, `${where}.career_title`),
      overview: r.optionalString(entry.overview, `${where}.overview`) ?? '',
      daily_schedule: r
        .array(entry.daily_schedule, `${where}.daily_schedule`)
        .map((task, i) => readTask(task, `${where}.daily_schedule[${i}]`)),
      working_hours: {
        start: r.string(hours.start, `${where}.working_hours.start`),
        end: r.string(hours.end, `${where}.working_hours.end`),
        total_hours: r.number(hours.total_hours, `${where}.working_hours.total_hours`),
      },
      average_stress_level: r.number(entry.average_stress_level, `${where}.average_stress_level`),
      work_life_balance: r.string(entry.work_life_balance, `${where}.work_life_balance`),
      salary_range: r.string(entry.salary_range, `${where}.salary_range`),
      education_required: r.string(entry.education_required, `${where}.education_required`),
      stress_factors: r.optionalStringArray(entry.stress_factors, `${where}.stress_factors`),
      rewards: r.optionalStringArray(entry.rewards, `${where}.rewards`),
    };
    const flexible = r.optionalBoolean(hours.flexible, `${where}.working_hours.flexible`);
    if (flexible !== undefined) record.working_hours.flexible = flexible;
    if (entry.region_specific !== undefined) {
      record.region_specific = readOverrides(entry.region_specific, `${where}.region_specific`);
    }
    return record;
  });

  const metadata = root.simulation_metadata === undefined ? {} : r.record(root.simulation_metadata, 'simulation_metadata');
  return {
    career_simulations: simulations,
    stress_scale:
      metadata.stress_scale === undefined
        ? {}
        : mapRecord(r, metadata.stress_scale, 'simulation_metadata.stress_scale', (v, w) => r.string(v, w)),
  };
}

export function parseRiskCriteria(raw: unknown, file: string = REFERENCE_FILES.riskCriteria): RiskCriteriaTable {
  const r = readerFor(file);
  const root = r.record(raw, 'root');
  const criteria = r.record(root.failure_warning_criteria, 'failure_warning_criteria');

  const readBand = (value: unknown, where: string): WarningBand => {
    const entry = r.record(value, where);
    const range = r.numberArray(entry.score_range, `${where}.score_range`);
    if (range.length !== 2 || range[0] > range[1]) {
      throw new ReferenceDataError(`${where}.score_range must be [min, max]`, file);
    }
    return {
      score_range: [range[0], range[1]],
      description: r.optionalString(entry.description, `${where}.description`) ?? '',
      recommendations: r.optionalStringArray(entry.recommendations, `${where}.recommendations`),
    };
  };

  const readDimension = (value: unknown, where: string): RiskDimensionCriteria => {
    const levels = r.record(r.record(value, where).warning_levels, `${where}.warning_levels`);
    return {
      warning_levels: {
        low_risk: readBand(levels.low_risk, `${where}.warning_levels.low_risk`),
        moderate_risk: readBand(levels.moderate_risk, `${where}.warning_levels.moderate_risk`),
        high_risk: readBand(levels.high_risk, `${where}.warning_levels.high_risk`),
      },
    };
  };

  const readProfile = (value: unknown, where: string): CareerRiskProfile => {
    const entry = r.record(value, where);
    return {
      career: r.string(entry.career, `${where}.career`),
      stress_level: r.number(entry.stress_level, `${where}.stress_level`),
      dropout_rate: r.string(entry.dropout_rate, `${where}.dropout_rate`),
      common_reasons: r.optionalStringArray(entry.common_reasons, `${where}.common_reasons`),
    };
  };

  return {
    failure_warning_criteria: {
      academic_consistency: readDimension(criteria.academic_consistency, 'academic_consistency'),
      interest_stability: readDimension(criteria.interest_stability, 'interest_stability'),
      stress_tolerance: readDimension(criteria.stress_tolerance, 'stress_tolerance'),
    },
    career_risk_mapping:
      root.career_risk_mapping === undefined
        ? {}
        : mapRecord(r, root.career_risk_mapping, 'career_risk_mapping', (v, w) =>
            r.array(v, w).map((item, i) => readProfile(item, `${w}[${i}]`))
          ),
    intervention_strategies:
      root.intervention_strategies === undefined
        ? {}
        : mapRecord(r, root.intervention_strategies, 'intervention_strategies', (v, w) => r.stringArray(v, w)),
  };
}

export const TREND_SCORE_MAX = 10;

export function parseTrendingCareers(
  raw: unknown,
  file: string = REFERENCE_FILES.trendingCareers
): TrendingCareersTable {
  const r = readerFor(file);
  const root = r.record(raw, 'root');
  const byRegion = r.record(root.trending_careers_2025_2035, 'trending_careers_2025_2035');

  const readCareer = (value: unknown, where: string): TrendingCareer => {
    const entry = r.record(value, where);
    return {
      name: r.string(entry.name, `${where}.name`),
      sector: r.optionalString(entry.sector, `${where}.sector`) ?? 'General',
      description: r.optionalString(entry.description, `${where}.description`) ?? '',
      trend_scores: mapRecord(r, entry.trend_scores, `${where}.trend_scores`, (score, w) =>
        r.integer(score, w, 0, TREND_SCORE_MAX)
      ),
      peak_horizon: r.string(entry.peak_horizon, `${where}.peak_horizon`),
      projected_growth: r.optionalString(entry.projected_growth, `${where}.projected_growth`) ?? 'N/A',
      key_skills: r.optionalStringArray(entry.key_skills, `${where}.key_skills`),
    };
  };

  // Only the global list is required; other regions reuse it when absent.
  const readRegion = (region: Region): TrendingCareer[] => {
    const where = `trending_careers_2025_2035.${region}`;
    const value = byRegion[region];
    if (value === undefined && region !== 'global') return [];
    return r.array(value, where).map((item, i) => readCareer(item, `${where}[${i}]`));
  };

  const categories = r.array(root.trend_categories, 'trend_categories').map((value, i): TrendCategory => {
    const entry = r.record(value, `trend_categories[${i}]`);
    return {
      id: r.string(entry.id, `trend_categories[${i}].id`),
      name: r.string(entry.name, `trend_categories[${i}].name`),
      description: r.optionalString(entry.description, `trend_categories[${i}].description`) ?? '',
    };
  });

  const horizons = r.array(root.time_horizons, 'time_horizons').map((value, i): TimeHorizon => {
    const entry = r.record(value, `time_horizons[${i}]`);
    return {
      id: r.string(entry.id, `time_horizons[${i}].id`),
      label: r.string(entry.label, `time_horizons[${i}].label`),
      years: r.string(entry.years, `time_horizons[${i}].years`),
    };
  });

  return {
    trending_careers_2025_2035: { global: readRegion('global'), india: readRegion('india') },
    trend_categories: categories,
    time_horizons: horizons,
  };
}

// ---------------------------------------------------------------------------
// Loading the directory
// ---------------------------------------------------------------------------

function withFallback<T>(label: string, load: () => T, fallback: T): T {
  try {
    return load();
  } catch (error) {
    if (error instanceof ConfigurationMissingError) {
      logger.warn(`${error.message}; using built-in ${label}`);
      return fallback;
    }
    throw error;
  }
}

/**
 * Reads every reference file under `dataDir`. Absent files fall back to the
 * built-in tables; malformed files raise ReferenceDataError.
 */
export function loadReferenceData(dataDir: string): ReferenceData {
  logger.info('Loading reference data', { dataDir });

  const modeConfig = withFallback(
    'mode configuration',
    () => parseModeConfig(readJson(dataDir, REFERENCE_FILES.modeConfig)),
    DEFAULT_MODE_CONFIG
  );

  const careersFor = (region: Region): Career[] => {
    const file = modeConfig.regions[region].career_file;
    return withFallback(`${region} careers`, () => parseCareers(readJson(dataDir, file), file), DEFAULT_CAREERS);
  };

  const roleModelsFor = (region: Region): RoleModel[] => {
    const file = modeConfig.regions[region].role_model_file;
    return withFallback(`${region} role models`, () => parseRoleModels(readJson(dataDir, file), file), []);
  };

  const data: ReferenceData = {
    modeConfig,
    careers: { global: careersFor('global'), india: careersFor('india') },
    taxonomy: withFallback('skill taxonomy', () => parseTaxonomy(readJson(dataDir, REFERENCE_FILES.taxonomy)), DEFAULT_TAXONOMY),
    personality: withFallback(
      'personality catalog',
      () => parsePersonality(readJson(dataDir, REFERENCE_FILES.personality)),
      DEFAULT_PERSONALITY
    ),
    roleModels: { global: roleModelsFor('global'), india: roleModelsFor('india') },
    tips: withFallback('career tips', () => parseTips(readText(dataDir, REFERENCE_FILES.tips)), []),
    realityCheck: withFallback(
      'reality checks',
      () => parseRealityCheck(readJson(dataDir, REFERENCE_FILES.realityCheck)),
      DEFAULT_REALITY_CHECK
    ),
    simulations: withFallback(
      'simulations',
      () => parseSimulations(readJson(dataDir, REFERENCE_FILES.simulations)),
      DEFAULT_SIMULATIONS
    ),
    riskCriteria: withFallback(
      'risk criteria',
      () => parseRiskCriteria(readJson(dataDir, REFERENCE_FILES.riskCriteria)),
      DEFAULT_RISK_CRITERIA
    ),
    trendingCareers: withFallback(
      'trending careers',
      () => parseTrendingCareers(readJson(dataDir, REFERENCE_FILES.trendingCareers)),
      DEFAULT_TRENDING_CAREERS
    ),
  };

  logger.info('Reference data loaded', {
    globalCareers: data.careers.global.length,
    indiaCareers: data.careers.india.length,
    tips: data.tips.length,
    simulations: Object.keys(data.simulations.career_simulations).length,
  });

  return data;
}
