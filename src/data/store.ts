import config from '../config/index.js';
import { logger } from '../utils/logger.js';
import { ReferenceDataError } from '../utils/errors.js';
import { builtInReferenceData } from './defaults.js';
import { loadReferenceData, REFERENCE_FILES } from './loaders.js';
import {
  type Career,
  type CareerTip,
  type ComparableCareer,
  type DimensionWeights,
  type Mode,
  type ModeConfig,
  type ModeDescriptor,
  type PersonalityCatalog,
  type RealityCheckTable,
  type ReferenceData,
  type Region,
  type RegionDescriptor,
  type RiskCriteriaTable,
  type RoleModel,
  type SimulationTable,
  type SkillTaxonomy,
  type TrendingCareersTable,
} from '../types/index.js';

const WEIGHT_TOLERANCE = 1e-9;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function weightTotal(weights: DimensionWeights): number {
  return weights.interests + weights.skills + weights.subjects + weights.personality;
}

/** Rescales a weight vector so it sums to 1. */
export function normalizeWeights(weights: DimensionWeights): DimensionWeights {
  const total = weightTotal(weights);
  if (total <= 0) {
    throw new ReferenceDataError('assessment weights must have a positive sum', REFERENCE_FILES.modeConfig);
  }
  if (Math.abs(total - 1) <= WEIGHT_TOLERANCE) {
    return weights;
  }
  return {
    interests: weights.interests / total,
    skills: weights.skills / total,
    subjects: weights.subjects / total,
    personality: weights.personality / total,
  };
}

function normalizeMode(mode: Mode, descriptor: ModeDescriptor): ModeDescriptor {
  const total = weightTotal(descriptor.assessment_weight);
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    logger.warn(`Assessment weights for ${mode} mode sum to ${total}; rescaling to 1`);
  }
  return { ...descriptor, assessment_weight: normalizeWeights(descriptor.assessment_weight) };
}

function normalizeModeConfig(modeConfig: ModeConfig): ModeConfig {
  return {
    regions: modeConfig.regions,
    modes: {
      student: normalizeMode('student', modeConfig.modes.student),
      professional: normalizeMode('professional', modeConfig.modes.professional),
    },
  };
}

/**
 * The India table overlays salary and outlook onto global careers of the same
 * name; careers only the India table knows are added with region "india".
 */
function mergeComparableCareers(careers: ReferenceData['careers']): Map<string, ComparableCareer> {
  const merged = new Map<string, ComparableCareer>();
  for (const career of careers.global) {
    merged.set(career.name, { ...career, region: 'global' });
  }
  for (const career of careers.india) {
    const existing = merged.get(career.name);
    if (existing) {
      merged.set(career.name, {
        ...existing,
        india_salary: career.median_salary || 'N/A',
        india_outlook: career.job_outlook ?? 'N/A',
      });
    } else {
      merged.set(career.name, { ...career, region: 'india' });
    }
  }
  return merged;
}

/**
 * Read-only holder of every reference table. Built once, frozen, and shared
 * by all engine components.
 */
export class ReferenceDataStore {
  private readonly data: ReferenceData;
  private readonly comparable: ReadonlyMap<string, ComparableCareer>;

  constructor(data: ReferenceData) {
    this.data = deepFreeze({ ...data, modeConfig: normalizeModeConfig(data.modeConfig) });
    const comparable = mergeComparableCareers(this.data.careers);
    for (const career of comparable.values()) deepFreeze(career);
    this.comparable = comparable;
  }

  /** Built-in tables with any of the given sections replacing them. */
  static fromPartial(partial: Partial<ReferenceData> = {}): ReferenceDataStore {
    return new ReferenceDataStore({ ...builtInReferenceData(), ...partial });
  }

  static load(dataDir: string = config.paths.dataDir): ReferenceDataStore {
    return new ReferenceDataStore(loadReferenceData(dataDir));
  }

  getModeConfig(): ModeConfig {
    return this.data.modeConfig;
  }

  getRegionInfo(region: Region): RegionDescriptor {
    return this.data.modeConfig.regions[region];
  }

  getModeInfo(mode: Mode): ModeDescriptor {
    return this.data.modeConfig.modes[mode];
  }

  getModeWeights(mode: Mode): DimensionWeights {
    return this.data.modeConfig.modes[mode].assessment_weight;
  }

  getCareers(region: Region): readonly Career[] {
    return this.data.careers[region];
  }

  getComparableCareers(): ReadonlyMap<string, ComparableCareer> {
    return this.comparable;
  }

  getTaxonomy(): SkillTaxonomy {
    return this.data.taxonomy;
  }

  getPersonality(): PersonalityCatalog {
    return this.data.personality;
  }

  getRoleModels(region: Region): readonly RoleModel[] {
    return this.data.roleModels[region];
  }

  getTips(): readonly CareerTip[] {
    return this.data.tips;
  }

  getRealityCheck(): RealityCheckTable {
    return this.data.realityCheck;
  }

  getSimulations(): SimulationTable {
    return this.data.simulations;
  }

  getRiskCriteria(): RiskCriteriaTable {
    return this.data.riskCriteria;
  }

  getTrendingCareers(): TrendingCareersTable {
    return this.data.trendingCareers;
  }
}

/** Exact key first, then a case-insensitive match. */
export function findKey(keys: Iterable<string>, name: string): string | undefined {
  const all = [...keys];
  if (all.includes(name)) return name;
  const lower = name.trim().toLowerCase();
  return all.find((key) => key.toLowerCase() === lower);
}
