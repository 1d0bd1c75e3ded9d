import { findKey, type ReferenceDataStore } from '../data/store.js';
import { NotFoundError } from '../utils/errors.js';
import type { RealityCheckEntry } from '../types/index.js';

export interface RealityCheckResult {
  career_name: string;
  reality_check: RealityCheckEntry;
  general_insights: string[];
}

export class RealityCheckService {
  constructor(private readonly store: ReferenceDataStore) {}

  availableCareers(): string[] {
    return Object.keys(this.store.getRealityCheck().career_reality_data);
  }

  lookup(careerName: string): RealityCheckResult {
    const { career_reality_data: table, general_insights } = this.store.getRealityCheck();
    const key = findKey(Object.keys(table), careerName);
    const entry = key === undefined ? undefined : table[key];
    if (key === undefined || !entry) {
      throw new NotFoundError(`Reality check data not available for ${careerName}`, this.availableCareers());
    }
    return { career_name: key, reality_check: entry, general_insights: [...general_insights] };
  }
}
