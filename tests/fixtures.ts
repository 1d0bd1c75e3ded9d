import { fileURLToPath } from 'url';
import { ReferenceDataStore } from '../src/data/store.js';
import { builtInReferenceData } from '../src/data/defaults.js';
import type { Career, ReferenceData, UserProfile } from '../src/types/index.js';

export const DATA_DIR = fileURLToPath(new URL('../data', import.meta.url));

export function makeCareer(name: string, overrides: Partial<Career> = {}): Career {
  return {
    name,
    required_skills: [],
    interests: [],
    subjects: [],
    personality_traits: [],
    description: `${name} description`,
    growth_rate: 'N/A',
    median_salary: 'N/A',
    ...overrides,
  };
}

export const SOFTWARE_ENGINEER = makeCareer('Software Engineer', {
  required_skills: ['programming', 'problem_solving', 'logical_thinking', 'mathematics'],
  interests: ['technology', 'computers', 'innovation', 'problem_solving'],
  subjects: ['computer_science', 'mathematics', 'physics'],
  personality_traits: ['analytical', 'detail_oriented', 'creative'],
  growth_rate: '22%',
  median_salary: '$110,000',
  job_outlook: 'Much faster than average',
});

export const CHEF = makeCareer('Chef', {
  required_skills: ['cooking', 'creativity', 'time_management'],
  interests: ['food', 'hospitality'],
  subjects: ['culinary_arts'],
  personality_traits: ['creative', 'energetic'],
  growth_rate: '5%',
  median_salary: '$55,000',
});

export function makeProfile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    interests: [],
    skills: [],
    subjects: [],
    personality: { traits: [] },
    experience_level: null,
    region: 'global',
    mode: 'student',
    ...overrides,
  };
}

/** Built-in tables with both regions holding the given careers. */
export function storeWith(careers: Career[], partial: Partial<ReferenceData> = {}): ReferenceDataStore {
  return ReferenceDataStore.fromPartial({ careers: { global: careers, india: careers }, ...partial });
}

export function rawData(partial: Partial<ReferenceData> = {}): ReferenceData {
  return { ...builtInReferenceData(), ...partial };
}
