import type { ReferenceDataStore } from '../data/store.js';
import type { Mode, ProfileInput, Region, UserProfile } from '../types/index.js';

/** Order-preserving union of several lists. */
export function unique(...lists: readonly (readonly string[])[]): string[] {
  return [...new Set(lists.flat())];
}

export class ProfileBuilder {
  constructor(private readonly store: ReferenceDataStore) {}

  /** Skills implied by the given subjects; unknown subjects contribute nothing. */
  deriveSkills(subjects: readonly string[]): string[] {
    const { subjects_to_skills: table } = this.store.getTaxonomy();
    return unique(...subjects.map((subject) => table[subject] ?? []));
  }

  build(input: ProfileInput, region: Region, mode: Mode): UserProfile {
    const subjects = unique(input.subjects ?? []);
    const personality: UserProfile['personality'] = { traits: unique(input.personality?.traits ?? []) };
    if (input.personality?.type) personality.type = input.personality.type;

    return {
      interests: unique(input.interests ?? []),
      skills: unique(input.skills ?? [], this.deriveSkills(subjects)),
      subjects,
      personality,
      experience_level: input.experience_level ?? null,
      region,
      mode,
    };
  }
}
