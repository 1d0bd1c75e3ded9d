import type { ReferenceDataStore } from '../data/store.js';
import type { Career, DimensionWeights, Mode, UserProfile } from '../types/index.js';

/** Subject coverage used when a career lists no subjects at all. */
export const NO_SUBJECTS_SCORE = 0.5;

/**
 * Hook applied to professional-mode scores when the profile carries an
 * experience level. Future experience weighting attaches here.
 */
export type ExperienceAdjustment = (baseScore: number, experienceLevel: string, career: Career) => number;

export const identityAdjustment: ExperienceAdjustment = (baseScore) => baseScore;

export interface MatchScorerOptions {
  experienceAdjustment?: ExperienceAdjustment;
}

export type DimensionScores = DimensionWeights;

/**
 * Share of the career's list the user covers: |have ∩ required| / max(|required|, 1).
 */
export function coverage(have: Iterable<string>, required: readonly string[]): number {
  const requiredSet = new Set(required);
  const haveSet = new Set(have);
  let matched = 0;
  for (const item of requiredSet) {
    if (haveSet.has(item)) matched++;
  }
  return matched / Math.max(requiredSet.size, 1);
}

/** Items of `required` present in `have`, in `required` order. */
export function intersect(required: readonly string[], have: Iterable<string>): string[] {
  const haveSet = new Set(have);
  return [...new Set(required)].filter((item) => haveSet.has(item));
}

export class MatchScorer {
  private readonly experienceAdjustment: ExperienceAdjustment;

  constructor(private readonly store: ReferenceDataStore, options: MatchScorerOptions = {}) {
    this.experienceAdjustment = options.experienceAdjustment ?? identityAdjustment;
  }

  weightsFor(mode: Mode): DimensionWeights {
    return this.store.getModeWeights(mode);
  }

  breakdown(profile: UserProfile, career: Career): DimensionScores {
    return {
      interests: coverage(profile.interests, career.interests),
      skills: coverage(profile.skills, career.required_skills),
      subjects: career.subjects.length > 0 ? coverage(profile.subjects, career.subjects) : NO_SUBJECTS_SCORE,
      personality: coverage(profile.personality.traits, career.personality_traits),
    };
  }

  score(profile: UserProfile, career: Career): number {
    const weights = this.weightsFor(profile.mode);
    const parts = this.breakdown(profile, career);
    const score =
      parts.interests * weights.interests +
      parts.skills * weights.skills +
      parts.subjects * weights.subjects +
      parts.personality * weights.personality;

    if (profile.mode === 'professional' && profile.experience_level) {
      const adjusted = this.experienceAdjustment(score, profile.experience_level, career);
      return Math.min(1, Math.max(0, adjusted));
    }
    return score;
  }
}
