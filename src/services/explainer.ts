import { coverage, intersect, NO_SUBJECTS_SCORE } from './match-scorer.js';
import type { Career, DimensionWeights, ProfileInput } from '../types/index.js';

/**
 * Emphasis used for the "overall match" figure shown with an explanation.
 * Independent of the mode weights the ranker uses.
 */
export const EXPLANATION_WEIGHTS: DimensionWeights = {
  interests: 0.4,
  skills: 0.35,
  subjects: 0.15,
  personality: 0.1,
};

export interface Explanation {
  overall_match: number;
  reasons: string[];
  skill_gaps: string[];
  strengths: string[];
}

interface DimensionExplanation {
  score: number;
  reasons: string[];
}

function explainInterests(career: Career, interests: readonly string[]): DimensionExplanation & { matched: string[] } {
  const matched = intersect(career.interests, interests);
  const score = coverage(interests, career.interests);
  const listed = new Set(career.interests).size;
  const reasons: string[] = [];

  if (matched.length > 0) {
    reasons.push(`Your interests in ${matched.join(', ')} align well with this career`);
  }
  // Banded on the career's list size; a career listing no interests reads as fully aligned.
  if (matched.length >= listed * 0.7) {
    reasons.push('Strong interest alignment - you share most key interests for this field');
  } else if (matched.length >= listed * 0.4) {
    reasons.push('Good interest match - several of your interests align with this career');
  } else {
    reasons.push('Limited interest overlap - explore the field before committing');
  }
  return { score, reasons, matched };
}

function explainSkills(
  career: Career,
  skills: readonly string[]
): DimensionExplanation & { matched: string[]; missing: string[] } {
  const matched = intersect(career.required_skills, skills);
  const have = new Set(skills);
  const missing = [...new Set(career.required_skills)].filter((skill) => !have.has(skill));
  const score = coverage(skills, career.required_skills);
  const reasons: string[] = [];

  if (matched.length > 0) {
    reasons.push(
      `You already have ${matched.length} out of ${new Set(career.required_skills).size} key skills: ${matched.join(', ')}`
    );
  }
  if (missing.length > 0) {
    reasons.push(`Skills to develop: ${missing.join(', ')}`);
  }
  if (score >= 0.7) {
    reasons.push('Excellent skill match - you have most required skills');
  } else if (score >= 0.4) {
    reasons.push('Good skill foundation - some development needed');
  } else {
    reasons.push('Significant skill development opportunity');
  }
  return { score, reasons, matched, missing };
}

function explainSubjects(career: Career, subjects: readonly string[]): DimensionExplanation {
  const matched = intersect(career.subjects, subjects);
  const score = career.subjects.length > 0 ? coverage(subjects, career.subjects) : NO_SUBJECTS_SCORE;
  const reasons: string[] = [];

  if (matched.length > 0) {
    reasons.push(`Your background in ${matched.join(', ')} provides a strong foundation`);
  }
  if (score >= 0.6) {
    reasons.push('Strong academic preparation for this field');
  } else if (score >= 0.3) {
    reasons.push('Some relevant academic background');
  } else {
    reasons.push('Little formal coursework in this area yet');
  }
  return { score, reasons };
}

function explainPersonality(career: Career, traits: readonly string[]): DimensionExplanation {
  const matched = intersect(career.personality_traits, traits);
  const score = coverage(traits, career.personality_traits);
  const reasons: string[] = [];

  if (matched.length > 0) {
    reasons.push(`Your ${matched.join(', ')} personality traits fit well with this career`);
  }
  if (score >= 0.6) {
    reasons.push('Strong personality-career alignment');
  } else if (score >= 0.3) {
    reasons.push('Some personality traits align with this career');
  } else {
    reasons.push('Few of your personality traits are typical for this career');
  }
  return { score, reasons };
}

export class ExplanationGenerator {
  constructor(private readonly weights: DimensionWeights = EXPLANATION_WEIGHTS) {}

  /**
   * Works on the raw request values: skills are not augmented with the
   * subject-derived ones here.
   */
  explain(career: Career, input: ProfileInput): Explanation {
    const interests = explainInterests(career, input.interests ?? []);
    const skills = explainSkills(career, input.skills ?? []);
    const subjects = explainSubjects(career, input.subjects ?? []);
    const personality = explainPersonality(career, input.personality?.traits ?? []);

    const total =
      interests.score * this.weights.interests +
      skills.score * this.weights.skills +
      subjects.score * this.weights.subjects +
      personality.score * this.weights.personality;

    return {
      overall_match: Math.round(total * 100),
      reasons: [...interests.reasons, ...skills.reasons, ...subjects.reasons, ...personality.reasons],
      skill_gaps: skills.missing,
      strengths: [...interests.matched, ...skills.matched],
    };
  }
}
