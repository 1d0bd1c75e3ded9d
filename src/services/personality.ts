import type { ReferenceDataStore } from '../data/store.js';
import { ValidationError } from '../utils/errors.js';
import { requestReader } from '../utils/validation.js';
import type { PersonalityArchetype, PersonalityDimension, PersonalityQuestion } from '../types/index.js';

export const ANSWER_MIN = 1;
export const ANSWER_MAX = 5;

const OPPOSITES: Record<PersonalityDimension, PersonalityDimension> = {
  extraversion: 'introversion',
  introversion: 'extraversion',
  sensing: 'intuition',
  intuition: 'sensing',
  thinking: 'feeling',
  feeling: 'thinking',
  judging: 'perceiving',
  perceiving: 'judging',
};

/** Questions on the other side of an axis are asked but carry no score. */
const SCORED_DIMENSIONS: ReadonlySet<PersonalityDimension> = new Set<PersonalityDimension>([
  'extraversion',
  'sensing',
  'thinking',
  'judging',
]);

/** Letter pairs in code order; the second letter wins a tie. */
const AXES: ReadonlyArray<[PersonalityDimension, string, PersonalityDimension, string]> = [
  ['extraversion', 'E', 'introversion', 'I'],
  ['sensing', 'S', 'intuition', 'N'],
  ['thinking', 'T', 'feeling', 'F'],
  ['judging', 'J', 'perceiving', 'P'],
];

export const UNKNOWN_TYPE: PersonalityArchetype = {
  name: 'Unique Type',
  traits: ['unique', 'individual'],
  careers: ['Various careers'],
  description: 'A unique personality combination',
};

export type DimensionScores = Record<PersonalityDimension, number>;

export interface PersonalityResult {
  type: string;
  name: string;
  traits: string[];
  suggested_careers: string[];
  description: string;
  scores: DimensionScores;
}

export class PersonalityTest {
  constructor(private readonly store: ReferenceDataStore) {}

  questions(): readonly PersonalityQuestion[] {
    return this.store.getPersonality().questions;
  }

  /**
   * One answer per question on a 1-5 agreement scale. An answer to an
   * E, S, T or J question counts towards that dimension and, mirrored
   * (6 - answer), towards the opposite one.
   */
  calculate(answers: unknown): PersonalityResult {
    const questions = this.questions();
    const values = requestReader.array(answers, 'answers');
    if (values.length !== questions.length) {
      throw new ValidationError(`Expected ${questions.length} answers, got ${values.length}`);
    }

    const scores: DimensionScores = {
      extraversion: 0,
      introversion: 0,
      sensing: 0,
      intuition: 0,
      thinking: 0,
      feeling: 0,
      judging: 0,
      perceiving: 0,
    };

    questions.forEach((question, i) => {
      const answer = requestReader.integer(values[i], `answers[${i}]`, ANSWER_MIN, ANSWER_MAX);
      if (!SCORED_DIMENSIONS.has(question.dimension)) return;
      scores[question.dimension] += answer * question.weight;
      scores[OPPOSITES[question.dimension]] += (ANSWER_MAX + 1 - answer) * question.weight;
    });

    const code = AXES.map(([first, firstLetter, second, secondLetter]) =>
      scores[first] > scores[second] ? firstLetter : secondLetter
    ).join('');
    const archetype = this.store.getPersonality().types[code] ?? UNKNOWN_TYPE;

    return {
      type: code,
      name: archetype.name,
      traits: [...archetype.traits],
      suggested_careers: [...archetype.careers],
      description: archetype.description,
      scores,
    };
  }
}
