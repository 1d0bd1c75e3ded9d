import { describe, expect, it } from 'vitest';
import { PersonalityTest, UNKNOWN_TYPE } from '../src/services/personality.js';
import { ReferenceDataStore } from '../src/data/store.js';
import { ValidationError } from '../src/utils/errors.js';
import { DATA_DIR } from './fixtures.js';

describe('PersonalityTest', () => {
  const test = new PersonalityTest(ReferenceDataStore.load(DATA_DIR));

  it('should serve the question list', () => {
    expect(test.questions()).toHaveLength(12);
    expect(test.questions()[0]?.dimension).toBe('extraversion');
  });

  it('should give the second letter of every axis on neutral answers', () => {
    const result = test.calculate(new Array<number>(12).fill(3));

    expect(result.type).toBe('INFP');
    expect(result.name).toBe('The Mediator');
    expect(result.suggested_careers).toEqual(['Graphic Designer', 'Teacher', 'UX Designer']);
    expect(Object.values(result.scores)).toEqual([9, 9, 6, 6, 6, 6, 6, 6]);
  });

  it('should score strong agreement towards each question dimension', () => {
    const result = test.calculate(new Array<number>(12).fill(5));

    expect(result.type).toBe('ESTJ');
    expect(result.scores).toEqual({
      extraversion: 15,
      introversion: 3,
      sensing: 10,
      intuition: 2,
      thinking: 10,
      feeling: 2,
      judging: 10,
      perceiving: 2,
    });
  });

  it('should mirror strong disagreement onto the opposite dimension', () => {
    expect(test.calculate(new Array<number>(12).fill(1)).type).toBe('INFP');
  });

  it('should score only the extraversion, sensing, thinking and judging questions', () => {
    const result = test.calculate([3, 3, 4, 4, 3, 3, 3, 3, 3, 5, 3, 3]);

    expect(result.type).toBe('ISFP');
    expect(result.scores.sensing).toBe(8);
    expect(result.scores.intuition).toBe(4);
  });

  it('should still validate answers to unscored questions', () => {
    const answers = new Array<number>(12).fill(3);
    answers[11] = 0;
    expect(() => test.calculate(answers)).toThrow('answers[11] must be an integer between 1 and 5');
  });

  it('should require one answer per question', () => {
    expect(() => test.calculate(new Array<number>(11).fill(3))).toThrow('Expected 12 answers, got 11');
    expect(() => test.calculate('3,3,3')).toThrow('answers must be an array');
  });

  it('should reject answers outside 1-5', () => {
    const answers = new Array<number>(12).fill(3);
    answers[4] = 6;
    expect(() => test.calculate(answers)).toThrow(ValidationError);
    expect(() => test.calculate(answers)).toThrow('answers[4] must be an integer between 1 and 5');
  });

  it('should fall back to a generic type missing from the catalog', () => {
    const sparse = new PersonalityTest(ReferenceDataStore.fromPartial());
    const result = sparse.calculate(new Array<number>(12).fill(3));

    expect(result.type).toBe('INFP');
    expect(result.name).toBe(UNKNOWN_TYPE.name);
    expect(result.suggested_careers).toEqual(['Various careers']);
  });
});
