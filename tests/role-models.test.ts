import { describe, expect, it } from 'vitest';
import { RoleModelService, dayKey, stableHash } from '../src/services/role-models.js';
import { RealityCheckService } from '../src/services/reality-check.js';
import { ReferenceDataStore } from '../src/data/store.js';
import { NotFoundError } from '../src/utils/errors.js';
import { DATA_DIR } from './fixtures.js';

const store = ReferenceDataStore.load(DATA_DIR);
const march1 = () => new Date('2026-03-01T08:30:00Z');

describe('stableHash', () => {
  it('should read the first four bytes of the SHA-256 digest', () => {
    expect(stableHash('student-42_2026-03-01')).toBe(3571508926);
  });

  it('should key days in UTC', () => {
    expect(dayKey(new Date('2026-03-01T23:59:59Z'))).toBe('2026-03-01');
  });
});

describe('RoleModelService', () => {
  const service = new RoleModelService(store, { random: () => 0, now: march1 });

  it('should match careers by substring in either direction', () => {
    expect(service.forCareer('global', 'Senior Software Engineer').map((model) => model.name)).toEqual([
      'Grace Hopper',
      'Margaret Hamilton',
    ]);
    expect(service.forCareer('global', 'Astronaut')).toHaveLength(5);
  });

  it('should cap role models for several careers at three', () => {
    expect(service.forCareers('global', ['Software Engineer', 'Doctor', 'Teacher']).map((model) => model.name)).toEqual([
      'Grace Hopper',
      'Margaret Hamilton',
      'Florence Nightingale',
    ]);
  });

  describe('dailyTip', () => {
    it('should give a user the same tip all day', () => {
      const tip = service.dailyTip({ careerFocus: 'Software Engineer', userId: 'student-42' });
      const other = new RoleModelService(store, { random: () => 0.5, now: () => new Date('2026-03-01T21:00:00Z') });

      expect(tip?.id).toBe('tip_010');
      expect(other.dailyTip({ careerFocus: 'Software Engineer', userId: 'student-42' })?.id).toBe('tip_010');
    });

    it('should vary between users', () => {
      expect(service.dailyTip({ careerFocus: 'Software Engineer', userId: 'student-7' })?.id).toBe('tip_014');
    });

    it('should draw from the random source without a user id', () => {
      expect(service.dailyTip({ careerFocus: 'Doctor' })?.id).toBe('tip_003');
    });

    it('should return null when there are no tips', () => {
      expect(new RoleModelService(ReferenceDataStore.fromPartial()).dailyTip()).toBeNull();
    });
  });

  it('should limit professional tips to the mode categories', () => {
    expect(service.weeklyTips({ mode: 'professional' }).map((tip) => tip.id)).toEqual([
      'tip_009',
      'tip_010',
      'tip_011',
      'tip_012',
    ]);
  });

  it('should return seven distinct weekly tips', () => {
    const shuffling = new RoleModelService(store, { random: () => 0.99 });
    const tips = shuffling.weeklyTips();

    expect(tips).toHaveLength(7);
    expect(new Set(tips.map((tip) => tip.id)).size).toBe(7);
  });

  it('should filter tips by category', () => {
    expect(service.tipsByCategory('networking').map((tip) => tip.id)).toEqual(['tip_011']);
  });

  it('should quote a role model for the career', () => {
    expect(service.inspirationQuote('india', 'Doctor')).toEqual({
      quote: 'Healthcare is not a privilege, it is a right.',
      author: 'Devi Shetty',
      title: 'Cardiac Surgeon',
    });
  });

  it('should return a career path example', () => {
    expect(service.careerPathExample('global', 'Teacher')?.career_path).toEqual([
      'Physician',
      'Researcher in child development',
      'Educator',
    ]);
  });

  it('should search names, titles and skills', () => {
    expect(service.search('global', 'PROGRAMMING').map((model) => model.name)).toEqual(['Grace Hopper', 'Margaret Hamilton']);
    expect(service.search('global', 'rear admiral').map((model) => model.name)).toEqual(['Grace Hopper']);
  });

  it('should find tips mentioning a skill', () => {
    expect(service.skillDevelopmentTips(['programming', 'data']).map(({ skill, tip }) => [skill, tip.id])).toEqual([
      ['programming', 'tip_002'],
      ['data', 'tip_005'],
    ]);
  });

  it('should return regional context only where models carry it', () => {
    expect(service.regionSpecificAdvice('india', 'Software Engineer')).toEqual([
      {
        name: 'Sundar Pichai',
        context: 'Started at IIT Kharagpur; shows how Indian engineering graduates reach global technology leadership',
        advice: 'Work with people who are better than you.',
      },
    ]);
    expect(service.regionSpecificAdvice('global', 'Software Engineer')).toEqual([]);
  });
});

describe('RealityCheckService', () => {
  const service = new RealityCheckService(store);

  it('should look careers up case-insensitively', () => {
    const result = service.lookup('software engineer');

    expect(result.career_name).toBe('Software Engineer');
    expect(result.reality_check.reality_check.stress_level).toBe('Medium');
    expect(result.reality_check.backup_careers).toEqual(['QA Engineer', 'Technical Writer', 'Product Manager']);
    expect(result.general_insights).toHaveLength(3);
  });

  it('should list the covered careers for an unknown one', () => {
    expect(() => service.lookup('Pilot')).toThrow('Reality check data not available for Pilot');
    try {
      service.lookup('Pilot');
    } catch (error) {
      expect(error instanceof NotFoundError ? error.available : []).toEqual([
        'Software Engineer',
        'Data Scientist',
        'Doctor',
        'Teacher',
        'UX Designer',
        'IAS Officer',
      ]);
    }
  });
});
