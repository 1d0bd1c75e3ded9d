import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { ReferenceDataStore, findKey, normalizeWeights } from '../src/data/store.js';
import { loadReferenceData, parseSimulations, parseTips } from '../src/data/loaders.js';
import { DEFAULT_CAREERS, DEFAULT_MODE_CONFIG, DEFAULT_TRENDING_CAREERS } from '../src/data/defaults.js';
import { ReferenceDataError } from '../src/utils/errors.js';
import { DATA_DIR, makeCareer } from './fixtures.js';

describe('ReferenceDataStore', () => {
  it('should rescale mode weights that do not sum to 1', () => {
    const store = ReferenceDataStore.fromPartial({
      modeConfig: {
        ...DEFAULT_MODE_CONFIG,
        modes: {
          ...DEFAULT_MODE_CONFIG.modes,
          student: { assessment_weight: { interests: 2, skills: 1, subjects: 1, personality: 0 } },
        },
      },
    });

    expect(store.getModeWeights('student')).toEqual({ interests: 0.5, skills: 0.25, subjects: 0.25, personality: 0 });
  });

  it('should reject weights with no positive sum', () => {
    expect(() => normalizeWeights({ interests: 0, skills: 0, subjects: 0, personality: 0 })).toThrow(ReferenceDataError);
  });

  it('should overlay India salary and outlook onto global careers', () => {
    const store = ReferenceDataStore.fromPartial({
      careers: {
        global: [makeCareer('Engineer', { median_salary: '$90,000' })],
        india: [
          makeCareer('Engineer', { median_salary: '₹8-12 LPA', job_outlook: 'Strong' }),
          makeCareer('IAS Officer'),
        ],
      },
    });

    const engineer = store.getComparableCareers().get('Engineer');
    expect(engineer?.region).toBe('global');
    expect(engineer?.median_salary).toBe('$90,000');
    expect(engineer?.india_salary).toBe('₹8-12 LPA');
    expect(engineer?.india_outlook).toBe('Strong');
    expect(store.getComparableCareers().get('IAS Officer')?.region).toBe('india');
  });

  it('should freeze the tables it holds', () => {
    const store = ReferenceDataStore.fromPartial();
    expect(Object.isFrozen(store.getCareers('global'))).toBe(true);
    expect(Object.isFrozen(store.getTaxonomy().subjects_to_skills)).toBe(true);
  });
});

describe('findKey', () => {
  it('should prefer an exact match and fall back to case-insensitive', () => {
    expect(findKey(['Doctor', 'doctor'], 'doctor')).toBe('doctor');
    expect(findKey(['Software Engineer'], 'software engineer')).toBe('Software Engineer');
    expect(findKey(['Software Engineer'], 'Pilot')).toBeUndefined();
  });
});

describe('loadReferenceData', () => {
  const tempDirs: string[] = [];

  function tempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pathfinder-'));
    tempDirs.push(dir);
    return dir;
  }

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should load the bundled data directory', () => {
    const data = loadReferenceData(DATA_DIR);

    expect(data.careers.global).toHaveLength(8);
    expect(data.careers.india).toHaveLength(6);
    expect(data.personality.questions).toHaveLength(12);
    expect(Object.keys(data.personality.types)).toHaveLength(16);
    expect(data.tips).toHaveLength(14);
    expect(data.simulations.stress_scale['5']).toBe('Very High - intense');
    expect(data.trendingCareers.trending_careers_2025_2035.global).toHaveLength(6);
  });

  it('should fall back to built-in tables when files are missing', () => {
    const data = loadReferenceData(tempDir());

    expect(data.careers.global).toEqual(DEFAULT_CAREERS);
    expect(data.tips).toEqual([]);
    expect(data.roleModels.india).toEqual([]);
    expect(data.trendingCareers).toEqual(DEFAULT_TRENDING_CAREERS);
  });

  it('should raise ReferenceDataError for a malformed file', () => {
    const dir = tempDir();
    fs.writeFileSync(path.join(dir, 'mode_config.json'), JSON.stringify({ regions: {}, modes: {} }));

    expect(() => loadReferenceData(dir)).toThrow('mode_config.json: regions.global must be an object');
  });

  it('should raise ReferenceDataError for invalid JSON', () => {
    const dir = tempDir();
    fs.writeFileSync(path.join(dir, 'personality.json'), '{ not json');

    expect(() => loadReferenceData(dir)).toThrow(ReferenceDataError);
  });
});

describe('parsers', () => {
  it('should split tip career focus on pipes', () => {
    const tips = parseTips('id,title,tip,category,career_focus\nt1,Title,Do it,learning,Doctor | Teacher\n');
    expect(tips).toEqual([
      { id: 't1', title: 'Title', tip: 'Do it', category: 'learning', career_focus: ['Doctor', 'Teacher'] },
    ]);
  });

  it('should reject stress levels outside 1-5', () => {
    const raw = {
      career_simulations: {
        Pilot: {
          career_title: 'Pilot',
          daily_schedule: [{ time: '08:00', task: 'Flight', duration: 60, stress_level: 6 }],
          working_hours: { start: '08:00', end: '16:00', total_hours: 8 },
          average_stress_level: 4,
          work_life_balance: 'Moderate',
          salary_range: '$100,000',
          education_required: 'License',
        },
      },
    };

    expect(() => parseSimulations(raw)).toThrow(
      'career_simulations.Pilot.daily_schedule[0].stress_level must be an integer between 1 and 5'
    );
  });
});
