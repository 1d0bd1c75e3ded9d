import { afterEach, describe, expect, it, vi } from 'vitest';
import { CareerAdvisor } from '../src/services/career-advisor.js';
import { logger } from '../src/utils/logger.js';
import { isErrorPayload } from '../src/utils/errors.js';
import { DATA_DIR } from './fixtures.js';

const advisor = CareerAdvisor.fromDataDir(DATA_DIR, {
  recommendationLimit: 3,
  visualizationLimit: 2,
  defaults: { region: 'global', mode: 'student' },
  roleModels: { random: () => 0, now: () => new Date('2026-03-01T08:30:00Z') },
});

const GLOBAL_CAREERS = [
  'Software Engineer',
  'Data Scientist',
  'Doctor',
  'Teacher',
  'UX Designer',
  'Marketing Manager',
  'Accountant',
  'Graphic Designer',
];

afterEach(() => {
  vi.restoreAllMocks();
});

describe('CareerAdvisor', () => {
  describe('recommend', () => {
    const result = advisor.recommend({
      user_id: 'student-42',
      interests: ['technology', 'computers', 'innovation', 'problem_solving'],
      skills: ['programming'],
      subjects: ['computer_science', 'mathematics'],
      personality: { traits: ['analytical'] },
    });

    it('should rank the matching careers first', () => {
      if (isErrorPayload(result)) throw new Error(result.error);
      expect(result.recommendations.map(({ career }) => career.name)).toEqual([
        'Software Engineer',
        'Data Scientist',
        'UX Designer',
      ]);
      expect(result.region).toBe('global');
      expect(result.mode).toBe('student');
      expect(result.region_info.currency).toBe('USD');
    });

    it('should explain and gap-analyze each recommendation', () => {
      if (isErrorPayload(result)) throw new Error(result.error);
      const [top] = result.recommendations;
      // interests 1 * 0.4, skills 1/5 * 0.35, subjects 2/3 * 0.15, personality 1/3 * 0.1
      expect(top?.explanation.overall_match).toBe(60);
      expect(top?.skills_gap.current_skills.skills).toEqual(['programming', 'problem_solving']);
      expect(top?.skills_gap.skill_match_percentage).toBe(40);
    });

    it('should attach role models, a tip and a visualization', () => {
      if (isErrorPayload(result)) throw new Error(result.error);
      expect(result.role_models.map((model) => model.name)).toEqual([
        'Grace Hopper',
        'Margaret Hamilton',
        'Florence Nightingale',
      ]);
      expect(result.daily_tip?.id).toBe('tip_010');
      expect(result.inspiration?.author).toBe('Grace Hopper');
      expect(result.visualization.nodes.map((node) => node.id)).toEqual(['user', 'career_0', 'career_1']);
    });
  });

  it('should reject an unknown region', () => {
    expect(advisor.recommend({ region: 'mars' })).toEqual({
      error: 'region must be one of global, india',
      code: 'VALIDATION_ERROR',
    });
  });

  it('should reject a body that is not an object', () => {
    expect(advisor.recommend('software')).toEqual({ error: 'request body must be an object', code: 'VALIDATION_ERROR' });
  });

  it('should list every comparable career when a name is unknown', () => {
    expect(advisor.compare(['Software Engineer', 'Astronaut'])).toEqual({
      error: "Career 'Astronaut' not found",
      code: 'NOT_FOUND',
      available: [...GLOBAL_CAREERS, 'IAS Officer', 'Chartered Accountant'],
    });
  });

  it('should validate the number of compared careers', () => {
    expect(advisor.compare(['Software Engineer'])).toEqual({
      error: 'Please select at least 2 careers to compare',
      code: 'VALIDATION_ERROR',
    });
  });

  it('should list comparable careers for a region', () => {
    expect(advisor.comparableCareers('india')).toEqual({
      careers: ['Chartered Accountant', 'Data Scientist', 'Doctor', 'IAS Officer', 'Software Engineer', 'Teacher'],
      region: 'india',
    });
  });

  it('should compare two careers in detail', () => {
    const result = advisor.detailedComparison('Software Engineer', 'Teacher');
    if (isErrorPayload(result)) throw new Error(result.error);
    expect(result.winner_analysis.salary).toBe('Software Engineer');
    expect(result.winner_analysis.growth_potential).toBe('Software Engineer');
  });

  it('should analyze a skills gap in the requested region', () => {
    const result = advisor.skillsGapAnalysis({
      career_name: 'software engineer',
      user_skills: ['Programming'],
      region: 'india',
    });
    if (isErrorPayload(result)) throw new Error(result.error);
    expect(result.career_name).toBe('Software Engineer');
    expect(result.skill_match_percentage).toBe(20);
  });

  it('should report a skills gap request for an unknown career', () => {
    expect(advisor.skillsGapAnalysis({ career_name: 'Pilot' })).toEqual({
      error: "Career 'Pilot' not found",
      code: 'NOT_FOUND',
      available: GLOBAL_CAREERS,
    });
  });

  it('should require a career name for reality checks', () => {
    expect(advisor.realityCheck('')).toEqual({ error: 'career is required', code: 'VALIDATION_ERROR' });
  });

  it('should validate personality answers', () => {
    expect(advisor.personalityResult([1, 2])).toEqual({ error: 'Expected 12 answers, got 2', code: 'VALIDATION_ERROR' });
  });

  it('should read quick risk flags from query strings', () => {
    const result = advisor.quickRiskAssessment({ recent_grade_drop: 'true', career_uncertainty: '1', external_pressure: '0' });
    if (isErrorPayload(result)) throw new Error(result.error);
    expect(result.risk_level).toBe('moderate_risk');
    expect(result.risk_indicators_count).toBe(2);
  });

  it('should give the same daily tip for the same user and day', () => {
    const result = advisor.dailyTip({ career: 'Doctor', user_id: 'student-42' });
    if (isErrorPayload(result)) throw new Error(result.error);
    expect(result.tip?.id).toBe('tip_004');
    expect(result.inspiration?.author).toBe('Florence Nightingale');
  });

  it('should return careers and region details for a region', () => {
    const result = advisor.careersByRegion('india');
    if (isErrorPayload(result)) throw new Error(result.error);
    expect(result.careers).toHaveLength(6);
    expect(result.region_info.salary_prefix).toBe('₹');
  });

  it('should report a missing simulation as not found', () => {
    expect(advisor.careerSimulation('Astronaut')).toEqual({
      error: 'Simulation not available for Astronaut',
      code: 'NOT_FOUND',
      available: ['Software Engineer', 'Doctor', 'Teacher', 'IAS Officer'],
    });
  });

  it('should list trending careers for a region and horizon', () => {
    const india = advisor.trendingCareers({ region: 'india' });
    if (isErrorPayload(india)) throw new Error(india.error);
    expect(india.careers).toHaveLength(4);
    expect(india.region).toBe('india');

    const later = advisor.trendingCareers({ horizon: 'long_term' });
    if (isErrorPayload(later)) throw new Error(later.error);
    expect(later.careers.map((career) => career.name)).toEqual(['Climate Risk Analyst', 'Robotics Technician']);
  });

  it('should list the time horizons for an unknown one', () => {
    expect(advisor.trendingCareers({ horizon: 'someday' })).toEqual({
      error: "Time horizon 'someday' not found",
      code: 'NOT_FOUND',
      available: ['near_term', 'mid_term', 'long_term'],
    });
  });

  it('should hide unexpected errors behind a generic payload', () => {
    vi.spyOn(advisor.risk, 'analyze').mockImplementation(() => {
      throw new Error('criteria table exploded');
    });
    const logged = vi.spyOn(logger, 'error');

    expect(advisor.riskAssessment({})).toEqual({ error: 'Internal error', code: 'UNEXPECTED_ERROR' });
    expect(logged).toHaveBeenCalledTimes(1);
  });
});
