import { describe, expect, it } from 'vitest';
import {
  SkillsGapAnalyzer,
  developmentPlan,
  nextSteps,
  normalizeSkill,
  readiness,
} from '../src/services/skills-gap.js';
import { NotFoundError } from '../src/utils/errors.js';
import { makeCareer, storeWith } from './fixtures.js';

const DATA_ANALYST = makeCareer('Data Analyst', {
  required_skills: ['Data Analysis', 'programming', 'communication', 'statistics', 'project_management'],
  interests: ['numbers', 'technology'],
});

describe('SkillsGapAnalyzer', () => {
  const analyzer = new SkillsGapAnalyzer(storeWith([DATA_ANALYST]));

  describe('analyze', () => {
    const report = analyzer.analyze(
      { user_skills: ['Programming'], user_subjects: ['mathematics'], user_interests: ['Technology'] },
      DATA_ANALYST
    );

    it('should split required skills into current and missing', () => {
      expect(report.current_skills.skills).toEqual(['programming', 'statistics']);
      expect(report.missing_skills.skills).toEqual(['data_analysis', 'communication', 'project_management']);
      expect(report.skill_match_percentage).toBe(40);
      expect(report.readiness_level.level).toBe('Developing');
    });

    it('should categorize by taxonomy keyword', () => {
      expect(report.current_skills.categories).toEqual({
        technical: ['programming'],
        soft: [],
        business: [],
        other: ['statistics'],
      });
      expect(report.missing_skills.categories).toEqual({
        technical: ['data_analysis'],
        soft: ['communication'],
        business: ['project_management'],
        other: [],
      });
    });

    it('should prioritize critical skills first', () => {
      expect(report.missing_skills.priorities).toEqual({
        high: ['data_analysis', 'communication'],
        medium: ['project_management'],
        low: [],
      });
    });

    it('should halve the summed months for the estimate', () => {
      expect(report.time_estimate.total_months).toBe(4);
      expect(report.time_estimate.breakdown).toEqual([
        'data_analysis: 3 months',
        'communication: 2 months',
        'project_management: 3 months',
      ]);
    });

    it('should use taxonomy resources where they exist and a generic plan otherwise', () => {
      const [dataAnalysis, communication] = report.learning_path;
      expect(dataAnalysis?.resources.time_estimate).toBe('2-4 months');
      expect(dataAnalysis?.resources.beginner[0]).toBe('Online courses for data_analysis');
      expect(communication?.resources.time_estimate).toBe('2-6 months');
    });

    it('should report interest alignment', () => {
      expect(report.interest_alignment).toEqual({ matched: ['technology'], percentage: 50 });
    });

    it('should phase the plan by position', () => {
      expect(report.skill_development_plan.phases.map((phase) => phase.skills)).toEqual([
        ['data_analysis', 'communication'],
        ['project_management'],
        [],
      ]);
    });
  });

  it('should report a ready profile with nothing to learn', () => {
    const report = analyzer.analyze({ user_skills: DATA_ANALYST.required_skills }, DATA_ANALYST);

    expect(report.skill_match_percentage).toBe(100);
    expect(report.readiness_level.level).toBe('Ready');
    expect(report.time_estimate).toEqual({ total_months: 0, total: '0 months', breakdown: [], note: 'No skills to learn' });
    expect(report.skill_development_plan).toEqual({ message: "No skill development needed - you're ready!", phases: [] });
  });

  it('should treat a career with no required skills as a full match', () => {
    const report = analyzer.analyze({ user_skills: [] }, makeCareer('Volunteer'));
    expect(report.skill_match_percentage).toBe(100);
  });

  it('should round the match percentage to one decimal', () => {
    const career = makeCareer('Trio', { required_skills: ['a', 'b', 'c'] });
    expect(analyzer.analyze({ user_skills: ['a'] }, career).skill_match_percentage).toBe(33.3);
  });

  it('should keep a three month floor on the estimate', () => {
    expect(analyzer.estimateTime(['juggling']).total_months).toBe(3);
    expect(analyzer.estimateTime(['programming', 'leadership', 'design']).total_months).toBe(7);
  });

  it('should find careers case-insensitively', () => {
    expect(analyzer.findCareer('data analyst', 'global').name).toBe('Data Analyst');
  });

  it('should list the available careers when one is unknown', () => {
    try {
      analyzer.findCareer('Astronaut', 'global');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error instanceof NotFoundError ? error.available : []).toEqual(['Data Analyst']);
    }
  });
});

describe('skills gap helpers', () => {
  it('should normalize spaces and case', () => {
    expect(normalizeSkill('Machine Learning')).toBe('machine_learning');
  });

  it('should map percentages to readiness levels at the thresholds', () => {
    expect(readiness(80).level).toBe('Ready');
    expect(readiness(79.9).level).toBe('Nearly Ready');
    expect(readiness(60).color).toBe('warning');
    expect(readiness(40).level).toBe('Developing');
    expect(readiness(39.9).color).toBe('danger');
  });

  it('should name the first missing skills in early-stage next steps', () => {
    expect(nextSteps(['sql'], 20)).toEqual([
      'Start learning sql immediately',
      'Dedicate 10-15 hours per week to skill development',
      'Join online communities and forums',
      'Consider formal education or certification programs',
    ]);
    expect(nextSteps(['sql', 'python'], 20)[4]).toBe('Plan to learn python after mastering the first skill');
    expect(nextSteps([], 20)).toEqual([]);
  });

  it('should put everything past the fourth skill into the last phase', () => {
    const plan = developmentPlan(['a', 'b', 'c', 'd', 'e', 'f']);
    expect(plan.phases.map((phase) => phase.skills)).toEqual([['a', 'b'], ['c', 'd'], ['e', 'f']]);
    expect(plan.phases[2]?.focus).toBe('Advanced Development');
  });
});
