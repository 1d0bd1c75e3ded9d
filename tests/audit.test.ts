import { describe, expect, it } from 'vitest';
import { auditReferenceData, countTables } from '../src/data/audit.js';
import { loadReferenceData } from '../src/data/loaders.js';
import { builtInReferenceData } from '../src/data/defaults.js';
import { DATA_DIR, SOFTWARE_ENGINEER, rawData } from './fixtures.js';

describe('auditReferenceData', () => {
  it('should find no errors in the bundled data', () => {
    const findings = auditReferenceData(loadReferenceData(DATA_DIR));
    expect(findings.filter((finding) => finding.severity === 'error')).toEqual([]);
  });

  it('should count every table', () => {
    expect(countTables(loadReferenceData(DATA_DIR))).toEqual({
      careers: { global: 8, india: 6 },
      role_models: { global: 5, india: 5 },
      personality_types: 16,
      tips: 14,
      reality_checks: 6,
      simulations: 4,
      trending_careers: { global: 6, india: 4 },
    });
  });

  it('should flag duplicate careers', () => {
    const findings = auditReferenceData(rawData({ careers: { global: [SOFTWARE_ENGINEER, SOFTWARE_ENGINEER], india: [] } }));
    expect(findings).toContainEqual({
      severity: 'error',
      table: 'careers (global)',
      message: "duplicate career 'Software Engineer'",
    });
  });

  it('should flag a gap between risk bands', () => {
    const base = builtInReferenceData();
    const criteria = base.riskCriteria.failure_warning_criteria;
    const levels = criteria.stress_tolerance.warning_levels;
    const findings = auditReferenceData(
      rawData({
        riskCriteria: {
          ...base.riskCriteria,
          failure_warning_criteria: {
            ...criteria,
            stress_tolerance: {
              ...criteria.stress_tolerance,
              warning_levels: { ...levels, moderate_risk: { ...levels.moderate_risk, score_range: [0.4, 0.6] } },
            },
          },
        },
      })
    );
    expect(findings).toContainEqual({
      severity: 'error',
      table: 'failure_warning_criteria',
      message: 'stress_tolerance has a gap between 0.3 and 0.4',
    });
  });

  it('should check trending careers against the horizons and categories', () => {
    const findings = auditReferenceData(
      rawData({
        trendingCareers: {
          trending_careers_2025_2035: {
            global: [
              {
                name: 'Drone Pilot',
                sector: 'Logistics',
                description: '',
                trend_scores: { demand: 7, hype: 9 },
                peak_horizon: 'someday',
                projected_growth: '15%',
                key_skills: [],
              },
            ],
            india: [],
          },
          trend_categories: [{ id: 'demand', name: 'Demand', description: '' }],
          time_horizons: [{ id: 'near_term', label: 'Near term', years: '2025-2027' }],
        },
      })
    );
    expect(findings).toEqual([
      {
        severity: 'error',
        table: 'trending_careers (global)',
        message: "'Drone Pilot' peaks in unknown horizon 'someday'",
      },
      {
        severity: 'warning',
        table: 'trending_careers (global)',
        message: "'Drone Pilot' scores unknown category 'hype'",
      },
    ]);
  });

  it('should warn about weights that need rescaling', () => {
    const base = builtInReferenceData();
    const findings = auditReferenceData(
      rawData({
        modeConfig: {
          ...base.modeConfig,
          modes: {
            ...base.modeConfig.modes,
            student: {
              ...base.modeConfig.modes.student,
              assessment_weight: { interests: 1, skills: 0.5, subjects: 0.5, personality: 0 },
            },
          },
        },
      })
    );
    expect(findings).toContainEqual({
      severity: 'warning',
      table: 'mode_config',
      message: 'student weights sum to 2 and are rescaled at load',
    });
  });
});
