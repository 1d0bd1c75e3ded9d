/**
 * Parsers for the loosely-typed request bodies the CareerAdvisor accepts.
 * Every failure is a ValidationError.
 */

import { ValidationError } from '../utils/errors.js';
import { requestReader as read } from '../utils/validation.js';
import { MODES, REGIONS, type Mode, type ProfileInput, type Region } from '../types/index.js';
import type { SkillsGapInput } from './skills-gap.js';
import type { QuickRiskFlags, StudentRiskInput } from './risk-assessor.js';

export interface RequestDefaults {
  region: Region;
  mode: Mode;
}

export interface RecommendRequest {
  region: Region;
  mode: Mode;
  profile: ProfileInput;
  user_id?: string;
}

export interface SkillsGapRequest extends SkillsGapInput {
  career_name: string;
  region: Region;
}

export interface TipRequest {
  region: Region;
  mode: Mode;
  career?: string;
  user_id?: string;
}

function body(value: unknown): Record<string, unknown> {
  return value === undefined || value === null ? {} : read.record(value, 'request body');
}

export function parseRegion(value: unknown, fallback: Region): Region {
  return value === undefined || value === null || value === '' ? fallback : read.oneOf(value, REGIONS, 'region');
}

export function parseRegionOrAll(value: unknown, fallback: Region): Region | 'all' {
  return value === 'all' ? 'all' : parseRegion(value, fallback);
}

export function parseMode(value: unknown, fallback: Mode): Mode {
  return value === undefined || value === null || value === '' ? fallback : read.oneOf(value, MODES, 'mode');
}

export function parseName(value: unknown, where: string): string {
  const name = value === undefined || value === null ? '' : read.string(value, where).trim();
  if (name === '') {
    throw new ValidationError(`${where} is required`);
  }
  return name;
}

export function parseNames(value: unknown, where: string): string[] {
  return read.array(value, where).map((item, i) => parseName(item, `${where}[${i}]`));
}

export function parseProfileInput(raw: Record<string, unknown>): ProfileInput {
  const personality =
    raw.personality === undefined || raw.personality === null ? {} : read.record(raw.personality, 'personality');
  const type = read.optionalString(personality.type, 'personality.type');

  return {
    interests: read.optionalStringArray(raw.interests, 'interests'),
    skills: read.optionalStringArray(raw.skills, 'skills'),
    subjects: read.optionalStringArray(raw.subjects, 'subjects'),
    personality: {
      traits: read.optionalStringArray(personality.traits, 'personality.traits'),
      ...(type === undefined ? {} : { type }),
    },
    experience_level: read.optionalString(raw.experience_level, 'experience_level') ?? null,
  };
}

export function parseRecommendRequest(value: unknown, defaults: RequestDefaults): RecommendRequest {
  const raw = body(value);
  const userId = read.optionalString(raw.user_id, 'user_id');
  return {
    region: parseRegion(raw.region, defaults.region),
    mode: parseMode(raw.mode, defaults.mode),
    profile: parseProfileInput(raw),
    ...(userId ? { user_id: userId } : {}),
  };
}

export function parseSkillsGapRequest(value: unknown, defaults: RequestDefaults): SkillsGapRequest {
  const raw = body(value);
  return {
    career_name: parseName(raw.career_name, 'career_name'),
    user_skills: read.optionalStringArray(raw.user_skills, 'user_skills'),
    user_subjects: read.optionalStringArray(raw.user_subjects, 'user_subjects'),
    user_interests: read.optionalStringArray(raw.user_interests, 'user_interests'),
    region: parseRegion(raw.region, defaults.region),
  };
}

export function parseTipRequest(value: unknown, defaults: RequestDefaults): TipRequest {
  const raw = body(value);
  const career = read.optionalString(raw.career, 'career');
  const userId = read.optionalString(raw.user_id, 'user_id');
  return {
    region: parseRegion(raw.region, defaults.region),
    mode: parseMode(raw.mode, defaults.mode),
    ...(career ? { career } : {}),
    ...(userId ? { user_id: userId } : {}),
  };
}

export interface TrendingRequest {
  region: Region;
  horizon?: string;
}

export function parseTrendingRequest(value: unknown, defaults: RequestDefaults): TrendingRequest {
  const raw = body(value);
  const horizon = read.optionalString(raw.horizon, 'horizon');
  return {
    region: parseRegion(raw.region, defaults.region),
    ...(horizon ? { horizon } : {}),
  };
}

function optionalSection(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return value === undefined || value === null ? {} : read.record(value, key);
}

export function parseRiskInput(value: unknown): Required<StudentRiskInput> {
  const raw = body(value);
  const academic = optionalSection(raw, 'academic_history');
  const interest = optionalSection(raw, 'interest_history');
  const stress = optionalSection(raw, 'stress_indicators');
  const num = (section: Record<string, unknown>, key: string, where: string) =>
    read.optionalNumber(section[key], `${where}.${key}`);

  return {
    academic_history: {
      grades: academic.grades === undefined ? [] : read.numberArray(academic.grades, 'academic_history.grades'),
      attendance_rate: num(academic, 'attendance_rate', 'academic_history'),
      study_consistency_score: num(academic, 'study_consistency_score', 'academic_history'),
      failed_subjects: num(academic, 'failed_subjects', 'academic_history'),
    },
    interest_history: {
      career_changes_count: num(interest, 'career_changes_count', 'interest_history'),
      career_research_score: num(interest, 'career_research_score', 'interest_history'),
      external_pressure_score: num(interest, 'external_pressure_score', 'interest_history'),
      passion_indicators_score: num(interest, 'passion_indicators_score', 'interest_history'),
    },
    stress_indicators: {
      anxiety_level: num(stress, 'anxiety_level', 'stress_indicators'),
      pressure_performance_score: num(stress, 'pressure_performance_score', 'stress_indicators'),
      coping_skills_score: num(stress, 'coping_skills_score', 'stress_indicators'),
      resilience_score: num(stress, 'resilience_score', 'stress_indicators'),
    },
    career_preferences: read.optionalStringArray(raw.career_preferences, 'career_preferences'),
  };
}

/** Flags also arrive from query strings, so "true" and "1" count as set. */
function flag(value: unknown, where: string): boolean {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0' || value === '') return false;
  return read.optionalBoolean(value, where) ?? false;
}

export function parseQuickRiskFlags(value: unknown): QuickRiskFlags {
  const raw = body(value);
  return {
    recent_grade_drop: flag(raw.recent_grade_drop, 'recent_grade_drop'),
    career_uncertainty: flag(raw.career_uncertainty, 'career_uncertainty'),
    high_stress_levels: flag(raw.high_stress_levels, 'high_stress_levels'),
    external_pressure: flag(raw.external_pressure, 'external_pressure'),
  };
}
