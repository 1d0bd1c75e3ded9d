import { createHash } from 'node:crypto';
import type { ReferenceDataStore } from '../data/store.js';
import type { CareerTip, Mode, Region, RoleModel } from '../types/index.js';

/** Tips tagged with this focus apply to every career. */
export const ALL_CAREERS = 'All careers';

const WEEKLY_TIP_COUNT = 7;
const ROLE_MODELS_PER_RECOMMENDATION = 3;
const MAX_SKILL_TIPS = 5;

export interface RoleModelServiceOptions {
  /** Returns a number in [0, 1). */
  random?: () => number;
  now?: () => Date;
}

export interface TipQuery {
  careerFocus?: string;
  userId?: string;
  mode?: Mode;
}

export interface InspirationQuote {
  quote: string;
  author: string;
  title: string;
}

export interface CareerPathExample {
  name: string;
  career_path: string[];
  advice: string;
  achievements: string[];
}

export interface SkillTip {
  skill: string;
  tip: CareerTip;
}

export interface RegionAdvice {
  name: string;
  context: string;
  advice: string;
}

/**
 * First 32 bits of the SHA-256 digest, so the same input maps to the same
 * number in every process.
 */
export function stableHash(value: string): number {
  return createHash('sha256').update(value, 'utf8').digest().readUInt32BE(0);
}

/** YYYY-MM-DD in UTC. */
export function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class RoleModelService {
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(
    private readonly store: ReferenceDataStore,
    options: RoleModelServiceOptions = {}
  ) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  /** Substring match in either direction; every model when none matches. */
  forCareer(region: Region, careerName: string): readonly RoleModel[] {
    const models = this.store.getRoleModels(region);
    const name = careerName.toLowerCase();
    const matching = models.filter((model) => {
      const career = model.career.toLowerCase();
      return name.includes(career) || career.includes(name);
    });
    return matching.length > 0 ? matching : models;
  }

  forCareers(region: Region, careerNames: readonly string[]): RoleModel[] {
    const seen = new Set<string>();
    const models: RoleModel[] = [];
    for (const name of careerNames) {
      for (const model of this.forCareer(region, name)) {
        if (seen.has(model.name)) continue;
        seen.add(model.name);
        models.push(model);
      }
    }
    return models.slice(0, ROLE_MODELS_PER_RECOMMENDATION);
  }

  /**
   * Same user, same day, same tip. Without a user id the tip is drawn from
   * the random source.
   */
  dailyTip(query: TipQuery = {}): CareerTip | null {
    const pool = this.relevantTips(query);
    if (pool.length === 0) return null;

    if (query.userId) {
      return pool[stableHash(`${query.userId}_${dayKey(this.now())}`) % pool.length] ?? null;
    }
    return pool[this.pick(pool.length)] ?? null;
  }

  /** Up to seven distinct tips in random order. */
  weeklyTips(query: Omit<TipQuery, 'userId'> = {}): CareerTip[] {
    const pool = [...this.relevantTips(query)];
    const count = Math.min(WEEKLY_TIP_COUNT, pool.length);
    for (let i = 0; i < count; i++) {
      const j = i + this.pick(pool.length - i);
      const picked = pool[j];
      const current = pool[i];
      if (picked === undefined || current === undefined) break;
      pool[i] = picked;
      pool[j] = current;
    }
    return pool.slice(0, count);
  }

  tipsByCategory(category: string): CareerTip[] {
    return this.store.getTips().filter((tip) => tip.category === category);
  }

  inspirationQuote(region: Region, careerName?: string): InspirationQuote | null {
    const models = careerName ? this.forCareer(region, careerName) : this.store.getRoleModels(region);
    const model = models[this.pick(models.length)];
    if (!model) return null;
    return { quote: model.inspiration_quote, author: model.name, title: model.title };
  }

  careerPathExample(region: Region, careerName: string): CareerPathExample | null {
    const models = this.forCareer(region, careerName);
    const model = models[this.pick(models.length)];
    if (!model) return null;
    return {
      name: model.name,
      career_path: [...(model.career_path ?? [])],
      advice: model.advice,
      achievements: [...model.achievements],
    };
  }

  /** Case-insensitive match on name, career, title and key skills. */
  search(region: Region, query: string): RoleModel[] {
    const needle = query.toLowerCase();
    return this.store.getRoleModels(region).filter((model) =>
      [model.name, model.career, model.title, ...model.key_skills].join(' ').toLowerCase().includes(needle)
    );
  }

  skillDevelopmentTips(skills: readonly string[]): SkillTip[] {
    const results: SkillTip[] = [];
    for (const skill of skills) {
      const needle = skill.toLowerCase();
      for (const tip of this.store.getTips()) {
        if (tip.tip.toLowerCase().includes(needle) || tip.title.toLowerCase().includes(needle)) {
          results.push({ skill, tip });
        }
      }
    }
    return results.slice(0, MAX_SKILL_TIPS);
  }

  regionSpecificAdvice(region: Region, careerName: string): RegionAdvice[] {
    return this.forCareer(region, careerName).flatMap((model) =>
      model.region_context ? [{ name: model.name, context: model.region_context, advice: model.advice }] : []
    );
  }

  private relevantTips(query: Omit<TipQuery, 'userId'>): readonly CareerTip[] {
    const tips = this.store.getTips();
    const { careerFocus, mode } = query;
    const categories = mode ? this.store.getModeInfo(mode).tip_categories : undefined;

    const relevant = tips.filter(
      (tip) =>
        (!careerFocus || tip.career_focus.includes(careerFocus) || tip.career_focus.includes(ALL_CAREERS)) &&
        (!categories || categories.includes(tip.category))
    );
    return relevant.length > 0 ? relevant : tips;
  }

  /** Index in [0, length). */
  private pick(length: number): number {
    return Math.min(length - 1, Math.floor(this.random() * length));
  }
}
