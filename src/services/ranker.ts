import type { MatchScorer } from './match-scorer.js';
import type { Career, Region, UserProfile } from '../types/index.js';

export interface ScoredCareer {
  career: Career;
  score: number;
}

export interface VisualizationNode {
  id: string;
  name: string;
  type: 'user' | 'career';
  size: number;
  region: Region;
  salary?: string;
  growth?: string;
}

export interface VisualizationLink {
  source: string;
  target: string;
  strength: number;
}

export interface VisualizationData {
  nodes: VisualizationNode[];
  links: VisualizationLink[];
}

export type SortDirection = 'asc' | 'desc';

/**
 * Orders items by a numeric key. Array.prototype.sort is stable, so equal
 * keys keep their input order.
 */
export function rankBy<T>(items: readonly T[], key: (item: T) => number, direction: SortDirection): T[] {
  const sign = direction === 'asc' ? 1 : -1;
  return [...items].sort((a, b) => sign * (key(a) - key(b)));
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export class Ranker {
  constructor(
    private readonly scorer: MatchScorer,
    private readonly visualizationLimit = 3
  ) {}

  rank(profile: UserProfile, careers: readonly Career[]): ScoredCareer[] {
    const scored = careers.map((career) => ({ career, score: this.scorer.score(profile, career) }));
    return rankBy(scored, (entry) => entry.score, 'desc');
  }

  recommend(profile: UserProfile, careers: readonly Career[], limit = 5): Career[] {
    return this.rank(profile, careers)
      .slice(0, limit)
      .map((entry) => entry.career);
  }

  /** User node plus the top careers, each linked with its match score. */
  visualize(profile: UserProfile, careers: readonly Career[]): VisualizationData {
    const top = this.rank(profile, careers).slice(0, this.visualizationLimit);
    const data: VisualizationData = {
      nodes: [
        {
          id: 'user',
          name: `You (${capitalize(profile.mode)})`,
          type: 'user',
          size: 20,
          region: profile.region,
        },
      ],
      links: [],
    };

    top.forEach(({ career, score }, i) => {
      const id = `career_${i}`;
      data.nodes.push({
        id,
        name: career.name,
        type: 'career',
        size: 15,
        salary: career.median_salary,
        growth: career.growth_rate,
        region: profile.region,
      });
      data.links.push({ source: 'user', target: id, strength: score });
    });

    return data;
  }
}
