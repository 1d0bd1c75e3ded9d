import type { ReferenceDataStore } from '../data/store.js';
import { NotFoundError } from '../utils/errors.js';
import { rankBy } from './ranker.js';
import type { Region, TimeHorizon, TrendCategory, TrendingCareer } from '../types/index.js';

export interface RadarSeries {
  career: string;
  /** One value per radar label; a category the career has no score for reads 0. */
  values: number[];
}

export interface TrendRadar {
  labels: string[];
  series: RadarSeries[];
}

export interface TrendingCareersView {
  careers: TrendingCareer[];
  categories: TrendCategory[];
  time_horizons: TimeHorizon[];
  radar: TrendRadar;
  region: Region;
}

export class TrendingCareersService {
  constructor(private readonly store: ReferenceDataStore) {}

  /** The region's list, or the global one when the region has none. */
  careers(region: Region): readonly TrendingCareer[] {
    const { trending_careers_2025_2035: lists } = this.store.getTrendingCareers();
    return lists[region].length > 0 ? lists[region] : lists.global;
  }

  overview(region: Region, horizon?: string): TrendingCareersView {
    const { trend_categories, time_horizons } = this.store.getTrendingCareers();
    const careers = horizon === undefined ? [...this.careers(region)] : this.byHorizon(region, horizon);
    return {
      careers,
      categories: [...trend_categories],
      time_horizons: [...time_horizons],
      radar: this.radar(careers),
      region,
    };
  }

  byHorizon(region: Region, horizonId: string): TrendingCareer[] {
    const horizon = this.findHorizon(horizonId);
    return this.careers(region).filter((career) => career.peak_horizon === horizon.id);
  }

  /** Highest scores first; ties keep the list order. */
  topForCategory(region: Region, categoryId: string, limit = 3): TrendingCareer[] {
    const { trend_categories: categories } = this.store.getTrendingCareers();
    if (!categories.some((category) => category.id === categoryId)) {
      throw new NotFoundError(
        `Trend category '${categoryId}' not found`,
        categories.map((category) => category.id)
      );
    }
    return rankBy(this.careers(region), (career) => career.trend_scores[categoryId] ?? 0, 'desc').slice(0, limit);
  }

  radar(careers: readonly TrendingCareer[]): TrendRadar {
    const { trend_categories: categories } = this.store.getTrendingCareers();
    return {
      labels: categories.map((category) => category.name),
      series: careers.map((career) => ({
        career: career.name,
        values: categories.map((category) => career.trend_scores[category.id] ?? 0),
      })),
    };
  }

  private findHorizon(horizonId: string): TimeHorizon {
    const { time_horizons: horizons } = this.store.getTrendingCareers();
    const lower = horizonId.trim().toLowerCase();
    const horizon = horizons.find((candidate) => candidate.id.toLowerCase() === lower);
    if (!horizon) {
      throw new NotFoundError(
        `Time horizon '${horizonId}' not found`,
        horizons.map((candidate) => candidate.id)
      );
    }
    return horizon;
  }
}
