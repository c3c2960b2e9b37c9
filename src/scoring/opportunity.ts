import type { PreferencesConfig, WeightsConfig } from '../config';
import type { ContentGapIndicator, TrendRecord } from '../extraction/types';
import type { Logger } from '../utils/logger';

interface OpportunityScorerDependencies {
  logger: Logger;
  weights: WeightsConfig;
  preferences: PreferencesConfig;
}

export interface OpportunityComponents {
  confidence: number;
  potential: number;
  contentGap: number;
  preferredCategory: number;
}

export interface RankedTrend {
  trend: TrendRecord;
  score: number;
  components: OpportunityComponents;
}

const CONTENT_GAP_WEIGHTS: Record<ContentGapIndicator, number> = {
  high: 1,
  medium: 0.6,
  low: 0.3,
  none: 0
};

/** Potential on a 0-1 scale; unreadable values count as zero. */
export function potentialRatio(potential: string): number {
  const value = Number.parseFloat(potential);
  if (!Number.isFinite(value)) {
    return 0;
  }
  return value / 10;
}

export class OpportunityScorer {
  private readonly preferredCategories: Set<string>;

  constructor(private readonly deps: OpportunityScorerDependencies) {
    this.preferredCategories = new Set(
      deps.preferences.preferred_categories.map((category) => category.trim().toLowerCase()).filter(Boolean)
    );
  }

  private isPreferred(category: string): boolean {
    return this.preferredCategories.has(category.trim().toLowerCase());
  }

  score(trend: TrendRecord): RankedTrend {
    const { weights } = this.deps;
    const components: OpportunityComponents = {
      confidence: weights.confidence * trend.confidence,
      potential: weights.potential * potentialRatio(trend.potential),
      contentGap: weights.content_gap * CONTENT_GAP_WEIGHTS[trend.contentGapIndicator],
      preferredCategory: this.isPreferred(trend.category) ? weights.preferred_category : 0
    };

    const score = components.confidence + components.potential + components.contentGap + components.preferredCategory;
    return { trend, score, components };
  }

  /** Highest score first; ties broken by keyword. */
  rank(trends: TrendRecord[]): RankedTrend[] {
    const ranked = trends.map((trend) => this.score(trend));
    ranked.sort((a, b) => b.score - a.score || a.trend.keyword.localeCompare(b.trend.keyword));

    if (ranked.length === 0) {
      this.deps.logger.warn('No trends available for opportunity scoring');
    }

    return ranked;
  }
}
