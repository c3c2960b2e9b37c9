import type { PreferencesConfig } from '../config';
import { locateJsonPayload } from '../extraction/normalizer';
import type { TrendRecord } from '../extraction/types';
import { describeError } from '../utils/errors';
import { keywordKey, truncate } from '../utils/text';
import type { Logger } from '../utils/logger';
import type { TrendGenerator } from '../vision/types';
import { trendAnalysisPayloadSchema } from './schemas';
import type { TrendAnalysis } from './schemas';

interface TrendAnalyzerDependencies {
  logger: Logger;
  generator: TrendGenerator;
  preferences: PreferencesConfig;
}

export function parseOverallScore(value: string | undefined): number | null {
  if (!value) {
    return null;
  }
  const match = value.match(/\d+(?:\.\d+)?/);
  if (!match) {
    return null;
  }
  const score = Number.parseFloat(match[0]);
  return Number.isFinite(score) ? score : null;
}

/** Local analysis used when the model is unavailable or its answer is unusable. */
export function basicAnalysis(trend: TrendRecord): TrendAnalysis {
  const keyword = trend.keyword || 'trend';
  const opportunity = { type: 'digital_product', description: `Create content about ${keyword}` };
  return {
    keyword: trend.keyword,
    marketSize: 'Unknown',
    growthTrajectory: 'Unknown',
    opportunities: [opportunity],
    recommendedAction: `Research and create content about ${keyword}`,
    overallScore: 50,
    generated: false,
    payload: {
      market_analysis: { market_size: 'Unknown', growth_trajectory: 'Unknown' },
      business_opportunities: [opportunity],
      recommended_action: `Research and create content about ${keyword}`,
      overall_score: '50'
    }
  };
}

export function buildAnalysisPrompt(trend: TrendRecord, preferences: PreferencesConfig): string {
  const constraints: string[] = [];
  if (preferences.target_market) {
    constraints.push(`Target market: ${preferences.target_market}.`);
  }
  if (preferences.budget_constraint) {
    constraints.push(`Budget constraint: ${preferences.budget_constraint}.`);
  }

  return [
    'Perform a business opportunity analysis for this social media search trend:',
    '',
    `Trend: "${trend.keyword}"`,
    `Category: ${trend.category || 'unknown'}`,
    `Description: ${trend.trendDescription || 'not available'}`,
    ...constraints,
    '',
    'Provide the analysis as JSON:',
    '{',
    '  "market_analysis": { "market_size": "estimate", "growth_trajectory": "growing/stable/declining", "seasonality": "...", "geographic_focus": "..." },',
    '  "business_opportunities": [ { "type": "digital_product/course/saas/service/physical_product", "description": "...", "revenue_potential": "$X-$Y monthly", "startup_cost": "$X", "time_to_launch": "X days/weeks", "success_probability": "1-10", "target_customers": "...", "pricing_strategy": "...", "marketing_approach": "..." } ],',
    '  "implementation_plan": { "week_1": "...", "week_2": "...", "week_3": "...", "week_4": "..." },',
    '  "content_strategy": { "hooks": ["..."], "content_pillars": ["..."], "posting_frequency": "X posts per day" },',
    '  "competitive_analysis": { "competition_level": "high/medium/low", "key_competitors": ["..."], "differentiation_opportunities": ["..."] },',
    '  "recommended_action": "immediate next step",',
    '  "overall_score": "1-100"',
    '}',
    '',
    'Focus on practical, actionable advice for a solo builder with a limited budget.'
  ].join('\n');
}

/** Maps a model answer onto a TrendAnalysis; `null` when it holds no usable JSON object. */
export function parseAnalysis(trend: TrendRecord, rawResponse: string): TrendAnalysis | null {
  const located = locateJsonPayload(rawResponse, 'business_opportunities');
  if (located.status !== 'decoded') {
    return null;
  }

  const parsed = trendAnalysisPayloadSchema.safeParse(located.value);
  if (!parsed.success) {
    return null;
  }

  const payload = parsed.data;
  return {
    keyword: trend.keyword,
    marketSize: payload.market_analysis.market_size ?? 'Unknown',
    growthTrajectory: payload.market_analysis.growth_trajectory ?? 'Unknown',
    opportunities: payload.business_opportunities,
    recommendedAction: payload.recommended_action ?? trend.recommendedActions,
    overallScore: parseOverallScore(payload.overall_score),
    generated: true,
    payload
  };
}

export class TrendAnalyzer {
  constructor(private readonly deps: TrendAnalyzerDependencies) {}

  async analyze(trend: TrendRecord): Promise<TrendAnalysis> {
    const { logger, generator } = this.deps;
    if (!generator.enabled) {
      return basicAnalysis(trend);
    }

    let response: string;
    try {
      response = await generator.generate(buildAnalysisPrompt(trend, this.deps.preferences));
    } catch (error) {
      logger.warn('Trend analysis request failed; using basic analysis', {
        keyword: trend.keyword,
        error: describeError(error)
      });
      return basicAnalysis(trend);
    }

    const analysis = parseAnalysis(trend, response);
    if (!analysis) {
      logger.warn('Trend analysis response was not valid JSON; using basic analysis', {
        keyword: trend.keyword,
        excerpt: truncate(response, 200)
      });
      return basicAnalysis(trend);
    }
    return analysis;
  }

  /** Sequential; keyed by the lower-cased keyword. */
  async analyzeAll(trends: TrendRecord[]): Promise<Map<string, TrendAnalysis>> {
    const analyses = new Map<string, TrendAnalysis>();
    for (const trend of trends) {
      this.deps.logger.info('Analyzing trend', { keyword: trend.keyword });
      analyses.set(keywordKey(trend.keyword), await this.analyze(trend));
    }
    return analyses;
  }
}
