import { z } from 'zod';

const text = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .optional();

const textList = z
  .array(z.union([z.string(), z.number()]))
  .transform((values) => values.map((value) => String(value).trim()).filter(Boolean))
  .default([]);

export const businessOpportunitySchema = z
  .object({
    type: text,
    description: text,
    revenue_potential: text,
    startup_cost: text,
    time_to_launch: text,
    success_probability: text,
    target_customers: text,
    pricing_strategy: text,
    marketing_approach: text
  })
  .passthrough();

export const trendAnalysisPayloadSchema = z
  .object({
    market_analysis: z
      .object({
        market_size: text,
        growth_trajectory: text,
        seasonality: text,
        geographic_focus: text
      })
      .passthrough()
      .default({}),
    business_opportunities: z.array(businessOpportunitySchema).default([]),
    implementation_plan: z.record(z.string(), z.unknown()).default({}),
    content_strategy: z
      .object({
        hooks: textList,
        content_pillars: textList,
        posting_frequency: text
      })
      .passthrough()
      .default({}),
    competitive_analysis: z
      .object({
        competition_level: text,
        key_competitors: textList,
        differentiation_opportunities: textList
      })
      .passthrough()
      .default({}),
    recommended_action: text,
    overall_score: text
  })
  .passthrough();

export type BusinessOpportunity = z.infer<typeof businessOpportunitySchema>;
export type TrendAnalysisPayload = z.infer<typeof trendAnalysisPayloadSchema>;

export interface TrendAnalysis {
  keyword: string;
  marketSize: string;
  growthTrajectory: string;
  opportunities: BusinessOpportunity[];
  recommendedAction: string;
  /** 1-100 when the model supplied a number, otherwise null. */
  overallScore: number | null;
  /** False for the local fallback analysis. */
  generated: boolean;
  payload: Record<string, unknown>;
}
