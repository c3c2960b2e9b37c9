export interface TrendRow {
  keyword_key: string;
  keyword: string;
  search_volume: string | null;
  growth_percentage: string | null;
  content_gap_indicator: string | null;
  category: string | null;
  trend_description: string | null;
  user_context: string | null;
  confidence: number;
  potential: string | null;
  recommended_actions: string | null;
  date_extracted: string;
  source_identifier: string;
  raw_response: string | null;
  updated_ts: number;
}

export interface TrendAnalysisRow {
  keyword_key: string;
  keyword: string;
  opportunity_type: string | null;
  revenue_potential: string | null;
  launch_timeline: string | null;
  success_probability: string | null;
  overall_score: number | null;
  recommended_action: string;
  generated: number;
  payload: string | null;
  created_ts: number;
}

export interface UpsertSummary {
  saved: number;
  failed: number;
}
