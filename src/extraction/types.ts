export type ContentGapIndicator = 'high' | 'medium' | 'low' | 'none';

export interface TrendRecord {
  keyword: string;
  searchVolume: string;
  growthPercentage: string;
  contentGapIndicator: ContentGapIndicator;
  category: string;
  trendDescription: string;
  userContext: string;
  /** Normalised from "N/M", "N" (out of 10) or a bare number; not clamped. */
  confidence: number;
  /** Business or mobile-app potential on a 1-10 scale, kept as text. */
  potential: string;
  recommendedActions: string;
  dateExtracted: string;
  sourceIdentifier: string;
  rawResponse: string;
}

export type TrendBatch = TrendRecord[];

export type SchemaVariantName = 'business' | 'mobile_app';

export interface SchemaDescriptor {
  readonly name: SchemaVariantName;
  /** Top-level key expected to hold the list of trends. */
  readonly containerKey: string;
  /** The first entry is used by the rescue patterns. */
  readonly requiredFields: readonly string[];
  /** Candidate JSON keys for the potential score, first present wins. */
  readonly potentialFields: readonly string[];
}

export type NormalizerStrategy =
  | 'fenced-json'
  | 'fenced-any'
  | 'fenced-structured'
  | 'inline-backtick'
  | 'bare-object'
  | 'bare-array'
  | 'brace-span';

export type NormalizedPayload =
  | { status: 'decoded'; payload: string; value: unknown; strategy: NormalizerStrategy }
  | { status: 'no-candidate'; payload: string }
  | { status: 'undecodable'; payload: string; candidates: number };

export type StageName = 'strict' | 'rescue' | 'heuristic';

export type StageResult =
  | { stage: StageName; status: 'matched'; records: TrendBatch; detail: string }
  | { stage: StageName; status: 'no-match' }
  | { stage: StageName; status: 'malformed'; reason: string };

export interface ExtractionOutcome {
  status: 'matched' | 'no-match' | 'malformed';
  stage: StageName | null;
  records: TrendBatch;
  attempts: StageResult[];
}

export interface ExtractionOptions {
  schema?: SchemaDescriptor;
  /** Used when a decoded trend has no usable confidence. */
  defaultConfidence?: number;
  /** Assigned to every record recovered by the line scan. */
  heuristicConfidence?: number;
  now?: () => Date;
}
