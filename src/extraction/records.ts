import { basename } from 'node:path';
import { z } from 'zod';

import { formatDate, keywordKey } from '../utils/text';
import type { ContentGapIndicator, SchemaDescriptor, TrendRecord } from './types';

export const NOT_SHOWN = 'not shown';
export const DEFAULT_POTENTIAL = '5';
export const DEFAULT_ACTIONS = 'Analyze further and create content';

function toText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : undefined;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    const parts = value.map(toText).filter((part): part is string => Boolean(part));
    return parts.length > 0 ? parts.join('; ') : undefined;
  }
  return undefined;
}

const textField = z.unknown().transform(toText);

/** Shape of one decoded trend as models emit it; unknown keys are kept. */
export const rawTrendSchema = z
  .object({
    keyword: textField,
    search_volume: textField,
    growth_percentage: textField,
    content_gap_indicator: textField,
    category: textField,
    trend_description: textField,
    user_context: textField,
    recommended_actions: textField,
    confidence: z.unknown()
  })
  .passthrough();

export type RawTrend = z.infer<typeof rawTrendSchema>;

/**
 * "8/10" -> 0.8, "7" -> 0.7, 9 -> 0.9. Values outside the nominal range are
 * returned as computed. Unreadable input yields `fallback`.
 */
export function normalizeConfidence(value: unknown, fallback = 0.5): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value / 10 : fallback;
  }
  if (typeof value !== 'string') {
    return fallback;
  }

  const text = value.trim();
  if (text.includes('/')) {
    const [numeratorText, denominatorText] = text.split('/', 2);
    const numerator = Number.parseFloat(numeratorText);
    const denominator = Number.parseFloat(denominatorText);
    if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
      return fallback;
    }
    return numerator / denominator;
  }

  const parsed = Number.parseFloat(text);
  return Number.isFinite(parsed) ? parsed / 10 : fallback;
}

export function normalizeContentGap(value: string | undefined): ContentGapIndicator {
  const match = value?.toLowerCase().match(/high|medium|low|none/);
  if (!match) {
    return 'none';
  }
  switch (match[0]) {
    case 'high':
      return 'high';
    case 'medium':
      return 'medium';
    case 'low':
      return 'low';
    default:
      return 'none';
  }
}

/** "8/10" -> "8"; anything else is returned trimmed. */
export function reducePotential(value: string): string {
  const fraction = value.trim().match(/^(\d+(?:\.\d+)?)\s*\/\s*\d+(?:\.\d+)?$/);
  return fraction ? fraction[1] : value.trim();
}

export interface RecordMetadata {
  sourceIdentifier: string;
  rawResponse: string;
  extractedAt: Date;
}

export interface TrendFields {
  keyword: string;
  searchVolume?: string;
  growthPercentage?: string;
  contentGap?: string;
  category?: string;
  trendDescription?: string;
  userContext?: string;
  confidence: number;
  potential?: string;
  recommendedActions?: string;
}

export function createTrendRecord(fields: TrendFields, metadata: RecordMetadata): TrendRecord {
  return {
    keyword: fields.keyword.trim(),
    searchVolume: fields.searchVolume ?? NOT_SHOWN,
    growthPercentage: fields.growthPercentage ?? NOT_SHOWN,
    contentGapIndicator: normalizeContentGap(fields.contentGap),
    category: fields.category ?? '',
    trendDescription: fields.trendDescription ?? '',
    userContext: fields.userContext ?? '',
    confidence: fields.confidence,
    potential: reducePotential(fields.potential ?? DEFAULT_POTENTIAL),
    recommendedActions: fields.recommendedActions ?? '',
    dateExtracted: formatDate(metadata.extractedAt),
    sourceIdentifier: basename(metadata.sourceIdentifier),
    rawResponse: metadata.rawResponse
  };
}

function pickPotential(raw: RawTrend, schema: SchemaDescriptor): string | undefined {
  for (const field of schema.potentialFields) {
    const value = toText(raw[field]);
    if (value) {
      return value;
    }
  }
  return undefined;
}

/** Converts one decoded list element; `null` when it is not a usable trend. */
export function recordFromDecoded(
  element: unknown,
  schema: SchemaDescriptor,
  metadata: RecordMetadata,
  defaultConfidence: number
): TrendRecord | null {
  const parsed = rawTrendSchema.safeParse(element);
  if (!parsed.success) {
    return null;
  }

  const raw = parsed.data;
  const keyword = raw.keyword;
  if (!keyword) {
    return null;
  }

  return createTrendRecord(
    {
      keyword,
      searchVolume: raw.search_volume,
      growthPercentage: raw.growth_percentage,
      contentGap: raw.content_gap_indicator,
      category: raw.category,
      trendDescription: raw.trend_description,
      userContext: raw.user_context,
      confidence: normalizeConfidence(raw.confidence, defaultConfidence),
      potential: pickPotential(raw, schema),
      recommendedActions: raw.recommended_actions
    },
    metadata
  );
}

/** Keeps the first record per lower-cased, trimmed keyword. */
export function dedupeTrends(records: Iterable<TrendRecord>): TrendRecord[] {
  const seen = new Set<string>();
  const unique: TrendRecord[] = [];

  for (const record of records) {
    const key = keywordKey(record.keyword);
    if (!key || seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(record);
  }

  return unique;
}
