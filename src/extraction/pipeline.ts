import { scanTrendLines } from './heuristics';
import { locateJsonPayload } from './normalizer';
import { recordFromDecoded } from './records';
import type { RecordMetadata } from './records';
import { listFromDecoded, rescueTrendList } from './rescue';
import { BUSINESS_SCHEMA } from './schemas';
import type {
  ExtractionOptions,
  ExtractionOutcome,
  SchemaDescriptor,
  StageResult,
  TrendBatch
} from './types';

export const DEFAULT_CONFIDENCE = 0.5;
export const HEURISTIC_CONFIDENCE = 0.7;

interface StageContext {
  raw: string;
  schema: SchemaDescriptor;
  metadata: RecordMetadata;
  defaultConfidence: number;
  heuristicConfidence: number;
}

function buildRecords(items: unknown[], context: StageContext): TrendBatch {
  const records: TrendBatch = [];
  for (const item of items) {
    const record = recordFromDecoded(item, context.schema, context.metadata, context.defaultConfidence);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

function fromItems(stage: 'strict' | 'rescue', items: unknown[], detail: string, context: StageContext): StageResult {
  const records = buildRecords(items, context);
  if (items.length > 0 && records.length === 0) {
    return { stage, status: 'malformed', reason: `none of ${items.length} listed trends carried a keyword` };
  }
  return { stage, status: 'matched', records, detail };
}

function strictStage(context: StageContext): StageResult {
  const located = locateJsonPayload(context.raw, context.schema.containerKey);
  switch (located.status) {
    case 'no-candidate':
      return { stage: 'strict', status: 'no-match' };
    case 'undecodable':
      return {
        stage: 'strict',
        status: 'malformed',
        reason: `${located.candidates} JSON candidate(s) failed to decode`
      };
    case 'decoded': {
      const items = listFromDecoded(located.value, context.schema.containerKey);
      if (!items) {
        return {
          stage: 'strict',
          status: 'malformed',
          reason: `decoded payload (${located.strategy}) has no "${context.schema.containerKey}" list`
        };
      }
      return fromItems('strict', items, located.strategy, context);
    }
  }
}

function rescueStage(context: StageContext): StageResult {
  const scan = rescueTrendList(context.raw, context.schema);
  if (!scan.candidate) {
    return scan.spans === 0
      ? { stage: 'rescue', status: 'no-match' }
      : { stage: 'rescue', status: 'malformed', reason: `${scan.spans} span(s) did not decode to a trend list` };
  }
  const detail = scan.candidate.repaired ? `${scan.candidate.pattern} (repaired)` : scan.candidate.pattern;
  return fromItems('rescue', scan.candidate.items, detail, context);
}

function heuristicStage(context: StageContext): StageResult {
  const records = scanTrendLines(context.raw, context.metadata, context.heuristicConfidence);
  if (records.length === 0) {
    return { stage: 'heuristic', status: 'no-match' };
  }
  return { stage: 'heuristic', status: 'matched', records, detail: 'line-scan' };
}

const STAGES: Array<(context: StageContext) => StageResult> = [strictStage, rescueStage, heuristicStage];

/**
 * Runs strict decode, regex rescue and the heuristic line scan in order and
 * stops at the first stage that matches. Every attempt is reported so callers
 * can tell "nothing found" from "found but unrecoverable".
 */
export function runExtractionPipeline(
  rawResponse: string,
  sourceIdentifier: string,
  options: ExtractionOptions = {}
): ExtractionOutcome {
  const context: StageContext = {
    raw: rawResponse,
    schema: options.schema ?? BUSINESS_SCHEMA,
    metadata: {
      sourceIdentifier,
      rawResponse,
      extractedAt: (options.now ?? (() => new Date()))()
    },
    defaultConfidence: options.defaultConfidence ?? DEFAULT_CONFIDENCE,
    heuristicConfidence: options.heuristicConfidence ?? HEURISTIC_CONFIDENCE
  };

  const attempts: StageResult[] = [];
  for (const stage of STAGES) {
    const result = stage(context);
    attempts.push(result);
    if (result.status === 'matched') {
      return { status: 'matched', stage: result.stage, records: result.records, attempts };
    }
  }

  const malformed = attempts.some((attempt) => attempt.status === 'malformed');
  return { status: malformed ? 'malformed' : 'no-match', stage: null, records: [], attempts };
}

export function extractTrends(
  rawResponse: string,
  sourceIdentifier: string,
  options?: ExtractionOptions
): TrendBatch {
  return runExtractionPipeline(rawResponse, sourceIdentifier, options).records;
}
