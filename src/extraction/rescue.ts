import { escapeRegExp } from '../utils/text';
import { findMatchingBracket, isRecord, repairJson, strictDecode } from './json';
import type { SchemaDescriptor } from './types';

export type RescuePatternName = 'container-object' | 'object-array';

export interface RescueCandidate {
  pattern: RescuePatternName;
  repaired: boolean;
  items: unknown[];
}

export interface RescueScan {
  spans: number;
  candidate: RescueCandidate | null;
}

interface RescuePattern {
  name: RescuePatternName;
  opener: RegExp;
  closer: RegExp;
  marker: string;
}

/** The trend list inside a decoded value, or `null` when the shape does not fit. */
export function listFromDecoded(value: unknown, containerKey: string): unknown[] | null {
  if (Array.isArray(value)) {
    return value;
  }
  if (isRecord(value)) {
    const list = value[containerKey];
    return Array.isArray(list) ? list : null;
  }
  return null;
}

function isObjectList(value: unknown): value is unknown[] {
  return Array.isArray(value) && value.every(isRecord);
}

function acceptShape(value: unknown, containerKey: string): unknown[] | null {
  if (isRecord(value)) {
    const list = value[containerKey];
    return isObjectList(list) ? list : null;
  }
  return isObjectList(value) ? value : null;
}

function buildPatterns(schema: SchemaDescriptor): RescuePattern[] {
  const container = escapeRegExp(schema.containerKey);
  const required = schema.requiredFields[0] ?? 'keyword';

  return [
    {
      name: 'container-object',
      opener: new RegExp(`\\{\\s*"${container}"\\s*:\\s*\\[`, 'g'),
      closer: /\]\s*\}$/,
      marker: `"${schema.containerKey}"`
    },
    {
      name: 'object-array',
      opener: /\[\s*\{/g,
      closer: /\}\s*,?\s*\]$/,
      marker: `"${required}"`
    }
  ];
}

/**
 * The span from `start` to its balancing bracket. Any shorter or longer span
 * ending at a closer leaves a bracket open, so no other span can decode.
 */
function spanFrom(raw: string, start: number, closer: RegExp): string | null {
  const end = findMatchingBracket(raw, start);
  if (end === -1) {
    return null;
  }
  const span = raw.slice(start, end + 1);
  return closer.test(span) ? span : null;
}

function decodeSpan(span: string, containerKey: string): { items: unknown[]; repaired: boolean } | null {
  for (const repaired of [false, true]) {
    const decoded = strictDecode(repaired ? repairJson(span) : span);
    if (!decoded.ok) {
      continue;
    }
    const items = acceptShape(decoded.value, containerKey);
    if (items) {
      return { items, repaired };
    }
  }
  return null;
}

/**
 * Searches the raw response for narrower structures. Patterns are tried in a
 * fixed order (container object, then array of objects). Within a pattern,
 * start positions are tried leftmost first; the balanced span from a start is
 * decoded strictly, then after repair, and the first accepted shape wins.
 */
export function rescueTrendList(raw: string, schema: SchemaDescriptor): RescueScan {
  let spans = 0;

  for (const pattern of buildPatterns(schema)) {
    for (const opening of raw.matchAll(pattern.opener)) {
      const span = spanFrom(raw, opening.index ?? 0, pattern.closer);
      if (span === null || !span.includes(pattern.marker)) {
        continue;
      }
      spans += 1;
      const decoded = decodeSpan(span, schema.containerKey);
      if (decoded) {
        return { spans, candidate: { pattern: pattern.name, ...decoded } };
      }
    }
  }

  return { spans, candidate: null };
}
