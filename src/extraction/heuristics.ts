import { stripWrappingQuotes } from '../utils/text';
import { DEFAULT_ACTIONS, DEFAULT_POTENTIAL, createTrendRecord } from './records';
import type { RecordMetadata, TrendFields } from './records';
import type { TrendRecord } from './types';

type LabelledField = Exclude<keyof TrendFields, 'keyword' | 'confidence'>;

const FIELD_SYNONYMS: Array<[LabelledField, string[]]> = [
  ['searchVolume', ['search volume', 'volume', 'searches']],
  ['growthPercentage', ['growth percentage', 'growth rate', 'growth', 'increase']],
  ['contentGap', ['content gap indicator', 'content gap', 'gap']],
  ['category', ['category', 'niche']],
  ['trendDescription', ['trend description', 'description', 'why trending']],
  ['userContext', ['user context', 'user intent', 'context']],
  [
    'potential',
    ['mobile app potential', 'app potential', 'business potential', 'opportunity potential', 'potential']
  ],
  ['recommendedActions', ['recommended actions', 'next steps', 'actions', 'action']]
];

/** Longest synonym first, so "user context" is never claimed by "context". */
const SYNONYM_TABLE = FIELD_SYNONYMS.flatMap(([field, synonyms]) =>
  synonyms.map((synonym) => ({ synonym, field }))
).sort((a, b) => b.synonym.length - a.synonym.length);

const RECORD_LABELS = new Set(['trend', 'keyword', 'term']);
const QUOTED_LINE = /^"([^"]+)"$/;

function cleanLine(line: string): string {
  return line
    .trim()
    .replace(/^(?:[-*•]+|\d+[.)])\s+/, '')
    .replace(/\*\*|__/g, '')
    .trim();
}

function normalizeLabel(label: string): string {
  return stripWrappingQuotes(label).replace(/_/g, ' ').replace(/\s+/g, ' ').toLowerCase();
}

function afterFirstColon(line: string): string {
  const index = line.indexOf(':');
  return index === -1 ? '' : line.slice(index + 1);
}

function matchField(label: string): LabelledField | null {
  for (const { synonym, field } of SYNONYM_TABLE) {
    if (label === synonym || label.startsWith(`${synonym} `) || label.startsWith(`${synonym}(`)) {
      return field;
    }
  }
  return null;
}

function labelOf(line: string): string | null {
  const index = line.indexOf(':');
  return index === -1 ? null : normalizeLabel(line.slice(0, index));
}

/**
 * The keyword a line opens a record with, or `null` for any other line. A bare
 * quoted line only counts outside a list, where it is not an array element.
 */
function detectRecordStart(line: string, inList: boolean): string | null {
  const label = labelOf(line);
  if (label !== null && RECORD_LABELS.has(label)) {
    return cleanValue(afterFirstColon(line));
  }
  if (inList) {
    return null;
  }
  const quoted = line.match(QUOTED_LINE);
  return quoted ? quoted[1].trim() : null;
}

function cleanValue(value: string): string {
  return stripWrappingQuotes(value.trim().replace(/,$/, ''));
}

/**
 * Last-resort recovery: scans labelled lines top to bottom, keeping one
 * record in progress. A labelled field overwrites the current value, even
 * when empty. Lists opened by a `"key": [` line are tracked so their element
 * lines never start records. Empty input or unlabelled prose yields no records.
 */
export function scanTrendLines(
  raw: string,
  metadata: RecordMetadata,
  confidence: number
): TrendRecord[] {
  const records: TrendRecord[] = [];
  let current: TrendFields | null = null;
  let listDepth = 0;

  const finalize = () => {
    if (current && current.keyword.trim()) {
      records.push(createTrendRecord(current, metadata));
    }
    current = null;
  };

  for (const rawLine of raw.split(/\r?\n/)) {
    const line = cleanLine(rawLine);
    if (!line) {
      continue;
    }

    if (line.startsWith(']')) {
      listDepth = Math.max(0, listDepth - 1);
      continue;
    }

    const keyword = detectRecordStart(line, listDepth > 0);
    if (keyword !== null) {
      finalize();
      current = {
        keyword,
        confidence,
        potential: DEFAULT_POTENTIAL,
        recommendedActions: DEFAULT_ACTIONS
      };
      continue;
    }

    const label = labelOf(line);
    if (label !== null && line.endsWith('[')) {
      listDepth += 1;
      continue;
    }
    if (!current || label === null) {
      continue;
    }

    const field = matchField(label);
    if (!field) {
      continue;
    }
    current[field] = cleanValue(afterFirstColon(line));
  }

  finalize();
  return records;
}
