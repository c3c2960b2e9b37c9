import { escapeRegExp } from '../utils/text';
import { findBalancedSpans, strictDecode } from './json';
import type { NormalizedPayload, NormalizerStrategy } from './types';

interface CandidateFinder {
  strategy: NormalizerStrategy;
  find(text: string): string[];
}

function collect(pattern: RegExp, text: string): string[] {
  return Array.from(text.matchAll(pattern), (match) => (match[1] ?? '').trim()).filter(Boolean);
}

/**
 * Finders in precedence order. The first finder that yields any decodable
 * span wins, even when a later finder would produce a richer payload.
 */
function buildFinders(containerKey: string): CandidateFinder[] {
  const keyMarker = new RegExp(`"${escapeRegExp(containerKey)}"\\s*:`);

  return [
    {
      strategy: 'fenced-json',
      find: (text) => collect(/```json[ \t]*\r?\n?([\s\S]*?)```/gi, text)
    },
    {
      strategy: 'fenced-any',
      find: (text) => collect(/```[\w-]*[ \t]*\r?\n?([\s\S]*?)```/g, text)
    },
    {
      strategy: 'fenced-structured',
      find: (text) => collect(/```[\w-]*\s*([[{][\s\S]*?[\]}])\s*```/g, text)
    },
    {
      strategy: 'inline-backtick',
      find: (text) => collect(/(?<!`)`([[{][^`]*[\]}])`(?!`)/g, text)
    },
    {
      strategy: 'bare-object',
      find: (text) => findBalancedSpans(text, '{', '}').filter((span) => keyMarker.test(span))
    },
    {
      strategy: 'bare-array',
      find: (text) => findBalancedSpans(text, '[', ']').filter((span) => /^\[\s*\{/.test(span))
    }
  ];
}

function stripFenceMarkers(text: string): string {
  return text.replace(/```[\w-]*/g, '').replace(/`/g, '');
}

/**
 * Locates the JSON payload most likely intended in a model response.
 * Never throws; undecodable input comes back unchanged with a status that
 * tells "nothing JSON-shaped" apart from "found but invalid".
 */
export function locateJsonPayload(raw: string, containerKey = 'trends_found'): NormalizedPayload {
  let candidates = 0;

  for (const finder of buildFinders(containerKey)) {
    for (const span of finder.find(raw)) {
      candidates += 1;
      const decoded = strictDecode(span);
      if (decoded.ok) {
        return { status: 'decoded', payload: span, value: decoded.value, strategy: finder.strategy };
      }
    }
  }

  const stripped = stripFenceMarkers(raw);
  const start = stripped.indexOf('{');
  const end = stripped.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidates += 1;
    const span = stripped.slice(start, end + 1);
    const decoded = strictDecode(span);
    if (decoded.ok) {
      return { status: 'decoded', payload: span, value: decoded.value, strategy: 'brace-span' };
    }
  }

  if (candidates === 0) {
    return { status: 'no-candidate', payload: raw };
  }
  return { status: 'undecodable', payload: raw, candidates };
}

/** The decodable JSON payload inside `raw`, or `raw` itself when there is none. */
export function normalizeResponse(raw: string, containerKey?: string): string {
  return locateJsonPayload(raw, containerKey).payload;
}
