export type DecodeResult = { ok: true; value: unknown } | { ok: false; error: string };

/** Strict JSON decode; no trailing text or syntax deviation is tolerated. */
export function strictDecode(text: string): DecodeResult {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Fixes the deviations models produce most often: typographic quotes and
 * trailing commas before a closing bracket.
 */
export function repairJson(text: string): string {
  return text
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(/,\s*([}\]])/g, '$1');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function findClosing(text: string, start: number, open: string, close: string): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === open) {
      depth += 1;
    } else if (char === close) {
      depth -= 1;
      if (depth === 0) {
        return index;
      }
    }
  }

  return -1;
}

/**
 * Index of the bracket closing the one at `start`, counting `{}` and `[]`
 * together; -1 when the text ends first.
 */
export function findMatchingBracket(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      depth += 1;
    } else if (char === '}' || char === ']') {
      depth -= 1;
      if (depth === 0) {
        return index;
      }
    }
  }

  return -1;
}

/**
 * Outermost balanced `open ... close` spans in text order. String literals
 * are skipped when counting depth; an opener that never closes is ignored.
 */
export function findBalancedSpans(text: string, open: '{' | '[', close: '}' | ']'): string[] {
  const spans: string[] = [];
  let index = text.indexOf(open);

  while (index !== -1) {
    const end = findClosing(text, index, open, close);
    if (end === -1) {
      index = text.indexOf(open, index + 1);
      continue;
    }
    spans.push(text.slice(index, end + 1));
    index = text.indexOf(open, end + 1);
  }

  return spans;
}
