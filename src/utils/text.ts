const SPACE_PATTERN = /\s+/g;
const WRAPPING_QUOTES = /^["'“”‘’`]+|["'“”‘’`]+$/g;

export function normalizeWhitespace(value: string): string {
  return value.replace(SPACE_PATTERN, ' ').trim();
}

/** Deduplication and storage key for a keyword. */
export function keywordKey(value: string): string {
  return value.trim().toLowerCase();
}

export function stripWrappingQuotes(value: string): string {
  return value.trim().replace(WRAPPING_QUOTES, '').trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local calendar date, `YYYY-MM-DD`. */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local timestamp, `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** Local timestamp for file names, `YYYYMMDD_HHMMSS`. */
export function formatFileStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function truncate(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, Math.max(0, maxLength - 3))}...`;
}
