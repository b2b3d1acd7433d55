/**
 * Text helpers for user input and display. Lengths are counted in code
 * points so surrogate pairs are never split.
 */

export const MAX_SANITIZED_LENGTH = 4000;
export const TRUNCATION_MARKER = '...';

export function charLength(text: string): number {
  return Array.from(text).length;
}

export function escapeHtml(value: string): string {
  return value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&#x27;');
}

/**
 * Escape markup, strip quote and angle characters, cap the length and trim.
 * Never throws; absent input yields an empty string.
 */
export function sanitizeInput(text: string | null | undefined): string {
  if (!text) {
    return '';
  }

  let sanitized = escapeHtml(text).replace(/[<>"']/g, '');

  const chars = Array.from(sanitized);
  if (chars.length > MAX_SANITIZED_LENGTH) {
    sanitized = chars.slice(0, MAX_SANITIZED_LENGTH).join('') + TRUNCATION_MARKER;
  }

  return sanitized.trim();
}

/**
 * `toFixed` with exact ties rounded to even. Plain `toFixed` sends ties away
 * from zero; the exact decimal expansion tells a true tie from a near one.
 */
export function toFixedHalfEven(value: number, digits: number): string {
  const exact = value.toFixed(60);
  const point = exact.indexOf('.');
  const kept = exact.slice(0, digits === 0 ? point : point + 1 + digits);
  const rest = exact.slice(point + 1 + digits);
  const lastDigit = Number(kept[kept.length - 1]);
  if (/^50*$/.test(rest) && lastDigit % 2 === 0) {
    return kept;
  }
  return value.toFixed(digits);
}

/** 0.5 -> "500ms", 2.345 -> "2.35s". */
export function formatResponseTime(seconds: number): string {
  if (seconds < 1) {
    return `${toFixedHalfEven(seconds * 1000, 0)}ms`;
  }
  return `${toFixedHalfEven(seconds, 2)}s`;
}
