/**
 * Tolerant cell-to-number coercion. Never throws; unparseable cells become the fallback.
 */

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Strips thousands separators, `$`, `₱`, `%` and surrounding whitespace,
 * then parses a decimal number.
 *
 * @example parseNumeric('$1,234.56') // 1234.56
 */
export const parseNumeric = (raw: string | null | undefined, fallback = 0): number => {
  if (raw === null || raw === undefined) return fallback;

  const cleaned = raw.replace(/[,$₱%]/g, '').trim();
  if (cleaned === '' || !DECIMAL_PATTERN.test(cleaned)) return fallback;

  const value = Number(cleaned);
  return Number.isFinite(value) ? value : fallback;
};

/**
 * Keeps only digits, `.` and `-` before parsing, so `"12 ads"` reads as 12.
 * Used by the hand-typed agent sheets.
 */
export const parseLooseNumeric = (raw: string | null | undefined, fallback = 0): number => {
  if (raw === null || raw === undefined) return fallback;

  const cleaned = raw.replace(/[^\d.-]/g, '');
  if (cleaned === '' || !DECIMAL_PATTERN.test(cleaned)) return fallback;

  const value = Number(cleaned);
  return Number.isFinite(value) ? value : fallback;
};

/**
 * Sum of every integer in a free-text count, e.g. `"7 Banners & 2 Videos"` → 9.
 */
export const parseCountPhrase = (raw: string | null | undefined, fallback = 0): number => {
  if (raw === null || raw === undefined) return fallback;

  const text = raw.trim();
  if (text === '' || text.toLowerCase() === 'nan') return fallback;

  const numbers = text.match(/\d+/g);
  if (numbers === null) return fallback;
  return numbers.reduce((sum, digits) => sum + Number.parseInt(digits, 10), 0);
};

/** Truncates toward zero, as counts are stored in the sheets with stray decimals */
export const toCount = (value: number): number => Math.trunc(value);
