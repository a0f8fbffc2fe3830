/**
 * String helpers for hand-typed labels.
 */

/** Blank cells include the literal `nan` left behind by exported formulas */
export const isBlank = (value: string | null | undefined): boolean => {
  if (value === null || value === undefined) return true;
  const trimmed = value.trim();
  return trimmed === '' || trimmed.toLowerCase() === 'nan';
};

export const cleanText = (value: string | null | undefined): string =>
  isBlank(value) ? '' : (value ?? '').trim();

/**
 * Upper-cases the first letter of every word and lower-cases the rest.
 * A word starts after any non-letter, so `"o'neil"` becomes `"O'Neil"`.
 */
export const toTitleCase = (value: string): string =>
  value.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => {
    return `${boundary}${letter.toUpperCase()}`;
  });
