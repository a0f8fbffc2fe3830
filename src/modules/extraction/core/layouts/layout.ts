/**
 * Layout descriptors and the row accessor built on them.
 *
 * A descriptor maps logical field names to zero-based column indices for one
 * (sheet, section) pair. Fields a section does not carry are simply absent;
 * reading them yields blank text and zero.
 */

import { CHANNEL_DATE_PROFILE, parseDate } from '../coercion/parse-date.js';
import { parseLooseNumeric, parseNumeric } from '../coercion/parse-numeric.js';
import { cleanText, isBlank } from '../coercion/text.js';
import { LayoutConfigError } from '../errors.js';

import type { DateParseOptions, DateParseProfile } from '../coercion/parse-date.js';
import type { IsoDate, RawRow } from '../types.js';

export interface LayoutDescriptor<F extends string> {
  readonly name: string;
  readonly columns: Readonly<Partial<Record<F, number>>>;
  /** Lowest referenced column */
  readonly minIndex: number;
  /** Highest referenced column; shorter rows are inapplicable */
  readonly maxIndex: number;
}

/**
 * Build a descriptor, rejecting negative, fractional or colliding offsets.
 */
export const defineLayout = <F extends string>(
  name: string,
  columns: Partial<Record<F, number>>
): LayoutDescriptor<F> => {
  const seen = new Map<number, string>();
  let minIndex = Number.POSITIVE_INFINITY;
  let maxIndex = -1;

  const entries: [string, number | undefined][] = Object.entries(columns);
  for (const [field, index] of entries) {
    if (index === undefined) continue;
    if (!Number.isInteger(index) || index < 0) {
      throw new LayoutConfigError(name, `field "${field}" has invalid column ${String(index)}`);
    }
    const previous = seen.get(index);
    if (previous !== undefined) {
      throw new LayoutConfigError(name, `fields "${previous}" and "${field}" share column ${String(index)}`);
    }
    seen.set(index, field);
    minIndex = Math.min(minIndex, index);
    maxIndex = Math.max(maxIndex, index);
  }

  if (maxIndex < 0) {
    throw new LayoutConfigError(name, 'no columns defined');
  }

  return Object.freeze({ name, columns: Object.freeze({ ...columns }), minIndex, maxIndex });
};

/**
 * Shift every column of a descriptor, for repeated blocks such as the
 * per-person bands of the individual KPI sheet.
 */
export const offsetLayout = <F extends string>(
  name: string,
  offsets: Partial<Record<F, number>>,
  fields: readonly F[],
  start: number
): LayoutDescriptor<F> => {
  const shifted: Partial<Record<F, number>> = {};
  for (const field of fields) {
    const offset = offsets[field];
    if (offset !== undefined) {
      shifted[field] = offset + start;
    }
  }
  return defineLayout(name, shifted);
};

// ─────────────────────────────────────────────────────────────────────────────
// Row accessor
// ─────────────────────────────────────────────────────────────────────────────

export interface RowView<F extends string> {
  readonly row: RawRow;
  /** Raw cell text, '' when the section has no such field */
  raw(field: F): string;
  /** Trimmed text; blank and `nan` read as '' */
  text(field: F): string;
  isBlank(field: F): boolean;
  /** parseNumeric with fallback 0 */
  number(field: F): number;
  /** parseLooseNumeric with fallback 0 */
  looseNumber(field: F): number;
  date(field: F, profile?: DateParseProfile, options?: DateParseOptions): IsoDate | null;
}

/**
 * Validate the row length once and return a typed projection, or null when
 * the row does not reach the descriptor's highest column.
 */
export const projectRow = <F extends string>(
  row: RawRow,
  layout: LayoutDescriptor<F>
): RowView<F> | null => {
  if (row.length <= layout.maxIndex) return null;

  const raw = (field: F): string => {
    const index = layout.columns[field];
    return index === undefined ? '' : (row[index] ?? '');
  };

  return {
    row,
    raw,
    text: (field) => cleanText(raw(field)),
    isBlank: (field) => isBlank(raw(field)),
    number: (field) => parseNumeric(raw(field)),
    looseNumber: (field) => parseLooseNumeric(raw(field)),
    date: (field, profile = CHANNEL_DATE_PROFILE, options = {}) =>
      parseDate(raw(field), profile, options),
  };
};
