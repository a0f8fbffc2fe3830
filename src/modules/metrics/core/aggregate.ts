/**
 * Grouping and ratio primitives.
 *
 * Ratios with a zero denominator are 0, and any non-finite intermediate is
 * shown as 0. Downstream sorting and colour thresholds depend on this.
 */

import { Decimal } from 'decimal.js';

/** Non-finite values become 0 */
export const clampFinite = (value: number): number => (Number.isFinite(value) ? value : 0);

/** `numerator / denominator`, or 0 when the denominator is 0 or the result is non-finite */
export const safeDivide = (numerator: number, denominator: number): number => {
  if (denominator === 0) return 0;
  return clampFinite(numerator / denominator);
};

/** Same as safeDivide, but only positive denominators count */
export const positiveDivide = (numerator: number, denominator: number): number =>
  denominator > 0 ? safeDivide(numerator, denominator) : 0;

export const roundTo = (value: number, decimals: number): number =>
  new Decimal(clampFinite(value)).toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP).toNumber();

/**
 * Sum the fields named by `zero` for every record, per group key.
 * Groups keep first-seen order. Additions go through decimal.js so that
 * money columns do not drift.
 *
 * @example groupSum(rows, (r) => r.agent, { cost: 0 }) // Map { 'A' => { cost: 15 }, 'B' => { cost: 3 } }
 */
export const groupSum = <F extends string, R extends Record<F, number>>(
  records: readonly R[],
  keyOf: (record: R) => string,
  zero: Record<F, number>
): Map<string, Record<F, number>> => {
  const sums = new Map<string, Record<F, number>>();

  for (const record of records) {
    const key = keyOf(record);
    const next: Record<F, number> = { ...(sums.get(key) ?? zero) };
    for (const field in zero) {
      next[field] = new Decimal(next[field]).plus(clampFinite(record[field])).toNumber();
    }
    sums.set(key, next);
  }

  return sums;
};

/** Sum of the fields named by `zero` over all records */
export const sumFields = <F extends string, R extends Record<F, number>>(
  records: readonly R[],
  zero: Record<F, number>
): Record<F, number> => groupSum(records, () => 'all', zero).get('all') ?? { ...zero };
