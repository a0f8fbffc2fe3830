/**
 * Counterpart rollups.
 *
 * Total amount is in PHP while spending is in USD, so ROAS converts the
 * per-payer revenue at a fixed rate before comparing it with the cost of
 * one first recharge.
 */

import { groupSum, positiveDivide } from './aggregate.js';
import { isoWeekLabel, monthLabel, spanLabel } from './periods.js';

import type { CounterpartRow, IsoDate } from '../../extraction/index.js';

export const PHP_USD_RATE = 57.7;

export interface CounterpartTotals {
  firstRecharge: number;
  totalAmount: number;
  spending: number;
}

export interface CounterpartRollupRow extends CounterpartTotals {
  key: string;
  /** spending / firstRecharge */
  costPerRecharge: number;
  /** totalAmount / firstRecharge */
  arppu: number;
  /** arppu / PHP_USD_RATE / costPerRecharge */
  roas: number;
}

export interface CounterpartWeekRow extends CounterpartRollupRow {
  dateStart: IsoDate;
  dateEnd: IsoDate;
  label: string;
}

const COUNTERPART_ZERO: CounterpartTotals = { firstRecharge: 0, totalAmount: 0, spending: 0 };

export const counterpartRatios = (
  key: string,
  totals: CounterpartTotals,
  phpUsdRate = PHP_USD_RATE
): CounterpartRollupRow => {
  const costPerRecharge = positiveDivide(totals.spending, totals.firstRecharge);
  const arppu = positiveDivide(totals.totalAmount, totals.firstRecharge);
  return {
    key,
    ...totals,
    costPerRecharge,
    arppu,
    roas: positiveDivide(positiveDivide(arppu, phpUsdRate), costPerRecharge),
  };
};

const rollup = <R extends CounterpartRow>(
  records: readonly R[],
  keyOf: (record: R) => string
): CounterpartRollupRow[] =>
  [...groupSum(records, keyOf, COUNTERPART_ZERO)].map(([key, totals]) => counterpartRatios(key, totals));

const byKey = (a: { key: string }, b: { key: string }): number => a.key.localeCompare(b.key);

/** Per channel source, first-seen order */
export const aggregateCounterpartBySource = (records: readonly CounterpartRow[]): CounterpartRollupRow[] =>
  rollup(records, (record) => record.channelSource);

export const aggregateCounterpartByDate = (
  records: readonly (CounterpartRow & { date: IsoDate })[]
): CounterpartRollupRow[] => rollup(records, (record) => record.date).sort(byKey);

export const aggregateCounterpartByMonth = (
  records: readonly (CounterpartRow & { date: IsoDate })[]
): CounterpartRollupRow[] => rollup(records, (record) => monthLabel(record.date)).sort(byKey);

/**
 * Per ISO week, labelled with the first and last date actually present.
 */
export const aggregateCounterpartByWeek = (
  records: readonly (CounterpartRow & { date: IsoDate })[]
): CounterpartWeekRow[] => {
  const spans = new Map<string, { dateStart: IsoDate; dateEnd: IsoDate }>();
  for (const record of records) {
    const week = isoWeekLabel(record.date);
    const span = spans.get(week);
    spans.set(week, {
      dateStart: span === undefined || record.date < span.dateStart ? record.date : span.dateStart,
      dateEnd: span === undefined || record.date > span.dateEnd ? record.date : span.dateEnd,
    });
  }

  return rollup(records, (record) => isoWeekLabel(record.date))
    .sort(byKey)
    .flatMap((row) => {
      const span = spans.get(row.key);
      if (span === undefined) return [];
      return [{ ...row, ...span, label: spanLabel(span.dateStart, span.dateEnd) }];
    });
};
