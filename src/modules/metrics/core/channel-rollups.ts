/**
 * Channel ROI rollups: per day, ISO week, month and channel.
 */

import { groupSum, positiveDivide } from './aggregate.js';
import { isoWeekLabel, monthLabel } from './periods.js';

import type { ChannelRoiRecord } from '../../extraction/index.js';

export interface RoiTotals {
  register: number;
  ftd: number;
  depositAmount: number;
  cost: number;
}

export interface RoiRollupRow extends RoiTotals {
  /** Date, week label, month label or channel */
  key: string;
  /** cost / register */
  cpr: number;
  /** depositAmount / cost */
  roas: number;
}

const ROI_ZERO: RoiTotals = { register: 0, ftd: 0, depositAmount: 0, cost: 0 };

const withRatios = (key: string, totals: RoiTotals): RoiRollupRow => ({
  key,
  ...totals,
  cpr: positiveDivide(totals.cost, totals.register),
  roas: positiveDivide(totals.depositAmount, totals.cost),
});

const rollup = (
  records: readonly ChannelRoiRecord[],
  keyOf: (record: ChannelRoiRecord) => string,
  sorted: boolean
): RoiRollupRow[] => {
  const rows = [...groupSum(records, keyOf, ROI_ZERO)].map(([key, totals]) => withRatios(key, totals));
  return sorted ? rows.sort((a, b) => a.key.localeCompare(b.key)) : rows;
};

export const aggregateByDate = (records: readonly ChannelRoiRecord[]): RoiRollupRow[] =>
  rollup(records, (record) => record.date, true);

export const aggregateByWeek = (records: readonly ChannelRoiRecord[]): RoiRollupRow[] =>
  rollup(records, (record) => isoWeekLabel(record.date), true);

export const aggregateByMonth = (records: readonly ChannelRoiRecord[]): RoiRollupRow[] =>
  rollup(records, (record) => monthLabel(record.date), true);

/** Rows in first-seen channel order */
export const aggregateByChannel = (records: readonly ChannelRoiRecord[]): RoiRollupRow[] =>
  rollup(records, (record) => record.channel, false);

export const totalRoi = (records: readonly ChannelRoiRecord[]): RoiRollupRow =>
  withRatios('total', groupSum(records, () => 'total', ROI_ZERO).get('total') ?? ROI_ZERO);
