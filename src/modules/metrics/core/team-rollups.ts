/**
 * Team Channel rollups: per team, per channel source and per
 * Tuesday–Monday reporting week.
 */

import { groupSum, positiveDivide } from './aggregate.js';
import { addDays, spanLabel, tuesdayWeekStart } from './periods.js';

import type { IsoDate, TeamChannelRow } from '../../extraction/index.js';

export interface TeamTotals {
  cost: number;
  registrations: number;
  firstRecharge: number;
  totalAmount: number;
}

export interface TeamRollupRow extends TeamTotals {
  key: string;
  /** cost / registrations */
  cpr: number;
  /** cost / firstRecharge */
  cpfd: number;
  /** totalAmount / firstRecharge */
  arppu: number;
  /** totalAmount / cost */
  roas: number;
}

export interface TeamWeekRow extends TeamRollupRow {
  /** The Tuesday opening the week */
  weekStart: IsoDate;
  /** The closing Monday */
  weekEnd: IsoDate;
  label: string;
}

const TEAM_ZERO: TeamTotals = { cost: 0, registrations: 0, firstRecharge: 0, totalAmount: 0 };

const withRatios = (key: string, totals: TeamTotals): TeamRollupRow => ({
  key,
  ...totals,
  cpr: positiveDivide(totals.cost, totals.registrations),
  cpfd: positiveDivide(totals.cost, totals.firstRecharge),
  arppu: positiveDivide(totals.totalAmount, totals.firstRecharge),
  roas: positiveDivide(totals.totalAmount, totals.cost),
});

const rollup = <R extends TeamChannelRow>(
  records: readonly R[],
  keyOf: (record: R) => string
): TeamRollupRow[] => [...groupSum(records, keyOf, TEAM_ZERO)].map(([key, totals]) => withRatios(key, totals));

/** Rows without a team are grouped under `''` */
export const aggregateTeamByTeam = (records: readonly TeamChannelRow[]): TeamRollupRow[] =>
  rollup(records, (record) => record.team);

export const aggregateTeamBySource = (records: readonly TeamChannelRow[]): TeamRollupRow[] =>
  rollup(records, (record) => record.channelSource);

export const aggregateTeamByWeek = (
  records: readonly (TeamChannelRow & { date: IsoDate })[]
): TeamWeekRow[] =>
  rollup(records, (record) => tuesdayWeekStart(record.date))
    .sort((a, b) => a.key.localeCompare(b.key))
    .map((row) => {
      const weekEnd = addDays(row.key, 6);
      return { ...row, weekStart: row.key, weekEnd, label: spanLabel(row.key, weekEnd) };
    });
