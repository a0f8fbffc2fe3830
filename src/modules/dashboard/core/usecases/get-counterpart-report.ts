/**
 * Get Counterpart Report Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import {
  extractCounterpart,
  type Channel,
  type CounterpartRow,
  type IsoDate,
} from '../../../extraction/index.js';
import {
  aggregateCounterpartByDate,
  aggregateCounterpartBySource,
  aggregateCounterpartByWeek,
  type CounterpartRollupRow,
  type CounterpartWeekRow,
} from '../../../metrics/index.js';
import { loadGrid, sheetTabRef } from '../../../sheet-source/index.js';
import { createNotFoundError, type DashboardError } from '../errors.js';
import { checkRange, inRange } from '../range.js';
import { channelFromSlug, type DateRange } from '../types.js';

import type { DashboardDeps } from '../ports.js';

export interface GetCounterpartReportInput {
  channel: string;
  range: DateRange;
}

export interface CounterpartReport {
  channel: Channel;
  /** The OVERALL PERFORMANCE block, as typed in the sheet */
  overall: CounterpartRow[];
  daily: (CounterpartRow & { date: IsoDate })[];
  /** Daily blocks summed per channel source */
  bySource: CounterpartRollupRow[];
  byDate: CounterpartRollupRow[];
  weekly: CounterpartWeekRow[];
}

export const getCounterpartReport = async (
  deps: DashboardDeps,
  input: GetCounterpartReportInput
): Promise<Result<CounterpartReport, DashboardError>> => {
  const channel = channelFromSlug(input.channel);
  if (channel === undefined) return err(createNotFoundError('channel', input.channel));

  const rangeResult = checkRange(input.range);
  if (rangeResult.isErr()) return err(rangeResult.error);

  const grid = await loadGrid(deps, sheetTabRef(deps.catalog.counterpart), 'partner');
  const { overall, daily } = extractCounterpart(
    grid,
    {
      channel,
      layout: deps.layouts.counterpart.sections[channel],
      startRow: deps.layouts.counterpart.startRow,
    },
    { today: deps.today() }
  );
  const dailyInRange = inRange(daily, rangeResult.value);

  return ok({
    channel,
    overall,
    daily: dailyInRange,
    bySource: aggregateCounterpartBySource(dailyInRange),
    byDate: aggregateCounterpartByDate(dailyInRange),
    weekly: aggregateCounterpartByWeek(dailyInRange),
  });
};
