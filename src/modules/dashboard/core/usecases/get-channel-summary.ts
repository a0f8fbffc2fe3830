/**
 * Get Channel Summary Use Case
 *
 * Daily ROI totals per channel, side by side.
 */

import { err, ok, type Result } from 'neverthrow';

import { loadChannelSection } from './get-channel-report.js';
import {
  aggregateByChannel,
  aggregateByDate,
  totalRoi,
  type RoiRollupRow,
} from '../../../metrics/index.js';
import { checkRange, inRange } from '../range.js';

import type { DashboardError } from '../errors.js';
import type { DashboardDeps } from '../ports.js';
import type { DateRange } from '../types.js';
import type { Channel } from '../../../extraction/index.js';

const CHANNELS: readonly Channel[] = ['Facebook', 'Google'];

export interface ChannelSummary {
  /** One row per channel, in `Facebook`, `Google` order when both have data */
  channels: RoiRollupRow[];
  /** Both channels summed per date */
  daily: RoiRollupRow[];
  total: RoiRollupRow;
}

export const getChannelSummary = async (
  deps: DashboardDeps,
  range: DateRange
): Promise<Result<ChannelSummary, DashboardError>> => {
  const rangeResult = checkRange(range);
  if (rangeResult.isErr()) return err(rangeResult.error);

  const sections = await Promise.all(
    CHANNELS.map((channel) => loadChannelSection(deps, channel, 'daily_roi'))
  );
  const records = inRange(sections.flat(), rangeResult.value);

  return ok({
    channels: aggregateByChannel(records),
    daily: aggregateByDate(records),
    total: totalRoi(records),
  });
};
