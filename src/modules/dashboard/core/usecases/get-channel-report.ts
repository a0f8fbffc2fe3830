/**
 * Get Channel Report Use Case
 *
 * One ROI section of the FB or Google summary sheet: records in range plus
 * daily, weekly and monthly rollups.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  extractChannelRoi,
  type Channel,
  type ChannelRoiRecord,
  type RoiSection,
} from '../../../extraction/index.js';
import {
  aggregateByDate,
  aggregateByMonth,
  aggregateByWeek,
  totalRoi,
  type RoiRollupRow,
} from '../../../metrics/index.js';
import { channelRoiRef, loadGrid } from '../../../sheet-source/index.js';
import { createNotFoundError, type DashboardError } from '../errors.js';
import { checkRange, inRange } from '../range.js';
import { channelFromSlug, sectionFromSlug, type DateRange } from '../types.js';

import type { DashboardDeps } from '../ports.js';

export interface GetChannelReportInput {
  channel: string;
  section: string;
  range: DateRange;
}

export interface ChannelReport {
  channel: Channel;
  section: RoiSection;
  records: ChannelRoiRecord[];
  daily: RoiRollupRow[];
  weekly: RoiRollupRow[];
  monthly: RoiRollupRow[];
  total: RoiRollupRow;
}

/**
 * All records of one channel section. Failed fetches read as an empty sheet.
 */
export const loadChannelSection = async (
  deps: DashboardDeps,
  channel: Channel,
  section: RoiSection
): Promise<ChannelRoiRecord[]> => {
  const sheet = deps.layouts.channelRoi[channel];
  const grid = await loadGrid(deps, channelRoiRef(deps.catalog, channel), 'channel');
  return extractChannelRoi(grid, {
    channel,
    section,
    layout: sheet.sections[section],
    startRow: sheet.startRow,
  });
};

export const getChannelReport = async (
  deps: DashboardDeps,
  input: GetChannelReportInput
): Promise<Result<ChannelReport, DashboardError>> => {
  const channel = channelFromSlug(input.channel);
  if (channel === undefined) return err(createNotFoundError('channel', input.channel));
  const section = sectionFromSlug(input.section);
  if (section === undefined) return err(createNotFoundError('section', input.section));

  const rangeResult = checkRange(input.range);
  if (rangeResult.isErr()) return err(rangeResult.error);

  const records = inRange(await loadChannelSection(deps, channel, section), rangeResult.value);

  return ok({
    channel,
    section,
    records,
    daily: aggregateByDate(records),
    weekly: aggregateByWeek(records),
    monthly: aggregateByMonth(records),
    total: totalRoi(records),
  });
};
