/**
 * Get Team Channel Report Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { extractTeamChannel, type IsoDate, type TeamChannelRow } from '../../../extraction/index.js';
import {
  aggregateTeamBySource,
  aggregateTeamByTeam,
  aggregateTeamByWeek,
  type TeamRollupRow,
  type TeamWeekRow,
} from '../../../metrics/index.js';
import { loadGrid, sheetTabRef } from '../../../sheet-source/index.js';
import { checkRange, inRange } from '../range.js';

import type { DashboardError } from '../errors.js';
import type { DashboardDeps } from '../ports.js';
import type { DateRange } from '../types.js';

export interface TeamChannelReport {
  overall: TeamChannelRow[];
  daily: (TeamChannelRow & { date: IsoDate })[];
  byTeam: TeamRollupRow[];
  bySource: TeamRollupRow[];
  /** Tuesday–Monday weeks */
  weekly: TeamWeekRow[];
}

export const getTeamChannelReport = async (
  deps: DashboardDeps,
  range: DateRange
): Promise<Result<TeamChannelReport, DashboardError>> => {
  const rangeResult = checkRange(range);
  if (rangeResult.isErr()) return err(rangeResult.error);

  const grid = await loadGrid(deps, sheetTabRef(deps.catalog.teamChannel), 'partner');
  const { overall, daily } = extractTeamChannel(
    grid,
    { layout: deps.layouts.teamChannel.layout, startRow: deps.layouts.teamChannel.startRow },
    { today: deps.today() }
  );
  const dailyInRange = inRange(daily, rangeResult.value);

  return ok({
    overall,
    daily: dailyInRange,
    byTeam: aggregateTeamByTeam(dailyInRange),
    bySource: aggregateTeamBySource(dailyInRange),
    weekly: aggregateTeamByWeek(dailyInRange),
  });
};
