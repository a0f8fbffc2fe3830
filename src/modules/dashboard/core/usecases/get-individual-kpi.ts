/**
 * Get Individual KPI Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import {
  extractIndividualKpi,
  type ExtractionContext,
  type IndividualKpiRecord,
} from '../../../extraction/index.js';
import { aggregateAdsKpiByPerson, totalAdsKpi, type AdsKpiRow } from '../../../metrics/index.js';
import { loadGrid, sheetTabRef } from '../../../sheet-source/index.js';
import { checkRange, inRange } from '../range.js';

import type { DashboardError } from '../errors.js';
import type { DashboardDeps } from '../ports.js';
import type { DateRange } from '../types.js';

export interface IndividualKpiReport {
  records: IndividualKpiRecord[];
  /** Highest spend first */
  byPerson: AdsKpiRow[];
  total: AdsKpiRow;
}

/**
 * Every Individual KPI record, with the configured persons left out.
 */
export const loadIndividualKpi = async (
  deps: DashboardDeps,
  ctx: ExtractionContext
): Promise<IndividualKpiRecord[]> => {
  const { individualKpi } = deps.catalog;
  const grid = await loadGrid(deps, sheetTabRef(individualKpi), 'ads');
  return extractIndividualKpi(
    grid,
    {
      ...deps.layouts.individualKpi,
      excludedPersons: individualKpi.excludedPersons.map((person) => person.toUpperCase()),
    },
    ctx
  );
};

export const getIndividualKpi = async (
  deps: DashboardDeps,
  range: DateRange
): Promise<Result<IndividualKpiReport, DashboardError>> => {
  const rangeResult = checkRange(range);
  if (rangeResult.isErr()) return err(rangeResult.error);

  const records = inRange(await loadIndividualKpi(deps, { today: deps.today() }), rangeResult.value);

  return ok({
    records,
    byPerson: aggregateAdsKpiByPerson(records),
    total: totalAdsKpi(records),
  });
};
