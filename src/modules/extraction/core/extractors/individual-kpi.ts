/**
 * Individual KPI sheet: per-person ad spend.
 *
 * Each person owns a ten-column block; the block's person name sits in the
 * names row and its ad account id in the account row, both at the block's
 * first column. Ratios are derived here from the row's raw counts.
 */

import { toCount } from '../coercion/parse-numeric.js';
import { projectRow } from '../layouts/layout.js';
import { agentDate, normalizeAgentName } from './shared.js';

import type { KpiBlockLayout } from '../layouts/registry.js';
import type { ExtractionContext, IndividualKpiRecord, RawGrid } from '../types.js';

export interface IndividualKpiInput {
  namesRow: number;
  accountRow: number;
  startRow: number;
  blocks: readonly KpiBlockLayout[];
  /** Upper-case person names to leave out */
  excludedPersons?: readonly string[];
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

const ratio = (numerator: number, denominator: number, scale = 1): number => {
  if (denominator <= 0) return 0;
  const value = (numerator / denominator) * scale;
  return Number.isFinite(value) ? round2(value) : 0;
};

const accountIdAt = (grid: RawGrid, rowIndex: number, column: number): string => {
  const raw = grid[rowIndex]?.[column] ?? '';
  const accountId = raw.replace(/\n/g, ' / ').trim();
  return accountId.toUpperCase().includes('DATE') ? '' : accountId;
};

export const extractIndividualKpi = (
  grid: RawGrid,
  input: IndividualKpiInput,
  ctx: ExtractionContext
): IndividualKpiRecord[] => {
  const excluded = new Set(input.excludedPersons ?? []);
  const blocks = input.blocks.flatMap((block) => {
    const person = normalizeAgentName(grid[input.namesRow]?.[block.start] ?? '');
    if (person === '') return [];
    return [{ ...block, person, accountId: accountIdAt(grid, input.accountRow, block.start) }];
  });

  const records: IndividualKpiRecord[] = [];

  for (const row of grid.slice(input.startRow)) {
    for (const block of blocks) {
      const view = projectRow(row, block.layout);
      if (view === null) continue;

      const date = agentDate(view, 'date', ctx);
      if (date === null) continue;

      const spend = view.looseNumber('spend');
      if (spend === 0) continue;

      const ftd = toCount(view.looseNumber('ftd'));
      const register = toCount(view.looseNumber('register'));
      const impressions = toCount(view.looseNumber('impressions'));
      const clicks = toCount(view.looseNumber('clicks'));

      records.push({
        person: block.person,
        accountId: block.accountId,
        date,
        adType: view.text('type'),
        spend,
        costPhp: view.looseNumber('costPhp'),
        ftd,
        register,
        reach: toCount(view.looseNumber('reach')),
        impressions,
        clicks,
        ctr: ratio(clicks, impressions, 100),
        cpc: ratio(spend, clicks),
        cpm: ratio(spend, impressions, 1000),
        cpr: ratio(spend, register),
        cpftd: ratio(spend, ftd),
      });
    }
  }

  return records.filter((record) => !excluded.has(record.person));
};
