/**
 * Section-boundary scanner for sheets that stack an overall totals block
 * above a run of daily blocks in the same columns (Counterpart, Team Channel).
 *
 *   overall ──(month-day title)──▶ daily(date) ──(month-day title)──▶ daily(date')
 *
 * There is no way back to `overall` once a daily title has been seen.
 */

import { parseMonthDay } from '../coercion/parse-date.js';

import type { IsoDate, RawGrid, RawRow, SectionedRecords } from '../types.js';

export type SectionState = { kind: 'overall' } | { kind: 'daily'; date: IsoDate };

export const OVERALL_SENTINEL = 'OVERALL PERFORMANCE';

/** Column headers, in English and in the localized labels of the sheets */
export const SECTION_SKIP_KEYWORDS: readonly string[] = [
  'CHANNEL SOURCE',
  '渠道来源',
  'FIRST RECHARGE',
  '首充',
  'TOTAL',
  'ARPPU',
  'ROAS',
  'SPENDING',
  '消耗',
  'TEAM',
];

export interface SectionedScanOptions {
  startRow: number;
  /** Inclusive column band searched for section titles */
  band: { from: number; to: number };
  /** Column checked against the skip keywords */
  labelColumn: number;
  /** Year for daily titles written without one */
  referenceYear: number;
  overallSentinel?: string;
  skipKeywords?: readonly string[];
}

export interface SectionedRow {
  row: RawRow;
  state: SectionState;
}

const bandCells = (row: RawRow, band: SectionedScanOptions['band']): string[] =>
  row.slice(band.from, band.to + 1);

const findDailyTitle = (cells: readonly string[], referenceYear: number): IsoDate | null => {
  for (const cell of cells) {
    const date = parseMonthDay(cell, referenceYear);
    if (date !== null) return date;
  }
  return null;
};

/**
 * Walk the grid from `startRow`, consuming title and header rows and
 * returning every remaining row tagged with the section it belongs to.
 */
export const scanSectionedSheet = (grid: RawGrid, options: SectionedScanOptions): SectionedRow[] => {
  const sentinel = options.overallSentinel ?? OVERALL_SENTINEL;
  const skipKeywords = options.skipKeywords ?? SECTION_SKIP_KEYWORDS;

  let state: SectionState = { kind: 'overall' };
  const rows: SectionedRow[] = [];

  for (const row of grid.slice(options.startRow)) {
    const cells = bandCells(row, options.band);

    if (cells.some((cell) => cell.toUpperCase().includes(sentinel))) {
      continue;
    }

    const dailyDate = findDailyTitle(cells, options.referenceYear);
    if (dailyDate !== null) {
      state = { kind: 'daily', date: dailyDate };
      continue;
    }

    const label = (row[options.labelColumn] ?? '').trim().toUpperCase();
    if (label !== '' && skipKeywords.some((keyword) => label.includes(keyword))) {
      continue;
    }

    rows.push({ row, state });
  }

  return rows;
};

/**
 * Route accepted rows into the overall and daily buckets.
 */
export const bucketBySection = <TRow>(
  rows: readonly { state: SectionState; record: TRow }[]
): SectionedRecords<TRow> => {
  const overall: TRow[] = [];
  const daily: SectionedRecords<TRow>['daily'] = [];

  for (const { state, record } of rows) {
    if (state.kind === 'overall') {
      overall.push(record);
    } else {
      daily.push({ ...record, date: state.date });
    }
  }

  return { overall, daily };
};
