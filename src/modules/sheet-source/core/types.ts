/**
 * Sheet Source Module - Core Types
 */

import type { RawGrid } from '../../extraction/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Sheet addressing
// ─────────────────────────────────────────────────────────────────────────────

export interface SheetRef {
  spreadsheetId: string;
  /** Tab name */
  worksheet: string;
  /** Tab GID; preferred over the name by the CSV export */
  gid?: number;
}

/**
 * Sheets that share a cache lifetime and are invalidated together.
 */
export type SheetGroup = 'channel' | 'agent' | 'ads' | 'partner' | 'agent-tabs';

export const SHEET_GROUPS: readonly SheetGroup[] = ['channel', 'agent', 'ads', 'partner', 'agent-tabs'];

const MINUTE_MS = 60_000;

/** Fetched grids are reused for this long before the sheet is read again */
export const SHEET_GROUP_TTL_MS: Readonly<Record<SheetGroup, number>> = {
  channel: 5 * MINUTE_MS,
  agent: 5 * MINUTE_MS,
  ads: 5 * MINUTE_MS,
  partner: 10 * MINUTE_MS,
  'agent-tabs': 10 * MINUTE_MS,
};

export const isSheetGroup = (value: string): value is SheetGroup =>
  SHEET_GROUPS.some((group) => group === value);

/** Stable identifier of a sheet tab, used in cache keys and logs */
export const refId = (ref: SheetRef): string =>
  `${ref.spreadsheetId}:${ref.gid !== undefined ? `gid=${String(ref.gid)}` : ref.worksheet}`;

// ─────────────────────────────────────────────────────────────────────────────
// Grids
// ─────────────────────────────────────────────────────────────────────────────

export const isRawGrid = (value: unknown): value is RawGrid =>
  Array.isArray(value) &&
  value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));

/**
 * Pad every row to the widest row. The Sheets API drops trailing empty
 * cells; padded rows read the same as a spreadsheet export.
 */
export const padGrid = (rows: readonly (readonly string[])[]): RawGrid => {
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  return rows.map((row) =>
    row.length === width ? [...row] : [...row, ...new Array<string>(width - row.length).fill('')]
  );
};
