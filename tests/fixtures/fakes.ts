/**
 * Test fakes and mocks
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createSheetNetworkError,
  createSheetNotFoundError,
  type SheetGridProvider,
  type SheetGroup,
  type SheetRef,
  type SheetSource,
  type SheetSourceError,
} from '@/modules/sheet-source/index.js';

import { makeSilentLogger, testCatalog, testLayouts, testScoring } from './builders.js';

import type { RawGrid } from '@/modules/extraction/index.js';
import type { DashboardDeps } from '@/modules/dashboard/index.js';
import type {
  DeliveryError,
  ReportSender,
  ReportSnapshot,
  SnapshotError,
  SnapshotStore,
} from '@/modules/reporting/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Sheets
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeSheetSource extends SheetSource {
  /** Worksheet names in the order they were fetched */
  readonly calls: string[];
}

/**
 * Sheet source serving grids by worksheet name.
 * Unknown worksheets are not found; names in `failing` fail with a network error.
 */
export const makeFakeSheetSource = (
  grids: Record<string, RawGrid> = {},
  failing: readonly string[] = []
): FakeSheetSource => {
  const calls: string[] = [];
  return {
    name: 'fake',
    calls,
    fetchGrid(ref: SheetRef): Promise<Result<RawGrid, SheetSourceError>> {
      calls.push(ref.worksheet);
      if (failing.includes(ref.worksheet)) {
        return Promise.resolve(err(createSheetNetworkError(`Timed out reading ${ref.worksheet}`)));
      }
      const grid = grids[ref.worksheet];
      return Promise.resolve(grid === undefined ? err(createSheetNotFoundError(ref)) : ok(grid));
    },
  };
};

export interface FakeGridProvider extends SheetGridProvider {
  readonly invalidated: (SheetGroup | undefined)[];
}

/**
 * Uncached provider over a fake source; `invalidate` records its argument
 * and reports `cleared` entries.
 */
export const makeFakeGridProvider = (source: SheetSource, cleared = 0): FakeGridProvider => {
  const invalidated: (SheetGroup | undefined)[] = [];
  return {
    invalidated,
    fetchGrid: (ref) => source.fetchGrid(ref),
    invalidate(group?: SheetGroup) {
      invalidated.push(group);
      return Promise.resolve(cleared);
    },
  };
};

/**
 * Dashboard dependencies over fake grids, with the shipped layouts,
 * catalog and scoring.
 */
export const makeDashboardDeps = (
  grids: Record<string, RawGrid> = {},
  overrides: Partial<DashboardDeps> = {}
): DashboardDeps => ({
  sheets: makeFakeGridProvider(makeFakeSheetSource(grids)),
  catalog: testCatalog(),
  layouts: testLayouts(),
  scoring: testScoring(),
  logger: makeSilentLogger(),
  today: () => '2026-03-10',
  ...overrides,
});

// ─────────────────────────────────────────────────────────────────────────────
// Reporting
// ─────────────────────────────────────────────────────────────────────────────

export interface RecordingSender extends ReportSender {
  readonly messages: string[];
}

/**
 * Sender that keeps every message. `failOn` makes the n-th message (1-based) fail.
 */
export const makeRecordingSender = (failOn?: number): RecordingSender => {
  const messages: string[] = [];
  const failure: DeliveryError = {
    type: 'DeliveryError',
    message: 'Telegram sendMessage failed: Bad Request',
    statusCode: 400,
  };
  return {
    messages,
    sendMessage(html: string): Promise<Result<void, DeliveryError>> {
      if (failOn !== undefined && messages.length + 1 === failOn) {
        return Promise.resolve(err(failure));
      }
      messages.push(html);
      return Promise.resolve(ok(undefined));
    },
    sendPhoto: () => Promise.resolve(ok(undefined)),
    sendDocument: () => Promise.resolve(ok(undefined)),
  };
};

export interface InMemorySnapshotStore extends SnapshotStore {
  saved: ReportSnapshot[];
}

export const makeInMemorySnapshotStore = (
  initial: ReportSnapshot | null = null,
  options: { failLoad?: boolean; failSave?: boolean } = {}
): InMemorySnapshotStore => {
  const saved: ReportSnapshot[] = [];
  const error = (message: string): SnapshotError => ({
    type: 'SnapshotError',
    message,
    path: 'memory',
  });
  return {
    saved,
    load(): Promise<Result<ReportSnapshot | null, SnapshotError>> {
      if (options.failLoad === true) return Promise.resolve(err(error('Cannot read snapshot')));
      return Promise.resolve(ok(saved.at(-1) ?? initial));
    },
    save(snapshot: ReportSnapshot): Promise<Result<void, SnapshotError>> {
      if (options.failSave === true) return Promise.resolve(err(error('Cannot write snapshot')));
      saved.push(snapshot);
      return Promise.resolve(ok(undefined));
    },
  };
};
