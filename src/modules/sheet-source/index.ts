/**
 * Sheet Source Module - Public API
 *
 * Reads worksheets as raw grids from the Google Sheets API or the public
 * CSV export, behind a time-boxed cache.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type { SheetRef, SheetGroup } from './core/types.js';

export {
  SHEET_GROUPS,
  SHEET_GROUP_TTL_MS,
  isSheetGroup,
  refId,
  isRawGrid,
  padGrid,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  SheetSourceError,
  SheetAuthError,
  SheetNotFoundError,
  SheetNetworkError,
  SheetFormatError,
} from './core/errors.js';

export {
  createSheetAuthError,
  createSheetNotFoundError,
  createSheetNetworkError,
  createSheetFormatError,
  errorForStatus,
  statusOf,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { SheetSource, SheetGridProvider } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────────

export {
  DEFAULT_SHEET_CATALOG_FILE,
  SheetCatalogSchema,
  parseSheetCatalog,
  loadSheetCatalog,
  channelRoiRef,
  findAgent,
  agentPerformanceRef,
  agentContentRef,
  agentTabRef,
  sheetTabRef,
  type SheetCatalog,
  type AgentEntry,
} from './core/catalog.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { loadGrid, type LoadGridDeps } from './core/usecases/load-grid.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Adapters
// ─────────────────────────────────────────────────────────────────────────────

export {
  createGoogleSheetsSource,
  createGoogleValuesReader,
  parseServiceAccountJson,
  wholeSheetRange,
  SHEETS_READONLY_SCOPE,
  type GoogleCredentials,
  type ValuesReader,
} from './shell/google/google-sheets-source.js';

export {
  createCsvExportSource,
  csvExportUrl,
  parseCsvGrid,
  type CsvExportSourceOptions,
} from './shell/csv/csv-export-source.js';

export {
  makeCachedSheetProvider,
  decodeGrid,
  SHEET_GROUP_NAMESPACE,
  type CachedSheetProviderDeps,
} from './shell/cache/cached-sheet-provider.js';

export { createSheetSource, type SheetSourceConfig } from './shell/create-sheet-source.js';
