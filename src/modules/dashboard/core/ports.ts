/**
 * Dashboard Module - Ports
 */

import type { LayoutRegistry, IsoDate } from '../../extraction/index.js';
import type { KpiScoring } from '../../metrics/index.js';
import type { SheetCatalog, SheetGridProvider } from '../../sheet-source/index.js';
import type { Logger } from 'pino';

/**
 * Everything the dashboard use cases read from.
 */
export interface DashboardDeps {
  sheets: SheetGridProvider;
  catalog: SheetCatalog;
  layouts: LayoutRegistry;
  scoring: KpiScoring;
  logger: Logger;
  /** Current calendar day in the reporting timezone */
  today: () => IsoDate;
}
