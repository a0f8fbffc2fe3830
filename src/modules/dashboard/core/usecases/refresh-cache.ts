/**
 * Refresh Cache Use Case
 *
 * Drops cached grids so that the next request reads the sheets again.
 */

import type { SheetGridProvider, SheetGroup } from '../../../sheet-source/index.js';
import type { Logger } from 'pino';

export interface RefreshCacheDeps {
  sheets: SheetGridProvider;
  logger: Logger;
}

export interface RefreshCacheResult {
  /** `null` when every group was cleared */
  group: SheetGroup | null;
  cleared: number;
}

export const refreshCache = async (
  deps: RefreshCacheDeps,
  group?: SheetGroup
): Promise<RefreshCacheResult> => {
  const cleared = await deps.sheets.invalidate(group);
  deps.logger.info({ group: group ?? 'all', cleared }, 'Sheet cache invalidated');
  return { group: group ?? null, cleared };
};
