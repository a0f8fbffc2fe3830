/**
 * Fetch boundary: a sheet that cannot be read becomes an empty grid.
 *
 * Callers treat "no rows" and "fetch failed" the same way; the failure is
 * visible only in the logs.
 */

import { refId, type SheetGroup, type SheetRef } from '../types.js';

import type { SheetGridProvider } from '../ports.js';
import type { RawGrid } from '../../../extraction/index.js';
import type { Logger } from 'pino';

export interface LoadGridDeps {
  sheets: SheetGridProvider;
  logger: Logger;
}

export const loadGrid = async (
  deps: LoadGridDeps,
  ref: SheetRef,
  group: SheetGroup
): Promise<RawGrid> => {
  const result = await deps.sheets.fetchGrid(ref, group);

  if (result.isErr()) {
    const error = result.error;
    deps.logger.warn(
      { sheet: refId(ref), worksheet: ref.worksheet, errorType: error.type },
      `Could not load sheet '${ref.worksheet}': ${error.message}`
    );
    return [];
  }

  return result.value;
};
