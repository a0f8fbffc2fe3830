/**
 * Public-sheet adapter: reads a tab through the gviz CSV export.
 * Only works for sheets shared as "anyone with the link".
 */

import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import {
  createSheetAuthError,
  createSheetFormatError,
  createSheetNetworkError,
  errorForStatus,
  type SheetSourceError,
} from '../../core/errors.js';
import { isRawGrid, padGrid } from '../../core/types.js';

import type { SheetSource } from '../../core/ports.js';
import type { SheetRef } from '../../core/types.js';
import type { RawGrid } from '../../../extraction/index.js';

export interface CsvExportSourceOptions {
  timeoutMs: number;
  fetch?: typeof fetch;
}

export const csvExportUrl = (ref: SheetRef): string => {
  const base = `https://docs.google.com/spreadsheets/d/${encodeURIComponent(ref.spreadsheetId)}/gviz/tq?tqx=out:csv`;
  return ref.gid !== undefined
    ? `${base}&gid=${String(ref.gid)}`
    : `${base}&sheet=${encodeURIComponent(ref.worksheet)}`;
};

/**
 * Parse CSV text into a padded grid. Rows keep their position, blank ones included.
 */
export const parseCsvGrid = (text: string): Result<RawGrid, SheetSourceError> => {
  let records: unknown;
  try {
    records = parse(text, { relax_column_count: true, relax_quotes: true, bom: true });
  } catch (cause) {
    return err(createSheetFormatError('CSV export could not be parsed', cause));
  }

  if (!isRawGrid(records)) {
    return err(createSheetFormatError('CSV export did not produce rows of text'));
  }
  return ok(padGrid(records));
};

export const createCsvExportSource = (options: CsvExportSourceOptions): SheetSource => {
  const fetchFn = options.fetch ?? fetch;

  return {
    name: 'csv-export',

    async fetchGrid(ref: SheetRef): Promise<Result<RawGrid, SheetSourceError>> {
      let response: Response;
      try {
        response = await fetchFn(csvExportUrl(ref), {
          signal: AbortSignal.timeout(options.timeoutMs),
          redirect: 'follow',
        });
      } catch (cause) {
        const message = cause instanceof Error ? cause.message : String(cause);
        return err(createSheetNetworkError(`CSV export request failed: ${message}`, cause));
      }

      if (!response.ok) {
        return err(
          errorForStatus(response.status, ref, `CSV export returned HTTP ${String(response.status)}`)
        );
      }

      // Private sheets answer with the sign-in page instead of CSV
      const contentType = response.headers.get('content-type') ?? '';
      if (contentType.includes('text/html')) {
        return err(createSheetAuthError(`Sheet '${ref.worksheet}' is not publicly readable`));
      }

      let text: string;
      try {
        text = await response.text();
      } catch (cause) {
        return err(createSheetNetworkError('CSV export body could not be read', cause));
      }

      return parseCsvGrid(text);
    },
  };
};
