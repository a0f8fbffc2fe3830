/**
 * Google Sheets API adapter (service account, read-only scope).
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { google } from 'googleapis';
import { err, ok, type Result } from 'neverthrow';

import {
  createSheetAuthError,
  createSheetFormatError,
  createSheetNetworkError,
  createSheetNotFoundError,
  errorForStatus,
  statusOf,
  type SheetAuthError,
  type SheetSourceError,
} from '../../core/errors.js';
import { padGrid } from '../../core/types.js';

import type { SheetSource } from '../../core/ports.js';
import type { SheetRef } from '../../core/types.js';
import type { RawGrid } from '../../../extraction/index.js';

export const SHEETS_READONLY_SCOPE = 'https://www.googleapis.com/auth/spreadsheets.readonly';

// ─────────────────────────────────────────────────────────────────────────────
// Credentials
// ─────────────────────────────────────────────────────────────────────────────

const ServiceAccountSchema = Type.Object({
  client_email: Type.String({ minLength: 1 }),
  private_key: Type.String({ minLength: 1 }),
});

export type GoogleCredentials =
  | { kind: 'inline'; clientEmail: string; privateKey: string }
  | { kind: 'file'; keyFile: string };

/**
 * Parse a service-account key given inline as JSON.
 */
export const parseServiceAccountJson = (json: string): Result<GoogleCredentials, SheetAuthError> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (cause) {
    return err(createSheetAuthError('Service account credentials are not valid JSON', cause));
  }

  if (!Value.Check(ServiceAccountSchema, parsed)) {
    return err(createSheetAuthError('Service account credentials lack client_email or private_key'));
  }

  return ok({ kind: 'inline', clientEmail: parsed.client_email, privateKey: parsed.private_key });
};

// ─────────────────────────────────────────────────────────────────────────────
// Values reader
// ─────────────────────────────────────────────────────────────────────────────

/** Reads the formatted cell values of an A1 range */
export type ValuesReader = (request: { spreadsheetId: string; range: string }) => Promise<unknown>;

export const createGoogleValuesReader = (
  credentials: GoogleCredentials,
  timeoutMs: number
): ValuesReader => {
  const auth = new google.auth.GoogleAuth({
    ...(credentials.kind === 'inline'
      ? { credentials: { client_email: credentials.clientEmail, private_key: credentials.privateKey } }
      : { keyFile: credentials.keyFile }),
    scopes: [SHEETS_READONLY_SCOPE],
  });
  const sheets = google.sheets({ version: 'v4', auth });

  return async ({ spreadsheetId, range }) => {
    const response = await sheets.spreadsheets.values.get(
      { spreadsheetId, range, valueRenderOption: 'FORMATTED_VALUE' },
      { timeout: timeoutMs }
    );
    return response.data.values ?? [];
  };
};

/** A1 range covering a whole tab; quotes are doubled inside the name */
export const wholeSheetRange = (worksheet: string): string => `'${worksheet.replace(/'/g, "''")}'`;

const toCellText = (cell: unknown): string => {
  if (cell === null || cell === undefined) return '';
  if (typeof cell === 'string') return cell;
  if (typeof cell === 'number' || typeof cell === 'boolean') return String(cell);
  return '';
};

const toRows = (values: unknown): string[][] | null => {
  if (!Array.isArray(values)) return null;
  const rows: string[][] = [];
  for (const row of values) {
    if (!Array.isArray(row)) return null;
    rows.push(row.map(toCellText));
  }
  return rows;
};

// ─────────────────────────────────────────────────────────────────────────────
// Source
// ─────────────────────────────────────────────────────────────────────────────

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const createGoogleSheetsSource = (readValues: ValuesReader): SheetSource => ({
  name: 'google-sheets-api',

  async fetchGrid(ref: SheetRef): Promise<Result<RawGrid, SheetSourceError>> {
    let values: unknown;
    try {
      values = await readValues({
        spreadsheetId: ref.spreadsheetId,
        range: wholeSheetRange(ref.worksheet),
      });
    } catch (error) {
      const message = messageOf(error);
      const status = statusOf(error);
      // A missing tab is reported as an unparseable range
      if (status === 400 && message.includes('Unable to parse range')) {
        return err(createSheetNotFoundError(ref));
      }
      if (status !== undefined) {
        return err(errorForStatus(status, ref, message, error));
      }
      return err(createSheetNetworkError(message, error));
    }

    const rows = toRows(values);
    if (rows === null) {
      return err(createSheetFormatError(`Unexpected values payload for '${ref.worksheet}'`));
    }
    return ok(padGrid(rows));
  },
});
