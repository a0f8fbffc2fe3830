/**
 * Sheet Source Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { SheetRef } from './types.js';

/**
 * Credentials missing, rejected, or the sheet is not shared with them.
 */
export interface SheetAuthError {
  readonly type: 'SheetAuthError';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Spreadsheet or worksheet does not exist.
 */
export interface SheetNotFoundError {
  readonly type: 'SheetNotFoundError';
  readonly message: string;
  readonly ref: SheetRef;
}

/**
 * Transport failure or an unexpected upstream status.
 */
export interface SheetNetworkError {
  readonly type: 'SheetNetworkError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * Upstream answered with something that is not a grid.
 */
export interface SheetFormatError {
  readonly type: 'SheetFormatError';
  readonly message: string;
  readonly cause?: unknown;
}

export type SheetSourceError =
  | SheetAuthError
  | SheetNotFoundError
  | SheetNetworkError
  | SheetFormatError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createSheetAuthError = (message: string, cause?: unknown): SheetAuthError => ({
  type: 'SheetAuthError',
  message,
  cause,
});

export const createSheetNotFoundError = (ref: SheetRef): SheetNotFoundError => ({
  type: 'SheetNotFoundError',
  message: `Worksheet '${ref.worksheet}' not found in spreadsheet '${ref.spreadsheetId}'`,
  ref,
});

export const createSheetNetworkError = (
  message: string,
  cause?: unknown,
  retryable = true
): SheetNetworkError => ({
  type: 'SheetNetworkError',
  message,
  retryable,
  cause,
});

export const createSheetFormatError = (message: string, cause?: unknown): SheetFormatError => ({
  type: 'SheetFormatError',
  message,
  cause,
});

/**
 * HTTP status carried by an upstream error object, if any.
 * Covers `status`, `code` and `response.status` shapes.
 */
export const statusOf = (error: unknown): number | undefined => {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
};

/**
 * Classify an upstream HTTP status.
 */
export const errorForStatus = (
  status: number,
  ref: SheetRef,
  message: string,
  cause?: unknown
): SheetSourceError => {
  if (status === 401 || status === 403) return createSheetAuthError(message, cause);
  if (status === 404) return createSheetNotFoundError(ref);
  return createSheetNetworkError(message, cause, status >= 500 || status === 429);
};
