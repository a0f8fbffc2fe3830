/**
 * Reporting Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The chat could not be reached or rejected the message.
 */
export interface DeliveryError {
  readonly type: 'DeliveryError';
  readonly message: string;
  /** Telegram error code, when the API answered */
  readonly statusCode?: number;
  readonly cause?: unknown;
}

/**
 * The last-report snapshot could not be read or written.
 */
export interface SnapshotError {
  readonly type: 'SnapshotError';
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type ReportingError = DeliveryError | SnapshotError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDeliveryError = (
  message: string,
  statusCode?: number,
  cause?: unknown
): DeliveryError => ({
  type: 'DeliveryError',
  message,
  ...(statusCode !== undefined && { statusCode }),
  cause,
});

export const createSnapshotError = (
  message: string,
  path: string,
  cause?: unknown
): SnapshotError => ({
  type: 'SnapshotError',
  message,
  path,
  cause,
});
