/**
 * Dashboard Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Unknown channel, section or agent.
 */
export interface NotFoundError {
  readonly type: 'NotFoundError';
  readonly message: string;
  readonly resource: 'channel' | 'section' | 'agent';
  readonly id: string;
}

/**
 * Request input that passed schema validation but makes no sense.
 */
export interface ValidationError {
  readonly type: 'ValidationError';
  readonly message: string;
  readonly field: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type DashboardError = NotFoundError | ValidationError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createNotFoundError = (
  resource: NotFoundError['resource'],
  id: string
): NotFoundError => ({
  type: 'NotFoundError',
  message: `Unknown ${resource} '${id}'`,
  resource,
  id,
});

export const createValidationError = (field: string, message: string): ValidationError => ({
  type: 'ValidationError',
  message,
  field,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

const HTTP_STATUS_MAP: Record<DashboardError['type'], 400 | 404> = {
  NotFoundError: 404,
  ValidationError: 400,
};

export const getHttpStatusForError = (error: DashboardError): 400 | 404 =>
  HTTP_STATUS_MAP[error.type];
