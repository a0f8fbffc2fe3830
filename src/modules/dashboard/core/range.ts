/**
 * Date range checks shared by the dashboard use cases.
 */

import { ok, err, type Result } from 'neverthrow';

import { createValidationError, type ValidationError } from './errors.js';
import { isWithin } from '../../metrics/index.js';

import type { DateRange } from './types.js';
import type { IsoDate } from '../../extraction/index.js';

export const checkRange = (range: DateRange): Result<DateRange, ValidationError> => {
  if (range.from !== undefined && range.to !== undefined && range.from > range.to) {
    return err(createValidationError('from', `'from' (${range.from}) is after 'to' (${range.to})`));
  }
  return ok(range);
};

export const inRange = <R extends { date: IsoDate }>(records: readonly R[], range: DateRange): R[] =>
  records.filter((record) => isWithin(record.date, range.from, range.to));
