/**
 * Sheet Source Module - Ports
 */

import type { SheetSourceError } from './errors.js';
import type { SheetGroup, SheetRef } from './types.js';
import type { RawGrid } from '../../extraction/index.js';
import type { Result } from 'neverthrow';

/**
 * Reads one worksheet as a grid of raw cell text. Read-only.
 */
export interface SheetSource {
  readonly name: string;
  fetchGrid(ref: SheetRef): Promise<Result<RawGrid, SheetSourceError>>;
}

/**
 * Time-boxed read-through access to sheets, with explicit invalidation.
 */
export interface SheetGridProvider {
  fetchGrid(ref: SheetRef, group: SheetGroup): Promise<Result<RawGrid, SheetSourceError>>;
  /** Drop cached grids of one group, or of every group. Returns the count. */
  invalidate(group?: SheetGroup): Promise<number>;
}
