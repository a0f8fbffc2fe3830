/**
 * Sheet source health checker
 *
 * Reports which spreadsheet adapter is serving reads. The source itself is
 * not probed: a failing sheet degrades to empty tables, not to an outage.
 */

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

export const makeSheetSourceHealthChecker = (source: { readonly name: string }): HealthChecker => {
  const result: HealthCheckResult = {
    name: 'sheet-source',
    status: 'healthy',
    message: source.name,
    critical: false,
  };
  return () => Promise.resolve(result);
};
