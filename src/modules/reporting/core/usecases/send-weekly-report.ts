/**
 * Send Weekly Report Use Case
 *
 * Creative, SMS and copywriting totals of the seven days ending today.
 */

import { err, ok, type Result } from 'neverthrow';

import { deliverMessage } from './deliver-message.js';
import { collectActivityRecords, type SendActivityReportDeps } from './send-activity-report.js';
import { normalizeAgentName } from '../../../extraction/index.js';
import { computeWeeklyStats } from '../activity.js';
import { formatWeeklyReport } from '../format.js';

import type { ReportOutcome } from './send-realtime-report.js';
import type { DeliveryError } from '../errors.js';

export type SendWeeklyReportDeps = SendActivityReportDeps;

export const sendWeeklyReport = async (
  deps: SendWeeklyReportDeps
): Promise<Result<ReportOutcome, DeliveryError>> => {
  const { dashboard, logger } = deps;
  const today = dashboard.today();

  const records = await collectActivityRecords(dashboard, { today });
  const stats = computeWeeklyStats(
    dashboard.catalog.agents.map((agent) => normalizeAgentName(agent.name)),
    records,
    today
  );

  const sent = await deliverMessage(deps, formatWeeklyReport(stats));
  if (sent.isErr()) {
    logger.error({ err: sent.error }, 'Weekly report delivery failed');
    return err(sent.error);
  }

  logger.info({ from: stats.from, to: stats.to, parts: sent.value }, 'Weekly report sent');
  return ok({ status: 'sent', parts: sent.value });
};
