/**
 * Send Activity Report Use Case
 *
 * T+1 creative, SMS and copywriting output of every configured agent.
 */

import { err, ok, type Result } from 'neverthrow';

import { deliverMessage } from './deliver-message.js';
import { loadAgentActivity, type DashboardDeps } from '../../../dashboard/index.js';
import {
  normalizeAgentName,
  type ContentRecord,
  type CreativeRecord,
  type ExtractionContext,
  type SmsRecord,
} from '../../../extraction/index.js';
import { addDays } from '../../../metrics/index.js';
import { computeActivityStats, type ActivityRecords } from '../activity.js';
import { formatActivityReport } from '../format.js';

import type { ReportOutcome } from './send-realtime-report.js';
import type { DeliveryError } from '../errors.js';
import type { ReportSender } from '../ports.js';
import type { Logger } from 'pino';

export interface SendActivityReportDeps {
  dashboard: DashboardDeps;
  sender: ReportSender;
  logger: Logger;
}

/**
 * Creative, SMS and content records of every configured agent.
 */
export const collectActivityRecords = async (
  dashboard: DashboardDeps,
  ctx: ExtractionContext
): Promise<ActivityRecords> => {
  const creative: CreativeRecord[] = [];
  const sms: SmsRecord[] = [];
  const content: ContentRecord[] = [];
  for (const agent of dashboard.catalog.agents) {
    const activity = await loadAgentActivity(dashboard, agent, ctx);
    creative.push(...activity.creative);
    sms.push(...activity.sms);
    content.push(...activity.content);
  }
  return { creative, sms, content };
};

export const sendActivityReport = async (
  deps: SendActivityReportDeps
): Promise<Result<ReportOutcome, DeliveryError>> => {
  const { dashboard, logger } = deps;
  const today = dashboard.today();

  const records = await collectActivityRecords(dashboard, { today });

  const stats = computeActivityStats(
    dashboard.catalog.agents.map((agent) => normalizeAgentName(agent.name)),
    records,
    addDays(today, -1)
  );

  const sent = await deliverMessage(deps, formatActivityReport(stats));
  if (sent.isErr()) {
    logger.error({ err: sent.error }, 'Activity report delivery failed');
    return err(sent.error);
  }

  logger.info({ date: stats.date, parts: sent.value }, 'Activity report sent');
  return ok({ status: 'sent', parts: sent.value });
};
