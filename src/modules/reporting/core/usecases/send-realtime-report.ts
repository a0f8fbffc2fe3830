/**
 * Send Real-time Report Use Case
 *
 * Flow:
 * 1. Load Individual KPI records and keep the latest day
 * 2. Compare per-agent totals with the previous snapshot
 * 3. Format the HTML summary with alerts and mentions
 * 4. Send it; only then save the new snapshot
 */

import { err, ok, type Result } from 'neverthrow';

import { deliverMessage } from './deliver-message.js';
import { loadIndividualKpi, type DashboardDeps } from '../../../dashboard/index.js';
import { formatRealtimeSummary } from '../format.js';
import {
  buildSnapshot,
  diffSnapshots,
  latestDayRecords,
  lowSpendAgents,
  noChangeAgents,
} from '../snapshot.js';

import type { ReportingError } from '../errors.js';
import type { ReportSender, SnapshotStore } from '../ports.js';
import type { ReportSettings, ReportSnapshot } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface SendRealtimeReportDeps {
  dashboard: DashboardDeps;
  sender: ReportSender;
  snapshots: SnapshotStore;
  settings: ReportSettings;
  logger: Logger;
  now: () => Date;
}

export type ReportOutcome =
  | { status: 'sent'; parts: number; snapshot?: ReportSnapshot }
  | { status: 'skipped'; reason: string };

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

export const sendRealtimeReport = async (
  deps: SendRealtimeReportDeps
): Promise<Result<ReportOutcome, ReportingError>> => {
  const { logger } = deps;
  const records = await loadIndividualKpi(deps.dashboard, { today: deps.dashboard.today() });

  const latest = latestDayRecords(records);
  if (latest === null) {
    logger.warn('No Individual KPI data; real-time report not sent');
    return ok({ status: 'skipped', reason: 'no data' });
  }

  const current = buildSnapshot(latest.date, latest.records);

  const previousResult = await deps.snapshots.load();
  if (previousResult.isErr()) {
    logger.warn(
      { err: previousResult.error },
      'Previous report snapshot unreadable; sending without diffs'
    );
  }
  const previous = previousResult.isOk() ? previousResult.value : null;

  const diffs = diffSnapshots(current, previous);
  const now = deps.now();
  const html = formatRealtimeSummary({
    snapshot: current,
    records: latest.records,
    diffs,
    lowSpend: lowSpendAgents(current, deps.settings.lowSpendThresholdUsd),
    noChange: noChangeAgents(diffs),
    settings: deps.settings,
    now,
  });

  const sent = await deliverMessage(deps, html);
  if (sent.isErr()) {
    logger.error({ err: sent.error }, 'Real-time report delivery failed');
    return err(sent.error);
  }

  const snapshot: ReportSnapshot = { ...current, timestamp: now.toISOString() };
  const saved = await deps.snapshots.save(snapshot);
  if (saved.isErr()) {
    logger.error({ err: saved.error }, 'Report sent but the snapshot was not saved');
    return err(saved.error);
  }

  logger.info(
    { date: latest.date, parts: sent.value, agents: Object.keys(snapshot.agents).length },
    'Real-time report sent'
  );
  return ok({ status: 'sent', parts: sent.value, snapshot });
};
