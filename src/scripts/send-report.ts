#!/usr/bin/env node

/**
 * Report Send Script
 *
 * Builds one report from the sheets and delivers it to the Telegram chat.
 * Meant to be run by a scheduler.
 *
 * Usage:
 *   node dist/src/scripts/send-report.js --kind realtime
 *   node dist/src/scripts/send-report.js --kind activity
 *   node dist/src/scripts/send-report.js --kind weekly
 *
 * Options:
 *   --kind: `realtime` (KPI summary with alerts), `activity` (T+1 output) or
 *           `weekly` (seven-day totals)
 */

import { parseArgs } from 'node:util';

import { makeDashboardDeps } from '../app/build-app.js';
import { createCacheConfig, initCache } from '../infra/cache/index.js';
import { bootstrap } from '../infra/bootstrap.js';
import {
  createTelegramSender,
  makeJsonFileSnapshotStore,
  sendActivityReport,
  sendRealtimeReport,
  sendWeeklyReport,
  type ReportOutcome,
  type ReportingError,
} from '../modules/reporting/index.js';
import { decodeGrid } from '../modules/sheet-source/index.js';

import type { Result } from 'neverthrow';

const REPORT_KINDS = ['realtime', 'activity', 'weekly'] as const;
type ReportKind = (typeof REPORT_KINDS)[number];

const isReportKind = (value: string | undefined): value is ReportKind =>
  REPORT_KINDS.some((kind) => kind === value);

const parseKind = (argv: string[]): ReportKind => {
  const { values } = parseArgs({
    args: argv,
    options: { kind: { type: 'string' } },
  });
  if (isReportKind(values.kind)) return values.kind;
  throw new Error(`--kind must be one of ${REPORT_KINDS.join(', ')} (got '${values.kind ?? ''}')`);
};

const main = async (): Promise<number> => {
  const kind = parseKind(process.argv.slice(2));
  const { config, logger, deps } = bootstrap(process.env, 'adops-report');

  const { botToken, chatId } = config.telegram;
  if (botToken === undefined || botToken === '' || chatId === undefined || chatId === '') {
    logger.error('TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are required to send reports');
    return 1;
  }

  // A single run reads each tab once; nothing to share across processes
  const cacheClient = initCache({
    config: { ...createCacheConfig(process.env), backend: 'disabled' },
    logger,
    decode: decodeGrid,
  });
  const { dashboard } = makeDashboardDeps({ ...deps, cacheClient });
  const sender = createTelegramSender({ botToken, chatId, logger });

  const sendReport = async (): Promise<Result<ReportOutcome, ReportingError>> => {
    switch (kind) {
      case 'realtime':
        return sendRealtimeReport({
          dashboard,
          sender,
          snapshots: makeJsonFileSnapshotStore(config.reporting.snapshotFile),
          settings: { ...config.reporting, mentions: config.telegram.mentions },
          logger,
          now: () => new Date(),
        });
      case 'activity':
        return (await sendActivityReport({ dashboard, sender, logger })).mapErr(
          (error): ReportingError => error
        );
      case 'weekly':
        return (await sendWeeklyReport({ dashboard, sender, logger })).mapErr(
          (error): ReportingError => error
        );
    }
  };

  const result = await sendReport();

  if (result.isErr()) {
    logger.error({ errorType: result.error.type, kind }, result.error.message);
    return 1;
  }

  logger.info({ kind, outcome: result.value }, 'Report run finished');
  return 0;
};

await main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
