/**
 * Reporting Module - Public API
 *
 * Real-time KPI, T+1 activity and weekly reports, delivered to Telegram.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export {
  TELEGRAM_MESSAGE_LIMIT,
  type SpendTotals,
  type ReportSnapshot,
  type AgentDiff,
  type LowSpendAlert,
  type ReportSettings,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { ReportingError, DeliveryError, SnapshotError } from './core/errors.js';

export { createDeliveryError, createSnapshotError } from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { ReportSender, SnapshotStore } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Logic
// ─────────────────────────────────────────────────────────────────────────────

export {
  latestDayRecords,
  buildSnapshot,
  diffSnapshots,
  noChangeAgents,
  lowSpendAgents,
} from './core/snapshot.js';

export {
  AVERAGE_WINDOW_DAYS,
  dailyTotalsByAgent,
  computeActivityStats,
  WEEKLY_WINDOW_DAYS,
  computeWeeklyStats,
  type ActivityRecords,
  type ActivityLine,
  type ActivityStats,
  type WeeklyLine,
  type WeeklyStats,
} from './core/activity.js';

export {
  escapeHtml,
  formatMoney,
  formatSignedWhole,
  spendIndicator,
  formatRealtimeSummary,
  formatActivityReport,
  formatWeeklyReport,
  type RealtimeSummaryInput,
} from './core/format.js';

export { splitMessage } from './core/split-message.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { deliverMessage, type DeliverMessageDeps } from './core/usecases/deliver-message.js';

export {
  sendRealtimeReport,
  type SendRealtimeReportDeps,
  type ReportOutcome,
} from './core/usecases/send-realtime-report.js';

export {
  collectActivityRecords,
  sendActivityReport,
  type SendActivityReportDeps,
} from './core/usecases/send-activity-report.js';

export {
  sendWeeklyReport,
  type SendWeeklyReportDeps,
} from './core/usecases/send-weekly-report.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Adapters
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeTelegramSender,
  createTelegramSender,
  toDeliveryError,
  type TelegramClient,
  type TelegramSenderOptions,
} from './shell/telegram/telegram-sender.js';

export {
  makeJsonFileSnapshotStore,
  ReportSnapshotSchema,
} from './shell/snapshot/json-file-snapshot-store.js';
