/**
 * Dashboard Module - Public API
 *
 * JSON views over the extracted sheets for the dashboard front end.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export {
  CHANNEL_SLUGS,
  SECTION_SLUGS,
  channelFromSlug,
  sectionFromSlug,
  type DateRange,
} from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { DashboardError, NotFoundError, ValidationError } from './core/errors.js';

export {
  createNotFoundError,
  createValidationError,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { DashboardDeps } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export { checkRange, inRange } from './core/range.js';

export {
  getChannelReport,
  loadChannelSection,
  type ChannelReport,
  type GetChannelReportInput,
} from './core/usecases/get-channel-report.js';

export { getChannelSummary, type ChannelSummary } from './core/usecases/get-channel-summary.js';

export {
  getCounterpartReport,
  type CounterpartReport,
  type GetCounterpartReportInput,
} from './core/usecases/get-counterpart-report.js';

export {
  getTeamChannelReport,
  type TeamChannelReport,
} from './core/usecases/get-team-channel-report.js';

export { listAgents, type AgentSummary } from './core/usecases/list-agents.js';

export {
  getAgentActivity,
  loadAgentActivity,
  type AgentActivity,
  type GetAgentActivityInput,
} from './core/usecases/get-agent-activity.js';

export {
  getIndividualKpi,
  loadIndividualKpi,
  type IndividualKpiReport,
} from './core/usecases/get-individual-kpi.js';

export {
  getAgentPerformance,
  type AgentPerformance,
} from './core/usecases/get-agent-performance.js';

export {
  refreshCache,
  type RefreshCacheDeps,
  type RefreshCacheResult,
} from './core/usecases/refresh-cache.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST
// ─────────────────────────────────────────────────────────────────────────────

export { makeDashboardRoutes, type MakeDashboardRoutesDeps } from './shell/rest/routes.js';
