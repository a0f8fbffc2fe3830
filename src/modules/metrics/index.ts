/**
 * Metrics Module - Public API
 *
 * Rollups and derived ratios over extracted records. Recomputed per request.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Primitives
// ─────────────────────────────────────────────────────────────────────────────

export { clampFinite, safeDivide, positiveDivide, roundTo, groupSum, sumFields } from './core/aggregate.js';

export {
  isoWeekLabel,
  monthLabel,
  tuesdayWeekStart,
  spanLabel,
  addDays,
  isWithin,
} from './core/periods.js';

// ─────────────────────────────────────────────────────────────────────────────
// Rollups
// ─────────────────────────────────────────────────────────────────────────────

export {
  aggregateByDate,
  aggregateByWeek,
  aggregateByMonth,
  aggregateByChannel,
  totalRoi,
  type RoiTotals,
  type RoiRollupRow,
} from './core/channel-rollups.js';

export {
  PHP_USD_RATE,
  counterpartRatios,
  aggregateCounterpartBySource,
  aggregateCounterpartByDate,
  aggregateCounterpartByMonth,
  aggregateCounterpartByWeek,
  type CounterpartTotals,
  type CounterpartRollupRow,
  type CounterpartWeekRow,
} from './core/counterpart-rollups.js';

export {
  aggregateTeamByTeam,
  aggregateTeamBySource,
  aggregateTeamByWeek,
  type TeamTotals,
  type TeamRollupRow,
  type TeamWeekRow,
} from './core/team-rollups.js';

export {
  ADS_KPI_ZERO,
  adsKpiRatios,
  aggregateAdsKpiByPerson,
  totalAdsKpi,
  type AdsKpiTotals,
  type AdsKpiRow,
} from './core/ads-kpi.js';

// ─────────────────────────────────────────────────────────────────────────────
// KPI Scoring
// ─────────────────────────────────────────────────────────────────────────────

export {
  DEFAULT_KPI_SCORING_FILE,
  KpiScoringSchema,
  KPI_METRICS,
  parseKpiScoring,
  loadKpiScoring,
  scoreMetric,
  kpiValues,
  scoreAgentKpi,
  type KpiScoring,
  type MetricScoring,
  type KpiMetric,
  type MetricScore,
  type AgentKpiScore,
} from './core/kpi-scoring.js';
