/**
 * Extraction Module - Public API
 *
 * Pure functions that turn raw sheet grids into typed records.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  IsoDate,
  RawRow,
  RawGrid,
  ExtractionContext,
  Channel,
  RoiSection,
  ChannelRoiRecord,
  RunningAdsRecord,
  CreativeRecord,
  SmsRecord,
  ContentSource,
  ContentRecord,
  IndividualKpiRecord,
  SectionedRecords,
  CounterpartRow,
  TeamChannelRow,
  AgentTabFigures,
  AgentTabMonthlyRow,
  AgentTabDailyRecord,
  AgentTabRecords,
} from './core/types.js';

export { LayoutConfigError } from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Coercion
// ─────────────────────────────────────────────────────────────────────────────

export * from './core/coercion/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Layouts
// ─────────────────────────────────────────────────────────────────────────────

export * from './core/layouts/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Extractors
// ─────────────────────────────────────────────────────────────────────────────

export * from './core/extractors/index.js';
