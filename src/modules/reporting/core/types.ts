/**
 * Reporting Module - Core Types
 */

import type { IsoDate } from '../../extraction/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Snapshot
// ─────────────────────────────────────────────────────────────────────────────

export interface SpendTotals {
  spend: number;
  register: number;
  ftd: number;
}

/**
 * Figures of the last real-time report, kept to compare the next one with.
 */
export interface ReportSnapshot {
  date: IsoDate;
  teamTotals: SpendTotals;
  agents: Record<string, SpendTotals>;
  /** ISO timestamp of the send */
  timestamp: string;
}

export interface AgentDiff {
  spendDiff: number;
  registerDiff: number;
  ftdDiff: number;
  hasChange: boolean;
}

export interface LowSpendAlert {
  agent: string;
  spend: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Settings
// ─────────────────────────────────────────────────────────────────────────────

export interface ReportSettings {
  /** IANA zone used for date and time labels */
  timezone: string;
  lowSpendThresholdUsd: number;
  noChangeAlert: boolean;
  /** Person → Telegram username, without the `@` */
  mentions: Readonly<Record<string, string>>;
}

/** Telegram rejects messages over 4096 characters; leave room for entities */
export const TELEGRAM_MESSAGE_LIMIT = 4000;
