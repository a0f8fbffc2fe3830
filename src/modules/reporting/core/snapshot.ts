/**
 * Real-time snapshot: per-agent spend figures for the latest day, compared
 * with the previous report.
 */

import { groupSum, sumFields } from '../../metrics/index.js';

import type { AgentDiff, LowSpendAlert, ReportSnapshot, SpendTotals } from './types.js';
import type { IndividualKpiRecord, IsoDate } from '../../extraction/index.js';

const SPEND_ZERO: SpendTotals = { spend: 0, register: 0, ftd: 0 };

/**
 * Records of the most recent date present, with that date. `null` when there
 * are no records.
 */
export const latestDayRecords = (
  records: readonly IndividualKpiRecord[]
): { date: IsoDate; records: IndividualKpiRecord[] } | null => {
  const latest = records.reduce<IsoDate | null>(
    (max, record) => (max === null || record.date > max ? record.date : max),
    null
  );
  if (latest === null) return null;
  return { date: latest, records: records.filter((record) => record.date === latest) };
};

/**
 * Snapshot of one day. `timestamp` is filled in when the report is sent.
 */
export const buildSnapshot = (
  date: IsoDate,
  records: readonly IndividualKpiRecord[],
  timestamp = ''
): ReportSnapshot => ({
  date,
  teamTotals: sumFields(records, SPEND_ZERO),
  agents: Object.fromEntries(groupSum(records, (record) => record.person, SPEND_ZERO)),
  timestamp,
});

/**
 * Per-agent change since the previous snapshot. Agents missing from the
 * previous snapshot compare against zero. `null` without a previous snapshot.
 */
export const diffSnapshots = (
  current: ReportSnapshot,
  previous: ReportSnapshot | null
): Record<string, AgentDiff> | null => {
  if (previous === null) return null;

  const diffs: Record<string, AgentDiff> = {};
  for (const [agent, now] of Object.entries(current.agents)) {
    const before = previous.agents[agent] ?? SPEND_ZERO;
    const spendDiff = now.spend - before.spend;
    const registerDiff = now.register - before.register;
    const ftdDiff = now.ftd - before.ftd;
    diffs[agent] = {
      spendDiff,
      registerDiff,
      ftdDiff,
      hasChange: spendDiff !== 0 || registerDiff !== 0 || ftdDiff !== 0,
    };
  }
  return diffs;
};

export const noChangeAgents = (diffs: Record<string, AgentDiff> | null): string[] =>
  diffs === null
    ? []
    : Object.entries(diffs)
        .filter(([, diff]) => !diff.hasChange)
        .map(([agent]) => agent);

export const lowSpendAgents = (snapshot: ReportSnapshot, thresholdUsd: number): LowSpendAlert[] =>
  Object.entries(snapshot.agents)
    .filter(([, totals]) => totals.spend < thresholdUsd)
    .map(([agent, totals]) => ({ agent, spend: totals.spend }));
