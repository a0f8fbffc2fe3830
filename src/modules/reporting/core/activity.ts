/**
 * Activity figures of the agent sheets: creative and SMS output of one day
 * against the trailing seven-day average (T+1), the seven-day totals (weekly),
 * and copywriting counts.
 */

import { addDays, isWithin } from '../../metrics/index.js';

import type { ContentRecord, CreativeRecord, IsoDate, SmsRecord } from '../../extraction/index.js';

export const AVERAGE_WINDOW_DAYS = 7;

export interface ActivityRecords {
  creative: readonly CreativeRecord[];
  sms: readonly SmsRecord[];
  content: readonly ContentRecord[];
}

export interface ActivityLine {
  agent: string;
  day: number;
  average: number;
}

export interface ActivityStats {
  /** The reported day (T+1) */
  date: IsoDate;
  creative: ActivityLine[];
  sms: ActivityLine[];
  /** Primary Text entries written on the reported day */
  copywriting: { agent: string; count: number }[];
}

/**
 * Sum of daily totals per agent. The daily total is repeated on every row of
 * its day, so each (agent, date) counts once.
 */
export const dailyTotalsByAgent = (
  records: readonly { agent: string; date: IsoDate; total: number }[],
  from: IsoDate,
  to: IsoDate
): Map<string, number> => {
  const seen = new Set<string>();
  const totals = new Map<string, number>();
  for (const record of records) {
    if (!isWithin(record.date, from, to)) continue;
    const key = `${record.agent}|${record.date}`;
    if (seen.has(key)) continue;
    seen.add(key);
    totals.set(record.agent, (totals.get(record.agent) ?? 0) + record.total);
  }
  return totals;
};

const linesFor = (
  agents: readonly string[],
  records: readonly { agent: string; date: IsoDate; total: number }[],
  date: IsoDate
): ActivityLine[] => {
  const day = dailyTotalsByAgent(records, date, date);
  const window = dailyTotalsByAgent(records, addDays(date, -(AVERAGE_WINDOW_DAYS - 1)), date);
  return agents.map((agent) => ({
    agent,
    day: day.get(agent) ?? 0,
    average: (window.get(agent) ?? 0) / AVERAGE_WINDOW_DAYS,
  }));
};

/**
 * Figures for `date`, one line per agent in `agents` plus any other agent
 * that has records, sorted by name.
 */
export const computeActivityStats = (
  agents: readonly string[],
  records: ActivityRecords,
  date: IsoDate
): ActivityStats => {
  const names = [
    ...new Set([
      ...agents,
      ...records.creative.map((record) => record.agent),
      ...records.sms.map((record) => record.agent),
    ]),
  ].sort((a, b) => a.localeCompare(b));

  const copywriting = new Map<string, number>();
  for (const record of records.content) {
    if (record.date !== date || record.contentType !== 'Primary Text') continue;
    copywriting.set(record.agent, (copywriting.get(record.agent) ?? 0) + 1);
  }

  return {
    date,
    creative: linesFor(names, records.creative, date),
    sms: linesFor(names, records.sms, date),
    copywriting: [...copywriting]
      .map(([agent, count]) => ({ agent, count }))
      .sort((a, b) => a.agent.localeCompare(b.agent)),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Weekly summary
// ─────────────────────────────────────────────────────────────────────────────

export const WEEKLY_WINDOW_DAYS = 7;

export interface WeeklyLine {
  agent: string;
  total: number;
  /** total / 7 */
  daily: number;
}

export interface WeeklyStats {
  from: IsoDate;
  to: IsoDate;
  creative: WeeklyLine[];
  sms: WeeklyLine[];
  /** Primary Text entries written within the week */
  copywriting: { agent: string; count: number }[];
}

const weeklyLines = (
  agents: readonly string[],
  records: readonly { agent: string; date: IsoDate; total: number }[],
  from: IsoDate,
  to: IsoDate
): WeeklyLine[] => {
  const totals = dailyTotalsByAgent(records, from, to);
  return agents.map((agent) => {
    const total = totals.get(agent) ?? 0;
    return { agent, total, daily: total / WEEKLY_WINDOW_DAYS };
  });
};

/**
 * Seven-day creative and SMS totals ending on `to`, one line per agent in
 * `agents` plus any other agent with records in the week.
 */
export const computeWeeklyStats = (
  agents: readonly string[],
  records: ActivityRecords,
  to: IsoDate
): WeeklyStats => {
  const from = addDays(to, -(WEEKLY_WINDOW_DAYS - 1));
  const inWeek = (record: { date: IsoDate }): boolean => isWithin(record.date, from, to);

  const names = [
    ...new Set([
      ...agents,
      ...records.creative.filter(inWeek).map((record) => record.agent),
      ...records.sms.filter(inWeek).map((record) => record.agent),
    ]),
  ].sort((a, b) => a.localeCompare(b));

  const copywriting = new Map<string, number>();
  for (const record of records.content) {
    if (!inWeek(record) || record.contentType !== 'Primary Text') continue;
    copywriting.set(record.agent, (copywriting.get(record.agent) ?? 0) + 1);
  }

  return {
    from,
    to,
    creative: weeklyLines(names, records.creative, from, to),
    sms: weeklyLines(names, records.sms, from, to),
    copywriting: [...copywriting]
      .map(([agent, count]) => ({ agent, count }))
      .sort((a, b) => a.agent.localeCompare(b.agent)),
  };
};
