/**
 * Telegram HTML formatting for the reports.
 *
 * Tables go inside `<pre>` so that the padded columns line up in the chat.
 */

import { positiveDivide } from '../../metrics/index.js';
import { dayjs, utcDay } from '../../../infra/time/index.js';

import type { ActivityLine, ActivityStats, WeeklyLine, WeeklyStats } from './activity.js';
import type {
  AgentDiff,
  LowSpendAlert,
  ReportSettings,
  ReportSnapshot,
  SpendTotals,
} from './types.js';
import type { IndividualKpiRecord } from '../../extraction/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Text helpers
// ─────────────────────────────────────────────────────────────────────────────

const HTML_ESCAPES: Readonly<Record<string, string>> = { '&': '&amp;', '<': '&lt;', '>': '&gt;' };

export const escapeHtml = (text: string): string =>
  text.replace(/[&<>]/g, (char) => HTML_ESCAPES[char] ?? char);

const grouped = (value: number, decimals: number): string =>
  value.toLocaleString('en-US', { minimumFractionDigits: decimals, maximumFractionDigits: decimals });

/** `1,234.50` */
export const formatMoney = (value: number): string => grouped(value, 2);

/** `+3`, `-2`, `+0` */
export const formatSignedWhole = (value: number): string =>
  value >= 0 ? `+${value.toFixed(0)}` : value.toFixed(0);

export const spendIndicator = (diff: AgentDiff | undefined): string => {
  if (diff === undefined) return ' ';
  if (diff.spendDiff > 0) return '↑';
  if (diff.spendDiff < 0) return '↓';
  return '─';
};

// ─────────────────────────────────────────────────────────────────────────────
// Real-time KPI report
// ─────────────────────────────────────────────────────────────────────────────

export interface RealtimeSummaryInput {
  snapshot: ReportSnapshot;
  /** Records of the snapshot's day; impressions and clicks feed the CTR */
  records: readonly IndividualKpiRecord[];
  diffs: Record<string, AgentDiff> | null;
  lowSpend: readonly LowSpendAlert[];
  noChange: readonly string[];
  settings: ReportSettings;
  now: Date;
}

const AGENT_TABLE_RULE = '-'.repeat(33);

const agentLine = (agent: string, totals: SpendTotals, indicator: string): string => {
  const conversion = positiveDivide(totals.ftd, totals.register) * 100;
  return (
    escapeHtml(agent.padEnd(8)) +
    `$${grouped(totals.spend, 0).padStart(7)}${indicator}` +
    String(totals.register).padStart(5) +
    String(totals.ftd).padStart(5) +
    `${conversion.toFixed(1).padStart(5)}%`
  );
};

export const formatRealtimeSummary = (input: RealtimeSummaryInput): string => {
  const { snapshot, settings, diffs } = input;
  const team = snapshot.teamTotals;
  const impressions = input.records.reduce((sum, record) => sum + record.impressions, 0);
  const clicks = input.records.reduce((sum, record) => sum + record.clicks, 0);

  const dateLabel = utcDay(snapshot.date).format('MMM DD, YYYY');
  const timeLabel = dayjs(input.now).tz(settings.timezone).format('hh:mm A');

  const lines: string[] = [
    '📊 <b>ADVERTISER KPI REPORT</b>',
    `📅 ${dateLabel} | ${timeLabel}`,
    '',
    '💰 <b>TEAM TOTALS</b>',
    `├ Spend: <b>$${formatMoney(team.spend)}</b>`,
    `├ Register: <b>${grouped(team.register, 0)}</b>`,
    `├ FTD: <b>${grouped(team.ftd, 0)}</b>`,
    `├ Conv Rate: <b>${(positiveDivide(team.ftd, team.register) * 100).toFixed(1)}%</b>`,
    `├ CPR: <b>$${positiveDivide(team.spend, team.register).toFixed(2)}</b>`,
    `├ Cost/FTD: <b>$${positiveDivide(team.spend, team.ftd).toFixed(2)}</b>`,
    `└ CTR: <b>${(positiveDivide(clicks, impressions) * 100).toFixed(2)}%</b>`,
    '',
    '👥 <b>AGENT SUMMARY</b>',
    `<pre>${'Agent'.padEnd(8)}${'Spend'.padStart(9)}${'Reg'.padStart(5)}${'FTD'.padStart(5)}${'Conv'.padStart(6)}`,
    AGENT_TABLE_RULE,
  ];

  const agents = Object.entries(snapshot.agents).sort(([, a], [, b]) => b.spend - a.spend);
  for (const [agent, totals] of agents) {
    lines.push(agentLine(agent, totals, spendIndicator(diffs?.[agent])));
  }
  lines.push('</pre>', '');

  const noChange = settings.noChangeAlert ? input.noChange : [];
  if (input.lowSpend.length > 0 || noChange.length > 0) {
    lines.push('⚠️ <b>ALERTS</b>');
    for (const alert of input.lowSpend) {
      const spend = alert.spend.toFixed(2);
      lines.push(`• <b>${escapeHtml(alert.agent)}</b>: Low spend ($${spend}) - Focus and work hard!`);
    }
    for (const agent of noChange) {
      lines.push(`• <b>${escapeHtml(agent)}</b>: No change since last report`);
    }
    lines.push('');
  }

  const mentions = Object.values(settings.mentions).map((username) => `@${username}`);
  if (mentions.length > 0) lines.push(mentions.join(' '));

  return lines.join('\n');
};

// ─────────────────────────────────────────────────────────────────────────────
// T+1 activity report
// ─────────────────────────────────────────────────────────────────────────────

const ACTIVITY_RULE = '-'.repeat(32);
const COPY_RULE = '-'.repeat(16);

const activityRow = (name: string, day: number, average: number): string =>
  escapeHtml(name.padEnd(10)) +
  String(day).padStart(6) +
  average.toFixed(1).padStart(8) +
  formatSignedWhole(day - average).padStart(8);

const activityTable = (title: string, rows: readonly ActivityLine[]): string[] => {
  const totalDay = rows.reduce((sum, row) => sum + row.day, 0);
  const totalAverage = rows.reduce((sum, row) => sum + row.average, 0);
  return [
    title,
    `<pre>${'Name'.padEnd(10)}${'T+1'.padStart(6)}${'7D Avg'.padStart(8)}${'Diff'.padStart(8)}`,
    ACTIVITY_RULE,
    ...rows.map((row) => activityRow(row.agent, row.day, row.average)),
    ACTIVITY_RULE,
    `${activityRow('TOTAL', totalDay, totalAverage)}</pre>`,
  ];
};

const copywritingTable = (
  title: string,
  rows: readonly { agent: string; count: number }[]
): string[] => {
  const total = rows.reduce((sum, row) => sum + row.count, 0);
  return [
    title,
    `<pre>${'Name'.padEnd(10)}${'Posts'.padStart(6)}`,
    COPY_RULE,
    ...rows.map((row) => `${escapeHtml(row.agent.padEnd(10))}${String(row.count).padStart(6)}`),
    COPY_RULE,
    `${'TOTAL'.padEnd(10)}${String(total).padStart(6)}</pre>`,
  ];
};

export const formatActivityReport = (stats: ActivityStats): string => {
  const lines: string[] = [
    `📊 <b>T+1 Activity Report</b> - ${utcDay(stats.date).format('MMM DD, YYYY')}`,
    '<i>vs Last 7 Days Average</i>',
    '',
    ...activityTable('🎨 <b>CREATIVE</b>', stats.creative),
    '',
    ...activityTable('📱 <b>SMS</b>', stats.sms),
  ];

  if (stats.copywriting.length > 0) {
    lines.push('', ...copywritingTable('📝 <b>COPYWRITING</b>', stats.copywriting));
  }

  return lines.join('\n');
};

// ─────────────────────────────────────────────────────────────────────────────
// Weekly summary
// ─────────────────────────────────────────────────────────────────────────────

const WEEKLY_RULE = '-'.repeat(24);

const weeklyRow = (name: string, total: number, daily: number): string =>
  escapeHtml(name.padEnd(10)) + String(total).padStart(7) + daily.toFixed(1).padStart(7);

const weeklyTable = (title: string, rows: readonly WeeklyLine[]): string[] => {
  const total = rows.reduce((sum, row) => sum + row.total, 0);
  const daily = rows.reduce((sum, row) => sum + row.daily, 0);
  return [
    title,
    `<pre>${'Name'.padEnd(10)}${'Total'.padStart(7)}${'Daily'.padStart(7)}`,
    WEEKLY_RULE,
    ...rows.map((row) => weeklyRow(row.agent, row.total, row.daily)),
    WEEKLY_RULE,
    `${weeklyRow('TOTAL', total, daily)}</pre>`,
  ];
};

export const formatWeeklyReport = (stats: WeeklyStats): string => {
  const lines: string[] = [
    '📊 <b>Weekly Activity Report</b>',
    `<i>${utcDay(stats.from).format('MMM DD')} - ${utcDay(stats.to).format('MMM DD, YYYY')}</i>`,
    '',
    ...weeklyTable('🎨 <b>CREATIVE (7 Days)</b>', stats.creative),
    '',
    ...weeklyTable('📱 <b>SMS (7 Days)</b>', stats.sms),
  ];

  if (stats.copywriting.length > 0) {
    lines.push('', ...copywritingTable('📝 <b>COPYWRITING (Primary Text)</b>', stats.copywriting));
  }

  return lines.join('\n');
};
