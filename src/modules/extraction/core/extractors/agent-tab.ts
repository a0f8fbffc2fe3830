/**
 * Agent performance tab (one tab per agent): a small monthly summary block
 * at the top, then one row per day.
 */

import { projectRow, type LayoutDescriptor, type RowView } from '../layouts/layout.js';
import { agentDate, normalizeAgentName } from './shared.js';

import type { AgentTabField } from '../layouts/registry.js';
import type {
  AgentTabDailyRecord,
  AgentTabFigures,
  AgentTabMonthlyRow,
  AgentTabRecords,
  ExtractionContext,
  RawGrid,
} from '../types.js';

export interface AgentTabInput {
  agent: string;
  layout: LayoutDescriptor<AgentTabField>;
  monthlyFirstRow: number;
  /** Inclusive */
  monthlyLastRow: number;
  dailyStartRow: number;
}

const readFigures = (view: RowView<AgentTabField>): AgentTabFigures => ({
  channel: view.text('channel'),
  cost: view.number('cost'),
  register: view.number('register'),
  cpr: view.number('cpr'),
  ftd: view.number('ftd'),
  cpd: view.number('cpd'),
  conversionRate: view.number('conversionRate'),
  impressions: view.number('impressions'),
  clicks: view.number('clicks'),
  ctr: view.number('ctr'),
  arppu: view.number('arppu'),
  roas: view.number('roas'),
});

const hasFigures = (figures: AgentTabFigures): boolean =>
  figures.cost !== 0 ||
  figures.register !== 0 ||
  figures.cpr !== 0 ||
  figures.ftd !== 0 ||
  figures.cpd !== 0 ||
  figures.conversionRate !== 0 ||
  figures.impressions !== 0 ||
  figures.clicks !== 0 ||
  figures.ctr !== 0 ||
  figures.arppu !== 0 ||
  figures.roas !== 0;

export const extractAgentTab = (
  grid: RawGrid,
  input: AgentTabInput,
  ctx: ExtractionContext
): AgentTabRecords => {
  const agent = normalizeAgentName(input.agent);
  const monthly: AgentTabMonthlyRow[] = [];
  const daily: AgentTabDailyRecord[] = [];

  for (const row of grid.slice(input.monthlyFirstRow, input.monthlyLastRow + 1)) {
    const view = projectRow(row, input.layout);
    if (view === null) continue;

    const figures = readFigures(view);
    // The date column of the monthly block holds the month label
    const month = view.text('date');
    if (figures.channel === '' && month === '') continue;
    if (!hasFigures(figures)) continue;

    monthly.push({ ...figures, agent, month });
  }

  for (const row of grid.slice(input.dailyStartRow)) {
    const view = projectRow(row, input.layout);
    if (view === null) continue;

    const date = agentDate(view, 'date', ctx);
    if (date === null) continue;

    const figures = readFigures(view);
    if (hasFigures(figures)) daily.push({ ...figures, agent, date });
  }

  return { monthly, daily };
};
