/**
 * Get Agent Performance Use Case
 *
 * The agent's P-tab (monthly summary rows and daily records) and the KPI
 * scores computed from it.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  extractAgentTab,
  normalizeAgentName,
  type AgentTabDailyRecord,
  type AgentTabMonthlyRow,
} from '../../../extraction/index.js';
import { scoreAgentKpi, type AgentKpiScore } from '../../../metrics/index.js';
import { agentTabRef, loadGrid } from '../../../sheet-source/index.js';
import { createNotFoundError, type DashboardError } from '../errors.js';

import type { DashboardDeps } from '../ports.js';

export interface AgentPerformance {
  agent: string;
  monthly: AgentTabMonthlyRow[];
  daily: AgentTabDailyRecord[];
  kpi: AgentKpiScore;
}

export const getAgentPerformance = async (
  deps: DashboardDeps,
  agentName: string
): Promise<Result<AgentPerformance, DashboardError>> => {
  const ref = agentTabRef(deps.catalog, agentName);
  if (ref === undefined) return err(createNotFoundError('agent', agentName));

  const agent = normalizeAgentName(agentName);
  const { agentTab } = deps.layouts;
  const grid = await loadGrid(deps, ref, 'agent-tabs');
  const records = extractAgentTab(
    grid,
    {
      agent,
      layout: agentTab.layout,
      monthlyFirstRow: agentTab.monthlyFirstRow,
      monthlyLastRow: agentTab.monthlyLastRow,
      dailyStartRow: agentTab.dailyStartRow,
    },
    { today: deps.today() }
  );

  return ok({
    agent,
    monthly: records.monthly,
    daily: records.daily,
    kpi: scoreAgentKpi(agent, records, deps.scoring),
  });
};
