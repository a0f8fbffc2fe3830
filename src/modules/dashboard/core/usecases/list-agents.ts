/**
 * List Agents Use Case
 */

import type { DashboardDeps } from '../ports.js';

export interface AgentSummary {
  name: string;
  performanceSheet: string;
  contentSheet: string;
  /** P-tab worksheet, when the agent has one */
  performanceTab: string | null;
}

export const listAgents = (deps: Pick<DashboardDeps, 'catalog'>): AgentSummary[] =>
  deps.catalog.agents.map((agent) => ({
    name: agent.name,
    performanceSheet: agent.performanceSheet,
    contentSheet: agent.contentSheet,
    performanceTab:
      deps.catalog.agentTabs.tabs.find((tab) => tab.agent.toUpperCase() === agent.name.toUpperCase())
        ?.worksheet ?? null,
  }));
