/**
 * Get Agent Activity Use Case
 *
 * Running ads, creative, SMS and copywriting records of one agent. The
 * performance sheet carries the first three side by side; copywriting comes
 * from the agent's content sheet and the shared Indian Promotion sheet.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  extractContentWork,
  extractCreativeWork,
  extractIndianPromotion,
  extractRunningAds,
  extractSmsWork,
  normalizeAgentName,
  type ContentRecord,
  type CreativeRecord,
  type ExtractionContext,
  type RunningAdsRecord,
  type SmsRecord,
} from '../../../extraction/index.js';
import {
  agentContentRef,
  agentPerformanceRef,
  findAgent,
  loadGrid,
  sheetTabRef,
  type AgentEntry,
} from '../../../sheet-source/index.js';
import { createNotFoundError, type DashboardError } from '../errors.js';
import { checkRange, inRange } from '../range.js';

import type { DashboardDeps } from '../ports.js';
import type { DateRange } from '../types.js';

export interface GetAgentActivityInput {
  agent: string;
  range: DateRange;
}

export interface AgentActivity {
  agent: string;
  runningAds: RunningAdsRecord[];
  creative: CreativeRecord[];
  sms: SmsRecord[];
  content: ContentRecord[];
}

/**
 * Every activity record of one agent, unfiltered.
 */
export const loadAgentActivity = async (
  deps: DashboardDeps,
  agent: AgentEntry,
  ctx: ExtractionContext
): Promise<AgentActivity> => {
  const { agentSheet, content, indianPromotion } = deps.layouts;
  const name = normalizeAgentName(agent.name);

  const [performanceGrid, contentGrid, promotionGrid] = await Promise.all([
    loadGrid(deps, agentPerformanceRef(deps.catalog, agent), 'agent'),
    loadGrid(deps, agentContentRef(deps.catalog, agent), 'agent'),
    loadGrid(deps, sheetTabRef(deps.catalog.indianPromotion), 'ads'),
  ]);

  const promotion = extractIndianPromotion(
    promotionGrid,
    {
      agents: indianPromotion.agents.filter((band) => normalizeAgentName(band.agent) === name),
      startRow: indianPromotion.startRow,
    },
    ctx
  );

  return {
    agent: name,
    runningAds: extractRunningAds(
      performanceGrid,
      { agent: name, layout: agentSheet.runningAds, startRow: agentSheet.startRow },
      ctx
    ),
    creative: extractCreativeWork(
      performanceGrid,
      { agent: name, layout: agentSheet.creative, startRow: agentSheet.startRow },
      ctx
    ),
    sms: extractSmsWork(
      performanceGrid,
      { agent: name, layout: agentSheet.sms, startRow: agentSheet.startRow },
      ctx
    ),
    content: [
      ...extractContentWork(
        contentGrid,
        { agent: name, layout: content.layout, startRow: content.startRow },
        ctx
      ),
      ...promotion,
    ],
  };
};

export const getAgentActivity = async (
  deps: DashboardDeps,
  input: GetAgentActivityInput
): Promise<Result<AgentActivity, DashboardError>> => {
  const agent = findAgent(deps.catalog, input.agent);
  if (agent === undefined) return err(createNotFoundError('agent', input.agent));

  const rangeResult = checkRange(input.range);
  if (rangeResult.isErr()) return err(rangeResult.error);
  const range = rangeResult.value;

  const activity = await loadAgentActivity(deps, agent, { today: deps.today() });

  return ok({
    agent: activity.agent,
    runningAds: inRange(activity.runningAds, range),
    creative: inRange(activity.creative, range),
    sms: inRange(activity.sms, range),
    content: inRange(activity.content, range),
  });
};
