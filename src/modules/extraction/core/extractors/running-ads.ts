/**
 * WITH RUNNING ADS band of an agent performance sheet (columns A-N).
 * Performance figures are per date, so undated rows are skipped.
 */

import { toCount } from '../coercion/parse-numeric.js';
import { projectRow } from '../layouts/layout.js';
import { agentDate, normalizeAgentName, type AgentSheetInput } from './shared.js';

import type { RunningAdsField } from '../layouts/registry.js';
import type { ExtractionContext, RawGrid, RunningAdsRecord } from '../types.js';

const NUMERIC_FIELDS = [
  'amountSpent',
  'totalAd',
  'impressions',
  'clicks',
  'ctrPercent',
  'cpc',
  'cpr',
  'conversionRate',
  'rejectedCount',
  'deletedCount',
  'activeCount',
] as const satisfies readonly (keyof RunningAdsRecord)[];

export const extractRunningAds = (
  grid: RawGrid,
  input: AgentSheetInput<RunningAdsField>,
  ctx: ExtractionContext
): RunningAdsRecord[] => {
  const agent = normalizeAgentName(input.agent);
  const records: RunningAdsRecord[] = [];

  for (const row of grid.slice(input.startRow)) {
    const view = projectRow(row, input.layout);
    if (view === null) continue;

    const date = agentDate(view, 'date', ctx);
    if (date === null) continue;

    const record: RunningAdsRecord = {
      agent,
      date,
      amountSpent: view.looseNumber('amountSpent'),
      totalAd: toCount(view.looseNumber('totalAd')),
      campaign: view.text('campaign'),
      impressions: toCount(view.looseNumber('impressions')),
      clicks: toCount(view.looseNumber('clicks')),
      ctrPercent: view.looseNumber('ctrPercent'),
      cpc: view.looseNumber('cpc'),
      cpr: view.looseNumber('cpr'),
      conversionRate: view.looseNumber('conversionRate'),
      rejectedCount: toCount(view.looseNumber('rejectedCount')),
      deletedCount: toCount(view.looseNumber('deletedCount')),
      activeCount: toCount(view.looseNumber('activeCount')),
      remarks: view.text('remarks'),
    };

    if (record.campaign !== '' || NUMERIC_FIELDS.some((field) => record[field] !== 0)) {
      records.push(record);
    }
  }

  return records;
};
