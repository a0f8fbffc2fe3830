/**
 * Indian Promotion sheet: one shared worksheet with a five-column band per
 * agent. Only Primary Text entries count as copywriting.
 */

import { projectRow } from '../layouts/layout.js';
import { agentDate } from './shared.js';

import type { PromotionAgentLayout } from '../layouts/registry.js';
import type { ContentRecord, ExtractionContext, IsoDate, RawGrid } from '../types.js';

export interface IndianPromotionInput {
  agents: readonly PromotionAgentLayout[];
  startRow: number;
}

export const extractIndianPromotion = (
  grid: RawGrid,
  input: IndianPromotionInput,
  ctx: ExtractionContext
): ContentRecord[] => {
  const records: ContentRecord[] = [];

  for (const { agent, layout } of input.agents) {
    // Each band keeps its own date cursor
    let lastDate: IsoDate | null = null;

    for (const row of grid.slice(input.startRow)) {
      const view = projectRow(row, layout);
      if (view === null) continue;

      const rowDate = agentDate(view, 'date', ctx);
      if (rowDate !== null) lastDate = rowDate;
      if (lastDate === null) continue;

      const content = view.text('content');
      if (!view.raw('type').includes('Primary Text') || content === '') continue;

      records.push({
        agent,
        date: lastDate,
        contentType: 'Primary Text',
        primaryContent: content,
        condition: view.text('condition'),
        status: view.text('status'),
        primaryAdjustment: '',
        remarks: '',
        source: 'Indian Promotion',
      });
    }
  }

  return records;
};
