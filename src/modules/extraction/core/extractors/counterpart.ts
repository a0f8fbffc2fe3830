/**
 * Counterpart performance sheet: FB and Google bands side by side, each an
 * OVERALL PERFORMANCE block followed by one block per day.
 */

import { projectRow, type LayoutDescriptor } from '../layouts/layout.js';
import { bucketBySection, scanSectionedSheet, type SectionState } from './sectioned-sheet.js';
import { referenceYearOf } from './shared.js';

import type { CounterpartField } from '../layouts/registry.js';
import type {
  Channel,
  CounterpartRow,
  ExtractionContext,
  RawGrid,
  SectionedRecords,
} from '../types.js';

export interface CounterpartInput {
  channel: Channel;
  layout: LayoutDescriptor<CounterpartField>;
  startRow: number;
}

export const extractCounterpart = (
  grid: RawGrid,
  input: CounterpartInput,
  ctx: ExtractionContext
): SectionedRecords<CounterpartRow> => {
  const { layout } = input;
  const labelColumn = layout.columns.channelSource ?? layout.minIndex;

  const scanned = scanSectionedSheet(grid, {
    startRow: input.startRow,
    band: { from: layout.minIndex, to: layout.maxIndex },
    labelColumn,
    referenceYear: referenceYearOf(ctx),
  });

  const accepted: { state: SectionState; record: CounterpartRow }[] = [];

  for (const { row, state } of scanned) {
    const view = projectRow(row, layout);
    if (view === null) continue;

    const channelSource = view.text('channelSource');
    if (channelSource === '') continue;

    const record: CounterpartRow = {
      channel: input.channel,
      channelSource,
      firstRecharge: view.number('firstRecharge'),
      totalAmount: view.number('totalAmount'),
      arppu: view.number('arppu'),
      spending: view.number('spending'),
      costPerRecharge: view.number('costPerRecharge'),
      roas: view.number('roas'),
    };

    const hasFigures =
      record.firstRecharge !== 0 ||
      record.totalAmount !== 0 ||
      record.arppu !== 0 ||
      record.spending !== 0 ||
      record.costPerRecharge !== 0 ||
      record.roas !== 0;

    if (hasFigures) accepted.push({ state, record });
  }

  return bucketBySection(accepted);
};
