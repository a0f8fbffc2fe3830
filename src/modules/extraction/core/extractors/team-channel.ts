/**
 * Team Channel sheet. The team name is merged down over its channel rows,
 * so it is carried forward until the next team or the next section.
 */

import { projectRow, type LayoutDescriptor } from '../layouts/layout.js';
import { bucketBySection, scanSectionedSheet, type SectionState } from './sectioned-sheet.js';
import { referenceYearOf } from './shared.js';

import type { TeamChannelField } from '../layouts/registry.js';
import type { ExtractionContext, RawGrid, SectionedRecords, TeamChannelRow } from '../types.js';

export interface TeamChannelInput {
  layout: LayoutDescriptor<TeamChannelField>;
  startRow: number;
}

const sameSection = (a: SectionState, b: SectionState): boolean =>
  a.kind === b.kind && (a.kind === 'overall' || (b.kind === 'daily' && a.date === b.date));

export const extractTeamChannel = (
  grid: RawGrid,
  input: TeamChannelInput,
  ctx: ExtractionContext
): SectionedRecords<TeamChannelRow> => {
  const { layout } = input;

  const scanned = scanSectionedSheet(grid, {
    startRow: input.startRow,
    band: { from: layout.minIndex, to: layout.maxIndex },
    labelColumn: layout.columns.channelSource ?? layout.minIndex,
    referenceYear: referenceYearOf(ctx),
  });

  const accepted: { state: SectionState; record: TeamChannelRow }[] = [];
  let section: SectionState = { kind: 'overall' };
  let team = '';

  for (const { row, state } of scanned) {
    if (!sameSection(section, state)) {
      section = state;
      team = '';
    }

    const view = projectRow(row, layout);
    if (view === null) continue;

    if (!view.isBlank('teamName')) team = view.text('teamName');

    const channelSource = view.text('channelSource');
    if (channelSource === '') continue;

    const record: TeamChannelRow = {
      team,
      channelSource,
      cost: view.number('cost'),
      registrations: view.number('registrations'),
      firstRecharge: view.number('firstRecharge'),
      totalAmount: view.number('totalAmount'),
      arppu: view.number('arppu'),
    };

    const hasFigures =
      record.cost !== 0 ||
      record.registrations !== 0 ||
      record.firstRecharge !== 0 ||
      record.totalAmount !== 0 ||
      record.arppu !== 0;

    if (hasFigures) accepted.push({ state, record });
  }

  return bucketBySection(accepted);
};
