/**
 * Channel ROI extractor (FB and Google summary sheets).
 *
 * Every section is read from the same grid through its own column band.
 * Rows carry their own date; there is no forward fill.
 */

import { toCount } from '../coercion/parse-numeric.js';
import { projectRow, type LayoutDescriptor } from '../layouts/layout.js';

import type { RoiField } from '../layouts/registry.js';
import type { Channel, ChannelRoiRecord, RawGrid, RoiSection } from '../types.js';

export interface ChannelRoiInput {
  channel: Channel;
  section: RoiSection;
  layout: LayoutDescriptor<RoiField>;
  startRow: number;
}

const hasFigures = (record: ChannelRoiRecord): boolean =>
  record.cost !== 0 ||
  record.register !== 0 ||
  record.ftd !== 0 ||
  record.ftdRecharge !== 0 ||
  record.avgRecharge !== 0 ||
  record.conversionRatio !== 0 ||
  record.cpr !== 0 ||
  record.cpftd !== 0 ||
  record.roas !== 0 ||
  record.cpm !== 0;

export const extractChannelRoi = (grid: RawGrid, input: ChannelRoiInput): ChannelRoiRecord[] => {
  const records: ChannelRoiRecord[] = [];

  for (const row of grid.slice(input.startRow)) {
    const view = projectRow(row, input.layout);
    if (view === null) continue;

    const date = view.date('date');
    if (date === null) continue;

    const ftdRecharge = view.number('ftdRecharge');
    const record: ChannelRoiRecord = {
      date,
      channel: input.channel,
      section: input.section,
      cost: view.number('cost'),
      register: toCount(view.number('register')),
      ftd: toCount(view.number('ftd')),
      ftdRecharge,
      avgRecharge: view.number('avgRecharge'),
      conversionRatio: view.number('conversionRatio'),
      cpr: view.number('cpr'),
      cpftd: view.number('cpftd'),
      roas: view.number('roas'),
      cpm: view.number('cpm'),
      depositAmount: ftdRecharge,
    };

    if (hasFigures(record)) records.push(record);
  }

  return records;
};
