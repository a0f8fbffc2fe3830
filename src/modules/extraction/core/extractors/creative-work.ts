/**
 * WITHOUT (creative work) band of an agent performance sheet (columns O-T).
 *
 * One day of creative work spans several rows with the date, folder, type
 * and total cells merged, so all four are carried forward from earlier rows.
 */

import { parseCountPhrase } from '../coercion/parse-numeric.js';
import { toTitleCase } from '../coercion/text.js';
import { projectRow } from '../layouts/layout.js';
import { agentDate, normalizeAgentName, type AgentSheetInput } from './shared.js';

import type { CreativeField } from '../layouts/registry.js';
import type { CreativeRecord, ExtractionContext, IsoDate, RawGrid } from '../types.js';

interface CreativeCursor {
  date: IsoDate | null;
  folder: string;
  type: string;
  total: number;
}

export const extractCreativeWork = (
  grid: RawGrid,
  input: AgentSheetInput<CreativeField>,
  ctx: ExtractionContext
): CreativeRecord[] => {
  const agent = normalizeAgentName(input.agent);
  const cursor: CreativeCursor = { date: null, folder: '', type: '', total: 0 };
  const records: CreativeRecord[] = [];

  for (const row of grid.slice(input.startRow)) {
    const view = projectRow(row, input.layout);
    if (view === null) continue;

    const rowDate = agentDate(view, 'date', ctx);
    if (rowDate !== null) {
      cursor.date = rowDate;
      // Folder and type only move forward on dated rows
      if (!view.isBlank('folder')) cursor.folder = view.text('folder');
      if (!view.isBlank('type')) cursor.type = view.text('type');
    }

    if (!view.isBlank('total')) {
      cursor.total = parseCountPhrase(view.raw('total'));
    }

    const content = view.text('content');
    if (content === '') continue;

    const folder = view.isBlank('folder') ? cursor.folder : view.text('folder');
    const type = view.isBlank('type') ? cursor.type : view.text('type');

    records.push({
      agent,
      date: rowDate ?? cursor.date ?? ctx.today,
      folder: toTitleCase(folder),
      type: type.toUpperCase(),
      total: cursor.total,
      content,
      caption: view.text('caption'),
      remarks: view.text('remarks'),
    });
  }

  return records;
};
