/**
 * SMS band of an agent performance sheet (columns U-W).
 * Date and daily total are carried forward across merged rows.
 */

import { toCount } from '../coercion/parse-numeric.js';
import { toTitleCase } from '../coercion/text.js';
import { projectRow } from '../layouts/layout.js';
import { agentDate, normalizeAgentName, type AgentSheetInput } from './shared.js';

import type { SmsField } from '../layouts/registry.js';
import type { ExtractionContext, IsoDate, RawGrid, SmsRecord } from '../types.js';

export const extractSmsWork = (
  grid: RawGrid,
  input: AgentSheetInput<SmsField>,
  ctx: ExtractionContext
): SmsRecord[] => {
  const agent = normalizeAgentName(input.agent);
  const cursor: { date: IsoDate | null; total: number } = { date: null, total: 0 };
  const records: SmsRecord[] = [];

  for (const row of grid.slice(input.startRow)) {
    const view = projectRow(row, input.layout);
    if (view === null) continue;

    const rowDate = agentDate(view, 'date', ctx);
    if (rowDate !== null) cursor.date = rowDate;
    if (!view.isBlank('total')) cursor.total = toCount(view.looseNumber('total'));

    if (cursor.date === null) continue;

    const smsType = view.text('type');
    if (smsType === '' || cursor.total <= 0) continue;

    records.push({
      agent,
      date: cursor.date,
      smsType: toTitleCase(smsType),
      total: cursor.total,
      remarks: view.text('remarks'),
    });
  }

  return records;
};
