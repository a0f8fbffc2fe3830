/**
 * Agent content (copywriting) sheets.
 *
 * Layout: DATE, TYPE, PRIMARY CONTENT, CONDITION, STATUS, PRIMARY ADJUSTMENT,
 * REMARKS. The first rows are sometimes a header whose merged cells were
 * exported as one concatenated string; those are recognised and skipped.
 */

import { toTitleCase } from '../coercion/text.js';
import { projectRow } from '../layouts/layout.js';
import { agentDate, normalizeAgentName, type AgentSheetInput } from './shared.js';

import type { ContentField } from '../layouts/registry.js';
import type { ContentRecord, ExtractionContext, IsoDate, RawGrid, RawRow } from '../types.js';

const MERGED_HEADER_KEYWORDS = [
  'Primary Text',
  'Headline',
  'Approved',
  'TYPE',
  'PRIMARY CONTENT',
  'CONDITION',
] as const;

const MERGED_HEADER_MAX_CELL = 500;
const MAX_CONTENT_LENGTH = 1000;

/**
 * A header row whose cells were concatenated: one of the first four cells
 * holds two or more header keywords, or is longer than 500 characters.
 */
export const isMergedHeaderRow = (row: RawRow): boolean => {
  if (row.length < 2) return false;

  return row.slice(0, 4).some((cell) => {
    const hits = MERGED_HEADER_KEYWORDS.filter((keyword) => cell.includes(keyword)).length;
    return hits >= 2 || cell.length > MERGED_HEADER_MAX_CELL;
  });
};

/** `Primary Text`, `Headline`, or the label in title case */
export const normalizeContentType = (raw: string): string => {
  const lower = raw.toLowerCase();
  if (lower.includes('primary')) return 'Primary Text';
  if (lower.includes('headline')) return 'Headline';
  return toTitleCase(raw);
};

export const extractContentWork = (
  grid: RawGrid,
  input: AgentSheetInput<ContentField>,
  ctx: ExtractionContext
): ContentRecord[] => {
  const agent = normalizeAgentName(input.agent);
  const cursor: { date: IsoDate | null; contentType: string } = { date: null, contentType: '' };
  const records: ContentRecord[] = [];

  grid.forEach((row, index) => {
    if (index < input.startRow) return;
    if (index < 3 && isMergedHeaderRow(row)) return;

    const view = projectRow(row, input.layout);
    if (view === null) return;

    if (index < 2 && view.raw('date').toUpperCase().includes('DATE')) return;

    const rowDate = agentDate(view, 'date', ctx);
    if (rowDate !== null) cursor.date = rowDate;
    if (cursor.date === null) return;

    if (!view.isBlank('contentType')) {
      cursor.contentType = normalizeContentType(view.text('contentType'));
    }

    const rawContent = view.raw('primaryContent');
    if (rawContent.toUpperCase().includes('PRIMARY CONTENT')) return;
    if (rawContent.length > MAX_CONTENT_LENGTH) return;

    const primaryContent = view.text('primaryContent');
    if (primaryContent === '') return;

    records.push({
      agent,
      date: cursor.date,
      contentType: cursor.contentType,
      primaryContent,
      condition: view.text('condition'),
      status: view.text('status'),
      primaryAdjustment: view.text('primaryAdjustment'),
      remarks: view.text('remarks'),
      source: 'Agent Sheet',
    });
  });

  return records;
};
