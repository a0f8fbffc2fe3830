/**
 * Helpers shared by the agent-sheet family of extractors.
 */

import { AGENT_SHEET_DATE_PROFILE } from '../coercion/parse-date.js';

import type { LayoutDescriptor, RowView } from '../layouts/layout.js';
import type { ExtractionContext, IsoDate } from '../types.js';

export const referenceYearOf = (ctx: ExtractionContext): number => Number(ctx.today.slice(0, 4));

/** Agent-sheet date of a field, with year-less dates resolved against `ctx.today` */
export const agentDate = <F extends string>(
  view: RowView<F>,
  field: F,
  ctx: ExtractionContext
): IsoDate | null =>
  view.date(field, AGENT_SHEET_DATE_PROFILE, { referenceYear: referenceYearOf(ctx) });

/** Agent names are compared and stored upper-case */
export const normalizeAgentName = (name: string): string => name.trim().toUpperCase();

export interface AgentSheetInput<F extends string> {
  agent: string;
  layout: LayoutDescriptor<F>;
  startRow: number;
}
