/**
 * Sheet catalog: which spreadsheet and tab holds each report.
 *
 * Lives in `config/sheets.json` and is validated when loaded.
 */

import { readFileSync } from 'node:fs';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import type { SheetRef } from './types.js';
import type { Channel } from '../../extraction/index.js';

export const DEFAULT_SHEET_CATALOG_FILE = 'config/sheets.json';

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

const SpreadsheetId = Type.String({ minLength: 1 });
const Worksheet = Type.String({ minLength: 1 });
const Gid = Type.Integer({ minimum: 0 });
const AgentName = Type.String({ minLength: 1 });

const Tab = Type.Object(
  { worksheet: Worksheet, gid: Type.Optional(Gid) },
  { additionalProperties: false }
);

const SheetTab = Type.Object(
  { spreadsheetId: SpreadsheetId, worksheet: Worksheet, gid: Type.Optional(Gid) },
  { additionalProperties: false }
);

export const SheetCatalogSchema = Type.Object(
  {
    channelRoi: Type.Object(
      { spreadsheetId: SpreadsheetId, facebook: Tab, google: Tab },
      { additionalProperties: false }
    ),
    agentSheets: Type.Object({ spreadsheetId: SpreadsheetId }, { additionalProperties: false }),
    agents: Type.Array(
      Type.Object(
        { name: AgentName, performanceSheet: Worksheet, contentSheet: Worksheet },
        { additionalProperties: false }
      ),
      { minItems: 1 }
    ),
    indianPromotion: SheetTab,
    individualKpi: Type.Object(
      {
        spreadsheetId: SpreadsheetId,
        worksheet: Worksheet,
        gid: Type.Optional(Gid),
        excludedPersons: Type.Array(AgentName),
      },
      { additionalProperties: false }
    ),
    counterpart: SheetTab,
    teamChannel: SheetTab,
    agentTabs: Type.Object(
      {
        spreadsheetId: SpreadsheetId,
        tabs: Type.Array(
          Type.Object(
            { agent: AgentName, worksheet: Worksheet, gid: Type.Optional(Gid) },
            { additionalProperties: false }
          )
        ),
      },
      { additionalProperties: false }
    ),
  },
  { additionalProperties: false }
);

export type SheetCatalog = Static<typeof SheetCatalogSchema>;
export type AgentEntry = SheetCatalog['agents'][number];

// ─────────────────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────────────────

export const parseSheetCatalog = (value: unknown): SheetCatalog => {
  if (!Value.Check(SheetCatalogSchema, value)) {
    const problems = [...Value.Errors(SheetCatalogSchema, value)]
      .map((e) => `${e.path}: ${e.message}`)
      .join(', ');
    throw new Error(`Invalid sheet catalog: ${problems}`);
  }
  return value;
};

export const loadSheetCatalog = (filePath: string = DEFAULT_SHEET_CATALOG_FILE): SheetCatalog => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (cause) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    throw new Error(`Cannot read sheet catalog ${filePath}: ${reason}`);
  }
  return parseSheetCatalog(parsed);
};

// ─────────────────────────────────────────────────────────────────────────────
// Lookups
// ─────────────────────────────────────────────────────────────────────────────

const withGid = (spreadsheetId: string, worksheet: string, gid: number | undefined): SheetRef =>
  gid === undefined ? { spreadsheetId, worksheet } : { spreadsheetId, worksheet, gid };

export const channelRoiRef = (catalog: SheetCatalog, channel: Channel): SheetRef => {
  const tab = channel === 'Facebook' ? catalog.channelRoi.facebook : catalog.channelRoi.google;
  return withGid(catalog.channelRoi.spreadsheetId, tab.worksheet, tab.gid);
};

/** Agent entry by name, case-insensitive */
export const findAgent = (catalog: SheetCatalog, name: string): AgentEntry | undefined => {
  const wanted = name.trim().toUpperCase();
  return catalog.agents.find((agent) => agent.name.toUpperCase() === wanted);
};

export const agentPerformanceRef = (catalog: SheetCatalog, agent: AgentEntry): SheetRef => ({
  spreadsheetId: catalog.agentSheets.spreadsheetId,
  worksheet: agent.performanceSheet,
});

export const agentContentRef = (catalog: SheetCatalog, agent: AgentEntry): SheetRef => ({
  spreadsheetId: catalog.agentSheets.spreadsheetId,
  worksheet: agent.contentSheet,
});

export const sheetTabRef = (tab: {
  spreadsheetId: string;
  worksheet: string;
  gid?: number;
}): SheetRef => withGid(tab.spreadsheetId, tab.worksheet, tab.gid);

/** P-tab of an agent, case-insensitive */
export const agentTabRef = (catalog: SheetCatalog, agent: string): SheetRef | undefined => {
  const wanted = agent.trim().toUpperCase();
  const tab = catalog.agentTabs.tabs.find((entry) => entry.agent.toUpperCase() === wanted);
  return tab === undefined
    ? undefined
    : withGid(catalog.agentTabs.spreadsheetId, tab.worksheet, tab.gid);
};
