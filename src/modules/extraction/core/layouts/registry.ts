/**
 * Layout Descriptor Registry
 *
 * The physical sheet layouts live in `config/layouts.json`. The file is
 * validated against the schemas below when it is loaded; a missing,
 * misspelled or negative offset stops start-up instead of silently reading
 * another column.
 */

import { readFileSync } from 'node:fs';

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import { LayoutConfigError } from '../errors.js';
import { defineLayout, offsetLayout, type LayoutDescriptor } from './layout.js';

import type { Channel, RoiSection } from '../types.js';

export const DEFAULT_LAYOUTS_FILE = 'config/layouts.json';

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

const Column = Type.Integer({ minimum: 0 });
const Row = Type.Integer({ minimum: 0 });

const strict = <T extends Record<string, TSchema>>(properties: T) =>
  Type.Object(properties, { additionalProperties: false });

/** Violet and Roll Back sections do not carry every ROI column */
export const RoiColumnsSchema = strict({
  date: Column,
  cost: Column,
  ftd: Column,
  ftdRecharge: Column,
  avgRecharge: Column,
  cpr: Column,
  roas: Column,
  register: Type.Optional(Column),
  conversionRatio: Type.Optional(Column),
  cpftd: Type.Optional(Column),
  cpm: Type.Optional(Column),
});

export const RunningAdsColumnsSchema = strict({
  date: Column,
  amountSpent: Column,
  totalAd: Column,
  campaign: Column,
  impressions: Column,
  clicks: Column,
  ctrPercent: Column,
  cpc: Column,
  cpr: Column,
  conversionRate: Column,
  rejectedCount: Column,
  deletedCount: Column,
  activeCount: Column,
  remarks: Column,
});

export const CreativeColumnsSchema = strict({
  date: Column,
  folder: Column,
  type: Column,
  total: Column,
  content: Column,
  caption: Column,
  remarks: Column,
});

export const SmsColumnsSchema = strict({
  date: Column,
  type: Column,
  total: Column,
  remarks: Column,
});

export const ContentColumnsSchema = strict({
  date: Column,
  contentType: Column,
  primaryContent: Column,
  condition: Column,
  status: Column,
  primaryAdjustment: Column,
  remarks: Column,
});

export const PromotionColumnsSchema = strict({
  date: Column,
  type: Column,
  content: Column,
  condition: Column,
  status: Column,
});

export const KpiBlockOffsetsSchema = strict({
  date: Column,
  type: Column,
  spend: Column,
  costPhp: Column,
  ftd: Column,
  register: Column,
  reach: Column,
  impressions: Column,
  clicks: Column,
});

export const CounterpartColumnsSchema = strict({
  channelSource: Column,
  firstRecharge: Column,
  totalAmount: Column,
  arppu: Column,
  spending: Column,
  costPerRecharge: Column,
  roas: Column,
});

export const TeamChannelColumnsSchema = strict({
  teamName: Column,
  channelSource: Column,
  cost: Column,
  registrations: Column,
  firstRecharge: Column,
  totalAmount: Column,
  arppu: Column,
});

export const AgentTabColumnsSchema = strict({
  channel: Column,
  date: Column,
  cost: Column,
  register: Column,
  cpr: Column,
  ftd: Column,
  cpd: Column,
  conversionRate: Column,
  impressions: Column,
  clicks: Column,
  ctr: Column,
  arppu: Column,
  roas: Column,
});

const RoiSheetSchema = strict({
  startRow: Row,
  sections: strict({
    daily_roi: RoiColumnsSchema,
    roll_back: RoiColumnsSchema,
    violet: RoiColumnsSchema,
  }),
});

export const LayoutFileSchema = strict({
  channelRoi: strict({ facebook: RoiSheetSchema, google: RoiSheetSchema }),
  agentSheet: strict({
    startRow: Row,
    runningAds: RunningAdsColumnsSchema,
    creative: CreativeColumnsSchema,
    sms: SmsColumnsSchema,
  }),
  content: strict({
    startRow: Row,
    columns: ContentColumnsSchema,
  }),
  indianPromotion: strict({
    startRow: Row,
    agents: Type.Record(Type.String({ minLength: 1 }), PromotionColumnsSchema),
  }),
  individualKpi: strict({
    namesRow: Row,
    accountRow: Row,
    startRow: Row,
    blockStarts: Type.Array(Column, { minItems: 1 }),
    offsets: KpiBlockOffsetsSchema,
  }),
  counterpart: strict({
    startRow: Row,
    facebook: CounterpartColumnsSchema,
    google: CounterpartColumnsSchema,
  }),
  teamChannel: strict({
    startRow: Row,
    columns: TeamChannelColumnsSchema,
  }),
  agentTab: strict({
    monthlyFirstRow: Row,
    monthlyLastRow: Row,
    dailyStartRow: Row,
    columns: AgentTabColumnsSchema,
  }),
});

export type LayoutFile = Static<typeof LayoutFileSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Field names
// ─────────────────────────────────────────────────────────────────────────────

export type RoiField = keyof Static<typeof RoiColumnsSchema>;
export type RunningAdsField = keyof Static<typeof RunningAdsColumnsSchema>;
export type CreativeField = keyof Static<typeof CreativeColumnsSchema>;
export type SmsField = keyof Static<typeof SmsColumnsSchema>;
export type ContentField = keyof Static<typeof ContentColumnsSchema>;
export type PromotionField = keyof Static<typeof PromotionColumnsSchema>;
export type KpiField = keyof Static<typeof KpiBlockOffsetsSchema>;
export type CounterpartField = keyof Static<typeof CounterpartColumnsSchema>;
export type TeamChannelField = keyof Static<typeof TeamChannelColumnsSchema>;
export type AgentTabField = keyof Static<typeof AgentTabColumnsSchema>;

const KPI_FIELDS: readonly KpiField[] = [
  'date',
  'type',
  'spend',
  'costPhp',
  'ftd',
  'register',
  'reach',
  'impressions',
  'clicks',
];

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export interface RoiSheetLayout {
  startRow: number;
  sections: Record<RoiSection, LayoutDescriptor<RoiField>>;
}

export interface KpiBlockLayout {
  start: number;
  layout: LayoutDescriptor<KpiField>;
}

export interface PromotionAgentLayout {
  agent: string;
  layout: LayoutDescriptor<PromotionField>;
}

export interface LayoutRegistry {
  channelRoi: Record<Channel, RoiSheetLayout>;
  agentSheet: {
    startRow: number;
    runningAds: LayoutDescriptor<RunningAdsField>;
    creative: LayoutDescriptor<CreativeField>;
    sms: LayoutDescriptor<SmsField>;
  };
  content: { startRow: number; layout: LayoutDescriptor<ContentField> };
  indianPromotion: { startRow: number; agents: PromotionAgentLayout[] };
  individualKpi: {
    namesRow: number;
    accountRow: number;
    startRow: number;
    blocks: KpiBlockLayout[];
  };
  counterpart: { startRow: number; sections: Record<Channel, LayoutDescriptor<CounterpartField>> };
  teamChannel: { startRow: number; layout: LayoutDescriptor<TeamChannelField> };
  agentTab: {
    monthlyFirstRow: number;
    monthlyLastRow: number;
    dailyStartRow: number;
    layout: LayoutDescriptor<AgentTabField>;
  };
}

const roiSheet = (label: string, sheet: LayoutFile['channelRoi']['facebook']): RoiSheetLayout => ({
  startRow: sheet.startRow,
  sections: {
    daily_roi: defineLayout<RoiField>(`${label} Daily ROI`, sheet.sections.daily_roi),
    roll_back: defineLayout<RoiField>(`${label} Roll Back`, sheet.sections.roll_back),
    violet: defineLayout<RoiField>(`${label} Violet`, sheet.sections.violet),
  },
});

/**
 * Turn a validated layout file into descriptors.
 */
export const buildLayoutRegistry = (file: LayoutFile): LayoutRegistry => {
  if (file.agentTab.monthlyLastRow < file.agentTab.monthlyFirstRow) {
    throw new LayoutConfigError('P-tab', 'monthlyLastRow is before monthlyFirstRow');
  }

  return {
    channelRoi: {
      Facebook: roiSheet('FB', file.channelRoi.facebook),
      Google: roiSheet('Google', file.channelRoi.google),
    },
    agentSheet: {
      startRow: file.agentSheet.startRow,
      runningAds: defineLayout<RunningAdsField>('Running Ads', file.agentSheet.runningAds),
      creative: defineLayout<CreativeField>('Creative Work', file.agentSheet.creative),
      sms: defineLayout<SmsField>('SMS', file.agentSheet.sms),
    },
    content: {
      startRow: file.content.startRow,
      layout: defineLayout<ContentField>('Content', file.content.columns),
    },
    indianPromotion: {
      startRow: file.indianPromotion.startRow,
      agents: Object.entries(file.indianPromotion.agents).map(([agent, columns]) => ({
        agent,
        layout: defineLayout<PromotionField>(`Indian Promotion ${agent}`, columns),
      })),
    },
    individualKpi: {
      namesRow: file.individualKpi.namesRow,
      accountRow: file.individualKpi.accountRow,
      startRow: file.individualKpi.startRow,
      blocks: file.individualKpi.blockStarts.map((start) => ({
        start,
        layout: offsetLayout<KpiField>(
          `Individual KPI @${String(start)}`,
          file.individualKpi.offsets,
          KPI_FIELDS,
          start
        ),
      })),
    },
    counterpart: {
      startRow: file.counterpart.startRow,
      sections: {
        Facebook: defineLayout<CounterpartField>('Counterpart FB', file.counterpart.facebook),
        Google: defineLayout<CounterpartField>('Counterpart Google', file.counterpart.google),
      },
    },
    teamChannel: {
      startRow: file.teamChannel.startRow,
      layout: defineLayout<TeamChannelField>('Team Channel', file.teamChannel.columns),
    },
    agentTab: {
      monthlyFirstRow: file.agentTab.monthlyFirstRow,
      monthlyLastRow: file.agentTab.monthlyLastRow,
      dailyStartRow: file.agentTab.dailyStartRow,
      layout: defineLayout<AgentTabField>('P-tab', file.agentTab.columns),
    },
  };
};

/**
 * Validate an already-parsed layout document.
 */
export const parseLayoutFile = (value: unknown): LayoutRegistry => {
  if (!Value.Check(LayoutFileSchema, value)) {
    const problems = [...Value.Errors(LayoutFileSchema, value)]
      .map((e) => `${e.path}: ${e.message}`)
      .join(', ');
    throw new LayoutConfigError('registry', problems);
  }
  return buildLayoutRegistry(value);
};

/**
 * Read and validate the layout file. Throws LayoutConfigError on any problem.
 */
export const loadLayoutRegistry = (filePath: string = DEFAULT_LAYOUTS_FILE): LayoutRegistry => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (cause) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    throw new LayoutConfigError('registry', `cannot read ${filePath}: ${reason}`);
  }
  return parseLayoutFile(parsed);
};
