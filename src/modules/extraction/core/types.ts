/**
 * Extraction Module - Core Types
 *
 * Record shapes produced by the sheet extractors. Every dated record carries
 * an ISO `YYYY-MM-DD` date.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Raw input
// ─────────────────────────────────────────────────────────────────────────────

/** Calendar date as `YYYY-MM-DD` */
export type IsoDate = string;

export type RawRow = readonly string[];

/** Rows × columns of raw cell text, as fetched. Rows may be short. */
export type RawGrid = readonly RawRow[];

/**
 * Per-call inputs that are not in the grid.
 */
export interface ExtractionContext {
  /** Fallback date for sheets that have not supplied one yet; also the reference year */
  today: IsoDate;
}

// ─────────────────────────────────────────────────────────────────────────────
// Channel ROI
// ─────────────────────────────────────────────────────────────────────────────

export type Channel = 'Facebook' | 'Google';

export type RoiSection = 'daily_roi' | 'roll_back' | 'violet';

export interface ChannelRoiRecord {
  date: IsoDate;
  channel: Channel;
  section: RoiSection;
  cost: number;
  register: number;
  ftd: number;
  ftdRecharge: number;
  avgRecharge: number;
  conversionRatio: number;
  cpr: number;
  cpftd: number;
  roas: number;
  cpm: number;
  /** Same figure as ftdRecharge; aggregations sum this one */
  depositAmount: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Agent sheets
// ─────────────────────────────────────────────────────────────────────────────

export interface RunningAdsRecord {
  agent: string;
  date: IsoDate;
  amountSpent: number;
  totalAd: number;
  campaign: string;
  impressions: number;
  clicks: number;
  ctrPercent: number;
  cpc: number;
  cpr: number;
  conversionRate: number;
  rejectedCount: number;
  deletedCount: number;
  activeCount: number;
  remarks: string;
}

export interface CreativeRecord {
  agent: string;
  date: IsoDate;
  folder: string;
  type: string;
  /** Daily total, repeated on every row of the day */
  total: number;
  content: string;
  caption: string;
  remarks: string;
}

export interface SmsRecord {
  agent: string;
  date: IsoDate;
  smsType: string;
  /** Daily total, repeated on every row of the day */
  total: number;
  remarks: string;
}

export type ContentSource = 'Agent Sheet' | 'Indian Promotion';

export interface ContentRecord {
  agent: string;
  date: IsoDate;
  contentType: string;
  primaryContent: string;
  condition: string;
  status: string;
  primaryAdjustment: string;
  remarks: string;
  source: ContentSource;
}

// ─────────────────────────────────────────────────────────────────────────────
// Individual KPI (per-person ad spend)
// ─────────────────────────────────────────────────────────────────────────────

export interface IndividualKpiRecord {
  person: string;
  accountId: string;
  date: IsoDate;
  adType: string;
  spend: number;
  costPhp: number;
  ftd: number;
  register: number;
  reach: number;
  impressions: number;
  clicks: number;
  ctr: number;
  cpc: number;
  cpm: number;
  cpr: number;
  cpftd: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Sectioned sheets (overall block followed by daily blocks)
// ─────────────────────────────────────────────────────────────────────────────

export interface SectionedRecords<TRow> {
  overall: TRow[];
  daily: (TRow & { date: IsoDate })[];
}

export interface CounterpartRow {
  channel: Channel;
  channelSource: string;
  firstRecharge: number;
  totalAmount: number;
  arppu: number;
  spending: number;
  costPerRecharge: number;
  roas: number;
}

export interface TeamChannelRow {
  team: string;
  channelSource: string;
  cost: number;
  registrations: number;
  firstRecharge: number;
  totalAmount: number;
  arppu: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Agent performance tabs
// ─────────────────────────────────────────────────────────────────────────────

export interface AgentTabFigures {
  channel: string;
  cost: number;
  register: number;
  cpr: number;
  ftd: number;
  cpd: number;
  conversionRate: number;
  impressions: number;
  clicks: number;
  ctr: number;
  arppu: number;
  roas: number;
}

export interface AgentTabMonthlyRow extends AgentTabFigures {
  agent: string;
  /** Month label as typed in the sheet, e.g. `February` */
  month: string;
}

export interface AgentTabDailyRecord extends AgentTabFigures {
  agent: string;
  date: IsoDate;
}

export interface AgentTabRecords {
  monthly: AgentTabMonthlyRow[];
  daily: AgentTabDailyRecord[];
}
