/**
 * Individual KPI totals per person, with the ratios recomputed from the
 * summed counts.
 */

import { groupSum, positiveDivide, roundTo } from './aggregate.js';

import type { IndividualKpiRecord } from '../../extraction/index.js';

export interface AdsKpiTotals {
  spend: number;
  costPhp: number;
  ftd: number;
  register: number;
  reach: number;
  impressions: number;
  clicks: number;
}

export interface AdsKpiRow extends AdsKpiTotals {
  person: string;
  ctr: number;
  cpc: number;
  cpm: number;
  cpr: number;
  cpftd: number;
  /** ftd / register × 100 */
  conversionRate: number;
}

export const ADS_KPI_ZERO: AdsKpiTotals = {
  spend: 0,
  costPhp: 0,
  ftd: 0,
  register: 0,
  reach: 0,
  impressions: 0,
  clicks: 0,
};

export const adsKpiRatios = (person: string, totals: AdsKpiTotals): AdsKpiRow => ({
  person,
  ...totals,
  ctr: roundTo(positiveDivide(totals.clicks, totals.impressions) * 100, 2),
  cpc: roundTo(positiveDivide(totals.spend, totals.clicks), 2),
  cpm: roundTo(positiveDivide(totals.spend, totals.impressions) * 1000, 2),
  cpr: roundTo(positiveDivide(totals.spend, totals.register), 2),
  cpftd: roundTo(positiveDivide(totals.spend, totals.ftd), 2),
  conversionRate: roundTo(positiveDivide(totals.ftd, totals.register) * 100, 2),
});

/** Rows sorted by spend, highest first */
export const aggregateAdsKpiByPerson = (records: readonly IndividualKpiRecord[]): AdsKpiRow[] =>
  [...groupSum(records, (record) => record.person, ADS_KPI_ZERO)]
    .map(([person, totals]) => adsKpiRatios(person, totals))
    .sort((a, b) => b.spend - a.spend);

export const totalAdsKpi = (records: readonly IndividualKpiRecord[]): AdsKpiRow =>
  adsKpiRatios('TOTAL', groupSum(records, () => 'TOTAL', ADS_KPI_ZERO).get('TOTAL') ?? ADS_KPI_ZERO);
