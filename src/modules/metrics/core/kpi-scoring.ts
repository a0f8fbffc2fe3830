/**
 * Agent KPI scoring from the performance tabs.
 *
 * Each metric maps to a score of 1–4 through ordered bands; a metric with
 * no data (value 0) scores 0. Thresholds and weights come from
 * `config/kpi-scoring.json`.
 */

import { readFileSync } from 'node:fs';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import { positiveDivide, roundTo, sumFields } from './aggregate.js';

import type { AgentTabFigures, AgentTabRecords } from '../../extraction/index.js';

export const DEFAULT_KPI_SCORING_FILE = 'config/kpi-scoring.json';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

const ScoreBand = Type.Object(
  {
    score: Type.Integer({ minimum: 1, maximum: 4 }),
    bound: Type.Number(),
  },
  { additionalProperties: false }
);

const MetricScoring = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    weight: Type.Number({ minimum: 0, maximum: 1 }),
    direction: Type.Union([Type.Literal('lower_better'), Type.Literal('higher_better')]),
    bands: Type.Array(ScoreBand, { minItems: 1 }),
  },
  { additionalProperties: false }
);

export const KpiScoringSchema = Type.Object(
  {
    phpUsdRate: Type.Number({ exclusiveMinimum: 0 }),
    metrics: Type.Object(
      { cpa: MetricScoring, roas: MetricScoring, cvr: MetricScoring, ctr: MetricScoring },
      { additionalProperties: false }
    ),
  },
  { additionalProperties: false }
);

export type KpiScoring = Static<typeof KpiScoringSchema>;
export type MetricScoring = Static<typeof MetricScoring>;
export type KpiMetric = keyof KpiScoring['metrics'];

export const KPI_METRICS: readonly KpiMetric[] = ['cpa', 'roas', 'cvr', 'ctr'];

export const parseKpiScoring = (value: unknown): KpiScoring => {
  if (!Value.Check(KpiScoringSchema, value)) {
    const problems = [...Value.Errors(KpiScoringSchema, value)]
      .map((e) => `${e.path}: ${e.message}`)
      .join(', ');
    throw new Error(`Invalid KPI scoring: ${problems}`);
  }
  return value;
};

export const loadKpiScoring = (filePath: string = DEFAULT_KPI_SCORING_FILE): KpiScoring => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (cause) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    throw new Error(`Cannot read KPI scoring ${filePath}: ${reason}`);
  }
  return parseKpiScoring(parsed);
};

// ─────────────────────────────────────────────────────────────────────────────
// Scoring
// ─────────────────────────────────────────────────────────────────────────────

export interface MetricScore {
  value: number;
  score: number;
  weighted: number;
}

export interface AgentKpiScore {
  agent: string;
  /** Which rows the figures came from */
  basis: 'daily' | 'monthly' | 'none';
  cost: number;
  register: number;
  ftd: number;
  metrics: Record<KpiMetric, MetricScore>;
  weightedTotal: number;
}

/**
 * Score for one metric value. Bands are read in order: the first bound the
 * value satisfies wins, otherwise the score is 1.
 */
export const scoreMetric = (value: number, scoring: MetricScoring): number => {
  if (value === 0) return 0;
  const band = scoring.bands.find((candidate) =>
    scoring.direction === 'lower_better' ? value <= candidate.bound : value >= candidate.bound
  );
  return band?.score ?? 1;
};

const FIGURES_ZERO = { cost: 0, register: 0, ftd: 0, impressions: 0, clicks: 0, arppuRevenue: 0 };

/** Raw KPI values: cpa, roas, cvr and ctr */
export const kpiValues = (
  rows: readonly AgentTabFigures[],
  phpUsdRate: number
): { totals: typeof FIGURES_ZERO; values: Record<KpiMetric, number> } => {
  // ARPPU is averaged weighted by FTD
  const totals = sumFields(
    rows.map((row) => ({ ...row, arppuRevenue: row.arppu * row.ftd })),
    FIGURES_ZERO
  );
  const cpa = positiveDivide(totals.cost, totals.ftd);
  const arppu = positiveDivide(totals.arppuRevenue, totals.ftd);
  return {
    totals,
    values: {
      cpa: roundTo(cpa, 2),
      roas: roundTo(positiveDivide(arppu / phpUsdRate, cpa), 4),
      cvr: roundTo(positiveDivide(totals.ftd, totals.register) * 100, 2),
      ctr: roundTo(positiveDivide(totals.clicks, totals.impressions) * 100, 2),
    },
  };
};

/**
 * Score one agent. Daily records are preferred; the monthly summary rows are
 * used when the tab has no daily block.
 */
export const scoreAgentKpi = (
  agent: string,
  records: AgentTabRecords,
  scoring: KpiScoring
): AgentKpiScore => {
  const basis = records.daily.length > 0 ? 'daily' : records.monthly.length > 0 ? 'monthly' : 'none';
  const rows: readonly AgentTabFigures[] = basis === 'daily' ? records.daily : records.monthly;
  const { totals, values } = kpiValues(rows, scoring.phpUsdRate);

  const scoreOf = (metric: KpiMetric): MetricScore => {
    const config = scoring.metrics[metric];
    const score = scoreMetric(values[metric], config);
    return { value: values[metric], score, weighted: roundTo(score * config.weight, 3) };
  };
  const metrics: Record<KpiMetric, MetricScore> = {
    cpa: scoreOf('cpa'),
    roas: scoreOf('roas'),
    cvr: scoreOf('cvr'),
    ctr: scoreOf('ctr'),
  };

  return {
    agent,
    basis,
    cost: totals.cost,
    register: totals.register,
    ftd: totals.ftd,
    metrics,
    weightedTotal: roundTo(
      KPI_METRICS.reduce((sum, metric) => sum + metrics[metric].weighted, 0),
      3
    ),
  };
};
