import { describe, expect, it } from 'vitest';

import {
  buildSnapshot,
  diffSnapshots,
  latestDayRecords,
  lowSpendAgents,
  noChangeAgents,
} from '@/modules/reporting/index.js';

import type { IndividualKpiRecord } from '@/modules/extraction/index.js';
import type { ReportSnapshot } from '@/modules/reporting/index.js';

const kpiRecord = (overrides: Partial<IndividualKpiRecord>): IndividualKpiRecord => ({
  person: 'ANNA',
  accountId: '',
  date: '2026-03-09',
  adType: '',
  spend: 0,
  costPhp: 0,
  ftd: 0,
  register: 0,
  reach: 0,
  impressions: 0,
  clicks: 0,
  ctr: 0,
  cpc: 0,
  cpm: 0,
  cpr: 0,
  cpftd: 0,
  ...overrides,
});

describe('latestDayRecords', () => {
  it('keeps the records of the most recent date', () => {
    const latest = latestDayRecords([
      kpiRecord({ date: '2026-03-08', spend: 10 }),
      kpiRecord({ date: '2026-03-09', spend: 20 }),
      kpiRecord({ date: '2026-03-09', person: 'BRUNO', spend: 30 }),
    ]);

    expect(latest?.date).toBe('2026-03-09');
    expect(latest?.records.map((record) => record.spend)).toEqual([20, 30]);
  });

  it('is null without records', () => {
    expect(latestDayRecords([])).toBeNull();
  });
});

describe('snapshots', () => {
  const current = buildSnapshot('2026-03-09', [
    kpiRecord({ spend: 100, register: 20, ftd: 4 }),
    kpiRecord({ spend: 20, register: 2 }),
    kpiRecord({ person: 'BRUNO', spend: 50, register: 5, ftd: 1 }),
    kpiRecord({ person: 'CARLA', spend: 5 }),
  ]);

  const previous: ReportSnapshot = {
    date: '2026-03-09',
    teamTotals: { spend: 160, register: 27, ftd: 5 },
    agents: {
      ANNA: { spend: 120, register: 22, ftd: 4 },
      BRUNO: { spend: 40, register: 5, ftd: 0 },
    },
    timestamp: '2026-03-09T05:00:00.000Z',
  };

  it('sums the day per agent and for the team', () => {
    expect(current).toEqual({
      date: '2026-03-09',
      teamTotals: { spend: 175, register: 27, ftd: 5 },
      agents: {
        ANNA: { spend: 120, register: 22, ftd: 4 },
        BRUNO: { spend: 50, register: 5, ftd: 1 },
        CARLA: { spend: 5, register: 0, ftd: 0 },
      },
      timestamp: '',
    });
  });

  it('diffs against the previous report, new agents against zero', () => {
    const diffs = diffSnapshots(current, previous);

    expect(diffs).toEqual({
      ANNA: { spendDiff: 0, registerDiff: 0, ftdDiff: 0, hasChange: false },
      BRUNO: { spendDiff: 10, registerDiff: 0, ftdDiff: 1, hasChange: true },
      CARLA: { spendDiff: 5, registerDiff: 0, ftdDiff: 0, hasChange: true },
    });
    expect(noChangeAgents(diffs)).toEqual(['ANNA']);
  });

  it('has no diffs for the first report', () => {
    expect(diffSnapshots(current, null)).toBeNull();
    expect(noChangeAgents(null)).toEqual([]);
  });

  it('flags agents below the spend threshold', () => {
    expect(lowSpendAgents(current, 50)).toEqual([{ agent: 'CARLA', spend: 5 }]);
  });
});
