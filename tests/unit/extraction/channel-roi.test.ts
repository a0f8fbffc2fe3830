import { describe, expect, it } from 'vitest';

import { extractChannelRoi } from '@/modules/extraction/index.js';

import { blankRows, row, testLayouts } from '../../fixtures/builders.js';

const WIDTH = 32;

describe('extractChannelRoi', () => {
  const layouts = testLayouts();
  const facebook = layouts.channelRoi.Facebook;

  const grid = [
    ...blankRows(4, WIDTH),
    row(WIDTH, {
      1: '3/1/2026',
      2: '$1,000.00',
      3: '50',
      4: '10',
      5: '2,500',
      6: '250',
      7: '20%',
      8: '20',
      9: '100',
      10: '2.5',
      11: '15',
      25: '3/1/2026',
      26: '4',
      27: '800',
      29: '200',
    }),
    row(WIDTH, { 1: '3/2/2026', 2: '0', 3: '0' }),
    row(WIDTH, { 1: 'TOTAL', 2: '5000' }),
    row(WIDTH, { 1: '3/3/2026', 2: '300', 3: '12.7' }),
    ['3/4/2026', '900'],
  ];

  it('reads the daily ROI band with its own dates', () => {
    const records = extractChannelRoi(grid, {
      channel: 'Facebook',
      section: 'daily_roi',
      layout: facebook.sections.daily_roi,
      startRow: facebook.startRow,
    });

    expect(records).toHaveLength(2);
    expect(records[0]).toEqual({
      date: '2026-03-01',
      channel: 'Facebook',
      section: 'daily_roi',
      cost: 1000,
      register: 50,
      ftd: 10,
      ftdRecharge: 2500,
      avgRecharge: 250,
      conversionRatio: 20,
      cpr: 20,
      cpftd: 100,
      roas: 2.5,
      cpm: 15,
      depositAmount: 2500,
    });
  });

  it('skips rows without figures, undated rows and short rows', () => {
    const records = extractChannelRoi(grid, {
      channel: 'Facebook',
      section: 'daily_roi',
      layout: facebook.sections.daily_roi,
      startRow: facebook.startRow,
    });

    expect(records.map((record) => record.date)).toEqual(['2026-03-01', '2026-03-03']);
    expect(records[1]?.register).toBe(12);
  });

  it('reads sections that lack some columns as zero', () => {
    const records = extractChannelRoi(grid, {
      channel: 'Facebook',
      section: 'violet',
      layout: facebook.sections.violet,
      startRow: facebook.startRow,
    });

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      section: 'violet',
      cost: 200,
      register: 0,
      ftd: 4,
      ftdRecharge: 800,
      depositAmount: 800,
      cpm: 0,
    });
  });
});
