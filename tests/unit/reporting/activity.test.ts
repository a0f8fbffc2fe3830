import { describe, expect, it } from 'vitest';

import {
  computeActivityStats,
  computeWeeklyStats,
  dailyTotalsByAgent,
  formatActivityReport,
  formatWeeklyReport,
} from '@/modules/reporting/index.js';

import type { ContentRecord, CreativeRecord, SmsRecord } from '@/modules/extraction/index.js';

const creative = (agent: string, date: string, total: number): CreativeRecord => ({
  agent,
  date,
  folder: '',
  type: 'Image',
  total,
  content: '',
  caption: '',
  remarks: '',
});

const sms = (agent: string, date: string, total: number): SmsRecord => ({
  agent,
  date,
  smsType: 'Promo',
  total,
  remarks: '',
});

const content = (agent: string, date: string, contentType: string): ContentRecord => ({
  agent,
  date,
  contentType,
  primaryContent: 'Text',
  condition: '',
  status: '',
  primaryAdjustment: '',
  remarks: '',
  source: 'Agent Sheet',
});

describe('dailyTotalsByAgent', () => {
  it('counts a repeated daily total once', () => {
    const totals = dailyTotalsByAgent(
      [creative('ANNA', '2026-03-09', 4), creative('ANNA', '2026-03-09', 4), creative('ANNA', '2026-03-10', 2)],
      '2026-03-09',
      '2026-03-09'
    );

    expect([...totals]).toEqual([['ANNA', 4]]);
  });
});

describe('computeActivityStats', () => {
  const stats = computeActivityStats(
    ['ANNA', 'CARLA'],
    {
      creative: [
        creative('ANNA', '2026-03-09', 4),
        creative('ANNA', '2026-03-09', 4),
        creative('ANNA', '2026-03-05', 3),
        creative('ANNA', '2026-03-02', 10),
        creative('BRUNO', '2026-03-08', 7),
      ],
      sms: [],
      content: [
        content('ANNA', '2026-03-09', 'Primary Text'),
        content('ANNA', '2026-03-09', 'Primary Text'),
        content('ANNA', '2026-03-09', 'Headline'),
        content('CARLA', '2026-03-08', 'Primary Text'),
      ],
    },
    '2026-03-09'
  );

  it('compares the day with the seven-day average for every agent', () => {
    expect(stats.creative).toEqual([
      { agent: 'ANNA', day: 4, average: 1 },
      { agent: 'BRUNO', day: 0, average: 1 },
      { agent: 'CARLA', day: 0, average: 0 },
    ]);
    expect(stats.sms.map((line) => line.day)).toEqual([0, 0, 0]);
  });

  it('counts Primary Text written on the day', () => {
    expect(stats.copywriting).toEqual([{ agent: 'ANNA', count: 2 }]);
  });

  it('formats aligned tables', () => {
    const lines = formatActivityReport(stats).split('\n');

    expect(lines[0]).toBe('📊 <b>T+1 Activity Report</b> - Mar 09, 2026');
    expect(lines).toContain('ANNA           4     1.0      +3');
    expect(lines).toContain('BRUNO          0     1.0      -1');
    expect(lines).toContain('TOTAL          4     2.0      +2</pre>');
    expect(lines).toContain('ANNA           2');
    expect(lines.at(-1)).toBe('TOTAL          2</pre>');
  });

  it('leaves out the copywriting table when nothing was written', () => {
    const text = formatActivityReport({ ...stats, copywriting: [] });

    expect(text).not.toContain('COPYWRITING');
  });
});

describe('computeWeeklyStats', () => {
  const stats = computeWeeklyStats(
    ['ANNA', 'CARLA'],
    {
      creative: [
        creative('ANNA', '2026-03-09', 4),
        creative('ANNA', '2026-03-09', 4),
        creative('ANNA', '2026-03-04', 3),
        creative('ANNA', '2026-03-03', 10),
        creative('BRUNO', '2026-03-10', 7),
        creative('DANTE', '2026-03-01', 5),
      ],
      sms: [sms('CARLA', '2026-03-05', 20), sms('CARLA', '2026-03-05', 20)],
      content: [
        content('ANNA', '2026-03-09', 'Primary Text'),
        content('DANTE', '2026-03-03', 'Primary Text'),
        content('CARLA', '2026-03-10', 'Headline'),
      ],
    },
    '2026-03-10'
  );

  it('sums each daily total once over the seven days ending on the date', () => {
    expect(stats.from).toBe('2026-03-04');
    expect(stats.creative).toEqual([
      { agent: 'ANNA', total: 7, daily: 1 },
      { agent: 'BRUNO', total: 7, daily: 1 },
      { agent: 'CARLA', total: 0, daily: 0 },
    ]);
    expect(stats.sms.map((line) => [line.agent, line.total])).toEqual([
      ['ANNA', 0],
      ['BRUNO', 0],
      ['CARLA', 20],
    ]);
    expect(stats.sms[2]?.daily).toBeCloseTo(20 / 7);
  });

  it('counts Primary Text written within the week', () => {
    expect(stats.copywriting).toEqual([{ agent: 'ANNA', count: 1 }]);
  });

  it('formats total and daily columns with a team row', () => {
    const lines = formatWeeklyReport(stats).split('\n');

    expect(lines[0]).toBe('📊 <b>Weekly Activity Report</b>');
    expect(lines[1]).toBe('<i>Mar 04 - Mar 10, 2026</i>');
    expect(lines).toContain('<pre>Name        Total  Daily');
    expect(lines).toContain('ANNA            7    1.0');
    expect(lines).toContain('TOTAL          14    2.0</pre>');
    expect(lines).toContain('CARLA          20    2.9');
    expect(lines).toContain('TOTAL          20    2.9</pre>');
    expect(lines.at(-1)).toBe('TOTAL          1</pre>');
  });
});
