import { describe, expect, it } from 'vitest';

import {
  extractCreativeWork,
  extractRunningAds,
  extractSmsWork,
} from '@/modules/extraction/index.js';

import { row, testLayouts } from '../../fixtures/builders.js';

const WIDTH = 23;
const ctx = { today: '2026-03-10' };

describe('agent performance sheet', () => {
  const { agentSheet } = testLayouts();

  describe('extractRunningAds', () => {
    const grid = [
      row(WIDTH, { 0: 'DATE', 1: 'AMOUNT SPENT' }),
      row(WIDTH, {
        0: '3/8',
        1: '$120.50',
        2: '5',
        3: 'Spring push',
        4: '10,000',
        5: '250',
        6: '2.5%',
        7: '0.48',
        8: '6.03',
        9: '4',
        10: '1',
        11: '0',
        12: '4',
        13: 'ok',
      }),
      row(WIDTH, { 0: '3/9' }),
      row(WIDTH, { 1: '50' }),
      row(WIDTH, { 0: 'DATE', 1: '9' }),
    ];

    it('reads dated rows that carry a campaign or a figure', () => {
      const records = extractRunningAds(
        grid,
        { agent: 'anna', layout: agentSheet.runningAds, startRow: agentSheet.startRow },
        ctx
      );

      expect(records).toEqual([
        {
          agent: 'ANNA',
          date: '2026-03-08',
          amountSpent: 120.5,
          totalAd: 5,
          campaign: 'Spring push',
          impressions: 10000,
          clicks: 250,
          ctrPercent: 2.5,
          cpc: 0.48,
          cpr: 6.03,
          conversionRate: 4,
          rejectedCount: 1,
          deletedCount: 0,
          activeCount: 4,
          remarks: 'ok',
        },
      ]);
    });

    it('reads counts typed with a unit', () => {
      const records = extractRunningAds(
        [row(WIDTH, {}), row(WIDTH, { 0: '3/9', 2: '12 ads', 5: '40 clicks' })],
        { agent: 'anna', layout: agentSheet.runningAds, startRow: agentSheet.startRow },
        ctx
      );

      expect(records).toHaveLength(1);
      expect(records[0]?.totalAd).toBe(12);
      expect(records[0]?.clicks).toBe(40);
    });
  });

  describe('extractCreativeWork', () => {
    const input = { agent: 'Bruno', layout: agentSheet.creative, startRow: agentSheet.startRow };

    it('carries date, folder, type and total over merged rows', () => {
      const grid = [
        row(WIDTH, {}),
        row(WIDTH, {
          0: '3/8',
          14: 'spring FOLDER',
          15: 'video',
          16: '3 Videos & 2 Banners',
          17: 'clip-1',
          18: 'Cap one',
        }),
        row(WIDTH, { 17: 'clip-2' }),
        row(WIDTH, { 0: '3/9', 15: 'banner', 16: '0', 17: 'banner-1' }),
        row(WIDTH, { 0: '3/10' }),
      ];

      const records = extractCreativeWork(grid, input, ctx);

      expect(records).toEqual([
        {
          agent: 'BRUNO',
          date: '2026-03-08',
          folder: 'Spring Folder',
          type: 'VIDEO',
          total: 5,
          content: 'clip-1',
          caption: 'Cap one',
          remarks: '',
        },
        {
          agent: 'BRUNO',
          date: '2026-03-08',
          folder: 'Spring Folder',
          type: 'VIDEO',
          total: 5,
          content: 'clip-2',
          caption: '',
          remarks: '',
        },
        {
          agent: 'BRUNO',
          date: '2026-03-09',
          folder: 'Spring Folder',
          type: 'BANNER',
          total: 0,
          content: 'banner-1',
          caption: '',
          remarks: '',
        },
      ]);
    });

    it('dates content typed before any date with today', () => {
      const grid = [row(WIDTH, {}), row(WIDTH, { 17: 'orphan' })];

      const records = extractCreativeWork(grid, input, ctx);

      expect(records).toHaveLength(1);
      expect(records[0]?.date).toBe('2026-03-10');
    });
  });

  describe('extractSmsWork', () => {
    it('keeps rows of days with a positive total', () => {
      const grid = [
        row(WIDTH, {}),
        row(WIDTH, { 0: '3/8', 20: 'promo blast', 21: '300' }),
        row(WIDTH, { 20: 'reminder' }),
        row(WIDTH, { 0: '3/9', 20: 'promo', 21: '0' }),
        row(WIDTH, { 20: 'late' }),
      ];

      const records = extractSmsWork(
        grid,
        { agent: 'carla', layout: agentSheet.sms, startRow: agentSheet.startRow },
        ctx
      );

      expect(records).toEqual([
        { agent: 'CARLA', date: '2026-03-08', smsType: 'Promo Blast', total: 300, remarks: '' },
        { agent: 'CARLA', date: '2026-03-08', smsType: 'Reminder', total: 300, remarks: '' },
      ]);
    });

    it('reads a total typed with a unit', () => {
      const records = extractSmsWork(
        [row(WIDTH, {}), row(WIDTH, { 0: '3/8', 20: 'promo', 21: '15 SMS' })],
        { agent: 'carla', layout: agentSheet.sms, startRow: agentSheet.startRow },
        ctx
      );

      expect(records).toEqual([
        { agent: 'CARLA', date: '2026-03-08', smsType: 'Promo', total: 15, remarks: '' },
      ]);
    });
  });
});
