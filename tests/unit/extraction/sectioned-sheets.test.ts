import { describe, expect, it } from 'vitest';

import {
  extractCounterpart,
  extractTeamChannel,
  scanSectionedSheet,
} from '@/modules/extraction/index.js';

import { row, testLayouts } from '../../fixtures/builders.js';

const ctx = { today: '2026-03-10' };

describe('sectioned sheets', () => {
  const layouts = testLayouts();

  describe('scanSectionedSheet', () => {
    it('moves from overall to daily sections and never back', () => {
      const grid = [
        ['', 'OVERALL PERFORMANCE'],
        ['', 'Source A'],
        ['', 'January 27'],
        ['', 'OVERALL PERFORMANCE'],
        ['', 'Source B'],
        ['', 'CHANNEL SOURCE'],
        ['', 'Jan 28'],
        ['', 'Source C'],
      ];

      const rows = scanSectionedSheet(grid, {
        startRow: 0,
        band: { from: 1, to: 1 },
        labelColumn: 1,
        referenceYear: 2026,
      });

      expect(rows.map(({ row: cells, state }) => [cells[1], state])).toEqual([
        ['Source A', { kind: 'overall' }],
        ['Source B', { kind: 'daily', date: '2026-01-27' }],
        ['Source C', { kind: 'daily', date: '2026-01-28' }],
      ]);
    });
  });

  describe('extractCounterpart', () => {
    const WIDTH = 16;
    const grid = [
      row(WIDTH, {}),
      row(WIDTH, {}),
      row(WIDTH, {}),
      row(WIDTH, { 1: 'OVERALL PERFORMANCE', 9: 'OVERALL PERFORMANCE' }),
      row(WIDTH, { 1: 'Channel Source', 2: 'First Recharge', 9: 'Channel Source' }),
      row(WIDTH, {
        1: 'Meta Ads',
        2: '10',
        3: '5,000',
        4: '500',
        5: '2,000',
        6: '200',
        7: '0.04',
        9: 'Search',
        10: '4',
        11: '1,000',
        12: '250',
        13: '800',
        14: '200',
        15: '0.02',
      }),
      row(WIDTH, { 1: 'March 8' }),
      row(WIDTH, { 1: 'Meta Ads', 2: '3', 3: '1,500', 5: '600' }),
      row(WIDTH, { 1: 'TOTAL', 2: '13' }),
      row(WIDTH, { 1: 'Mar 9, 2026' }),
      row(WIDTH, { 1: 'Meta Ads', 2: '0', 3: '0' }),
    ];

    it('splits the FB band into overall and daily rows', () => {
      const records = extractCounterpart(
        grid,
        {
          channel: 'Facebook',
          layout: layouts.counterpart.sections.Facebook,
          startRow: layouts.counterpart.startRow,
        },
        ctx
      );

      expect(records.overall).toEqual([
        {
          channel: 'Facebook',
          channelSource: 'Meta Ads',
          firstRecharge: 10,
          totalAmount: 5000,
          arppu: 500,
          spending: 2000,
          costPerRecharge: 200,
          roas: 0.04,
        },
      ]);
      expect(records.daily).toEqual([
        {
          channel: 'Facebook',
          channelSource: 'Meta Ads',
          firstRecharge: 3,
          totalAmount: 1500,
          arppu: 0,
          spending: 600,
          costPerRecharge: 0,
          roas: 0,
          date: '2026-03-08',
        },
      ]);
    });

    it('reads the Google band from its own columns', () => {
      const records = extractCounterpart(
        grid,
        {
          channel: 'Google',
          layout: layouts.counterpart.sections.Google,
          startRow: layouts.counterpart.startRow,
        },
        ctx
      );

      expect(records.overall.map((record) => [record.channelSource, record.spending])).toEqual([
        ['Search', 800],
      ]);
      expect(records.daily).toEqual([]);
    });
  });

  describe('extractTeamChannel', () => {
    const WIDTH = 8;

    it('carries the team name within a section only', () => {
      const grid = [
        row(WIDTH, {}),
        row(WIDTH, {}),
        row(WIDTH, {}),
        row(WIDTH, {}),
        row(WIDTH, { 1: 'OVERALL PERFORMANCE' }),
        row(WIDTH, { 1: 'TEAM', 2: 'CHANNEL SOURCE' }),
        row(WIDTH, { 1: 'Alpha', 2: 'FB', 3: '1,000', 4: '50', 5: '10', 6: '3,000', 7: '300' }),
        row(WIDTH, { 2: 'Google', 3: '500', 4: '20', 5: '5', 6: '1,000', 7: '200' }),
        row(WIDTH, { 1: 'March 9' }),
        row(WIDTH, { 2: 'FB', 3: '200', 4: '10', 5: '2', 6: '400', 7: '200' }),
        row(WIDTH, { 1: 'Beta', 2: 'FB', 3: '100', 4: '5', 5: '1', 6: '150', 7: '150' }),
      ];

      const records = extractTeamChannel(
        grid,
        { layout: layouts.teamChannel.layout, startRow: layouts.teamChannel.startRow },
        ctx
      );

      expect(records.overall.map((record) => [record.team, record.channelSource])).toEqual([
        ['Alpha', 'FB'],
        ['Alpha', 'Google'],
      ]);
      expect(records.overall[0]).toEqual({
        team: 'Alpha',
        channelSource: 'FB',
        cost: 1000,
        registrations: 50,
        firstRecharge: 10,
        totalAmount: 3000,
        arppu: 300,
      });
      expect(records.daily.map((record) => [record.team, record.date, record.cost])).toEqual([
        ['', '2026-03-09', 200],
        ['Beta', '2026-03-09', 100],
      ]);
    });
  });
});
