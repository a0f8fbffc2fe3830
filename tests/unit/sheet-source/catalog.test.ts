import { describe, expect, it } from 'vitest';

import {
  agentContentRef,
  agentPerformanceRef,
  agentTabRef,
  channelRoiRef,
  findAgent,
  isSheetGroup,
  loadSheetCatalog,
  padGrid,
  parseSheetCatalog,
  refId,
  sheetTabRef,
} from '@/modules/sheet-source/index.js';

describe('sheet catalog', () => {
  const catalog = loadSheetCatalog();

  it('loads the shipped catalog', () => {
    expect(catalog.agents.map((agent) => agent.name)).toEqual([
      'ANNA',
      'BRUNO',
      'CARLA',
      'DANTE',
      'ELISE',
    ]);
    expect(catalog.individualKpi.excludedPersons).toEqual(['TRAINEE']);
  });

  it('finds agents case-insensitively', () => {
    const agent = findAgent(catalog, ' bruno ');

    expect(agent?.name).toBe('BRUNO');
    expect(findAgent(catalog, 'nobody')).toBeUndefined();
  });

  it('builds refs for agent sheets', () => {
    const agent = findAgent(catalog, 'carla');
    if (agent === undefined) throw new Error('CARLA missing from catalog');

    expect(agentPerformanceRef(catalog, agent)).toEqual({
      spreadsheetId: 'agent-sheets-spreadsheet-id',
      worksheet: 'CARLA',
    });
    expect(agentContentRef(catalog, agent)).toEqual({
      spreadsheetId: 'agent-sheets-spreadsheet-id',
      worksheet: 'Carla content',
    });
  });

  it('keeps the gid only where the catalog has one', () => {
    expect(channelRoiRef(catalog, 'Google')).toEqual({
      spreadsheetId: 'channel-roi-spreadsheet-id',
      worksheet: 'Google Summary',
    });
    expect(sheetTabRef(catalog.indianPromotion)).toEqual({
      spreadsheetId: 'indian-promotion-spreadsheet-id',
      worksheet: 'Indian Promotion',
      gid: 100,
    });
  });

  it('resolves P-tabs by agent', () => {
    expect(agentTabRef(catalog, 'bruno')).toEqual({
      spreadsheetId: 'agent-tabs-spreadsheet-id',
      worksheet: 'P2-Bruno',
      gid: 302,
    });
    expect(agentTabRef(catalog, 'TRAINEE')).toBeUndefined();
  });

  it('rejects an invalid catalog', () => {
    expect(() => parseSheetCatalog({ agents: [] })).toThrow(/^Invalid sheet catalog: /);
  });
});

describe('sheet refs and grids', () => {
  it('identifies a tab by gid when known', () => {
    expect(refId({ spreadsheetId: 'abc', worksheet: 'ANNA' })).toBe('abc:ANNA');
    expect(refId({ spreadsheetId: 'abc', worksheet: 'ANNA', gid: 7 })).toBe('abc:gid=7');
  });

  it('recognises sheet groups', () => {
    expect(isSheetGroup('agent-tabs')).toBe(true);
    expect(isSheetGroup('agents')).toBe(false);
  });

  it('pads rows to the widest one', () => {
    expect(padGrid([['a'], ['b', 'c', 'd'], []])).toEqual([
      ['a', '', ''],
      ['b', 'c', 'd'],
      ['', '', ''],
    ]);
  });
});
