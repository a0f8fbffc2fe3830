import { describe, expect, it } from 'vitest';

import {
  createKeyBuilder,
  createMemoryCache,
  createSilentCache,
} from '@/infra/cache/index.js';
import {
  decodeGrid,
  loadGrid,
  makeCachedSheetProvider,
  type SheetSource,
} from '@/modules/sheet-source/index.js';

import { LOG_LEVEL, makeCapturingLogger, makeSilentLogger } from '../../fixtures/builders.js';
import { makeFakeGridProvider, makeFakeSheetSource } from '../../fixtures/fakes.js';

import type { RawGrid } from '@/modules/extraction/index.js';

const grid: RawGrid = [['3/1/2026', '100']];
const fbRef = { spreadsheetId: 'roi', worksheet: 'FB Summary' };
const annaRef = { spreadsheetId: 'agents', worksheet: 'ANNA' };

const makeProvider = (source: SheetSource) => {
  const cache = createSilentCache(createMemoryCache<RawGrid>(), { logger: makeSilentLogger() });
  return makeCachedSheetProvider({ source, cache, keyBuilder: createKeyBuilder() });
};

describe('makeCachedSheetProvider', () => {
  it('reads each tab once within its lifetime', async () => {
    const source = makeFakeSheetSource({ 'FB Summary': grid });
    const provider = makeProvider(source);

    const first = await provider.fetchGrid(fbRef, 'channel');
    const second = await provider.fetchGrid(fbRef, 'channel');

    expect(first._unsafeUnwrap()).toEqual(grid);
    expect(second._unsafeUnwrap()).toEqual(grid);
    expect(source.calls).toEqual(['FB Summary']);
  });

  it('does not cache failures', async () => {
    const source = makeFakeSheetSource({}, ['FB Summary']);
    const provider = makeProvider(source);

    await provider.fetchGrid(fbRef, 'channel');
    const second = await provider.fetchGrid(fbRef, 'channel');

    expect(second._unsafeUnwrapErr().type).toBe('SheetNetworkError');
    expect(source.calls).toEqual(['FB Summary', 'FB Summary']);
  });

  it('invalidates one group without touching the others', async () => {
    const source = makeFakeSheetSource({ 'FB Summary': grid, ANNA: grid });
    const provider = makeProvider(source);
    await provider.fetchGrid(fbRef, 'channel');
    await provider.fetchGrid(annaRef, 'agent');

    const cleared = await provider.invalidate('channel');
    await provider.fetchGrid(fbRef, 'channel');
    await provider.fetchGrid(annaRef, 'agent');

    expect(cleared).toBe(1);
    expect(source.calls).toEqual(['FB Summary', 'ANNA', 'FB Summary']);
  });

  it('invalidates every group at once', async () => {
    const source = makeFakeSheetSource({ 'FB Summary': grid, ANNA: grid });
    const provider = makeProvider(source);
    await provider.fetchGrid(fbRef, 'channel');
    await provider.fetchGrid(annaRef, 'agent');

    expect(await provider.invalidate()).toBe(2);
  });
});

describe('decodeGrid', () => {
  it('accepts rows of strings only', () => {
    expect(decodeGrid([['a', 'b'], []])).toEqual([['a', 'b'], []]);
    expect(decodeGrid([['a', 1]])).toBeUndefined();
    expect(decodeGrid('a,b')).toBeUndefined();
  });
});

describe('loadGrid', () => {
  it('returns the grid on success', async () => {
    const sheets = makeFakeGridProvider(makeFakeSheetSource({ ANNA: grid }));

    const result = await loadGrid({ sheets, logger: makeSilentLogger() }, annaRef, 'agent');

    expect(result).toEqual(grid);
  });

  it('turns a failed fetch into an empty grid and a warning', async () => {
    const { logger, logs } = makeCapturingLogger();
    const sheets = makeFakeGridProvider(makeFakeSheetSource({}, ['ANNA']));

    const result = await loadGrid({ sheets, logger }, annaRef, 'agent');

    expect(result).toEqual([]);
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      level: LOG_LEVEL.warn,
      msg: "Could not load sheet 'ANNA': Timed out reading ANNA",
      worksheet: 'ANNA',
      errorType: 'SheetNetworkError',
    });
  });
});
