import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { makeJsonFileSnapshotStore } from '@/modules/reporting/index.js';

import type { ReportSnapshot } from '@/modules/reporting/index.js';

const snapshot: ReportSnapshot = {
  date: '2026-03-09',
  teamTotals: { spend: 150, register: 25, ftd: 5 },
  agents: { ANNA: { spend: 150, register: 25, ftd: 5 } },
  timestamp: '2026-03-09T06:30:00.000Z',
};

describe('makeJsonFileSnapshotStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'report-snapshot-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads null before the first report', async () => {
    const store = makeJsonFileSnapshotStore(join(dir, 'last_report.json'));

    expect((await store.load())._unsafeUnwrap()).toBeNull();
  });

  it('reads back what it saved, creating the directory', async () => {
    const filePath = join(dir, 'state', 'last_report.json');
    const store = makeJsonFileSnapshotStore(filePath);

    expect((await store.save(snapshot)).isOk()).toBe(true);
    expect((await store.load())._unsafeUnwrap()).toEqual(snapshot);
    expect(JSON.parse(await readFile(filePath, 'utf8'))).toEqual(snapshot);
  });

  it('rejects a file that is not JSON', async () => {
    const filePath = join(dir, 'last_report.json');
    await writeFile(filePath, 'not json', 'utf8');

    const error = (await makeJsonFileSnapshotStore(filePath).load())._unsafeUnwrapErr();

    expect(error).toMatchObject({ type: 'SnapshotError', path: filePath });
    expect(error.message).toBe(`Report snapshot ${filePath} is not JSON`);
  });

  it('rejects a snapshot of the wrong shape', async () => {
    const filePath = join(dir, 'last_report.json');
    await writeFile(filePath, JSON.stringify({ date: 'yesterday' }), 'utf8');

    const error = (await makeJsonFileSnapshotStore(filePath).load())._unsafeUnwrapErr();

    expect(error.message.startsWith(`Report snapshot ${filePath} is malformed`)).toBe(true);
  });
});
