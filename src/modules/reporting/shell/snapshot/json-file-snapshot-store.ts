/**
 * SnapshotStore backed by one JSON file.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { err, ok } from 'neverthrow';

import { createSnapshotError } from '../../core/errors.js';

import type { SnapshotStore } from '../../core/ports.js';
import type { ReportSnapshot } from '../../core/types.js';

const SpendTotalsSchema = Type.Object({
  spend: Type.Number(),
  register: Type.Number(),
  ftd: Type.Number(),
});

export const ReportSnapshotSchema = Type.Object({
  date: Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}$' }),
  teamTotals: SpendTotalsSchema,
  agents: Type.Record(Type.String(), SpendTotalsSchema),
  timestamp: Type.String(),
});

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const makeJsonFileSnapshotStore = (filePath: string): SnapshotStore => ({
  async load() {
    let text: string;
    try {
      text = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return ok(null);
      return err(createSnapshotError(`Cannot read report snapshot ${filePath}`, filePath, error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      return err(createSnapshotError(`Report snapshot ${filePath} is not JSON`, filePath, error));
    }

    if (!Value.Check(ReportSnapshotSchema, parsed)) {
      const first = Value.Errors(ReportSnapshotSchema, parsed).First();
      const detail = first === undefined ? '' : `: ${first.path} ${first.message}`;
      return err(createSnapshotError(`Report snapshot ${filePath} is malformed${detail}`, filePath));
    }
    return ok(parsed);
  },

  async save(snapshot: ReportSnapshot) {
    // Written beside the target and renamed over it
    const tempPath = `${filePath}.tmp`;
    try {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
      await rename(tempPath, filePath);
      return ok(undefined);
    } catch (error) {
      return err(createSnapshotError(`Cannot write report snapshot ${filePath}`, filePath, error));
    }
  },
});
