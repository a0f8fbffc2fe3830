/**
 * Read-through cache in front of a SheetSource.
 *
 * Grids are cached per tab under the namespace of their group, each group
 * with its own lifetime. Failed fetches are never cached.
 */

import {
  CacheNamespace,
  SHEETS_NAMESPACE_ROOT,
  withCacheResult,
  type CacheDecoder,
  type KeyBuilder,
  type SilentCachePort,
} from '../../../../infra/cache/index.js';
import {
  SHEET_GROUP_TTL_MS,
  isRawGrid,
  refId,
  type SheetGroup,
  type SheetRef,
} from '../../core/types.js';

import type { SheetGridProvider, SheetSource } from '../../core/ports.js';
import type { RawGrid } from '../../../extraction/index.js';

export const SHEET_GROUP_NAMESPACE: Readonly<Record<SheetGroup, CacheNamespace>> = {
  channel: CacheNamespace.SHEETS_CHANNEL,
  agent: CacheNamespace.SHEETS_AGENT,
  ads: CacheNamespace.SHEETS_ADS,
  partner: CacheNamespace.SHEETS_PARTNER,
  'agent-tabs': CacheNamespace.SHEETS_AGENT_TABS,
};

/** Grids read back from an out-of-process cache */
export const decodeGrid: CacheDecoder<RawGrid> = (value) => (isRawGrid(value) ? value : undefined);

export interface CachedSheetProviderDeps {
  source: SheetSource;
  cache: SilentCachePort<RawGrid>;
  keyBuilder: KeyBuilder;
  /** Per-group overrides of the default lifetimes */
  ttlMs?: Partial<Record<SheetGroup, number>>;
}

export const makeCachedSheetProvider = (deps: CachedSheetProviderDeps): SheetGridProvider => {
  const { source, cache, keyBuilder } = deps;
  const ttlFor = (group: SheetGroup): number => deps.ttlMs?.[group] ?? SHEET_GROUP_TTL_MS[group];

  const fetchGrid = withCacheResult(
    (ref: SheetRef, _group: SheetGroup) => source.fetchGrid(ref),
    cache,
    {
      ttlMs: ([, group]) => ttlFor(group),
      keyGenerator: ([ref, group]) => keyBuilder.build(SHEET_GROUP_NAMESPACE[group], refId(ref)),
    }
  );

  return {
    fetchGrid,

    invalidate(group?: SheetGroup) {
      const prefix =
        group === undefined
          ? keyBuilder.getPrefix(SHEETS_NAMESPACE_ROOT)
          : keyBuilder.getPrefix(SHEET_GROUP_NAMESPACE[group]);
      return cache.clearByPrefix(prefix);
    },
  };
};
