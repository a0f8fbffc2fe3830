/**
 * Cache key generation with namespaces for targeted invalidation.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Namespaces
// ─────────────────────────────────────────────────────────────────────────────

/** Parent namespace of every fetched sheet; clearing it drops all sheet grids */
export const SHEETS_NAMESPACE_ROOT = 'sheets';

export const CacheNamespace = {
  /** FB / Google channel summary sheets (Daily ROI, Roll Back, Violet) */
  SHEETS_CHANNEL: 'sheets:channel',
  /** Per-agent performance and content tabs, Indian promotion */
  SHEETS_AGENT: 'sheets:agent',
  /** INDIVIDUAL KPI ad-spend sheet */
  SHEETS_ADS: 'sheets:ads',
  /** Counterpart and Team Channel sheets */
  SHEETS_PARTNER: 'sheets:partner',
  /** P-tabs with monthly and daily agent figures */
  SHEETS_AGENT_TABS: 'sheets:agent-tabs',
} as const;

export type CacheNamespace = (typeof CacheNamespace)[keyof typeof CacheNamespace];

// ─────────────────────────────────────────────────────────────────────────────
// Key Builder
// ─────────────────────────────────────────────────────────────────────────────

export interface KeyBuilder {
  /** Format: `{globalPrefix}:{namespace}:{identifier}` */
  build(namespace: CacheNamespace, identifier: string): string;

  /** Format: `{globalPrefix}:{namespace}:` */
  getPrefix(namespace: CacheNamespace | typeof SHEETS_NAMESPACE_ROOT): string;

  getGlobalPrefix(): string;
}

export interface KeyBuilderOptions {
  /** Global prefix for all keys. Defaults to 'adops'. */
  globalPrefix?: string;
}

export const createKeyBuilder = (options: KeyBuilderOptions = {}): KeyBuilder => {
  const globalPrefix = options.globalPrefix ?? 'adops';

  return {
    build(namespace, identifier) {
      return `${globalPrefix}:${namespace}:${identifier}`;
    },

    getPrefix(namespace) {
      return `${globalPrefix}:${namespace}:`;
    },

    getGlobalPrefix() {
      return globalPrefix;
    },
  };
};
