/**
 * Dashboard Module - Core Types
 */

import type { Channel, IsoDate, RoiSection } from '../../extraction/index.js';

/** Inclusive date range; either end may be open */
export interface DateRange {
  from?: IsoDate;
  to?: IsoDate;
}

/** URL slug → channel */
export const CHANNEL_SLUGS: Readonly<Record<string, Channel>> = {
  facebook: 'Facebook',
  fb: 'Facebook',
  google: 'Google',
};

/** URL slug → ROI section */
export const SECTION_SLUGS: Readonly<Record<string, RoiSection>> = {
  daily_roi: 'daily_roi',
  'daily-roi': 'daily_roi',
  roll_back: 'roll_back',
  'roll-back': 'roll_back',
  violet: 'violet',
};

export const channelFromSlug = (slug: string): Channel | undefined =>
  CHANNEL_SLUGS[slug.trim().toLowerCase()];

export const sectionFromSlug = (slug: string): RoiSection | undefined =>
  SECTION_SLUGS[slug.trim().toLowerCase()];
