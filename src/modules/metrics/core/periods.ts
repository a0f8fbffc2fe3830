/**
 * Calendar bucketing for rollups.
 */

import { formatIsoDay, utcDay } from '../../../infra/time/index.js';

import type { IsoDate } from '../../extraction/index.js';

/** ISO week label, e.g. `2026-W05`. The year is the ISO week-numbering year. */
export const isoWeekLabel = (date: IsoDate): string => {
  const day = utcDay(date);
  return `${String(day.isoWeekYear())}-W${String(day.isoWeek()).padStart(2, '0')}`;
};

/** `YYYY-MM` */
export const monthLabel = (date: IsoDate): string => date.slice(0, 7);

/**
 * First day (a Tuesday) of the Tuesday–Monday reporting week holding `date`.
 */
export const tuesdayWeekStart = (date: IsoDate): IsoDate => {
  const day = utcDay(date);
  // isoWeekday: Monday = 1 … Sunday = 7; Tuesday starts the week
  const daysSinceTuesday = (day.isoWeekday() + 5) % 7;
  return formatIsoDay(day.subtract(daysSinceTuesday, 'day'));
};

/** `Jan 27 - Feb 02` style label for a date span */
export const spanLabel = (from: IsoDate, to: IsoDate): string =>
  `${utcDay(from).format('MMM DD')} - ${utcDay(to).format('MMM DD')}`;

/** `date` shifted by whole days */
export const addDays = (date: IsoDate, days: number): IsoDate =>
  formatIsoDay(utcDay(date).add(days, 'day'));

export const isWithin = (date: IsoDate, from: IsoDate | undefined, to: IsoDate | undefined): boolean =>
  (from === undefined || date >= from) && (to === undefined || date <= to);
