/**
 * dayjs with the plugins the reports rely on, registered once.
 */

import dayjs from 'dayjs';
import isoWeek from 'dayjs/plugin/isoWeek.js';
import timezone from 'dayjs/plugin/timezone.js';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(isoWeek);

export { dayjs };
export type { Dayjs } from 'dayjs';

const ISO_DATE = 'YYYY-MM-DD';

/** Parse a `YYYY-MM-DD` date as a UTC calendar day */
export const utcDay = (isoDate: string): dayjs.Dayjs => dayjs.utc(isoDate);

export const formatIsoDay = (day: dayjs.Dayjs): string => day.format(ISO_DATE);

/** Calendar date in a timezone, as `YYYY-MM-DD` */
export const todayIn = (timezoneName: string, now: Date = new Date()): string =>
  dayjs(now).tz(timezoneName).format(ISO_DATE);
