/**
 * Tolerant cell-to-date coercion.
 *
 * Sheets mix several date spellings in one column and embed title rows
 * mid-sheet, so a parse is an ordered list of strict format attempts guarded
 * by a header-keyword check. The first format that yields a real calendar
 * date wins.
 */

import type { IsoDate } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Formats
// ─────────────────────────────────────────────────────────────────────────────

export type DateFormat =
  | 'M/D/YYYY'
  | 'M/D/YY'
  | 'M/D'
  | 'YYYY-M-D'
  | 'D/M/YYYY'
  | 'M-D-YYYY'
  | 'MMMM D, YYYY'
  | 'MMM D, YYYY';

export interface DateParseProfile {
  /** Upper-case substrings that mark a header cell */
  readonly rejectKeywords: readonly string[];
  /** Attempted in order */
  readonly formats: readonly DateFormat[];
  /** Longer strings are treated as merged header text */
  readonly maxLength?: number;
  /** `1//7/` reads as `1/7` */
  readonly collapseSlashes: boolean;
  /** Fall back to the spreadsheet serial-day encoding */
  readonly acceptSerial: boolean;
  /** Years further than this past the reference year move back a century */
  readonly centuryWindow?: number;
}

export interface DateParseOptions {
  /** Year for year-less formats and the century check. Defaults to the current year. */
  referenceYear?: number;
}

/** Channel ROI, counterpart and team sheets */
export const CHANNEL_DATE_PROFILE: DateParseProfile = {
  rejectKeywords: ['MONTH', 'DATE', 'GOOGLE', 'CHANNEL', 'REPORT'],
  formats: ['M/D/YYYY', 'M/D/YY', 'YYYY-M-D', 'D/M/YYYY', 'M-D-YYYY', 'MMMM D, YYYY', 'MMM D, YYYY'],
  collapseSlashes: false,
  acceptSerial: false,
};

/** Agent performance, content, Indian promotion and individual KPI sheets */
export const AGENT_SHEET_DATE_PROFILE: DateParseProfile = {
  rejectKeywords: ['TYPE', 'PRIMARY', 'CONTENT', 'DATE', 'CONDITION'],
  formats: [
    'M/D/YYYY',
    'M/D/YY',
    'M/D',
    'YYYY-M-D',
    'D/M/YYYY',
    'M-D-YYYY',
    'MMMM D, YYYY',
    'MMM D, YYYY',
  ],
  maxLength: 20,
  collapseSlashes: true,
  acceptSerial: true,
  centuryWindow: 10,
};

// ─────────────────────────────────────────────────────────────────────────────
// Calendar helpers
// ─────────────────────────────────────────────────────────────────────────────

export const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

interface Ymd {
  year: number;
  month: number;
  day: number;
}

const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const daysInMonth = (year: number, month: number): number => {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
};

const isValidYmd = ({ year, month, day }: Ymd): boolean =>
  year >= 1 && month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);

export const formatIsoDate = ({ year, month, day }: Ymd): IsoDate =>
  `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;

/** 1-based month for a full (`january`) or three-letter (`jan`) name */
export const monthFromName = (name: string, style: 'full' | 'short'): number | undefined => {
  const lower = name.toLowerCase();
  const index = MONTH_NAMES.findIndex((month) =>
    style === 'full' ? month === lower : month.slice(0, 3) === lower
  );
  return index === -1 ? undefined : index + 1;
};

// ─────────────────────────────────────────────────────────────────────────────
// Format matchers
// ─────────────────────────────────────────────────────────────────────────────

const SLASH_YEAR4 = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const SLASH_YEAR2 = /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/;
const SLASH_NO_YEAR = /^(\d{1,2})\/(\d{1,2})$/;
const ISO_LIKE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const DASH_YEAR4 = /^(\d{1,2})-(\d{1,2})-(\d{4})$/;
const NAMED_MONTH = /^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/;

type Matcher = (text: string, referenceYear: number) => Ymd | null;

const numbers = (match: RegExpExecArray | null): [number, number, number] | null => {
  if (match === null) return null;
  const [, a, b, c] = match;
  return [Number(a), Number(b), Number(c ?? '0')];
};

const namedMonth =
  (style: 'full' | 'short'): Matcher =>
  (text) => {
    const match = NAMED_MONTH.exec(text);
    if (match === null) return null;
    const month = monthFromName(match[1] ?? '', style);
    if (month === undefined) return null;
    return { year: Number(match[3]), month, day: Number(match[2]) };
  };

const MATCHERS: Record<DateFormat, Matcher> = {
  'M/D/YYYY': (text) => {
    const parts = numbers(SLASH_YEAR4.exec(text));
    return parts === null ? null : { month: parts[0], day: parts[1], year: parts[2] };
  },
  'M/D/YY': (text) => {
    const parts = numbers(SLASH_YEAR2.exec(text));
    return parts === null ? null : { month: parts[0], day: parts[1], year: parts[2] + 2000 };
  },
  'M/D': (text, referenceYear) => {
    const parts = numbers(SLASH_NO_YEAR.exec(text));
    return parts === null ? null : { month: parts[0], day: parts[1], year: referenceYear };
  },
  'YYYY-M-D': (text) => {
    const parts = numbers(ISO_LIKE.exec(text));
    return parts === null ? null : { year: parts[0], month: parts[1], day: parts[2] };
  },
  'D/M/YYYY': (text) => {
    const parts = numbers(SLASH_YEAR4.exec(text));
    return parts === null ? null : { day: parts[0], month: parts[1], year: parts[2] };
  },
  'M-D-YYYY': (text) => {
    const parts = numbers(DASH_YEAR4.exec(text));
    return parts === null ? null : { month: parts[0], day: parts[1], year: parts[2] };
  },
  'MMMM D, YYYY': namedMonth('full'),
  'MMM D, YYYY': namedMonth('short'),
};

// ─────────────────────────────────────────────────────────────────────────────
// Serial dates
// ─────────────────────────────────────────────────────────────────────────────

const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);
const DAY_MS = 86_400_000;
const SERIAL_PATTERN = /^\d+(?:\.\d+)?$/;

/**
 * Spreadsheet serial day number (day 0 = 1899-12-30) to an ISO date.
 * Only 1 < n < 100000 is accepted.
 */
export const serialToIsoDate = (serial: number): IsoDate | null => {
  if (!(serial > 1 && serial < 100_000)) return null;
  const date = new Date(SERIAL_EPOCH_MS + Math.floor(serial) * DAY_MS);
  return formatIsoDate({
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// parseDate
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parse a raw cell into an ISO date, or null.
 * Never throws; a failed format falls through to the next one.
 */
export const parseDate = (
  raw: string | null | undefined,
  profile: DateParseProfile = CHANNEL_DATE_PROFILE,
  options: DateParseOptions = {}
): IsoDate | null => {
  if (raw === null || raw === undefined) return null;

  let text = raw.trim();
  if (text === '') return null;
  if (profile.maxLength !== undefined && text.length > profile.maxLength) return null;

  const upper = text.toUpperCase();
  if (profile.rejectKeywords.some((keyword) => upper.includes(keyword))) return null;

  if (profile.collapseSlashes) {
    text = text.replace(/\/+/g, '/').replace(/^\/+|\/+$/g, '');
  }

  const referenceYear = options.referenceYear ?? new Date().getFullYear();

  for (const format of profile.formats) {
    const parsed = MATCHERS[format](text, referenceYear);
    if (parsed === null || !isValidYmd(parsed)) continue;

    const window = profile.centuryWindow;
    if (window !== undefined && parsed.year > referenceYear + window) {
      const shifted = { ...parsed, year: parsed.year - 100 };
      if (isValidYmd(shifted)) return formatIsoDate(shifted);
      continue;
    }
    return formatIsoDate(parsed);
  }

  if (profile.acceptSerial && SERIAL_PATTERN.test(text)) {
    return serialToIsoDate(Number(text));
  }

  return null;
};

// ─────────────────────────────────────────────────────────────────────────────
// Section titles
// ─────────────────────────────────────────────────────────────────────────────

const MONTH_DAY = /^([A-Za-z]+)\.?\s+(\d{1,2})(?:,?\s*(\d{4}))?$/;

/**
 * Month-name-plus-day titles such as `January 27`, `Jan 27` or
 * `January 27, 2026`. A missing year is the reference year.
 */
export const parseMonthDay = (raw: string, referenceYear: number): IsoDate | null => {
  const match = MONTH_DAY.exec(raw.trim());
  if (match === null) return null;

  const name = match[1] ?? '';
  const month = monthFromName(name, 'full') ?? monthFromName(name, 'short');
  if (month === undefined) return null;

  const parsed = {
    year: match[3] === undefined ? referenceYear : Number(match[3]),
    month,
    day: Number(match[2]),
  };
  return isValidYmd(parsed) ? formatIsoDate(parsed) : null;
};
