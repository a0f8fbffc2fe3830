export {
  parseDate,
  parseMonthDay,
  serialToIsoDate,
  formatIsoDate,
  monthFromName,
  MONTH_NAMES,
  CHANNEL_DATE_PROFILE,
  AGENT_SHEET_DATE_PROFILE,
  type DateFormat,
  type DateParseProfile,
  type DateParseOptions,
} from './parse-date.js';
export { parseNumeric, parseLooseNumeric, parseCountPhrase, toCount } from './parse-numeric.js';
export { isBlank, cleanText, toTitleCase } from './text.js';
