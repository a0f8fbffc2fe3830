export { extractChannelRoi, type ChannelRoiInput } from './channel-roi.js';
export { extractRunningAds } from './running-ads.js';
export { extractCreativeWork } from './creative-work.js';
export { extractSmsWork } from './sms-work.js';
export {
  extractContentWork,
  isMergedHeaderRow,
  normalizeContentType,
} from './content-work.js';
export { extractIndianPromotion, type IndianPromotionInput } from './indian-promotion.js';
export { extractIndividualKpi, type IndividualKpiInput } from './individual-kpi.js';
export {
  scanSectionedSheet,
  bucketBySection,
  OVERALL_SENTINEL,
  SECTION_SKIP_KEYWORDS,
  type SectionState,
  type SectionedRow,
  type SectionedScanOptions,
} from './sectioned-sheet.js';
export { extractCounterpart, type CounterpartInput } from './counterpart.js';
export { extractTeamChannel, type TeamChannelInput } from './team-channel.js';
export { extractAgentTab, type AgentTabInput } from './agent-tab.js';
export {
  agentDate,
  normalizeAgentName,
  referenceYearOf,
  type AgentSheetInput,
} from './shared.js';
