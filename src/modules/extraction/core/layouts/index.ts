export {
  defineLayout,
  offsetLayout,
  projectRow,
  type LayoutDescriptor,
  type RowView,
} from './layout.js';
export {
  DEFAULT_LAYOUTS_FILE,
  LayoutFileSchema,
  buildLayoutRegistry,
  parseLayoutFile,
  loadLayoutRegistry,
  type LayoutFile,
  type LayoutRegistry,
  type RoiSheetLayout,
  type KpiBlockLayout,
  type PromotionAgentLayout,
  type RoiField,
  type RunningAdsField,
  type CreativeField,
  type SmsField,
  type ContentField,
  type PromotionField,
  type KpiField,
  type CounterpartField,
  type TeamChannelField,
  type AgentTabField,
} from './registry.js';
