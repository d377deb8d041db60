export {
  DEFAULT_DOCUMENT_KIND,
  DOCUMENT_EXTENSIONS,
  DOCUMENT_KINDS,
  isDocumentKind,
  type DocumentKind,
} from './document-kind';
export {
  PROPERTY_SCOPES,
  compactPreferences,
  type AppliedProperties,
  type FormattingPreferences,
  type NullablePreferences,
  type PreferenceValue,
  type PropertyScope,
} from './formatting-preferences';
export type {
  StageFailure,
  StageFailureKind,
  StageOutcome,
} from './stage-failure';
export type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';
export type { WorkflowRequest, WorkflowStage } from './workflow-request';
