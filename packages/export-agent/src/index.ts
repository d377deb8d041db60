export {
  IntentClassifier,
  SAFE_CLASSIFICATION,
  normalizeDocumentKind,
  type IntentClassification,
  type IntentClassifierOptions,
} from './classifiers/intent-classifier';
export {
  ContentCleaner,
  type ContentCleanerOptions,
} from './cleaners/content-cleaner';
export { ConfigError } from './config/config-error';
export {
  DEFAULT_MODELS,
  exportEnvSchema,
  loadExportConfig,
  resolveOutputDirectory,
  type ExportConfig,
  type LoadExportConfigOptions,
} from './config/export-config';
export {
  SUPPORTED_PROVIDERS,
  createModelFactory,
  type ModelFactory,
  type ProviderCredentials,
} from './config/model-factory';
export {
  createExportWorkflowFromConfig,
  type WorkflowFactoryOptions,
} from './config/workflow-factory';
export {
  BaseLLMComponent,
  TextLLMComponent,
  type BaseLLMComponentOptions,
} from './core';
export {
  FormattingExtractor,
  type FormattingExtractorOptions,
} from './extractors/formatting-extractor';
export {
  PdfFormattingSchema,
  WordFormattingSchema,
  type PdfFormatting,
  type WordFormatting,
} from './extractors/formatting-schemas';
export {
  SystemArtifactOpener,
  resolveOpenCommand,
  type ArtifactOpener,
  type OpenCommand,
} from './openers/artifact-opener';
export {
  findLatestAssistantMessage,
  type ConversationMessage,
  type ConversationRole,
} from './workflow/conversation';
export {
  ExportWorkflow,
  createExportWorkflow,
  createWorkflowRequest,
  type ConversationExportInput,
  type DocumentExportInput,
  type ExportRunInput,
  type ExportWorkflowOptions,
} from './workflow/export-workflow';
export { Finalizer } from './workflow/finalizer';
export { routeByDocumentKind, type RenderRoute } from './workflow/router';
