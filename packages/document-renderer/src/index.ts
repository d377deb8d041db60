export {
  DocumentFormattingEngine,
  type DocumentFormattingEngineOptions,
  type RenderRequest,
  type RenderResult,
} from './document-formatting-engine';
export { PropertyValueError } from './errors/property-value-error';
export { RenderError } from './errors/render-error';
export {
  PathAllocator,
  formatFileTimestamp,
  sanitizeBaseName,
  type PathAllocatorOptions,
} from './output/path-allocator';
export {
  buildFormattingPlan,
  type FormattingPlan,
} from './plan/formatting-plan';
export { splitDocumentText, type DocumentContent } from './plan/text-splitter';
export {
  PDF_PROPERTY_REGISTRY,
  WORD_PROPERTY_REGISTRY,
  getPropertyRegistry,
  type PropertyDefinition,
  type PropertyRegistry,
  type PropertyType,
} from './registry/property-registry';
export type {
  DocumentRenderer,
  RenderJob,
  RendererOutput,
} from './renderers/document-renderer';
export { PdfRenderer } from './renderers/pdf-renderer';
export { WordRenderer } from './renderers/word-renderer';
