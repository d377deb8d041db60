import type { WorkflowStage } from '@quillkit/model';

export type RenderRoute = Extract<WorkflowStage, 'render-word' | 'render-pdf'>;

/**
 * Pick the render branch for a document kind; anything but `pdf`,
 * including no kind at all, renders Word
 */
export function routeByDocumentKind(kind?: string): RenderRoute {
  return kind === 'pdf' ? 'render-pdf' : 'render-word';
}
