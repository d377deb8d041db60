/**
 * Every document kind the renderer can produce
 */
export const DOCUMENT_KINDS = ['word', 'pdf'] as const;

/**
 * Target output format category
 *
 * - word: word-processor document (.docx)
 * - pdf: fixed-layout PDF document
 */
export type DocumentKind = (typeof DOCUMENT_KINDS)[number];

/**
 * Kind used whenever the target format cannot be determined
 */
export const DEFAULT_DOCUMENT_KIND: DocumentKind = 'word';

/**
 * File extension (without dot) written for each kind
 */
export const DOCUMENT_EXTENSIONS: Readonly<Record<DocumentKind, string>> = {
  word: 'docx',
  pdf: 'pdf',
};

export function isDocumentKind(value: unknown): value is DocumentKind {
  return (
    typeof value === 'string' &&
    (DOCUMENT_KINDS as readonly string[]).includes(value)
  );
}
