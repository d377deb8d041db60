const MAX_TITLE_LENGTH = 100;

/**
 * Source text split into the parts a renderer lays out
 */
export interface DocumentContent {
  /**
   * First non-empty line, trimmed; empty string for blank input
   */
  title: string;

  /**
   * Body paragraphs, each a list of lines rendered with line breaks between
   */
  paragraphs: string[][];
}

/**
 * Split free text into a title and body paragraphs.
 *
 * The title is the first non-empty line cut to 100 code points. The rest is
 * split on blank lines; single newlines stay inside their paragraph.
 */
export function splitDocumentText(text: string): DocumentContent {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  const titleIndex = lines.findIndex((line) => line.trim() !== '');

  if (titleIndex === -1) {
    return { title: '', paragraphs: [] };
  }

  // by code point, so a surrogate pair is never split
  const title = Array.from(lines[titleIndex].trim())
    .slice(0, MAX_TITLE_LENGTH)
    .join('');
  const remainder = lines.slice(titleIndex + 1).join('\n');

  const paragraphs = remainder
    .split(/\n\s*\n/)
    .map((block) =>
      block
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line !== ''),
    )
    .filter((paragraphLines) => paragraphLines.length > 0);

  return { title, paragraphs };
}
