import type { LoggerMethods } from '@quillkit/logger';

import {
  AlignmentType,
  Document,
  HeadingLevel,
  Packer,
  Paragraph,
  TextRun,
  UnderlineType,
} from 'docx';
import { omit } from 'es-toolkit';
import { writeFile } from 'node:fs/promises';

import type {
  DocumentRenderer,
  RenderJob,
  RendererOutput,
  SetterTable,
} from './document-renderer';

import {
  type TextAlignment,
  toAlignment,
  toBoolean,
  toHexColor,
  toNumber,
  toText,
} from '../registry/value-coercers';
import { PropertyApplier } from './document-renderer';

/**
 * Run and paragraph formatting for one block of a .docx document
 */
export interface WordTextStyle {
  font?: string;

  /**
   * Font size in points
   */
  size?: number;
  bold?: boolean;
  italics?: boolean;
  underline?: boolean;

  /**
   * Upper-case `RRGGBB`
   */
  color?: string;
  alignment?: TextAlignment;

  /**
   * Line spacing multiplier (1 = single)
   */
  lineSpacing?: number;
}

const FONT_SIZE_RANGE = { min: 1, max: 400 };
const LINE_SPACING_RANGE = { min: 0.5, max: 10 };

// docx measures auto line spacing in 240ths of a line
const LINE_SPACING_UNIT = 240;

const DOCX_ALIGNMENT = {
  left: AlignmentType.LEFT,
  center: AlignmentType.CENTER,
  right: AlignmentType.RIGHT,
  justify: AlignmentType.JUSTIFIED,
} as const;

export const WORD_BODY_SETTERS: SetterTable<WordTextStyle> = {
  name: (style, value, property) => {
    style.font = toText(property, value);
  },
  size: (style, value, property) => {
    style.size = toNumber(property, value, FONT_SIZE_RANGE);
  },
  bold: (style, value, property) => {
    style.bold = toBoolean(property, value);
  },
  italic: (style, value, property) => {
    style.italics = toBoolean(property, value);
  },
  underline: (style, value, property) => {
    style.underline = toBoolean(property, value);
  },
  color: (style, value, property) => {
    style.color = toHexColor(property, value);
  },
  alignment: (style, value, property) => {
    style.alignment = toAlignment(property, value);
  },
  lineSpacing: (style, value, property) => {
    style.lineSpacing = toNumber(property, value, LINE_SPACING_RANGE);
  },
};

export const WORD_TITLE_SETTERS: SetterTable<WordTextStyle> = omit(
  WORD_BODY_SETTERS,
  ['lineSpacing'],
);

export const WORD_PAGE_SETTERS: SetterTable<WordTextStyle> = {};

function buildRuns(lines: string[], style: WordTextStyle): TextRun[] {
  return lines.map(
    (text, index) =>
      new TextRun({
        text,
        break: index > 0 ? 1 : undefined,
        font: style.font,
        // docx sizes are half-points
        size: style.size === undefined ? undefined : Math.round(style.size * 2),
        bold: style.bold,
        italics: style.italics,
        underline: style.underline ? { type: UnderlineType.SINGLE } : undefined,
        color: style.color,
      }),
  );
}

function toDocxAlignment(alignment: TextAlignment | undefined) {
  return alignment === undefined ? undefined : DOCX_ALIGNMENT[alignment];
}

/**
 * Writes .docx files with the `docx` library.
 *
 * The title becomes a Heading 1 paragraph; each body paragraph is one
 * paragraph with a run per line and line breaks between runs.
 */
export class WordRenderer implements DocumentRenderer {
  readonly kind = 'word';

  constructor(private readonly logger: LoggerMethods) {}

  async render({ path, content, plan }: RenderJob): Promise<RendererOutput> {
    const applier = new PropertyApplier(this.logger, 'WordRenderer', 'word');
    const titleStyle: WordTextStyle = {};
    const bodyStyle: WordTextStyle = {};

    applier.apply('title', WORD_TITLE_SETTERS, titleStyle, plan.scopes.title);
    applier.apply('body', WORD_BODY_SETTERS, bodyStyle, plan.scopes.body);
    applier.apply('page', WORD_PAGE_SETTERS, bodyStyle, plan.scopes.page);

    const children: Paragraph[] = [];

    if (content.title) {
      children.push(
        new Paragraph({
          heading: HeadingLevel.HEADING_1,
          alignment: toDocxAlignment(titleStyle.alignment),
          children: buildRuns([content.title], titleStyle),
        }),
      );
    }

    for (const lines of content.paragraphs) {
      children.push(
        new Paragraph({
          alignment: toDocxAlignment(bodyStyle.alignment),
          spacing:
            bodyStyle.lineSpacing === undefined
              ? undefined
              : { line: Math.round(bodyStyle.lineSpacing * LINE_SPACING_UNIT) },
          children: buildRuns(lines, bodyStyle),
        }),
      );
    }

    const document = new Document({
      sections: [
        { children: children.length > 0 ? children : [new Paragraph({})] },
      ],
    });

    const buffer = await Packer.toBuffer(document);
    await writeFile(path, buffer);

    this.logger.info(`[WordRenderer] Word document written: ${path}`);
    return applier.result();
  }
}
