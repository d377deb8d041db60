import type { LoggerMethods } from '@quillkit/logger';

import { writeFile } from 'node:fs/promises';
import PDFDocument from 'pdfkit';

import type {
  DocumentRenderer,
  RenderJob,
  RendererOutput,
  SetterTable,
} from './document-renderer';
import type { PdfPageSize, StandardPdfFont } from './pdf-fonts';

import {
  type TextAlignment,
  toAlignment,
  toHexColor,
  toNumber,
} from '../registry/value-coercers';
import { PropertyApplier } from './document-renderer';
import {
  findUnencodableCharacters,
  resolvePdfFont,
  resolvePdfPageSize,
} from './pdf-fonts';

export interface PdfTextStyle {
  font: StandardPdfFont;
  fontSize: number;

  /**
   * Upper-case `RRGGBB`
   */
  color: string;
  align: TextAlignment;

  /**
   * Vertical space in points
   */
  spaceBefore: number;
  spaceAfter: number;
  lineGap: number;
}

export interface PdfPageLayout {
  size: PdfPageSize;

  /**
   * Margins in points (72 = 1 inch)
   */
  margins: { top: number; bottom: number; left: number; right: number };
}

const FONT_SIZE_RANGE = { min: 1, max: 400 };
const SPACING_RANGE = { min: 0, max: 720 };
const LINE_GAP_RANGE = { min: 0, max: 200 };
const MARGIN_RANGE = { min: 0, max: 720 };

// Gap between the title and the first paragraph
const TITLE_SPACING = 12;

const TEXT_SETTERS: SetterTable<PdfTextStyle> = {
  fontName: (style, value, property) => {
    style.font = resolvePdfFont(property, value);
  },
  fontSize: (style, value, property) => {
    style.fontSize = toNumber(property, value, FONT_SIZE_RANGE);
  },
  textColor: (style, value, property) => {
    style.color = toHexColor(property, value);
  },
  alignment: (style, value, property) => {
    style.align = toAlignment(property, value);
  },
};

export const PDF_BODY_SETTERS: SetterTable<PdfTextStyle> = {
  ...TEXT_SETTERS,
  spaceBefore: (style, value, property) => {
    style.spaceBefore = toNumber(property, value, SPACING_RANGE);
  },
  spaceAfter: (style, value, property) => {
    style.spaceAfter = toNumber(property, value, SPACING_RANGE);
  },
  lineGap: (style, value, property) => {
    style.lineGap = toNumber(property, value, LINE_GAP_RANGE);
  },
};

export const PDF_TITLE_SETTERS: SetterTable<PdfTextStyle> = TEXT_SETTERS;

export const PDF_PAGE_SETTERS: SetterTable<PdfPageLayout> = {
  leftMargin: (layout, value, property) => {
    layout.margins.left = toNumber(property, value, MARGIN_RANGE);
  },
  rightMargin: (layout, value, property) => {
    layout.margins.right = toNumber(property, value, MARGIN_RANGE);
  },
  topMargin: (layout, value, property) => {
    layout.margins.top = toNumber(property, value, MARGIN_RANGE);
  },
  bottomMargin: (layout, value, property) => {
    layout.margins.bottom = toNumber(property, value, MARGIN_RANGE);
  },
  pageSize: (layout, value, property) => {
    layout.size = resolvePdfPageSize(property, value);
  },
};

function baseTextStyle(): PdfTextStyle {
  return {
    font: 'Helvetica',
    fontSize: 12,
    color: '000000',
    align: 'left',
    spaceBefore: 0,
    spaceAfter: 0,
    lineGap: 0,
  };
}

function collectOutput(doc: PDFKit.PDFDocument): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);
  });
}

function formatCodePoint(char: string): string {
  const code = (char.codePointAt(0) ?? 0).toString(16).toUpperCase();
  return `U+${code.padStart(4, '0')}`;
}

function useTextStyle(doc: PDFKit.PDFDocument, style: PdfTextStyle): void {
  doc.font(style.font).fontSize(style.fontSize).fillColor(`#${style.color}`);
}

/**
 * Writes PDF files with pdfkit using the standard 14 fonts.
 *
 * Page size and margins are fixed when the document is constructed, before
 * any content is laid out.
 */
export class PdfRenderer implements DocumentRenderer {
  readonly kind = 'pdf';

  constructor(private readonly logger: LoggerMethods) {}

  async render({ path, content, plan }: RenderJob): Promise<RendererOutput> {
    const applier = new PropertyApplier(this.logger, 'PdfRenderer', 'pdf');
    const layout: PdfPageLayout = {
      size: 'LETTER',
      margins: { top: 72, bottom: 72, left: 72, right: 72 },
    };
    const titleStyle = baseTextStyle();
    const bodyStyle = baseTextStyle();

    applier.apply('page', PDF_PAGE_SETTERS, layout, plan.scopes.page);
    applier.apply('title', PDF_TITLE_SETTERS, titleStyle, plan.scopes.title);
    applier.apply('body', PDF_BODY_SETTERS, bodyStyle, plan.scopes.body);

    const unencodable = findUnencodableCharacters(
      [content.title, ...content.paragraphs.flat()].join('\n'),
    );
    if (unencodable.length > 0) {
      this.logger.warn(
        `[PdfRenderer] Standard fonts cannot encode ${unencodable.length} character(s), output will be garbled: ${unencodable.map(formatCodePoint).join(', ')}`,
      );
    }

    const doc = new PDFDocument({
      size: layout.size,
      margins: layout.margins,
      info: { Title: content.title },
    });
    const output = collectOutput(doc);

    if (content.title) {
      useTextStyle(doc, titleStyle);
      doc.text(content.title, { align: titleStyle.align });
      doc.y += TITLE_SPACING;
    }

    for (const lines of content.paragraphs) {
      useTextStyle(doc, bodyStyle);
      doc.y += bodyStyle.spaceBefore;
      doc.text(lines.join('\n'), {
        align: bodyStyle.align,
        lineGap: bodyStyle.lineGap,
      });
      doc.y += bodyStyle.spaceAfter;
    }

    doc.end();
    await writeFile(path, await output);

    this.logger.info(`[PdfRenderer] PDF document written: ${path}`);
    return applier.result();
  }
}
