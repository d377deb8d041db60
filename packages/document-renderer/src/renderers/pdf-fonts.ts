import { PropertyValueError } from '../errors/property-value-error';

/**
 * Fonts every PDF reader provides; pdfkit embeds nothing for them
 */
export const STANDARD_PDF_FONTS = [
  'Courier',
  'Courier-Bold',
  'Courier-Oblique',
  'Courier-BoldOblique',
  'Helvetica',
  'Helvetica-Bold',
  'Helvetica-Oblique',
  'Helvetica-BoldOblique',
  'Times-Roman',
  'Times-Bold',
  'Times-Italic',
  'Times-BoldItalic',
  'Symbol',
  'ZapfDingbats',
] as const;

export type StandardPdfFont = (typeof STANDARD_PDF_FONTS)[number];

export const PDF_PAGE_SIZES = ['LETTER', 'A4', 'LEGAL'] as const;

export type PdfPageSize = (typeof PDF_PAGE_SIZES)[number];

const FONT_ALIASES: Readonly<Record<string, StandardPdfFont>> = {
  arial: 'Helvetica',
  'arial bold': 'Helvetica-Bold',
  'arial italic': 'Helvetica-Oblique',
  times: 'Times-Roman',
  'times new roman': 'Times-Roman',
  'times new roman bold': 'Times-Bold',
  'times new roman italic': 'Times-Italic',
  'courier new': 'Courier',
  'courier new bold': 'Courier-Bold',
};

const FONTS_BY_LOWER_NAME = new Map<string, StandardPdfFont>(
  STANDARD_PDF_FONTS.map((font) => [font.toLowerCase(), font]),
);

/**
 * Resolve a requested font name to one of the standard 14 PDF fonts.
 * Matching is case-insensitive and knows common desktop font names.
 */
export function resolvePdfFont(
  property: string,
  value: unknown,
): StandardPdfFont {
  if (typeof value === 'string') {
    const normalized = value.trim().replace(/\s+/g, ' ').toLowerCase();
    const font =
      FONTS_BY_LOWER_NAME.get(normalized) ?? FONT_ALIASES[normalized];
    if (font) return font;
  }
  throw new PropertyValueError(
    property,
    value,
    'expected one of the standard PDF fonts',
  );
}

export function resolvePdfPageSize(
  property: string,
  value: unknown,
): PdfPageSize {
  const size =
    typeof value === 'string'
      ? PDF_PAGE_SIZES.find((name) => name === value.trim().toUpperCase())
      : undefined;
  if (!size) {
    throw new PropertyValueError(
      property,
      value,
      `expected one of ${PDF_PAGE_SIZES.join(', ')}`,
    );
  }
  return size;
}

// Windows-1252 characters outside Latin-1 that the standard fonts carry
const WIN_ANSI_EXTRAS = new Set(
  '€‚ƒ„…†‡ˆ‰Š‹Œ' +
    'Ž‘’“”•–—˜™š' +
    '›œžŸ',
);

function isWinAnsi(char: string): boolean {
  const code = char.codePointAt(0) ?? 0;
  return (
    code === 0x09 ||
    code === 0x0a ||
    code === 0x0d ||
    (code >= 0x20 && code <= 0x7e) ||
    (code >= 0xa0 && code <= 0xff) ||
    WIN_ANSI_EXTRAS.has(char)
  );
}

/**
 * Distinct characters in `text` the standard 14 fonts have no glyph for,
 * in order of first appearance
 */
export function findUnencodableCharacters(text: string): string[] {
  const found = new Set<string>();
  for (const char of text) {
    if (!isWinAnsi(char)) {
      found.add(char);
    }
  }
  return [...found];
}
