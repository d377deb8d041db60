import { z } from 'zod';

const alignment = (target: string) =>
  z
    .enum(['left', 'center', 'right', 'justify'])
    .nullable()
    .describe(`${target} alignment`);

const color = (target: string) =>
  z
    .string()
    .nullable()
    .describe(`${target} color as a name ("navy") or hex ("#1F3864")`);

const points = (description: string) =>
  z.number().nullable().describe(`${description} in points`);

const flag = (description: string) =>
  z.boolean().nullable().describe(description);

/**
 * Preferences a Word (.docx) export can take. Every field is required and
 * nullable; null means "not mentioned".
 */
export const WordFormattingSchema = z.object({
  name: z
    .string()
    .nullable()
    .describe('Body font name (Arial, Calibri, Times New Roman, etc.)'),
  size: points('Body font size'),
  bold: flag('Bold body text'),
  italic: flag('Italic body text'),
  underline: flag('Underlined body text'),
  color: color('Body text'),
  alignment: alignment('Body paragraph'),
  lineSpacing: z
    .number()
    .nullable()
    .describe('Line spacing multiplier (1 = single, 2 = double)'),
  title_name: z.string().nullable().describe('Title font name'),
  title_size: points('Title font size'),
  title_bold: flag('Bold title'),
  title_italic: flag('Italic title'),
  title_underline: flag('Underlined title'),
  title_alignment: alignment('Title'),
  title_color: color('Title text'),
});

/**
 * Preferences a PDF export can take
 */
export const PdfFormattingSchema = z.object({
  fontName: z
    .string()
    .nullable()
    .describe('Body font (Helvetica, Times-Roman, Courier, etc.)'),
  fontSize: points('Body font size'),
  textColor: color('Body text'),
  alignment: alignment('Body paragraph'),
  spaceBefore: points('Space before each paragraph'),
  spaceAfter: points('Space after each paragraph'),
  lineGap: points('Extra gap between lines'),
  title_fontName: z.string().nullable().describe('Title font'),
  title_fontSize: points('Title font size'),
  title_textColor: color('Title text'),
  title_alignment: alignment('Title'),
  leftMargin: points('Left page margin (72 = 1 inch)'),
  rightMargin: points('Right page margin (72 = 1 inch)'),
  topMargin: points('Top page margin (72 = 1 inch)'),
  bottomMargin: points('Bottom page margin (72 = 1 inch)'),
  pageSize: z
    .enum(['LETTER', 'A4', 'LEGAL'])
    .nullable()
    .describe('Paper size'),
});

export type WordFormatting = z.infer<typeof WordFormattingSchema>;
export type PdfFormatting = z.infer<typeof PdfFormattingSchema>;
