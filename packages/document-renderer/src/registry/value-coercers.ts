import { PropertyValueError } from '../errors/property-value-error';

export type TextAlignment = 'left' | 'center' | 'right' | 'justify';

export interface NumberRange {
  min: number;
  max: number;
}

const ALIGNMENT_ALIASES: Readonly<Record<string, TextAlignment>> = {
  left: 'left',
  start: 'left',
  center: 'center',
  centre: 'center',
  centered: 'center',
  centred: 'center',
  middle: 'center',
  right: 'right',
  end: 'right',
  justify: 'justify',
  justified: 'justify',
  both: 'justify',
};

const NAMED_COLORS: Readonly<Record<string, string>> = {
  black: '000000',
  white: 'FFFFFF',
  red: 'FF0000',
  green: '008000',
  blue: '0000FF',
  yellow: 'FFFF00',
  orange: 'FFA500',
  purple: '800080',
  gray: '808080',
  grey: '808080',
  navy: '000080',
  maroon: '800000',
  teal: '008080',
  brown: 'A52A2A',
  pink: 'FFC0CB',
};

const NUMBER_PATTERN = /^(-?\d+(?:\.\d+)?)\s*(?:pt|pts|points?)?$/i;

export function toText(property: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new PropertyValueError(
      property,
      value,
      'expected a non-empty string',
    );
  }
  return value.trim();
}

/**
 * Accepts numbers and numeric strings with an optional point unit ("14pt")
 */
export function toNumber(
  property: string,
  value: unknown,
  range: NumberRange,
): number {
  let parsed: number | undefined;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    const match = NUMBER_PATTERN.exec(value.trim());
    parsed = match ? Number(match[1]) : undefined;
  }

  if (parsed === undefined || !Number.isFinite(parsed)) {
    throw new PropertyValueError(property, value, 'expected a number');
  }
  if (parsed < range.min || parsed > range.max) {
    throw new PropertyValueError(
      property,
      value,
      `expected a number between ${range.min} and ${range.max}`,
    );
  }
  return parsed;
}

export function toBoolean(property: string, value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['true', 'yes', 'on'].includes(normalized)) return true;
    if (['false', 'no', 'off'].includes(normalized)) return false;
  }
  throw new PropertyValueError(property, value, 'expected a boolean');
}

export function toAlignment(property: string, value: unknown): TextAlignment {
  const alignment =
    typeof value === 'string'
      ? ALIGNMENT_ALIASES[value.trim().toLowerCase()]
      : undefined;
  if (!alignment) {
    throw new PropertyValueError(
      property,
      value,
      'expected left, center, right or justify',
    );
  }
  return alignment;
}

/**
 * Normalise `#RGB`, `#RRGGBB`, `RRGGBB` or a basic colour name to upper-case
 * `RRGGBB`
 */
export function toHexColor(property: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw new PropertyValueError(property, value, 'expected a colour');
  }

  const normalized = value.trim().replace(/\s+/g, '').toLowerCase();
  const named = NAMED_COLORS[normalized];
  if (named) return named;

  const hex = normalized.startsWith('#') ? normalized.slice(1) : normalized;
  if (/^[0-9a-f]{6}$/.test(hex)) return hex.toUpperCase();
  if (/^[0-9a-f]{3}$/.test(hex)) {
    return [...hex].map((digit) => digit + digit).join('').toUpperCase();
  }

  throw new PropertyValueError(
    property,
    value,
    'expected a hex colour or a basic colour name',
  );
}
