import type {
  DocumentKind,
  PreferenceValue,
  PropertyScope,
} from '@quillkit/model';

/**
 * Value category a property setter accepts
 */
export type PropertyType =
  | 'string'
  | 'number'
  | 'boolean'
  | 'alignment'
  | 'color';

export interface PropertyDefinition {
  readonly type: PropertyType;

  /**
   * Built-in value applied when the user does not ask for one
   */
  readonly default?: PreferenceValue;
}

export type ScopeRegistry = Readonly<Record<string, PropertyDefinition>>;

/**
 * Every property a renderer understands, per scope
 */
export type PropertyRegistry = Readonly<Record<PropertyScope, ScopeRegistry>>;

function defineRegistry(
  scopes: Record<PropertyScope, Record<string, PropertyDefinition>>,
): PropertyRegistry {
  return Object.freeze({
    body: Object.freeze(scopes.body),
    title: Object.freeze(scopes.title),
    page: Object.freeze(scopes.page),
  });
}

export const WORD_PROPERTY_REGISTRY = defineRegistry({
  body: {
    name: { type: 'string', default: 'Calibri' },
    size: { type: 'number', default: 11 },
    bold: { type: 'boolean' },
    italic: { type: 'boolean' },
    underline: { type: 'boolean' },
    color: { type: 'color' },
    alignment: { type: 'alignment' },
    lineSpacing: { type: 'number' },
  },
  title: {
    name: { type: 'string' },
    size: { type: 'number' },
    bold: { type: 'boolean' },
    italic: { type: 'boolean' },
    underline: { type: 'boolean' },
    color: { type: 'color' },
    alignment: { type: 'alignment', default: 'left' },
  },
  page: {},
});

export const PDF_PROPERTY_REGISTRY = defineRegistry({
  body: {
    fontName: { type: 'string', default: 'Helvetica' },
    fontSize: { type: 'number', default: 12 },
    textColor: { type: 'color' },
    alignment: { type: 'alignment' },
    spaceBefore: { type: 'number' },
    spaceAfter: { type: 'number', default: 12 },
    lineGap: { type: 'number' },
  },
  title: {
    fontName: { type: 'string', default: 'Helvetica-Bold' },
    fontSize: { type: 'number', default: 18 },
    textColor: { type: 'color' },
    alignment: { type: 'alignment', default: 'left' },
  },
  page: {
    leftMargin: { type: 'number', default: 72 },
    rightMargin: { type: 'number', default: 72 },
    topMargin: { type: 'number', default: 72 },
    bottomMargin: { type: 'number', default: 18 },
    pageSize: { type: 'string', default: 'LETTER' },
  },
});

const REGISTRIES: Readonly<Record<DocumentKind, PropertyRegistry>> = {
  word: WORD_PROPERTY_REGISTRY,
  pdf: PDF_PROPERTY_REGISTRY,
};

export function getPropertyRegistry(kind: DocumentKind): PropertyRegistry {
  return REGISTRIES[kind];
}

export function getPropertyDefinition(
  registry: PropertyRegistry,
  scope: PropertyScope,
  key: string,
): PropertyDefinition | undefined {
  const scopeRegistry = registry[scope];
  return Object.hasOwn(scopeRegistry, key) ? scopeRegistry[key] : undefined;
}

/**
 * Built-in values of one scope, in registry order
 */
export function getScopeDefaults(
  registry: PropertyRegistry,
  scope: PropertyScope,
): Record<string, PreferenceValue> {
  const defaults: Record<string, PreferenceValue> = {};
  for (const [key, definition] of Object.entries(registry[scope])) {
    if (definition.default !== undefined) {
      defaults[key] = definition.default;
    }
  }
  return defaults;
}
