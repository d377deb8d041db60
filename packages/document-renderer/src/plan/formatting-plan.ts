import {
  PROPERTY_SCOPES,
  type DocumentKind,
  type FormattingPreferences,
  type PreferenceValue,
  type PropertyScope,
} from '@quillkit/model';

import {
  getPropertyDefinition,
  getPropertyRegistry,
  getScopeDefaults,
} from '../registry/property-registry';

/**
 * Resolved property values per scope for one render
 */
export interface FormattingPlan {
  kind: DocumentKind;
  scopes: Record<PropertyScope, Record<string, PreferenceValue>>;

  /**
   * Preference keys no scope of this kind recognises, in input order
   */
  ignoredKeys: string[];
}

const SCOPE_PREFIXES: ReadonlyArray<[prefix: string, scope: PropertyScope]> = [
  ['title_', 'title'],
  ['page_', 'page'],
  ['body_', 'body'],
];

// Unprefixed keys never style the title
const BARE_KEY_SCOPES: readonly PropertyScope[] = ['body', 'page'];

function parseScopedKey(
  key: string,
): { scope: PropertyScope; property: string } | undefined {
  for (const [prefix, scope] of SCOPE_PREFIXES) {
    if (key.startsWith(prefix) && key.length > prefix.length) {
      return { scope, property: key.slice(prefix.length) };
    }
  }
  return undefined;
}

/**
 * Layer built-in defaults, bare preferences and scope-prefixed overrides into
 * one value set per scope.
 *
 * Prefixed keys win over bare keys whatever order they were supplied in. Keys
 * the registry does not list for their target scope end up in `ignoredKeys`.
 */
export function buildFormattingPlan(
  kind: DocumentKind,
  preferences: FormattingPreferences,
): FormattingPlan {
  const registry = getPropertyRegistry(kind);
  const scopes: FormattingPlan['scopes'] = {
    body: getScopeDefaults(registry, 'body'),
    title: getScopeDefaults(registry, 'title'),
    page: getScopeDefaults(registry, 'page'),
  };
  const overrides: FormattingPlan['scopes'] = { body: {}, title: {}, page: {} };
  const ignoredKeys: string[] = [];

  for (const [key, value] of Object.entries(preferences)) {
    const scoped = parseScopedKey(key);

    if (scoped) {
      if (getPropertyDefinition(registry, scoped.scope, scoped.property)) {
        overrides[scoped.scope][scoped.property] = value;
      } else {
        ignoredKeys.push(key);
      }
      continue;
    }

    let recognised = false;
    for (const scope of BARE_KEY_SCOPES) {
      if (getPropertyDefinition(registry, scope, key)) {
        scopes[scope][key] = value;
        recognised = true;
      }
    }
    if (!recognised) {
      ignoredKeys.push(key);
    }
  }

  for (const scope of PROPERTY_SCOPES) {
    Object.assign(scopes[scope], overrides[scope]);
  }

  return { kind, scopes, ignoredKeys };
}
