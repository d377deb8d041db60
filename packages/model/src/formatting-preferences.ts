import { isNil } from 'es-toolkit';

/**
 * Region of a document that styling properties apply to independently
 */
export type PropertyScope = 'body' | 'title' | 'page';

export const PROPERTY_SCOPES: readonly PropertyScope[] = [
  'body',
  'title',
  'page',
];

/**
 * A single explicitly requested styling value.
 * `null` is not a member: an unrequested property is absent.
 */
export type PreferenceValue = string | number | boolean;

/**
 * Sparse preference mapping extracted from the user's instruction
 *
 * Keys are either bare (`fontSize`) or scope-prefixed (`title_fontSize`,
 * `page_leftMargin`). A key is present only when the user asked for it;
 * absence means "use the engine default".
 */
export type FormattingPreferences = Readonly<Record<string, PreferenceValue>>;

/**
 * Properties actually applied while rendering, per scope
 */
export type AppliedProperties = Record<
  PropertyScope,
  Record<string, PreferenceValue>
>;

/**
 * LLM-shaped preference record, where every schema field is present and
 * unrequested ones are `null`
 */
export type NullablePreferences = Readonly<
  Record<string, PreferenceValue | null | undefined>
>;

/**
 * Drop `null` and `undefined` entries so only requested keys remain
 */
export function compactPreferences(
  raw: NullablePreferences,
): FormattingPreferences {
  const preferences: Record<string, PreferenceValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isNil(value)) {
      preferences[key] = value;
    }
  }
  return preferences;
}
