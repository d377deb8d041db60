import type { LanguageModel } from 'ai';

export type ProviderType =
  | 'openai'
  | 'anthropic'
  | 'google'
  | 'togetherai'
  | 'unknown';

/**
 * Detect the provider type from a LanguageModel.
 *
 * Provider instances expose a `provider` id such as 'openai.chat' or
 * 'anthropic.messages'; plain string models use the gateway form
 * 'provider/model'. Anything unrecognised is 'unknown'.
 */
export function detectProvider(model: LanguageModel): ProviderType {
  const providerId =
    typeof model === 'string' ? model.split('/')[0] : model.provider;
  if (!providerId) return 'unknown';

  if (providerId.includes('openai')) return 'openai';
  if (providerId.includes('anthropic')) return 'anthropic';
  if (providerId.includes('google')) return 'google';
  if (providerId.includes('together')) return 'togetherai';

  return 'unknown';
}
