export const AI_PROVIDERS = ['OpenAI', 'DeepSeek', 'Google', 'Anthropic'] as const;

export type AiProviderName = typeof AI_PROVIDERS[number];

/**
 * Models assumed available when the provider's model lookup cannot be
 * reached (bad credentials, network failure). Entries also match dated or
 * suffixed variants such as `gpt-4o-2024-08-06` or `gemini-1.5-pro.001`.
 */
export const KNOWN_MODELS: Record<AiProviderName, readonly string[]> = {
  OpenAI: ['gpt-4.1', 'gpt-4o', 'gpt-4o-mini', 'gpt-3.5-turbo', 'gpt-5'],
  DeepSeek: ['deepseek-chat', 'deepseek-coder'],
  Google: ['gemini-pro', 'gemini-1.5-pro', 'gemini-1.5-flash'],
  Anthropic: ['claude-3-opus', 'claude-3-sonnet', 'claude-3-haiku'],
};

export function isAiProviderName(value: string | null | undefined): value is AiProviderName {
  return AI_PROVIDERS.some((name) => name === value);
}
