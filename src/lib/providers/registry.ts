/**
 * Builds the configured provider, if any
 */

import { ConfigurationError } from '../../shared/errors.js';
import type { AppConfig } from '../../shared/config.js';
import { AnthropicProvider } from './anthropic.js';
import { GeminiProvider } from './gemini.js';
import { OpenAIProvider } from './openai.js';
import type { FetchLike, ModelProvider, ProviderName, ProviderOptions } from './types.js';

const FACTORIES: Record<ProviderName, (options: ProviderOptions) => ModelProvider> = {
  openai: options => new OpenAIProvider(options),
  anthropic: options => new AnthropicProvider(options),
  gemini: options => new GeminiProvider(options)
};

export const SUPPORTED_PROVIDERS: readonly ProviderName[] = ['openai', 'anthropic', 'gemini'];

/** Returns `null` when enrichment is switched off (`provider: none`). */
export function createModelProvider(
  config: Pick<AppConfig, 'model' | 'requestTimeoutMs'>,
  fetchImpl?: FetchLike
): ModelProvider | null {
  const { provider, name, apiKey, baseUrl } = config.model;
  if (provider === 'none') return null;

  if (!apiKey || !name) {
    throw new ConfigurationError(`Model provider "${provider}" is missing an API key or model name`, 'model');
  }

  return FACTORIES[provider]({
    apiKey,
    model: name,
    baseUrl,
    timeoutMs: config.requestTimeoutMs,
    fetchImpl
  });
}
