import {
  KNOWN_MODELS,
  isAiProviderName,
  type AiModelConfig,
  type AiProviderName,
  type AiRequest,
  type AiRequestOptions,
  type AiResponse,
} from '@redline/shared';
import { decryptCredential } from '../services/credentials.service.js';
import { ProviderError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** One AI vendor behind the gateway. */
export interface AiProvider {
  readonly name: AiProviderName;
  /** Appended to every prompt so the model replies with bare JSON. */
  readonly jsonInstruction: string;
  /** Live lookup of the configured model; falls back to the static list when the lookup cannot be made. */
  checkModel(config: AiModelConfig): Promise<boolean>;
  buildRequest(config: AiModelConfig, prompt: string, options: AiRequestOptions): AiRequest;
  execute(request: AiRequest): Promise<AiResponse>;
}

/**
 * Static allow-list check. `gpt-4o` also accepts `gpt-4o-2024-08-06` and
 * `gpt-4o.1`.
 */
export function fallbackModelCheck(provider: AiProviderName, modelName: string): boolean {
  return KNOWN_MODELS[provider].some(
    (pattern) => modelName === pattern || modelName.startsWith(`${pattern}-`) || modelName.startsWith(`${pattern}.`),
  );
}

export function isNotFoundError(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'status' in error && error.status === 404) {
    return true;
  }
  const message = describeError(error).toLowerCase();
  return message.includes('not found') || message.includes('does not exist');
}

export function resolveApiKey(config: AiModelConfig): string {
  return config.apiKeyEncrypted ? decryptCredential(config.apiKeyEncrypted) : '';
}

export function appendJsonInstruction(prompt: string, instruction: string): string {
  const normalized = prompt.trimEnd();
  return normalized ? `${normalized}\n\n${instruction}` : instruction;
}

/**
 * Request for the configured model. Explicit options win over the
 * model's defaults when they carry a value.
 */
export function composeRequest(
  provider: Pick<AiProvider, 'name' | 'jsonInstruction'>,
  config: AiModelConfig,
  prompt: string,
  options: AiRequestOptions,
): AiRequest {
  const apiKey = resolveApiKey(config);
  if (!apiKey) {
    throw new ProviderError(`Missing API key for AI provider ${provider.name}`);
  }

  const temperature = options.temperature ?? config.temperature;
  const maxTokens = options.maxTokens ?? config.maxTokens;

  return {
    provider: provider.name,
    model: config.modelName,
    prompt: appendJsonInstruction(prompt, provider.jsonInstruction),
    ...(options.systemPrompt ? { systemPrompt: options.systemPrompt } : {}),
    ...(temperature !== null && temperature !== undefined ? { temperature } : {}),
    ...(maxTokens !== null && maxTokens !== undefined ? { maxTokens } : {}),
    apiKey,
    ...(config.baseUrl ? { baseUrl: config.baseUrl } : {}),
  };
}

export class AiGateway {
  private readonly providers = new Map<AiProviderName, AiProvider>();

  constructor(providers: readonly AiProvider[]) {
    for (const provider of providers) {
      this.providers.set(provider.name, provider);
    }
  }

  isProviderSupported(provider: string | null | undefined): provider is AiProviderName {
    return isAiProviderName(provider) && this.providers.has(provider);
  }

  private provider(name: string): AiProvider {
    const provider = isAiProviderName(name) ? this.providers.get(name) : undefined;
    if (!provider) throw new ProviderError(`Unsupported AI provider: ${name}`);
    return provider;
  }

  async isModelSupported(config: AiModelConfig): Promise<boolean> {
    if (!config.modelName || !this.isProviderSupported(config.provider)) return false;
    return this.provider(config.provider).checkModel(config);
  }

  buildRequest(config: AiModelConfig, prompt: string, options: AiRequestOptions = {}): AiRequest {
    return this.provider(config.provider).buildRequest(config, prompt, options);
  }

  /** Sends one stateless request. Every failure surfaces as a ProviderError. */
  async execute(request: AiRequest): Promise<AiResponse> {
    const provider = this.provider(request.provider);
    const startedAt = Date.now();
    try {
      const response = await provider.execute(request);
      logger.info(
        {
          provider: request.provider,
          model: request.model,
          tokensInput: response.tokensInput,
          tokensOutput: response.tokensOutput,
          durationMs: Date.now() - startedAt,
        },
        'AI request completed',
      );
      return response;
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(`${request.provider} request for ${request.model} failed: ${describeError(error)}`);
    }
  }
}
