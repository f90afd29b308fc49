import Anthropic from '@anthropic-ai/sdk';
import type { AiModelConfig, AiRequest, AiRequestOptions, AiResponse } from '@redline/shared';
import { composeRequest, fallbackModelCheck, isNotFoundError, resolveApiKey, type AiProvider } from '../gateway.js';

// the Messages API requires an explicit output limit
const DEFAULT_MAX_TOKENS = 4096;

export class AnthropicProvider implements AiProvider {
  readonly name = 'Anthropic' as const;
  readonly jsonInstruction =
    'Respond only with valid JSON. Do not include explanations, markdown, or any text before or after the JSON.';

  private client(apiKey: string, baseUrl: string | null | undefined): Anthropic {
    return new Anthropic({ apiKey, ...(baseUrl ? { baseURL: baseUrl } : {}) });
  }

  async checkModel(config: AiModelConfig): Promise<boolean> {
    const apiKey = resolveApiKey(config);
    if (!apiKey) return false;

    try {
      await this.client(apiKey, config.baseUrl).models.retrieve(config.modelName);
      return true;
    } catch (error) {
      if (error instanceof Anthropic.NotFoundError || isNotFoundError(error)) return false;
      return fallbackModelCheck(this.name, config.modelName);
    }
  }

  buildRequest(config: AiModelConfig, prompt: string, options: AiRequestOptions): AiRequest {
    const request = composeRequest(this, config, prompt, options);
    return { ...request, maxTokens: request.maxTokens ?? DEFAULT_MAX_TOKENS };
  }

  async execute(request: AiRequest): Promise<AiResponse> {
    const message = await this.client(request.apiKey, request.baseUrl).messages.create({
      model: request.model,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages: [{ role: 'user', content: request.prompt }],
      ...(request.systemPrompt ? { system: request.systemPrompt } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    });

    return {
      text: message.content.map((block) => (block.type === 'text' ? block.text : '')).join(''),
      tokensInput: message.usage.input_tokens,
      tokensOutput: message.usage.output_tokens,
      raw: JSON.stringify(message),
      metadata: {
        model: message.model || null,
        finishReason: message.stop_reason,
      },
    };
  }
}
