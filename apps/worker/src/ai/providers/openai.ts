import OpenAI from 'openai';
import type { AiModelConfig, AiRequest, AiRequestOptions, AiResponse } from '@redline/shared';
import { composeRequest, fallbackModelCheck, isNotFoundError, resolveApiKey, type AiProvider } from '../gateway.js';

type OpenAiCompatible = 'OpenAI' | 'DeepSeek';

const JSON_INSTRUCTIONS: Record<OpenAiCompatible, string> = {
  OpenAI: 'Return only valid JSON, with no comments or surrounding text. The result must be a pure JSON object.',
  DeepSeek: 'Return only valid JSON, without code blocks or extra text.',
};

const DEFAULT_BASE_URLS: Record<OpenAiCompatible, string | undefined> = {
  OpenAI: undefined,
  DeepSeek: 'https://api.deepseek.com/v1',
};

/**
 * OpenAI and DeepSeek, which speaks the same chat completions API.
 */
export class OpenAiCompatibleProvider implements AiProvider {
  readonly jsonInstruction: string;

  constructor(readonly name: OpenAiCompatible) {
    this.jsonInstruction = JSON_INSTRUCTIONS[name];
  }

  private client(apiKey: string, baseUrl: string | null | undefined): OpenAI {
    return new OpenAI({ apiKey, baseURL: baseUrl || DEFAULT_BASE_URLS[this.name] });
  }

  async checkModel(config: AiModelConfig): Promise<boolean> {
    const apiKey = resolveApiKey(config);
    if (!apiKey) return false;

    try {
      await this.client(apiKey, config.baseUrl).models.retrieve(config.modelName);
      return true;
    } catch (error) {
      if (error instanceof OpenAI.NotFoundError || isNotFoundError(error)) return false;
      // AuthenticationError, APIConnectionError and the rest
      return fallbackModelCheck(this.name, config.modelName);
    }
  }

  buildRequest(config: AiModelConfig, prompt: string, options: AiRequestOptions): AiRequest {
    return composeRequest(this, config, prompt, options);
  }

  async execute(request: AiRequest): Promise<AiResponse> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    const completion = await this.client(request.apiKey, request.baseUrl).chat.completions.create({
      model: request.model,
      messages,
      response_format: { type: 'json_object' },
      stream: false,
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(request.maxTokens !== undefined ? { max_completion_tokens: request.maxTokens } : {}),
    });

    const choice = completion.choices[0];
    return {
      text: choice?.message.content ?? '',
      tokensInput: completion.usage?.prompt_tokens ?? 0,
      tokensOutput: completion.usage?.completion_tokens ?? 0,
      raw: JSON.stringify(completion),
      metadata: {
        model: completion.model || null,
        finishReason: choice?.finish_reason ?? null,
      },
    };
  }
}
