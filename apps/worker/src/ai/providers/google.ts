import { GoogleGenerativeAI } from '@google/generative-ai';
import type { AiModelConfig, AiRequest, AiRequestOptions, AiResponse } from '@redline/shared';
import { composeRequest, fallbackModelCheck, resolveApiKey, type AiProvider } from '../gateway.js';

const MODELS_ENDPOINT = 'https://generativelanguage.googleapis.com/v1beta/models';

export class GoogleProvider implements AiProvider {
  readonly name = 'Google' as const;
  readonly jsonInstruction = 'Output only valid JSON. No markdown, no text outside the JSON.';

  /**
   * The SDK has no model lookup, so the REST endpoint is queried directly.
   */
  async checkModel(config: AiModelConfig): Promise<boolean> {
    const apiKey = resolveApiKey(config);
    if (!apiKey) return false;

    const modelName = config.modelName.replace(/^models\//, '');
    try {
      const response = await fetch(
        `${MODELS_ENDPOINT}/${encodeURIComponent(modelName)}?key=${encodeURIComponent(apiKey)}`,
      );
      if (response.ok) return true;
      if (response.status === 404) return false;
      return fallbackModelCheck(this.name, modelName);
    } catch {
      return fallbackModelCheck(this.name, modelName);
    }
  }

  buildRequest(config: AiModelConfig, prompt: string, options: AiRequestOptions): AiRequest {
    return composeRequest(this, config, prompt, options);
  }

  async execute(request: AiRequest): Promise<AiResponse> {
    const model = new GoogleGenerativeAI(request.apiKey).getGenerativeModel(
      {
        model: request.model,
        ...(request.systemPrompt ? { systemInstruction: request.systemPrompt } : {}),
        generationConfig: {
          responseMimeType: 'application/json',
          ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
          ...(request.maxTokens !== undefined ? { maxOutputTokens: request.maxTokens } : {}),
        },
      },
      request.baseUrl ? { baseUrl: request.baseUrl } : undefined,
    );

    const { response } = await model.generateContent({
      contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
    });

    return {
      text: response.text(),
      tokensInput: response.usageMetadata?.promptTokenCount ?? 0,
      tokensOutput: response.usageMetadata?.candidatesTokenCount ?? 0,
      raw: JSON.stringify(response),
      metadata: {
        model: null,
        finishReason: response.candidates?.[0]?.finishReason ?? null,
      },
    };
  }
}
