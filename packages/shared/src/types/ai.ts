import type { AiProviderName } from '../constants/providers.js';

export interface AiModelConfig {
  id: number;
  provider: string;
  modelName: string;
  apiKeyEncrypted: string | null;
  baseUrl: string | null;
  temperature: number | null;
  maxTokens: number | null;
  maxCharInput: number | null;
}

export interface AiRequestOptions {
  temperature?: number | null;
  maxTokens?: number | null;
  systemPrompt?: string | null;
}

/**
 * Provider-agnostic request descriptor. The prompt already carries the
 * provider's JSON-only instruction.
 */
export interface AiRequest {
  provider: AiProviderName;
  model: string;
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  apiKey: string;
  baseUrl?: string;
}

export interface AiResponseMetadata {
  model: string | null;
  finishReason: string | null;
}

export interface AiResponse {
  text: string;
  tokensInput: number;
  tokensOutput: number;
  /** Serialized provider payload, kept for diagnostics. */
  raw: string;
  metadata: AiResponseMetadata;
}
