import { AiGateway } from '../gateway.js';
import { AnthropicProvider } from './anthropic.js';
import { GoogleProvider } from './google.js';
import { OpenAiCompatibleProvider } from './openai.js';

export function createGateway(): AiGateway {
  return new AiGateway([
    new OpenAiCompatibleProvider('OpenAI'),
    new OpenAiCompatibleProvider('DeepSeek'),
    new GoogleProvider(),
    new AnthropicProvider(),
  ]);
}
