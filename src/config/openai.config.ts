import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export interface OpenAISettings {
  apiKey: string;
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  embeddingTimeoutMs: number;
  embeddingMaxRetries: number;
  temperature: number;
  maxTokens: number;
}

export default registerAs('openai', (): OpenAISettings => {
  const env = loadEnv();
  return {
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL,
    chatModel: env.OPENAI_MODEL,
    embeddingModel: env.OPENAI_EMBEDDING_MODEL,
    embeddingTimeoutMs: env.OPENAI_EMBEDDING_TIMEOUT_MS,
    embeddingMaxRetries: env.OPENAI_EMBEDDING_MAX_RETRIES,
    temperature: env.OPENAI_TEMPERATURE,
    maxTokens: env.OPENAI_MAX_TOKENS,
  };
});
