import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export interface GenerationSettings {
  /** Per-attempt timeout. */
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface RagSettings {
  topK: number;
  minSimilarity: number;
  maxPromptChars: number;
  /** Fixed index dimension; when undefined the first insertion decides it. */
  embeddingDimension?: number;
  queryDeadlineMs: number;
  generation: GenerationSettings;
}

export default registerAs('rag', (): RagSettings => {
  const env = loadEnv();
  return {
    topK: env.RAG_TOP_K,
    minSimilarity: env.RAG_MIN_SIMILARITY,
    maxPromptChars: env.RAG_MAX_PROMPT_CHARS,
    embeddingDimension: env.RAG_EMBEDDING_DIMENSION,
    queryDeadlineMs: env.QUERY_DEADLINE_MS,
    generation: {
      timeoutMs: env.GENERATION_TIMEOUT_MS,
      maxRetries: env.GENERATION_MAX_RETRIES,
      retryDelayMs: env.GENERATION_RETRY_DELAY_MS,
    },
  };
});
