import { z } from 'zod';

const optionalString = z.preprocess(
  (val) => (typeof val === 'string' && val.trim().length === 0 ? undefined : val),
  z.string().optional(),
);

export const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  HOST_IP: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // OpenAI Configuration
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  OPENAI_EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  OPENAI_EMBEDDING_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(512),

  // RAG Pipeline Configuration
  RAG_TOP_K: z.coerce.number().int().positive().default(3),
  RAG_MIN_SIMILARITY: z.coerce.number().min(-1).max(1).default(0.3),
  RAG_MAX_PROMPT_CHARS: z.coerce.number().int().positive().default(6000),
  RAG_EMBEDDING_DIMENSION: z.coerce.number().int().positive().optional(),
  QUERY_DEADLINE_MS: z.coerce.number().int().positive().default(60000),

  // Generation client
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  GENERATION_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  GENERATION_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),

  // Guardrails
  GUARDRAIL_DOMAIN_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.3),
  GUARDRAIL_JAILBREAK_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.85),
  GUARDRAIL_MAX_QUERY_LENGTH: z.coerce.number().int().positive().default(500),

  // Ingestion
  RAG_SEED_FILE: optionalString,
  RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  RAG_MIN_CHUNK_SIZE: z.coerce.number().int().min(0).default(100),
  RAG_CHUNK_OVERLAP: z.coerce.number().int().min(0).default(50),
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(16 * 1024 * 1024),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse process.env against the schema. Throws with every offending key listed.
 */
export function loadEnv(source: Record<string, unknown> = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new Error(`Environment validation failed: ${result.error.message}`);
  }
  return result.data;
}
