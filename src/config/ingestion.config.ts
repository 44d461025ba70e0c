import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export interface IngestionSettings {
  seedFile?: string;
  chunkSize: number;
  minChunkSize: number;
  chunkOverlap: number;
  uploadMaxBytes: number;
  allowedExtensions: string[];
  manualSource: string;
}

export default registerAs('ingestion', (): IngestionSettings => {
  const env = loadEnv();
  return {
    seedFile: env.RAG_SEED_FILE,
    chunkSize: env.RAG_CHUNK_SIZE,
    minChunkSize: env.RAG_MIN_CHUNK_SIZE,
    chunkOverlap: env.RAG_CHUNK_OVERLAP,
    uploadMaxBytes: env.UPLOAD_MAX_BYTES,
    allowedExtensions: ['json', 'csv', 'xlsx'],
    manualSource: 'manual_addition',
  };
});
