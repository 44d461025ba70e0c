/**
 * RAG pipeline type definitions
 */
import { ScoredChunk } from '../../knowledge/types';

/**
 * Prompt handed to the generation client, with the chunks that survived the budget
 */
export interface ComposedPrompt {
    text: string;
    chunks: ScoredChunk[];
    sources: string[];
}

export interface GenerationOptions {
    /** Overrides the configured per-attempt timeout. */
    timeoutMs?: number;
    signal?: AbortSignal;
}

export interface GenerationResult {
    text: string;
    attempts: number;
    model: string;
}

/**
 * Chunking options
 */
export interface ChunkingOptions {
    chunkSize: number;
    minChunkSize: number;
    overlap: number;
}

export interface TextChunk {
    text: string;
    chunkIndex: number;
    totalChunks: number;
}
