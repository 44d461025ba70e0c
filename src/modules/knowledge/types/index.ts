/**
 * Knowledge index types
 */

/**
 * An indexed unit of knowledge. Frozen once created.
 */
export interface Chunk {
    readonly id: string;
    readonly text: string;
    readonly embedding: readonly number[];
    readonly category: string;
    readonly source: string;
    readonly createdAt: Date;
    readonly metadata: Readonly<Record<string, string>>;
}

/**
 * What the ingestion path hands to the index. Without `embedding` the index embeds `text`.
 */
export interface ChunkInput {
    id?: string;
    text: string;
    category: string;
    source: string;
    embedding?: number[];
    metadata?: Record<string, string>;
}

export interface ScoredChunk {
    chunk: Chunk;
    score: number;
}

export interface IndexStats {
    chunkCount: number;
    dimension: number | null;
    categories: Record<string, number>;
    lastUpdatedAt: string | null;
}
