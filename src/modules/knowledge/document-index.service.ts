import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import ragConfig, { RagSettings } from '../../config/rag.config';
import { ReadWriteLock } from '../../common/concurrency/read-write-lock';
import {
    DimensionMismatchError,
    EmptyIndexError,
    InvalidChunkError,
} from '../../common/errors/rag.errors';
import { errorMessage } from '../../common/utils/error.util';
import { cosineWithNorms, validateEmbeddingValues, vectorNorm } from '../../common/utils/vector.util';
import { EMBEDDING_PROVIDER, EmbeddingProvider } from '../rag/providers/provider.interfaces';
import { Chunk, ChunkInput, IndexStats, ScoredChunk } from './types';

interface IndexEntry {
    chunk: Chunk;
    norm: number;
    seq: number;
}

interface PreparedChunk {
    input: ChunkInput;
    embedding: number[];
}

/**
 * Document Index - owns every embedded chunk for the lifetime of the process.
 *
 * Exact cosine k-NN over all entries. Writers serialize on a reader-writer lock and
 * publish a fresh entries array, so a search sees a batch either entirely or not at all.
 */
@Injectable()
export class DocumentIndexService {
    private readonly logger = new Logger(DocumentIndexService.name);
    private readonly lock = new ReadWriteLock();
    private entries: readonly IndexEntry[] = [];
    private readonly ids = new Set<string>();
    private dimension: number | null;
    private sequence = 0;
    private lastUpdatedAt: Date | null = null;

    constructor(
        @Inject(EMBEDDING_PROVIDER) private readonly embeddings: EmbeddingProvider,
        @Inject(ragConfig.KEY) settings: RagSettings,
    ) {
        this.dimension = settings.embeddingDimension ?? null;
    }

    get size(): number {
        return this.entries.length;
    }

    get embeddingDimension(): number | null {
        return this.dimension;
    }

    /**
     * Insert one chunk. Fails with DimensionMismatchError when the embedding length
     * disagrees with the index.
     */
    async insert(input: ChunkInput): Promise<Chunk> {
        const [chunk] = await this.bulkInsert([input]);
        return chunk;
    }

    /**
     * Insert a batch atomically: every input is validated first and nothing is
     * inserted if any of them fails.
     */
    async bulkInsert(inputs: ChunkInput[]): Promise<Chunk[]> {
        if (inputs.length === 0) {
            return [];
        }

        const prepared = await this.prepare(inputs);

        return this.lock.withWrite(() => {
            const inserted = this.commit(prepared);
            this.logger.log(`📥 Indexed ${inserted.length} chunks (total ${this.entries.length})`);
            return inserted;
        });
    }

    /**
     * Top-k chunks by cosine similarity, descending; ties go to the earliest chunk.
     */
    async search(queryEmbedding: readonly number[], k: number): Promise<ScoredChunk[]> {
        return this.lock.withRead(() => {
            const snapshot = this.entries;
            if (snapshot.length === 0) {
                throw new EmptyIndexError();
            }
            if (this.dimension !== null && queryEmbedding.length !== this.dimension) {
                throw new DimensionMismatchError(this.dimension, queryEmbedding.length);
            }
            validateEmbeddingValues(queryEmbedding);

            if (k <= 0) {
                return [];
            }

            const queryNorm = vectorNorm(queryEmbedding);
            const scored = snapshot.map((entry) => ({
                entry,
                score: cosineWithNorms(queryEmbedding, queryNorm, entry.chunk.embedding, entry.norm),
            }));

            scored.sort(
                (a, b) =>
                    b.score - a.score ||
                    a.entry.chunk.createdAt.getTime() - b.entry.chunk.createdAt.getTime() ||
                    a.entry.seq - b.entry.seq,
            );

            return scored.slice(0, k).map(({ entry, score }) => ({ chunk: entry.chunk, score }));
        });
    }

    stats(): IndexStats {
        const snapshot = this.entries;
        const categories: Record<string, number> = {};
        for (const { chunk } of snapshot) {
            categories[chunk.category] = (categories[chunk.category] ?? 0) + 1;
        }

        return {
            chunkCount: snapshot.length,
            dimension: this.dimension,
            categories,
            lastUpdatedAt: this.lastUpdatedAt ? this.lastUpdatedAt.toISOString() : null,
        };
    }

    /**
     * Validate fields and resolve embeddings outside the write lock.
     */
    private async prepare(inputs: ChunkInput[]): Promise<PreparedChunk[]> {
        inputs.forEach((input, i) => this.validateInput(input, i));

        const missing = inputs
            .map((input, i) => ({ input, i }))
            .filter(({ input }) => input.embedding === undefined);

        const computed = new Map<number, number[]>();
        if (missing.length > 0) {
            this.logger.debug(`🔄 Embedding ${missing.length} chunk(s)`);
            const vectors = await this.embeddings.embedBatch(missing.map(({ input }) => input.text));
            if (vectors.length !== missing.length) {
                throw new InvalidChunkError(
                    `embedding provider returned ${vectors.length} vectors for ${missing.length} texts`,
                );
            }
            missing.forEach(({ i }, j) => computed.set(i, vectors[j]));
        }

        const prepared = inputs.map((input, i) => {
            const embedding = input.embedding ?? computed.get(i);
            if (!embedding) {
                throw new InvalidChunkError(`no embedding resolved for input ${i}`);
            }
            try {
                validateEmbeddingValues(embedding);
            } catch (error) {
                throw new InvalidChunkError(errorMessage(error));
            }
            return { input, embedding: [...embedding] };
        });

        const batchDimension = prepared[0].embedding.length;
        for (const { embedding } of prepared) {
            if (embedding.length !== batchDimension) {
                throw new DimensionMismatchError(batchDimension, embedding.length);
            }
        }

        return prepared;
    }

    private validateInput(input: ChunkInput, position: number): void {
        if (input.text.trim().length === 0) {
            throw new InvalidChunkError(`input ${position} has empty text`);
        }
        if (input.source.trim().length === 0) {
            throw new InvalidChunkError(`input ${position} has no source`);
        }
        if (input.category.trim().length === 0) {
            throw new InvalidChunkError(`input ${position} has no category`);
        }
    }

    /**
     * Runs under the write lock.
     */
    private commit(prepared: PreparedChunk[]): Chunk[] {
        const batchDimension = prepared[0].embedding.length;
        if (this.dimension !== null && batchDimension !== this.dimension) {
            throw new DimensionMismatchError(this.dimension, batchDimension);
        }

        const batchIds = new Set<string>();
        const withIds = prepared.map((item) => {
            const id = item.input.id ?? uuidv4();
            if (this.ids.has(id) || batchIds.has(id)) {
                throw new InvalidChunkError(`duplicate chunk id "${id}"`);
            }
            batchIds.add(id);
            return { ...item, id };
        });

        const createdAt = new Date();
        const newEntries: IndexEntry[] = withIds.map(({ input, embedding, id }) => {
            const chunk: Chunk = Object.freeze({
                id,
                text: input.text,
                embedding: Object.freeze(embedding),
                category: input.category,
                source: input.source,
                createdAt,
                metadata: Object.freeze({ ...(input.metadata ?? {}) }),
            });
            return { chunk, norm: vectorNorm(embedding), seq: this.sequence++ };
        });

        this.dimension = batchDimension;
        this.entries = [...this.entries, ...newEntries];
        batchIds.forEach((id) => this.ids.add(id));
        this.lastUpdatedAt = createdAt;

        return newEntries.map((entry) => entry.chunk);
    }
}
