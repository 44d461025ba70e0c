import { Injectable, Logger } from '@nestjs/common';
import { EmptyIndexError } from '../../../common/errors/rag.errors';
import { DocumentIndexService } from '../../knowledge/document-index.service';
import { ScoredChunk } from '../../knowledge/types';

/**
 * Retriever Service - thresholded top-k with one chunk per source
 */
@Injectable()
export class RetrieverService {
    private readonly logger = new Logger(RetrieverService.name);

    constructor(private readonly index: DocumentIndexService) { }

    async retrieve(queryEmbedding: readonly number[], k: number, minSimilarity: number): Promise<ScoredChunk[]> {
        let candidates: ScoredChunk[];
        try {
            candidates = await this.index.search(queryEmbedding, k);
        } catch (error) {
            if (error instanceof EmptyIndexError) {
                this.logger.warn('⚠️ Retrieval against an empty index');
                return [];
            }
            throw error;
        }

        // Candidates arrive best-first, so the first chunk seen per source is its best.
        const seen = new Set<string>();
        const results: ScoredChunk[] = [];
        for (const candidate of candidates) {
            if (candidate.score < minSimilarity || seen.has(candidate.chunk.source)) {
                continue;
            }
            seen.add(candidate.chunk.source);
            results.push(candidate);
        }

        this.logger.debug(`🔍 Retrieved ${results.length}/${candidates.length} chunks (min similarity ${minSimilarity})`);
        return results;
    }
}
