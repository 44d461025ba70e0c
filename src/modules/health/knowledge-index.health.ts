import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { DocumentIndexService } from '../knowledge/document-index.service';

/**
 * Reports the document index state. An empty index is healthy: queries then decline
 * with the no-context notice.
 */
@Injectable()
export class KnowledgeIndexHealthIndicator extends HealthIndicator {
    constructor(private readonly index: DocumentIndexService) {
        super();
    }

    isHealthy(key: string): HealthIndicatorResult {
        const { chunkCount, dimension, categories, lastUpdatedAt } = this.index.stats();
        return this.getStatus(key, true, { chunkCount, dimension, categories, lastUpdatedAt });
    }
}
