import { Inject, Injectable, Logger } from '@nestjs/common';
import guardrailsConfig, { GuardrailsSettings, PatternRule } from '../../config/guardrails.config';
import { EmptyIndexError } from '../../common/errors/rag.errors';
import { cosineSimilarity } from '../../common/utils/vector.util';
import { DocumentIndexService } from '../knowledge/document-index.service';
import { EMBEDDING_PROVIDER, EmbeddingProvider } from '../rag/providers/provider.interfaces';
import { Classification } from './types';

/**
 * Guardrails Service - classifies a query as in-domain, out-of-domain or jailbreak.
 *
 * Jailbreak checks run first and are terminal: lexical rules, then similarity to known
 * jailbreak exemplars. The domain check compares the query against the closest indexed
 * chunk. Nothing here mutates state apart from the exemplar embedding cache.
 */
@Injectable()
export class GuardrailsService {
    private readonly logger = new Logger(GuardrailsService.name);
    private exemplarEmbeddings: Promise<number[][]> | null = null;

    constructor(
        @Inject(guardrailsConfig.KEY) private readonly settings: GuardrailsSettings,
        @Inject(EMBEDDING_PROVIDER) private readonly embeddings: EmbeddingProvider,
        private readonly index: DocumentIndexService,
    ) { }

    async classify(queryText: string, queryEmbedding: readonly number[]): Promise<Classification> {
        const rule = this.matchJailbreakPattern(queryText);
        if (rule) {
            this.logger.warn(`🚫 Jailbreak pattern matched: ${rule.name}`);
            return {
                label: 'jailbreak',
                score: 1,
                reason: `Potential ${rule.name}: ${rule.description}`,
                rule: rule.name,
            };
        }

        const jailbreakSimilarity = await this.jailbreakSimilarity(queryEmbedding);
        if (jailbreakSimilarity >= this.settings.jailbreakThreshold) {
            this.logger.warn(`🚫 Query resembles a known jailbreak (similarity ${jailbreakSimilarity.toFixed(3)})`);
            return {
                label: 'jailbreak',
                score: jailbreakSimilarity,
                reason: 'Query closely resembles a known jailbreak attempt',
            };
        }

        const domainSimilarity = await this.domainSimilarity(queryEmbedding);
        if (domainSimilarity === null) {
            return { label: 'in_domain', score: 0, reason: 'Document index is empty' };
        }

        if (domainSimilarity < this.settings.domainThreshold) {
            this.logger.log(`🧭 Out-of-domain query (similarity ${domainSimilarity.toFixed(3)})`);
            return {
                label: 'out_of_domain',
                score: domainSimilarity,
                reason: `Best knowledge similarity ${domainSimilarity.toFixed(3)} is below ${this.settings.domainThreshold}`,
            };
        }

        return {
            label: 'in_domain',
            score: domainSimilarity,
            reason: `Best knowledge similarity ${domainSimilarity.toFixed(3)}`,
        };
    }

    private matchJailbreakPattern(queryText: string): PatternRule | undefined {
        return this.settings.jailbreakPatterns.find(({ pattern }) => pattern.test(queryText));
    }

    private async jailbreakSimilarity(queryEmbedding: readonly number[]): Promise<number> {
        if (this.settings.jailbreakExemplars.length === 0) {
            return 0;
        }

        const exemplars = await this.loadExemplarEmbeddings();
        let best = 0;
        for (const exemplar of exemplars) {
            if (exemplar.length !== queryEmbedding.length) {
                continue;
            }
            best = Math.max(best, cosineSimilarity(queryEmbedding, exemplar));
        }
        return best;
    }

    /**
     * Best similarity to any indexed chunk, or null when the index is empty.
     */
    private async domainSimilarity(queryEmbedding: readonly number[]): Promise<number | null> {
        try {
            const [best] = await this.index.search(queryEmbedding, 1);
            return best ? best.score : null;
        } catch (error) {
            if (error instanceof EmptyIndexError) {
                return null;
            }
            throw error;
        }
    }

    /**
     * Exemplars are embedded once and shared by every query; a failed load is retried
     * on the next call.
     */
    private loadExemplarEmbeddings(): Promise<number[][]> {
        if (!this.exemplarEmbeddings) {
            this.logger.log(`🔄 Embedding ${this.settings.jailbreakExemplars.length} jailbreak exemplars`);
            this.exemplarEmbeddings = this.embeddings
                .embedBatch(this.settings.jailbreakExemplars)
                .catch((error: unknown) => {
                    this.exemplarEmbeddings = null;
                    throw error;
                });
        }
        return this.exemplarEmbeddings;
    }
}
