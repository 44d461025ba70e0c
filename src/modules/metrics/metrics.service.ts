import { Injectable } from '@nestjs/common';
import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import { DocumentIndexService } from '../knowledge/document-index.service';

export interface QueryObservation {
    outcome: string;
    durationMs: number;
    isJailbreak: boolean;
    isOutOfDomain: boolean;
}

export interface SessionStats {
    sessionStart: string;
    sessionDurationSeconds: number;
    totalQueries: number;
    averageResponseTimeSeconds: number;
    jailbreakAttempts: number;
    outOfDomainQueries: number;
    errorCount: number;
}

/**
 * Prometheus metrics plus in-memory session statistics.
 *
 * Metrics live on a registry owned by this service rather than the prom-client
 * default, so independent instances never collide on metric names.
 */
@Injectable()
export class MetricsService {
    private readonly registry = new Registry();
    private readonly queriesTotal: Counter<'outcome'>;
    private readonly queryDuration: Histogram<'outcome'>;
    private readonly generationAttempts: Counter;

    private readonly sessionStart = new Date();
    private queryCount = 0;
    private totalResponseSeconds = 0;
    private jailbreakAttempts = 0;
    private outOfDomainQueries = 0;
    private errorCount = 0;

    constructor(index: DocumentIndexService) {
        this.queriesTotal = new Counter({
            name: 'rag_queries_total',
            help: 'Queries handled since server start, by outcome',
            labelNames: ['outcome'] as const,
            registers: [this.registry],
        });

        this.queryDuration = new Histogram({
            name: 'rag_query_duration_seconds',
            help: 'End-to-end query time, in seconds',
            labelNames: ['outcome'] as const,
            buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60],
            registers: [this.registry],
        });

        this.generationAttempts = new Counter({
            name: 'rag_generation_attempts_total',
            help: 'Calls made to the generation provider, retries included',
            registers: [this.registry],
        });

        new Gauge({
            name: 'rag_index_chunks',
            help: 'Chunks currently held by the document index',
            registers: [this.registry],
            collect() {
                this.set(index.size);
            },
        });
    }

    get contentType(): string {
        return this.registry.contentType;
    }

    /**
     * Return the dump text of Prometheus metrics.
     */
    async metrics(): Promise<string> {
        return this.registry.metrics();
    }

    recordQuery({ outcome, durationMs, isJailbreak, isOutOfDomain }: QueryObservation): void {
        const seconds = durationMs / 1000;
        this.queriesTotal.labels({ outcome }).inc();
        this.queryDuration.labels({ outcome }).observe(seconds);

        this.queryCount++;
        this.totalResponseSeconds += seconds;
        if (isJailbreak) {
            this.jailbreakAttempts++;
        }
        if (isOutOfDomain) {
            this.outOfDomainQueries++;
        }
    }

    recordGenerationAttempts(attempts: number): void {
        if (attempts > 0) {
            this.generationAttempts.inc(attempts);
        }
    }

    recordError(): void {
        this.errorCount++;
    }

    sessionStats(now: Date = new Date()): SessionStats {
        return {
            sessionStart: this.sessionStart.toISOString(),
            sessionDurationSeconds: (now.getTime() - this.sessionStart.getTime()) / 1000,
            totalQueries: this.queryCount,
            averageResponseTimeSeconds: this.queryCount ? this.totalResponseSeconds / this.queryCount : 0,
            jailbreakAttempts: this.jailbreakAttempts,
            outOfDomainQueries: this.outOfDomainQueries,
            errorCount: this.errorCount,
        };
    }
}
