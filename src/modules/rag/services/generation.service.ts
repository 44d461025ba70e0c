import { Inject, Injectable, Logger } from '@nestjs/common';
import ragConfig, { GenerationSettings, RagSettings } from '../../../config/rag.config';
import {
    GenerationAbortedError,
    GenerationProviderError,
    GenerationUnavailableError,
    OperationTimeoutError,
} from '../../../common/errors/rag.errors';
import { raceWithSignal, sleep, withTimeout } from '../../../common/utils/async.util';
import { errorMessage } from '../../../common/utils/error.util';
import { GENERATION_PROVIDER, GenerationProvider } from '../providers/provider.interfaces';
import { GenerationOptions, GenerationResult } from '../types';

/**
 * Generation Service - retry, timeout and backoff around the generation provider
 */
@Injectable()
export class GenerationService {
    private readonly logger = new Logger(GenerationService.name);
    private readonly settings: GenerationSettings;

    constructor(
        @Inject(GENERATION_PROVIDER) private readonly provider: GenerationProvider,
        @Inject(ragConfig.KEY) ragSettings: RagSettings,
    ) {
        this.settings = ragSettings.generation;
    }

    /**
     * Generate text for a prompt.
     *
     * Transient failures (timeouts, connection errors, 408/409/429/5xx) are retried up to
     * `maxRetries` times with exponential backoff. A non-transient failure ends the call
     * after that attempt. Aborting `signal` cancels the in-flight attempt or the pending
     * backoff and rejects with GenerationAbortedError.
     */
    async generate(prompt: string, options: GenerationOptions = {}): Promise<GenerationResult> {
        const { signal } = options;
        const timeoutMs = options.timeoutMs ?? this.settings.timeoutMs;
        const maxAttempts = this.settings.maxRetries + 1;
        let lastError: unknown;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            if (signal?.aborted) {
                throw new GenerationAbortedError(attempt - 1);
            }

            try {
                const text = await this.attempt(prompt, attempt, timeoutMs, signal);
                if (attempt > 1) {
                    this.logger.log(`✅ Generation succeeded on attempt ${attempt}`);
                }
                return { text, attempts: attempt, model: this.provider.model };
            } catch (error) {
                if (signal?.aborted) {
                    throw new GenerationAbortedError(attempt);
                }
                if (!this.isTransient(error)) {
                    this.logger.error(`❌ Generation failed with a non-transient error: ${errorMessage(error)}`);
                    throw new GenerationUnavailableError('non_transient', attempt, error);
                }
                lastError = error;
                this.logger.warn(`⚠️ Generation attempt ${attempt}/${maxAttempts} failed: ${errorMessage(error)}`);
            }

            if (attempt < maxAttempts) {
                await sleep(this.settings.retryDelayMs * 2 ** (attempt - 1), signal);
            }
        }

        if (signal?.aborted) {
            throw new GenerationAbortedError(maxAttempts);
        }
        this.logger.error(`❌ Generation unavailable after ${maxAttempts} attempts`);
        throw new GenerationUnavailableError('retries_exhausted', maxAttempts, lastError);
    }

    /**
     * One provider call under its own AbortController, cancelled by the timeout or by
     * the caller's signal.
     */
    private async attempt(
        prompt: string,
        attempt: number,
        timeoutMs: number,
        signal?: AbortSignal,
    ): Promise<string> {
        const controller = new AbortController();
        const forwardAbort = () => controller.abort();
        signal?.addEventListener('abort', forwardAbort, { once: true });

        try {
            return await withTimeout(
                () =>
                    raceWithSignal(
                        this.provider.generate(prompt, { signal: controller.signal }),
                        controller.signal,
                        () => new GenerationAbortedError(attempt),
                    ),
                timeoutMs,
                'Generation',
                () => controller.abort(),
            );
        } finally {
            signal?.removeEventListener('abort', forwardAbort);
        }
    }

    private isTransient(error: unknown): boolean {
        if (error instanceof OperationTimeoutError) {
            return true;
        }
        // The attempt's own controller fired without the caller aborting: a timeout.
        if (error instanceof GenerationAbortedError) {
            return true;
        }
        return error instanceof GenerationProviderError && error.transient;
    }
}
