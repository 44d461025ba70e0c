import { Inject, Injectable, Logger } from '@nestjs/common';
import guardrailsConfig, { GuardrailsSettings } from '../../config/guardrails.config';
import ragConfig, { RagSettings } from '../../config/rag.config';
import {
  GenerationAbortedError,
  GenerationUnavailableError,
  QueryDeadlineExceededError,
  QueryValidationError,
} from '../../common/errors/rag.errors';
import { raceWithSignal } from '../../common/utils/async.util';
import { errorMessage } from '../../common/utils/error.util';
import { GuardrailsService } from '../guardrails/guardrails.service';
import { ResponseValidatorService } from '../guardrails/response-validator.service';
import { Classification } from '../guardrails/types';
import { MetricsService } from '../metrics/metrics.service';
import { EMBEDDING_PROVIDER, EmbeddingProvider } from '../rag/providers/provider.interfaces';
import { GenerationService } from '../rag/services/generation.service';
import { PromptBuilderService } from '../rag/services/prompt-builder.service';
import { RetrieverService } from '../rag/services/retriever.service';
import { GenerationResult } from '../rag/types';
import { QueryResult, QueryState, QueryStatus } from './types';

/**
 * Query Service - drives one query through the RAG pipeline.
 *
 * received → classified → (short_circuited | retrieved) → composed → generated →
 * validated → delivered. The query is embedded once; the vector feeds both the
 * guardrail classifier and the retriever. The whole run is bounded by the query
 * deadline, which aborts the in-flight embedding or generation call.
 */
@Injectable()
export class QueryService {
  private readonly logger = new Logger(QueryService.name);

  constructor(
    @Inject(ragConfig.KEY) private readonly rag: RagSettings,
    @Inject(guardrailsConfig.KEY) private readonly guardrails: GuardrailsSettings,
    @Inject(EMBEDDING_PROVIDER) private readonly embeddings: EmbeddingProvider,
    private readonly classifier: GuardrailsService,
    private readonly retriever: RetrieverService,
    private readonly promptBuilder: PromptBuilderService,
    private readonly generation: GenerationService,
    private readonly validator: ResponseValidatorService,
    private readonly metrics: MetricsService,
  ) { }

  async query(queryText: string): Promise<QueryResult> {
    const text = queryText.trim();
    if (!text) {
      throw new QueryValidationError('No query provided');
    }
    if (text.length > this.guardrails.maxQueryLength) {
      throw new QueryValidationError(`Query exceeds the maximum length of ${this.guardrails.maxQueryLength} characters`);
    }

    const startTime = Date.now();
    const controller = new AbortController();
    const deadline = setTimeout(() => controller.abort(), this.rag.queryDeadlineMs);

    this.logger.log(`🔍 QUERY START: "${text.substring(0, 80)}${text.length > 80 ? '...' : ''}"`);

    try {
      const result = await this.run(text, controller.signal);
      const totalTime = Date.now() - startTime;

      this.metrics.recordQuery({
        outcome: result.status,
        durationMs: totalTime,
        isJailbreak: result.isJailbreak,
        isOutOfDomain: result.isOutOfDomain,
      });
      this.logger.log(`🎯 QUERY COMPLETED: status=${result.status}, sources=${result.sources.length}, time=${totalTime}ms`);

      return result;
    } catch (error) {
      const totalTime = Date.now() - startTime;
      this.metrics.recordError();

      if (error instanceof QueryDeadlineExceededError || controller.signal.aborted) {
        this.metrics.recordQuery({ outcome: 'deadline_exceeded', durationMs: totalTime, isJailbreak: false, isOutOfDomain: false });
        this.logger.error(`⏱️ Query exceeded its ${this.rag.queryDeadlineMs}ms deadline`);
        throw error instanceof QueryDeadlineExceededError ? error : this.deadlineExceeded();
      }

      this.metrics.recordQuery({ outcome: 'error', durationMs: totalTime, isJailbreak: false, isOutOfDomain: false });
      this.logger.error(`❌ Query failed after ${totalTime}ms: ${errorMessage(error)}`);
      throw error;
    } finally {
      clearTimeout(deadline);
    }
  }

  private async run(text: string, signal: AbortSignal): Promise<QueryResult> {
    const states: QueryState[] = ['received'];
    const onDeadline = () => this.deadlineExceeded();
    const { notices } = this.guardrails;

    const embedding = await raceWithSignal(this.embeddings.embed(text, { signal }), signal, onDeadline);
    const classification = await raceWithSignal(this.classifier.classify(text, embedding), signal, onDeadline);
    states.push('classified');

    if (classification.label === 'jailbreak') {
      states.push('short_circuited');
      return this.deliver(states, 'security_notice', notices.security, [], classification);
    }
    if (classification.label === 'out_of_domain') {
      states.push('short_circuited');
      return this.deliver(states, 'domain_notice', notices.outOfDomain, [], classification);
    }

    const retrieved = await raceWithSignal(
      this.retriever.retrieve(embedding, this.rag.topK, this.rag.minSimilarity),
      signal,
      onDeadline,
    );
    states.push('retrieved');

    if (retrieved.length === 0) {
      this.logger.log('📭 No chunks above the similarity threshold');
      return this.deliver(states, 'no_context', notices.noContext, [], classification);
    }

    const prompt = this.promptBuilder.compose(text, retrieved, this.guardrails.systemInstructions);
    states.push('composed');

    let generated: GenerationResult;
    try {
      generated = await this.generation.generate(prompt.text, { signal });
    } catch (error) {
      if (error instanceof GenerationUnavailableError) {
        this.metrics.recordGenerationAttempts(error.attempts);
        this.logger.error(`❌ Generation unavailable (${error.reason}): ${errorMessage(error.lastError)}`);
        return this.deliver(states, 'generation_unavailable', notices.generationUnavailable, [], classification);
      }
      if (error instanceof GenerationAbortedError) {
        this.metrics.recordGenerationAttempts(error.attempts);
        throw this.deadlineExceeded();
      }
      throw error;
    }
    this.metrics.recordGenerationAttempts(generated.attempts);
    states.push('generated');

    const validated = this.validator.validate(generated.text);
    states.push('validated');

    if (!validated.text) {
      return this.deliver(states, 'no_context', notices.noContext, [], classification);
    }

    return this.deliver(states, 'answered', validated.text, prompt.sources, classification);
  }

  private deliver(
    states: QueryState[],
    status: QueryStatus,
    response: string,
    sources: string[],
    classification: Classification,
  ): QueryResult {
    return {
      status,
      response,
      sources,
      classification,
      isJailbreak: classification.label === 'jailbreak',
      isOutOfDomain: classification.label === 'out_of_domain',
      states: [...states, 'delivered'],
    };
  }

  private deadlineExceeded(): QueryDeadlineExceededError {
    return new QueryDeadlineExceededError(this.rag.queryDeadlineMs);
  }
}
