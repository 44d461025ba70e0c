import { Inject, Injectable, Logger } from '@nestjs/common';
import ragConfig, { RagSettings } from '../../../config/rag.config';
import { ScoredChunk } from '../../knowledge/types';
import { ComposedPrompt } from '../types';

export const ANSWER_CUE = 'Helpful Answer:';
const EMPTY_CONTEXT = '(none)';

/**
 * Prompt Builder Service - bounded prompt assembly for the RAG pipeline
 */
@Injectable()
export class PromptBuilderService {
    private readonly logger = new Logger(PromptBuilderService.name);
    private readonly maxPromptChars: number;

    constructor(@Inject(ragConfig.KEY) settings: RagSettings) {
        this.maxPromptChars = settings.maxPromptChars;
    }

    /**
     * Instructions, then a `Context:` section of `[Source: ...]` passages, then the
     * question and the answer cue.
     *
     * Passages are ordered best-first and dropped from the lowest-similarity end until
     * the prompt fits the character budget. Instructions and question are never cut,
     * so a prompt with no passages may still exceed the budget.
     */
    compose(
        query: string,
        chunks: ScoredChunk[],
        systemInstructions: string,
        maxChars: number = this.maxPromptChars,
    ): ComposedPrompt {
        const ranked = [...chunks].sort((a, b) => b.score - a.score);

        let included = ranked;
        let text = this.render(query, included, systemInstructions);
        while (text.length > maxChars && included.length > 0) {
            included = included.slice(0, -1);
            text = this.render(query, included, systemInstructions);
        }

        if (included.length < ranked.length) {
            this.logger.debug(`✂️ Dropped ${ranked.length - included.length} chunk(s) to fit ${maxChars} chars`);
        }

        return { text, chunks: included, sources: this.collectSources(included) };
    }

    private render(query: string, chunks: ScoredChunk[], systemInstructions: string): string {
        const context = chunks.length
            ? chunks.map(({ chunk }) => `[Source: ${chunk.source}]\n${chunk.text}`).join('\n\n')
            : EMPTY_CONTEXT;

        return `${systemInstructions}

Context:
${context}

Question: ${query}

${ANSWER_CUE}`;
    }

    private collectSources(chunks: ScoredChunk[]): string[] {
        return [...new Set(chunks.map(({ chunk }) => chunk.source))];
    }
}
