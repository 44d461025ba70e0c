import { Inject, Injectable, Logger } from '@nestjs/common';
import OpenAI from 'openai';
import openaiConfig, { OpenAISettings } from '../../../config/openai.config';
import { GenerationProviderError } from '../../../common/errors/rag.errors';
import { GenerationProvider, ProviderCallOptions } from './provider.interfaces';

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

export function isTransientStatus(status: number): boolean {
    return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/**
 * Map SDK failures onto the provider error contract.
 */
export function toGenerationProviderError(error: unknown): unknown {
    if (error instanceof OpenAI.APIUserAbortError) {
        return error;
    }
    // Connection and timeout errors carry no status.
    if (error instanceof OpenAI.APIConnectionError) {
        return new GenerationProviderError(error.message, true);
    }
    if (error instanceof OpenAI.APIError) {
        const status = error.status;
        if (status === undefined) {
            return new GenerationProviderError(error.message, true);
        }
        return new GenerationProviderError(error.message, isTransientStatus(status), status);
    }
    return error;
}

/**
 * OpenAI chat completions as a single-prompt generator. SDK retries are disabled: the
 * generation client owns the retry budget.
 */
@Injectable()
export class OpenAIGenerationProvider implements GenerationProvider {
    private readonly logger = new Logger(OpenAIGenerationProvider.name);
    private readonly client: OpenAI;

    constructor(@Inject(openaiConfig.KEY) private readonly settings: OpenAISettings) {
        this.client = new OpenAI({
            apiKey: settings.apiKey,
            baseURL: settings.baseUrl,
            maxRetries: 0,
        });
        this.logger.log(`💬 Chat model: ${settings.chatModel}`);
    }

    get model(): string {
        return this.settings.chatModel;
    }

    async generate(prompt: string, options?: ProviderCallOptions): Promise<string> {
        try {
            const response = await this.client.chat.completions.create(
                {
                    model: this.settings.chatModel,
                    messages: [{ role: 'user', content: prompt }],
                    temperature: this.settings.temperature,
                    max_tokens: this.settings.maxTokens,
                },
                { signal: options?.signal },
            );

            this.logger.debug(`📊 Tokens used: ${response.usage?.total_tokens ?? 0}`);
            return response.choices[0]?.message.content ?? '';
        } catch (error) {
            throw toGenerationProviderError(error);
        }
    }
}
