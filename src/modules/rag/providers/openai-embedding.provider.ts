import { Inject, Injectable, Logger } from '@nestjs/common';
import OpenAI from 'openai';
import openaiConfig, { OpenAISettings } from '../../../config/openai.config';
import { errorMessage } from '../../../common/utils/error.util';
import { EmbeddingProvider, ProviderCallOptions } from './provider.interfaces';

/**
 * OpenAI embeddings. Retries and timeouts are delegated to the SDK.
 */
@Injectable()
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    private readonly logger = new Logger(OpenAIEmbeddingProvider.name);
    private readonly client: OpenAI;

    constructor(@Inject(openaiConfig.KEY) private readonly settings: OpenAISettings) {
        this.client = new OpenAI({
            apiKey: settings.apiKey,
            baseURL: settings.baseUrl,
            timeout: settings.embeddingTimeoutMs,
            maxRetries: settings.embeddingMaxRetries,
        });
        this.logger.log(`📊 Embedding model: ${settings.embeddingModel}`);
    }

    async embed(text: string, options?: ProviderCallOptions): Promise<number[]> {
        const [embedding] = await this.embedBatch([text], options);
        return embedding;
    }

    async embedBatch(texts: string[], options?: ProviderCallOptions): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        try {
            this.logger.debug(`🔄 Generating embeddings for ${texts.length} texts`);

            const response = await this.client.embeddings.create(
                {
                    model: this.settings.embeddingModel,
                    input: texts,
                    encoding_format: 'float',
                },
                { signal: options?.signal },
            );

            return [...response.data]
                .sort((a, b) => a.index - b.index)
                .map((item) => item.embedding);
        } catch (error) {
            this.logger.error(`❌ Failed to generate embeddings: ${errorMessage(error)}`);
            throw error;
        }
    }
}
