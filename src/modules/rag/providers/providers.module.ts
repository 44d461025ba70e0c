import { Module } from '@nestjs/common';
import { EMBEDDING_PROVIDER, GENERATION_PROVIDER } from './provider.interfaces';
import { OpenAIEmbeddingProvider } from './openai-embedding.provider';
import { OpenAIGenerationProvider } from './openai-generation.provider';

/**
 * Binds the capability tokens to the OpenAI implementations
 */
@Module({
    providers: [
        { provide: EMBEDDING_PROVIDER, useClass: OpenAIEmbeddingProvider },
        { provide: GENERATION_PROVIDER, useClass: OpenAIGenerationProvider },
    ],
    exports: [EMBEDDING_PROVIDER, GENERATION_PROVIDER],
})
export class ProvidersModule { }
