import { Module } from '@nestjs/common';
import { KnowledgeModule } from '../knowledge/knowledge.module';
import { ProvidersModule } from './providers/providers.module';
import { ChunkerService } from './services/chunker.service';
import { GenerationService } from './services/generation.service';
import { PromptBuilderService } from './services/prompt-builder.service';
import { RetrieverService } from './services/retriever.service';

/**
 * RAG Module - retrieval, prompt assembly and generation
 */
@Module({
    imports: [KnowledgeModule, ProvidersModule],
    providers: [
        RetrieverService,
        PromptBuilderService,
        GenerationService,
        ChunkerService,
    ],
    exports: [
        RetrieverService,
        PromptBuilderService,
        GenerationService,
        ChunkerService,
        ProvidersModule,
    ],
})
export class RagModule { }
