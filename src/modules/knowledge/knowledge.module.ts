import { Module } from '@nestjs/common';
import { ProvidersModule } from '../rag/providers/providers.module';
import { DocumentIndexService } from './document-index.service';

/**
 * Knowledge Module - the process-wide document index
 */
@Module({
    imports: [ProvidersModule],
    providers: [DocumentIndexService],
    exports: [DocumentIndexService],
})
export class KnowledgeModule { }
