import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';
import ingestionConfig, { IngestionSettings } from '../../config/ingestion.config';
import { KnowledgeModule } from '../knowledge/knowledge.module';
import { RagModule } from '../rag/rag.module';
import { IngestionController } from './ingestion.controller';
import { IngestionService } from './ingestion.service';

/**
 * Ingestion Module - uploads, manual additions and the startup seed
 */
@Module({
    imports: [
        KnowledgeModule,
        RagModule,
        MulterModule.registerAsync({
            inject: [ingestionConfig.KEY],
            useFactory: (settings: IngestionSettings) => ({
                limits: { fileSize: settings.uploadMaxBytes, files: 1 },
            }),
        }),
    ],
    controllers: [IngestionController],
    providers: [IngestionService],
})
export class IngestionModule { }
