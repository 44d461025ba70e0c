import { Module } from '@nestjs/common';
import { KnowledgeModule } from '../knowledge/knowledge.module';
import { ProvidersModule } from '../rag/providers/providers.module';
import { GuardrailsService } from './guardrails.service';
import { ResponseValidatorService } from './response-validator.service';

@Module({
    imports: [KnowledgeModule, ProvidersModule],
    providers: [GuardrailsService, ResponseValidatorService],
    exports: [GuardrailsService, ResponseValidatorService],
})
export class GuardrailsModule { }
