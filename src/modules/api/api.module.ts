import { Module } from '@nestjs/common';
import { GuardrailsModule } from '../guardrails/guardrails.module';
import { MetricsModule } from '../metrics/metrics.module';
import { RagModule } from '../rag/rag.module';
import { QueryController } from './query.controller';
import { QueryService } from './query.service';

/**
 * API Module - the query endpoint and its orchestrator
 */
@Module({
  imports: [RagModule, GuardrailsModule, MetricsModule],
  controllers: [QueryController],
  providers: [QueryService],
})
export class ApiModule { }
