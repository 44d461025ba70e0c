import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { KnowledgeModule } from '../knowledge/knowledge.module';
import { HealthController } from './health.controller';
import { KnowledgeIndexHealthIndicator } from './knowledge-index.health';

@Module({
  imports: [TerminusModule, KnowledgeModule],
  controllers: [HealthController],
  providers: [KnowledgeIndexHealthIndicator],
})
export class HealthModule { }
