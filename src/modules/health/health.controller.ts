import { Controller, Get, Logger } from '@nestjs/common';
import { HealthCheck, HealthCheckResult, HealthCheckService } from '@nestjs/terminus';
import { KnowledgeIndexHealthIndicator } from './knowledge-index.health';

@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly health: HealthCheckService,
    private readonly knowledgeIndex: KnowledgeIndexHealthIndicator,
  ) { }

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    this.logger.debug('Health check endpoint called.');
    return this.health.check([
      () => this.knowledgeIndex.isHealthy('knowledge_index'),
    ]);
  }
}
