import { Controller, Get, Res } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';
import { Response } from 'express';
import { MetricsService, SessionStats } from './metrics.service';

@Controller()
export class MetricsController {
    constructor(private readonly metricsService: MetricsService) { }

    @Get('metrics')
    @ApiOperation({ summary: 'Prometheus metrics', description: 'Exposes query, generation and index metrics in Prometheus text format.' })
    @ApiResponse({ status: 200, description: 'Prometheus exposition text.' })
    async metrics(@Res({ passthrough: true }) res: Response): Promise<string> {
        res.type(this.metricsService.contentType);
        return this.metricsService.metrics();
    }

    @Get('stats')
    @ApiOperation({ summary: 'Session statistics', description: 'Query counts and timings since the server started.' })
    @ApiResponse({ status: 200, description: 'Session statistics.' })
    stats(): SessionStats {
        return this.metricsService.sessionStats();
    }
}
