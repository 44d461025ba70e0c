import { Body, Controller, HttpCode, Logger, Post, UseFilters, UsePipes, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';
import { QueryDto } from './dto/query.dto';
import { QueryResponseDto } from './dto/response.dto';
import { QueryExceptionFilter } from './filters/query-exception.filter';
import { QueryService } from './query.service';

@Controller()
@UseFilters(QueryExceptionFilter)
export class QueryController {
  private readonly logger = new Logger(QueryController.name);

  constructor(private readonly queryService: QueryService) { }

  @Post('query')
  @HttpCode(200)
  @ApiOperation({ summary: 'Ask the banking assistant', description: 'Runs the question through the guardrails and the RAG pipeline.' })
  @ApiResponse({ status: 200, description: 'Answer or guardrail notice.', type: QueryResponseDto })
  @ApiResponse({ status: 400, description: 'Missing or invalid query.' })
  @ApiResponse({ status: 504, description: 'The query deadline expired.' })
  @UsePipes(new ValidationPipe({ transform: true }))
  async query(@Body() queryDto: QueryDto): Promise<QueryResponseDto> {
    const requestStart = Date.now();
    this.logger.log('🌐 HTTP REQUEST: Query received');

    const result = await this.queryService.query(queryDto.query ?? '');

    this.logger.log(`🌐 HTTP RESPONSE: ${result.status} in ${Date.now() - requestStart}ms`);
    return QueryResponseDto.fromResult(result);
  }
}
