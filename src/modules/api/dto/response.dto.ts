import { ApiProperty } from '@nestjs/swagger';
import { QueryResult, QueryStatus } from '../types';

export class QueryResponseDto {
  @ApiProperty({ description: 'Answer or guardrail notice.' })
  response!: string;

  @ApiProperty({ description: 'Citation tags of the passages used for the answer.', type: [String] })
  sources!: string[];

  @ApiProperty()
  is_jailbreak!: boolean;

  @ApiProperty()
  is_out_of_domain!: boolean;

  @ApiProperty({ enum: ['answered', 'security_notice', 'domain_notice', 'no_context', 'generation_unavailable'] })
  status!: QueryStatus;

  static fromResult(result: QueryResult): QueryResponseDto {
    const dto = new QueryResponseDto();
    dto.response = result.response;
    dto.sources = result.sources;
    dto.is_jailbreak = result.isJailbreak;
    dto.is_out_of_domain = result.isOutOfDomain;
    dto.status = result.status;
    return dto;
  }
}
