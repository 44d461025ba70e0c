import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';

export class QueryDto {
  // Optional at the DTO level so a missing query surfaces as "No query provided".
  @ApiPropertyOptional({ description: 'The banking question to answer.', example: 'What is the minimum loan amount?' })
  @IsOptional()
  @IsString()
  query?: string;
}
