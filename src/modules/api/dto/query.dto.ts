import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { Metadata } from '../../rag/types';
import { IsMetadataFilter } from './is-metadata-filter';

export class QueryDto {
  @ApiProperty({ description: 'The question to answer from the indexed documents.', example: 'How did revenue change in Q3?' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  query!: string;

  @ApiPropertyOptional({ description: 'Number of chunks to retrieve.', minimum: 1, maximum: 50, example: 5 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  topK?: number;

  @ApiPropertyOptional({
    description: 'Equality filters on chunk metadata.',
    type: 'object',
    additionalProperties: true,
    example: { fileName: 'q3-report.txt' },
  })
  @IsOptional()
  @IsMetadataFilter()
  filters?: Metadata;

  @ApiPropertyOptional({ description: 'Interleave sources before answering.', default: true })
  @IsOptional()
  @IsBoolean()
  rerank?: boolean;
}
