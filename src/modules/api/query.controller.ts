import { Body, Controller, Get, HttpCode, Logger, Post, UsePipes, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { toHttpException } from '../../common/errors/http-error.mapper';
import { RagService } from '../rag/services/rag.service';
import { RagAnswer, SystemStats } from '../rag/types';
import { QueryDto } from './dto/query.dto';

@ApiTags('query')
@Controller()
export class QueryController {
  private readonly logger = new Logger(QueryController.name);

  constructor(private readonly ragService: RagService) { }

  @Post('query')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Ask a question',
    description: 'Retrieves the most relevant chunks and answers with numbered citations mapped back to them.',
  })
  @ApiResponse({ status: 200, description: 'The cited answer, its sources and the citation map.' })
  @ApiResponse({ status: 400, description: 'Invalid query.' })
  @ApiResponse({ status: 502, description: 'Embedding, vector store or generation failure.' })
  @UsePipes(new ValidationPipe({ transform: true, whitelist: true }))
  async query(@Body() queryDto: QueryDto): Promise<RagAnswer> {
    const requestStart = Date.now();
    this.logger.log(`🌐 HTTP REQUEST: Query received (topK=${queryDto.topK ?? 'default'})`);

    try {
      const result = await this.ragService.query({
        query: queryDto.query,
        topK: queryDto.topK,
        filters: queryDto.filters,
        rerank: queryDto.rerank,
      });
      this.logger.log(`🌐 HTTP RESPONSE: ${result.citations.length} citations in ${Date.now() - requestStart}ms`);
      return result;
    } catch (error) {
      this.logger.error(`❌ Query failed after ${Date.now() - requestStart}ms`, error instanceof Error ? error.stack : undefined);
      throw toHttpException(error);
    }
  }

  @Get('stats')
  @ApiOperation({ summary: 'Index statistics', description: 'Stored chunk count, collection and the models in use.' })
  @ApiResponse({ status: 200, description: 'Current statistics.' })
  async getStats(): Promise<SystemStats> {
    try {
      return await this.ragService.getStats();
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
