import { Controller, Get, Inject } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import ragConfig, { RagSettings } from '../../config/rag.config';
import vectorStoreConfig from '../../config/vector-store.config';
import { OpenAIModelInfo, OpenAIService } from '../rag/services/openai.service';

export interface ModelInfo extends OpenAIModelInfo {
  vectorStore: { driver: string; collection: string };
  chunking: { chunkSize: number; chunkOverlap: number; maxChunkSize: number };
}

@ApiTags('models')
@Controller('models')
export class ModelsController {
  constructor(
    private readonly openaiService: OpenAIService,
    @Inject(ragConfig.KEY) private readonly settings: RagSettings,
    @Inject(vectorStoreConfig.KEY) private readonly vectorStore: ConfigType<typeof vectorStoreConfig>,
  ) { }

  @Get('info')
  @ApiOperation({ summary: 'Configured models', description: 'Chat and embedding models, vector store and chunking settings.' })
  @ApiResponse({ status: 200, description: 'Model and pipeline configuration.' })
  getModelInfo(): ModelInfo {
    return {
      ...this.openaiService.getModelInfo(),
      vectorStore: {
        driver: this.vectorStore.driver,
        collection: this.vectorStore.collection,
      },
      chunking: {
        chunkSize: this.settings.chunkSize,
        chunkOverlap: this.settings.chunkOverlap,
        maxChunkSize: this.settings.maxChunkSize,
      },
    };
  }
}
