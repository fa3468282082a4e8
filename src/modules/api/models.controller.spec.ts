import { buildOpenAIConfig, buildRagSettings, buildVectorStoreConfig } from '../../../test/fixtures';
import { OpenAIService } from '../rag/services/openai.service';
import { ModelsController } from './models.controller';

describe('ModelsController', () => {
  it('describes the configured models and pipeline settings', () => {
    const vectorStore = buildVectorStoreConfig({ dimensions: 1536, collection: 'reports' });
    const controller = new ModelsController(
      new OpenAIService(buildOpenAIConfig(), vectorStore),
      buildRagSettings(),
      vectorStore,
    );

    expect(controller.getModelInfo()).toEqual({
      llm: { provider: 'openai', model: 'gpt-4o-mini', temperature: 0.1, maxTokens: 1000 },
      embedding: { model: 'text-embedding-3-small', dimensions: 1536 },
      vectorStore: { driver: 'memory', collection: 'reports' },
      chunking: { chunkSize: 300, chunkOverlap: 50, maxChunkSize: 500 },
    });
  });
});
