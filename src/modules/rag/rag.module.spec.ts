import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { KeywordEmbeddingProvider, StubAnswerGenerator } from '../../../test/fixtures';
import { loadEnv } from '../../config/env.schema';
import appConfig from '../../config/app.config';
import openaiConfig from '../../config/openai.config';
import ragConfig from '../../config/rag.config';
import redisConfig from '../../config/redis.config';
import vectorStoreConfig from '../../config/vector-store.config';
import { AnswerGenerator, EmbeddingProvider } from './collaborators';
import { RagModule } from './rag.module';
import { RagService } from './services/rag.service';

describe('RagModule', () => {
  const originalEnv = process.env;
  const generator = new StubAnswerGenerator('Revenue grew by ten percent [1].');
  let moduleRef: TestingModule;

  beforeAll(async () => {
    process.env = {
      ...originalEnv,
      OPENAI_API_KEY: 'test-secret',
      VECTOR_STORE_DRIVER: 'memory',
      EMBEDDING_CACHE_ENABLED: 'false',
      INGESTION_EVENTS_ENABLED: 'false',
    };

    moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [appConfig, ragConfig, openaiConfig, vectorStoreConfig, redisConfig],
          validate: (config) => loadEnv(config),
        }),
        RagModule,
      ],
    })
      .overrideProvider(EmbeddingProvider)
      .useValue(new KeywordEmbeddingProvider(['revenue', 'costs', 'hiring']))
      .overrideProvider(AnswerGenerator)
      .useValue(generator)
      .compile();
  });

  afterAll(async () => {
    await moduleRef.close();
    process.env = originalEnv;
  });

  it('indexes documents and answers with citations through the wired services', async () => {
    const rag = moduleRef.get(RagService);

    const results = await rag.indexDocuments([
      { fileName: 'q3.txt', filePath: 'reports/q3.txt', content: Buffer.from('Revenue grew by ten percent. Costs were flat.') },
      { fileName: 'hr.txt', filePath: 'reports/hr.txt', content: Buffer.from('Hiring slowed in March.') },
    ]);
    expect(results.map((result) => result.status)).toEqual(['success', 'success']);

    const answer = await rag.query({ query: 'What happened to revenue?' });

    expect(answer.sources.map((source) => source.fileName)).toEqual(['q3.txt', 'hr.txt']);
    expect(answer.citations).toEqual([1]);
    expect(answer.citationMap[1].fileName).toBe('q3.txt');
    expect(answer.citationErrors).toEqual([]);
    expect(answer.numSources).toBe(2);
    expect(generator.prompts[0].userPrompt).toContain('[1] q3.txt - Page 1');
  });

  it('reports the configured collaborators in its statistics', async () => {
    const stats = await moduleRef.get(RagService).getStats();

    expect(stats).toEqual({
      totalChunks: 2,
      collectionName: 'documents',
      vectorStoreDriver: 'memory',
      embeddingModel: 'keyword-test-model',
      llmModel: 'stub-test-model',
    });
  });
});
