import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

export const envSchema = z
  .object({
    // Application
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

    // Chunking, retrieval and citation pipeline
    RAG_CHUNK_SIZE: z.coerce.number().int().min(50).max(1000).default(300),
    RAG_CHUNK_OVERLAP: z.coerce.number().int().min(0).max(200).default(50),
    RAG_MAX_CHUNK_SIZE: z.coerce.number().int().min(100).default(500),
    RAG_TOP_K: z.coerce.number().int().min(1).max(20).default(5),
    RAG_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
    RAG_RERANK_STRATEGY: z.string().default('diversity'),
    RAG_MAX_EXCERPT_LENGTH: z.coerce.number().int().positive().default(800),
    RAG_EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(32),
    RAG_STRICT_CITATIONS: booleanFlag,
    RAG_SENTENCE_LOCALE: z.string().default('en'),
    RAG_TOKENIZER_ENCODING: z.enum(['cl100k_base', 'o200k_base', 'p50k_base', 'r50k_base']).default('cl100k_base'),

    // OpenAI
    OPENAI_API_KEY: z.string().min(1),
    OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
    OPENAI_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
    OPENAI_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),

    // Vector store
    VECTOR_STORE_DRIVER: z.enum(['milvus', 'memory']).default('milvus'),
    MILVUS_ENDPOINT: z.string().url().default('http://localhost:19530'),
    MILVUS_TOKEN: z.string().default(''),
    MILVUS_COLLECTION: z.string().regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/).default('documents'),
    MILVUS_TIMEOUT: z.coerce.number().int().positive().default(60000),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),

    // Embedding cache
    EMBEDDING_CACHE_ENABLED: booleanFlag,
    REDIS_HOST: z.string().default('localhost'),
    REDIS_PORT: z.coerce.number().int().positive().default(6379),
    EMBEDDING_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),

    // Ingestion events (Kafka + MinIO)
    INGESTION_EVENTS_ENABLED: booleanFlag,
    KAFKA_BROKER: z.string().optional(),
    KAFKA_CLIENT_ID: z.string().default('cited-retrieval'),
    KAFKA_CONSUMER_GROUP_ID: z.string().default('cited-retrieval-ingestion'),
    KAFKA_DOCUMENT_INGESTION_TOPIC: z.string().default('document-ingestion-events'),
    MINIO_ENDPOINT: z.string().optional(),
    MINIO_PORT: z.coerce.number().int().positive().default(9000),
    MINIO_USE_SSL: booleanFlag,
    MINIO_ACCESS_KEY: z.string().optional(),
    MINIO_SECRET_KEY: z.string().optional(),
    MINIO_BUCKET: z.string().default('documents'),
  })
  .superRefine((env, ctx) => {
    if (env.RAG_CHUNK_OVERLAP >= env.RAG_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RAG_CHUNK_OVERLAP'],
        message: 'RAG_CHUNK_OVERLAP must be smaller than RAG_CHUNK_SIZE',
      });
    }
    if (env.RAG_MAX_CHUNK_SIZE < env.RAG_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RAG_MAX_CHUNK_SIZE'],
        message: 'RAG_MAX_CHUNK_SIZE must not be smaller than RAG_CHUNK_SIZE',
      });
    }
    if (env.INGESTION_EVENTS_ENABLED) {
      for (const name of ['KAFKA_BROKER', 'MINIO_ENDPOINT', 'MINIO_ACCESS_KEY', 'MINIO_SECRET_KEY'] as const) {
        if (!env[name]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [name],
            message: `${name} is required when INGESTION_EVENTS_ENABLED=true`,
          });
        }
      }
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Parses the process environment. Config namespaces call this so that they
 * see the same defaults and coercions as the startup validation.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new Error(`Environment validation failed: ${result.error.message}`);
  }
  return result.data;
}
