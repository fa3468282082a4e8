import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('vectorStore', () => {
  const env = loadEnv();
  return {
    driver: env.VECTOR_STORE_DRIVER,
    endpoint: env.MILVUS_ENDPOINT,
    token: env.MILVUS_TOKEN,
    collection: env.MILVUS_COLLECTION,
    timeoutMs: env.MILVUS_TIMEOUT,
    dimensions: env.EMBEDDING_DIMENSIONS,
  };
});
