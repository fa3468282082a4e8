import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('redis', () => {
  const env = loadEnv();
  return {
    enabled: env.EMBEDDING_CACHE_ENABLED,
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    ttlSeconds: env.EMBEDDING_CACHE_TTL_SECONDS,
  };
});
