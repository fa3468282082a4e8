import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('openai', () => {
  const env = loadEnv();
  return {
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.OPENAI_BASE_URL,
    chatModel: env.OPENAI_MODEL,
    embeddingModel: env.OPENAI_EMBEDDING_MODEL,
    temperature: env.OPENAI_TEMPERATURE,
    maxTokens: env.OPENAI_MAX_TOKENS,
    maxRetries: env.OPENAI_MAX_RETRIES,
    retryDelayMs: env.OPENAI_RETRY_DELAY_MS,
  };
});
