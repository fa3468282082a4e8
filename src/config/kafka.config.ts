import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('kafka', () => {
  const env = loadEnv();
  return {
    enabled: env.INGESTION_EVENTS_ENABLED,
    broker: env.KAFKA_BROKER ?? '',
    clientId: env.KAFKA_CLIENT_ID,
    consumerGroupId: env.KAFKA_CONSUMER_GROUP_ID,
    documentIngestionTopic: env.KAFKA_DOCUMENT_INGESTION_TOPIC,
  };
});
