import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

export default registerAs('minio', () => {
  const env = loadEnv();
  return {
    enabled: env.INGESTION_EVENTS_ENABLED,
    endpoint: env.MINIO_ENDPOINT ?? 'localhost',
    port: env.MINIO_PORT,
    useSSL: env.MINIO_USE_SSL,
    accessKey: env.MINIO_ACCESS_KEY ?? '',
    secretKey: env.MINIO_SECRET_KEY ?? '',
    bucket: env.MINIO_BUCKET,
  };
});
