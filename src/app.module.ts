import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { loadEnv } from './config/env.schema';
import appConfig from './config/app.config';
import kafkaConfig from './config/kafka.config';
import minioConfig from './config/minio.config';
import openaiConfig from './config/openai.config';
import ragConfig from './config/rag.config';
import redisConfig from './config/redis.config';
import vectorStoreConfig from './config/vector-store.config';
import { ApiModule } from './modules/api/api.module';
import { HealthModule } from './modules/health/health.module';
import { KafkaModule } from './modules/kafka/kafka.module';
import { RagModule } from './modules/rag/rag.module';

/**
 * App Module - Main application module
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env`,
      load: [appConfig, ragConfig, openaiConfig, vectorStoreConfig, redisConfig, kafkaConfig, minioConfig],
      validate: (config) => loadEnv(config),
    }),
    LoggerModule.forRootAsync({
      inject: [appConfig.KEY],
      useFactory: (config: ConfigType<typeof appConfig>) => ({
        pinoHttp: {
          level: config.logLevel,
          autoLogging: config.nodeEnv !== 'test',
        },
      }),
    }),
    RagModule,
    ApiModule,
    KafkaModule,
    HealthModule,
  ],
})
export class AppModule { }
