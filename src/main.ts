import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigType } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import appConfig from './config/app.config';
import { KafkaService } from './modules/kafka/kafka.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const logger = app.get(Logger);
  app.useLogger(logger);

  // Enable graceful shutdown
  app.enableShutdownHooks();

  const kafkaService = app.get(KafkaService);
  if (kafkaService.isEnabled()) {
    app.connectMicroservice(kafkaService.getOptions());
    await app.startAllMicroservices();
  }

  const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Cited Retrieval API')
      .setDescription('Document indexing and question answering with validated citations')
      .setVersion('1.0')
      .build(),
  );
  SwaggerModule.setup('api', app, document);

  await app.listen(config.port, config.host);

  const url = await app.getUrl();
  logger.log(`🚀 Application is running on: ${url}`);
  logger.log(`📚 Swagger UI available at: ${url}/api`);
  if (kafkaService.isEnabled()) {
    logger.log('✅ Kafka ingestion consumer started.');
  }
}

bootstrap().catch((error: unknown) => {
  console.error('Application failed to start', error);
  process.exit(1);
});
