import { Module } from '@nestjs/common';
import { KafkaService } from './kafka.service';
import { ConsumerController } from './consumer.controller';
import { ConsumerService } from './consumer.service';
import { RagModule } from '../rag/rag.module';
import { MinioModule } from '../minio/minio.module';

/**
 * Kafka Module - asynchronous document ingestion
 */
@Module({
  imports: [RagModule, MinioModule],
  controllers: [ConsumerController],
  providers: [KafkaService, ConsumerService],
  exports: [KafkaService],
})
export class KafkaModule { }
