import { Module } from '@nestjs/common';
import { KafkaModule } from '../kafka/kafka.module';
import { MinioModule } from '../minio/minio.module';
import { RagModule } from '../rag/rag.module';
import { DocumentsController } from './documents.controller';
import { ModelsController } from './models.controller';
import { QueryController } from './query.controller';

/**
 * API Module - query, document and statistics endpoints
 */
@Module({
  imports: [RagModule, KafkaModule, MinioModule],
  controllers: [QueryController, DocumentsController, ModelsController],
})
export class ApiModule { }
