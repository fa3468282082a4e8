import { Injectable, Logger } from '@nestjs/common';
import { describeError } from '../../common/utils/error.util';
import { MinioService } from '../minio/minio.service';
import { IndexerService } from '../rag/services/indexer.service';
import { IndexingResult } from '../rag/types';
import { documentIngestionEventSchema, objectNameFromLocation } from './ingestion-event';

/**
 * Consumer Service - Kafka Document Ingestion
 */
@Injectable()
export class ConsumerService {
  private readonly logger = new Logger(ConsumerService.name);

  constructor(
    private readonly minioService: MinioService,
    private readonly indexer: IndexerService,
  ) { }

  /**
   * Malformed events and unreadable objects are logged and dropped so one
   * bad message never stalls the topic. Returns null in those cases.
   */
  async handleDocumentIngestion(message: unknown): Promise<IndexingResult | null> {
    const parsed = documentIngestionEventSchema.safeParse(message);
    if (!parsed.success) {
      this.logger.error(`Discarding malformed ingestion event: ${parsed.error.message}`);
      return null;
    }

    const event = parsed.data;
    this.logger.log(`--> Received document ingestion event for ${event.fileName}`);
    this.logger.debug(`Full event payload: ${JSON.stringify(event)}`);

    let content: Buffer;
    try {
      content = await this.minioService.getDocument(objectNameFromLocation(event.documentLocation));
    } catch (err) {
      this.logger.error(`Error downloading document ${event.documentLocation}: ${describeError(err)}`);
      this.logger.warn(`Skipping document ${event.fileName} due to download error`);
      return null;
    }

    const result = await this.indexer.indexDocument({
      fileName: event.fileName,
      filePath: event.documentLocation,
      content,
      mimeType: event.documentMimeType,
    });

    if (result.status === 'success') {
      this.logger.log(`🎯 Successfully indexed ${result.chunksStored} chunks from ${event.fileName}`);
    }
    return result;
  }
}
