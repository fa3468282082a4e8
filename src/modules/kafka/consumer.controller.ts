import { Controller } from '@nestjs/common';
import { EventPattern, Payload } from '@nestjs/microservices';
import { ConsumerService } from './consumer.service';

@Controller()
export class ConsumerController {
  constructor(private readonly consumerService: ConsumerService) {}

  // @EventPattern needs a static value: keep in sync with KAFKA_DOCUMENT_INGESTION_TOPIC.
  @EventPattern('document-ingestion-events')
  async handleDocumentIngestion(@Payload() message: unknown): Promise<void> {
    await this.consumerService.handleDocumentIngestion(message);
  }
}
