import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { KafkaOptions, Transport } from '@nestjs/microservices';
import { Admin, Kafka, Producer } from 'kafkajs';
import kafkaConfig from '../../config/kafka.config';
import { ConfigurationError } from '../../common/errors/rag.errors';
import { DocumentIngestionEvent } from './ingestion-event';

/**
 * Kafka admin and producer for ingestion events. Nothing connects while
 * ingestion events are disabled.
 */
@Injectable()
export class KafkaService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(KafkaService.name);
  private admin?: Admin;
  private producer?: Producer;

  constructor(@Inject(kafkaConfig.KEY) private readonly config: ConfigType<typeof kafkaConfig>) { }

  async onModuleInit() {
    if (!this.config.enabled) {
      this.logger.log('Ingestion events disabled, Kafka not connected');
      return;
    }

    const kafka = new Kafka({
      clientId: this.config.clientId,
      brokers: [this.config.broker],
    });
    const admin = kafka.admin();
    const producer = kafka.producer();

    this.logger.log('Connecting Kafka admin and producer...');
    await admin.connect();
    await producer.connect();
    this.admin = admin;
    this.producer = producer;
    this.logger.log('Kafka admin and producer connected successfully.');
  }

  async onModuleDestroy() {
    if (!this.producer && !this.admin) {
      return;
    }
    await this.producer?.disconnect();
    await this.admin?.disconnect();
    this.producer = undefined;
    this.admin = undefined;
    this.logger.log('Kafka admin and producer disconnected');
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  /** Undefined while ingestion events are disabled. */
  getAdmin(): Admin | undefined {
    return this.admin;
  }

  async publishIngestionEvents(events: DocumentIngestionEvent[]): Promise<void> {
    if (!this.producer) {
      throw new ConfigurationError('Kafka producer is not connected; enable INGESTION_EVENTS_ENABLED');
    }

    const topic = this.config.documentIngestionTopic;
    this.logger.log(`Publishing ${events.length} ingestion events to Kafka topic '${topic}'...`);
    await this.producer.send({
      topic,
      messages: events.map((event) => ({ key: event.fileName, value: JSON.stringify(event) })),
    });
  }

  getOptions(): KafkaOptions {
    const { broker, clientId, consumerGroupId } = this.config;
    if (!broker) {
      throw new ConfigurationError('Kafka configuration is missing or incomplete.');
    }

    this.logger.log(
      `Connecting to Kafka broker at ${broker} with client ID '${clientId}' and group ID '${consumerGroupId}'`,
    );

    return {
      transport: Transport.KAFKA,
      options: {
        client: {
          clientId,
          brokers: [broker],
        },
        consumer: {
          groupId: consumerGroupId,
        },
        subscribe: {
          fromBeginning: true,
        },
      },
    };
  }
}
