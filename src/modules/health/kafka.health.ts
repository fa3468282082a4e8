import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult, HealthCheckError } from '@nestjs/terminus';
import { describeError } from '../../common/utils/error.util';
import { KafkaService } from '../kafka/kafka.service';

@Injectable()
export class KafkaHealthIndicator extends HealthIndicator {
  constructor(private readonly kafkaService: KafkaService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    if (!this.kafkaService.isEnabled()) {
      return this.getStatus(key, true, { message: 'disabled' });
    }

    const admin = this.kafkaService.getAdmin();
    if (!admin) {
      throw new HealthCheckError('Kafka check failed', this.getStatus(key, false, { message: 'not connected' }));
    }
    try {
      await admin.listTopics();
      return this.getStatus(key, true);
    } catch (e) {
      throw new HealthCheckError('Kafka check failed', this.getStatus(key, false, { message: describeError(e) }));
    }
  }
}
