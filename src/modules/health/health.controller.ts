import { Controller, Get, Logger } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { KafkaHealthIndicator } from './kafka.health';
import { VectorStoreHealthIndicator } from './vector-store.health';

@ApiTags('health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly health: HealthCheckService,
    private readonly vectorStoreHealth: VectorStoreHealthIndicator,
    private readonly kafkaHealth: KafkaHealthIndicator,
  ) { }

  @Get()
  @HealthCheck()
  check() {
    this.logger.debug('Health check endpoint called.');
    return this.health.check([
      () => this.vectorStoreHealth.isHealthy('vectorStore'),
      () => this.kafkaHealth.isHealthy('kafka'),
    ]);
  }
}
