import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { VectorStoreModule } from '../vector-store/vector-store.module';
import { VectorStoreHealthIndicator } from './vector-store.health';
import { KafkaModule } from '../kafka/kafka.module';
import { KafkaHealthIndicator } from './kafka.health';

@Module({
  imports: [TerminusModule, VectorStoreModule, KafkaModule],
  controllers: [HealthController],
  providers: [VectorStoreHealthIndicator, KafkaHealthIndicator],
})
export class HealthModule { }
