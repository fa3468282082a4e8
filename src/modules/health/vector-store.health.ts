import { Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { describeError } from '../../common/utils/error.util';
import { VectorStore } from '../vector-store/vector-store';

@Injectable()
export class VectorStoreHealthIndicator extends HealthIndicator {
    constructor(private readonly vectorStore: VectorStore) {
        super();
    }

    async isHealthy(key: string): Promise<HealthIndicatorResult> {
        let healthy: boolean;
        try {
            healthy = await this.vectorStore.checkHealth();
        } catch (error) {
            throw new HealthCheckError(
                'Vector store health check failed',
                this.getStatus(key, false, { message: describeError(error) }),
            );
        }
        if (!healthy) {
            throw new HealthCheckError('Vector store reported unhealthy', this.getStatus(key, false));
        }
        return this.getStatus(key, true);
    }
}
