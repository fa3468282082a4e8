import { HealthCheckError } from '@nestjs/terminus';
import { InMemoryVectorStore } from '../vector-store/in-memory-vector-store';
import { VectorStoreHealthIndicator } from './vector-store.health';

class UnreachableVectorStore extends InMemoryVectorStore {
    async checkHealth(): Promise<boolean> {
        throw new Error('connect ECONNREFUSED');
    }
}

describe('VectorStoreHealthIndicator', () => {
    it('reports a reachable store as up', async () => {
        const indicator = new VectorStoreHealthIndicator(new InMemoryVectorStore('test'));

        await expect(indicator.isHealthy('vectorStore')).resolves.toEqual({ vectorStore: { status: 'up' } });
    });

    it('reports the failure cause when the store is unreachable', async () => {
        const indicator = new VectorStoreHealthIndicator(new UnreachableVectorStore('test'));

        const failure = await indicator.isHealthy('vectorStore').catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(HealthCheckError);
        expect(failure).toMatchObject({
            causes: { vectorStore: { status: 'down', message: 'connect ECONNREFUSED' } },
        });
    });
});
