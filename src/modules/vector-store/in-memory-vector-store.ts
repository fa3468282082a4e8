import { Logger } from '@nestjs/common';
import { Metadata } from '../rag/types';
import { VectorQueryResult, VectorRecords, VectorStore, VectorStoreStats } from './vector-store';
import { assertAlignedRecords, cosineDistance, matchesFilter } from './vector-store.utils';

interface StoredRecord {
    id: string;
    embedding: number[];
    document: string;
    metadata: Metadata;
}

/**
 * Process-local vector store with exact cosine search. Used for tests and for
 * running the service without a Milvus instance.
 */
export class InMemoryVectorStore extends VectorStore {
    private readonly logger = new Logger(InMemoryVectorStore.name);
    private readonly records = new Map<string, StoredRecord>();

    constructor(private readonly collectionName: string = 'memory') {
        super();
    }

    async add(records: VectorRecords): Promise<string[]> {
        assertAlignedRecords(records);

        records.ids.forEach((id, i) => {
            this.records.set(id, {
                id,
                embedding: records.embeddings[i],
                document: records.documents[i],
                metadata: { ...records.metadatas[i] },
            });
        });

        this.logger.debug(`Stored ${records.ids.length} records (${this.records.size} total)`);
        return [...records.ids];
    }

    async query(embeddings: number[][], k: number, filter?: Metadata): Promise<VectorQueryResult> {
        const result: VectorQueryResult = { ids: [], distances: [], documents: [], metadatas: [] };
        const candidates = [...this.records.values()].filter((record) => matchesFilter(record.metadata, filter));

        for (const embedding of embeddings) {
            const nearest = candidates
                .map((record) => ({ record, distance: cosineDistance(embedding, record.embedding) }))
                .sort((a, b) => a.distance - b.distance)
                .slice(0, k);

            result.ids.push(nearest.map(({ record }) => record.id));
            result.distances.push(nearest.map(({ distance }) => distance));
            result.documents.push(nearest.map(({ record }) => record.document));
            result.metadatas.push(nearest.map(({ record }) => ({ ...record.metadata })));
        }

        return result;
    }

    async delete(filter: Metadata): Promise<number> {
        let deleted = 0;
        for (const [id, record] of this.records) {
            if (matchesFilter(record.metadata, filter)) {
                this.records.delete(id);
                deleted++;
            }
        }
        return deleted;
    }

    async clear(): Promise<number> {
        const removed = this.records.size;
        this.records.clear();
        return removed;
    }

    async count(): Promise<number> {
        return this.records.size;
    }

    async getStats(): Promise<VectorStoreStats> {
        return {
            collectionName: this.collectionName,
            totalChunks: this.records.size,
            driver: 'memory',
        };
    }

    async checkHealth(): Promise<boolean> {
        return true;
    }
}
