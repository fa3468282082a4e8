import { Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { DataType, MetricType, MilvusClient } from '@zilliz/milvus2-sdk-node';
import { z } from 'zod';
import vectorStoreConfig from '../../config/vector-store.config';
import { VectorStoreError } from '../../common/errors/rag.errors';
import { describeError } from '../../common/utils/error.util';
import { withRetryAndTimeout } from '../../common/utils/retry.util';
import { Metadata } from '../rag/types';
import { VectorQueryResult, VectorRecords, VectorStore, VectorStoreStats } from './vector-store';
import { assertAlignedRecords, buildFilterExpression, parseMetadata } from './vector-store.utils';

const searchHitSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    score: z.number(),
    text: z.string().default(''),
    metadata: z.unknown(),
});

/**
 * Milvus / Zilliz Cloud backed vector store. Uses the COSINE metric, whose
 * score is a cosine similarity; it is reported as a distance of 1 - score.
 */
export class MilvusService extends VectorStore implements OnModuleInit, OnModuleDestroy {
    private readonly logger = new Logger(MilvusService.name);
    private client?: MilvusClient;
    private readonly DEFAULT_METRIC_TYPE = MetricType.COSINE;
    private readonly DEFAULT_INDEX_TYPE = 'IVF_FLAT';
    private collectionReady = false;

    constructor(private readonly config: ConfigType<typeof vectorStoreConfig>) {
        super();
    }

    async onModuleInit() {
        await this.connect();
    }

    async onModuleDestroy() {
        await this.disconnect();
    }

    /**
     * Connect to Milvus/Zilliz Cloud
     */
    private async connect(): Promise<void> {
        try {
            this.logger.log(`🔗 Connecting to Milvus at ${this.config.endpoint.substring(0, 50)} (timeout=${this.config.timeoutMs}ms)...`);

            this.client = new MilvusClient({
                address: this.config.endpoint,
                token: this.config.token,
                timeout: this.config.timeoutMs,
            });

            await this.client.checkHealth();
            this.logger.log('✅ Milvus connection successful');
        } catch (error) {
            this.logger.error(`❌ Failed to connect to Milvus: ${describeError(error)}`);
            throw new VectorStoreError(`Milvus connection failed: ${describeError(error)}`, { cause: error });
        }
    }

    /**
     * Disconnect from Milvus
     */
    private async disconnect(): Promise<void> {
        if (!this.client) {
            return;
        }
        try {
            await this.client.closeConnection();
            this.logger.log('✅ Milvus connection closed');
        } catch (error) {
            this.logger.error(`Error disconnecting from Milvus: ${describeError(error)}`);
        }
    }

    private getClient(): MilvusClient {
        if (!this.client) {
            throw new VectorStoreError('Milvus client is not connected');
        }
        return this.client;
    }

    /**
     * Ensure the chunk collection exists and is loaded, creating it on first use
     */
    private async ensureCollection(): Promise<void> {
        if (this.collectionReady) {
            return;
        }

        const client = this.getClient();
        const collectionName = this.config.collection;

        const exists = await withRetryAndTimeout(
            () => client.hasCollection({ collection_name: collectionName }),
            {
                maxRetries: 3,
                timeoutMs: 15000,
                initialDelayMs: 500,
                operationName: `Check collection ${collectionName}`,
            },
        );

        if (!exists.value) {
            this.logger.log(`📦 Creating collection: ${collectionName}`);
            await client.createCollection({
                collection_name: collectionName,
                description: 'Document chunks with provenance metadata',
                fields: [
                    { name: 'id', data_type: DataType.VarChar, is_primary_key: true, autoID: false, max_length: 64 },
                    { name: 'embedding', data_type: DataType.FloatVector, dim: this.config.dimensions },
                    { name: 'text', data_type: DataType.VarChar, max_length: 65535 },
                    { name: 'metadata', data_type: DataType.JSON },
                ],
            });
            await client.createIndex({
                collection_name: collectionName,
                field_name: 'embedding',
                index_type: this.DEFAULT_INDEX_TYPE,
                metric_type: this.DEFAULT_METRIC_TYPE,
                params: { nlist: 128 },
            });
            this.logger.log(`✅ Collection ${collectionName} created with ${this.DEFAULT_INDEX_TYPE} index`);
        }

        const progress = await client.getLoadingProgress({ collection_name: collectionName });
        if (Number(progress.progress) !== 100) {
            this.logger.log(`📥 Loading collection: ${collectionName}`);
            await client.loadCollectionSync({ collection_name: collectionName });
        }

        this.collectionReady = true;
    }

    async add(records: VectorRecords): Promise<string[]> {
        assertAlignedRecords(records);
        if (records.ids.length === 0) {
            this.logger.warn('No documents to add');
            return [];
        }

        try {
            await this.ensureCollection();

            const response = await this.getClient().insert({
                collection_name: this.config.collection,
                data: records.ids.map((id, i) => ({
                    id,
                    embedding: records.embeddings[i],
                    text: records.documents[i],
                    metadata: records.metadatas[i],
                })),
            });

            if (response.status.error_code !== 'Success') {
                throw new Error(response.status.reason);
            }

            this.logger.log(`✅ Inserted ${records.ids.length} chunks into ${this.config.collection}`);
            return [...records.ids];
        } catch (error) {
            this.logger.error(`Failed to insert chunks: ${describeError(error)}`);
            throw new VectorStoreError(`Document addition failed: ${describeError(error)}`, { cause: error });
        }
    }

    async query(embeddings: number[][], k: number, filter?: Metadata): Promise<VectorQueryResult> {
        const result: VectorQueryResult = { ids: [], distances: [], documents: [], metadatas: [] };
        const expression = filter ? buildFilterExpression(filter) : '';

        try {
            await this.ensureCollection();

            for (const embedding of embeddings) {
                const response = await this.getClient().search({
                    collection_name: this.config.collection,
                    data: [embedding],
                    limit: k,
                    output_fields: ['text', 'metadata'],
                    metric_type: this.DEFAULT_METRIC_TYPE,
                    ...(expression ? { filter: expression } : {}),
                });

                const rows: unknown[] = response.results;
                const hits = z.array(searchHitSchema).parse(Array.isArray(rows[0]) ? rows[0] : rows);

                result.ids.push(hits.map((hit) => hit.id));
                result.distances.push(hits.map((hit) => 1 - hit.score));
                result.documents.push(hits.map((hit) => hit.text));
                result.metadatas.push(hits.map((hit) => parseMetadata(hit.metadata)));
            }

            this.logger.debug(`🔍 Search completed: ${result.ids.map((ids) => ids.length).join(',')} hits in ${this.config.collection}`);
            return result;
        } catch (error) {
            this.logger.error(`Search failed: ${describeError(error)}`);
            throw new VectorStoreError(`Query failed: ${describeError(error)}`, { cause: error });
        }
    }

    async delete(filter: Metadata): Promise<number> {
        const expression = buildFilterExpression(filter);
        if (!expression) {
            throw new VectorStoreError('Refusing to delete with an empty filter');
        }

        try {
            await this.ensureCollection();
            const response = await this.getClient().delete({
                collection_name: this.config.collection,
                filter: expression,
            });

            const deleted = Number(response.delete_cnt) || 0;
            this.logger.log(`✅ Deleted ${deleted} chunks matching ${expression}`);
            return deleted;
        } catch (error) {
            this.logger.error(`Delete operation failed: ${describeError(error)}`);
            throw new VectorStoreError(`Delete failed: ${describeError(error)}`, { cause: error });
        }
    }

    /**
     * Drops the collection and creates it again with the same schema.
     */
    async clear(): Promise<number> {
        try {
            const removed = await this.count();
            await this.getClient().dropCollection({ collection_name: this.config.collection });
            this.collectionReady = false;
            this.logger.log(`🗑️ Dropped collection ${this.config.collection} (${removed} chunks)`);
            await this.ensureCollection();
            return removed;
        } catch (error) {
            this.logger.error(`Clear failed: ${describeError(error)}`);
            throw new VectorStoreError(`Clear failed: ${describeError(error)}`, { cause: error });
        }
    }

    async count(): Promise<number> {
        try {
            await this.ensureCollection();
            const response = await this.getClient().count({ collection_name: this.config.collection });
            return Number(response.data) || 0;
        } catch (error) {
            throw new VectorStoreError(`Count failed: ${describeError(error)}`, { cause: error });
        }
    }

    async getStats(): Promise<VectorStoreStats> {
        return {
            collectionName: this.config.collection,
            totalChunks: await this.count(),
            driver: 'milvus',
        };
    }

    async checkHealth(): Promise<boolean> {
        const response = await this.getClient().checkHealth();
        return response.isHealthy;
    }
}
