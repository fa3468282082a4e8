import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import ragConfig, { RagSettings } from '../../../config/rag.config';
import { EmbeddingGenerationError } from '../../../common/errors/rag.errors';
import { describeError } from '../../../common/utils/error.util';
import { createEmbeddingCacheKey } from '../../../common/utils/hash.util';
import { batchArray } from '../../../common/utils/retry.util';
import { RedisService } from '../../redis/redis.service';
import { normalizeEmbedding } from '../../vector-store/vector-store.utils';
import { EmbeddingProvider } from '../collaborators';
import { OpenAIService } from './openai.service';

const cachedEmbeddingSchema = z.array(z.number()).nonempty();

/**
 * L2-normalised OpenAI embeddings, requested in batches and cached in Redis
 * when the cache is enabled.
 */
@Injectable()
export class EmbeddingService extends EmbeddingProvider {
    private readonly logger = new Logger(EmbeddingService.name);
    private readonly batchSize: number;
    readonly modelName: string;
    private readonly dimensions: number;

    constructor(
        private readonly openaiService: OpenAIService,
        private readonly cache: RedisService,
        @Inject(ragConfig.KEY) settings: RagSettings,
    ) {
        super();
        this.batchSize = settings.embeddingBatchSize;
        this.modelName = openaiService.embeddingModel;
        this.dimensions = openaiService.embeddingDimensions;
    }

    async embed(text: string): Promise<number[]> {
        const [embedding] = await this.embedMany([text], 1);
        return embedding;
    }

    async embedMany(texts: string[], batchSize: number = this.batchSize): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }
        if (texts.some((text) => !text.trim())) {
            throw new EmbeddingGenerationError('Cannot embed empty text');
        }

        try {
            const embeddings: number[][] = [];
            const batches = batchArray(texts, batchSize);

            for (const [i, batch] of batches.entries()) {
                this.logger.debug(`🔄 Embedding batch ${i + 1}/${batches.length} (${batch.length} texts)`);
                embeddings.push(...(await this.embedBatch(batch)));
            }

            return embeddings;
        } catch (error) {
            if (error instanceof EmbeddingGenerationError) {
                throw error;
            }
            throw new EmbeddingGenerationError(`Failed to generate embeddings: ${describeError(error)}`, { cause: error });
        }
    }

    private async embedBatch(batch: string[]): Promise<number[][]> {
        const cached = await Promise.all(batch.map((text) => this.readCache(text)));
        const missing = batch.filter((_, i) => cached[i] === null);

        const fresh = missing.length > 0 ? (await this.openaiService.createEmbeddings(missing)).map(normalizeEmbedding) : [];
        if (fresh.length !== missing.length) {
            throw new EmbeddingGenerationError(`Expected ${missing.length} embeddings, received ${fresh.length}`);
        }

        if (missing.length < batch.length) {
            this.logger.debug(`✅ Cache hits: ${batch.length - missing.length}/${batch.length}`);
        }
        await Promise.all(missing.map((text, i) => this.writeCache(text, fresh[i])));

        let next = 0;
        return cached.map((embedding) => embedding ?? fresh[next++]);
    }

    private async readCache(text: string): Promise<number[] | null> {
        if (!this.cache.isReady()) {
            return null;
        }
        const value = await this.cache.getJson(this.cacheKey(text));
        if (value === null) {
            return null;
        }

        const parsed = cachedEmbeddingSchema.safeParse(value);
        if (!parsed.success || parsed.data.length !== this.dimensions) {
            this.logger.warn('Ignoring malformed cached embedding');
            return null;
        }
        return parsed.data;
    }

    private cacheKey(text: string): string {
        return createEmbeddingCacheKey(this.modelName, this.dimensions, text);
    }

    private async writeCache(text: string, embedding: number[]): Promise<void> {
        if (!this.cache.isReady()) {
            return;
        }
        try {
            await this.cache.setJson(this.cacheKey(text), embedding);
        } catch (error) {
            this.logger.warn(`Failed to cache embedding: ${describeError(error)}`);
        }
    }
}
