import { Inject, Injectable, Logger } from '@nestjs/common';
import ragConfig, { RagSettings } from '../../../config/rag.config';
import { InputValidationError, RetrievalError } from '../../../common/errors/rag.errors';
import { describeError } from '../../../common/utils/error.util';
import { VectorStore } from '../../vector-store/vector-store';
import { EmbeddingProvider } from '../collaborators';
import { Metadata, RetrievalContext, RetrievedChunk } from '../types';

/**
 * Semantic search over the stored chunks.
 */
@Injectable()
export class RetrieverService {
    private readonly logger = new Logger(RetrieverService.name);
    private readonly topK: number;
    private readonly similarityThreshold: number;

    constructor(
        @Inject(ragConfig.KEY) settings: RagSettings,
        private readonly embeddingProvider: EmbeddingProvider,
        private readonly vectorStore: VectorStore,
    ) {
        this.topK = settings.topK;
        this.similarityThreshold = settings.similarityThreshold;
        this.logger.log(`Retriever initialized: topK=${this.topK}, threshold=${this.similarityThreshold}`);
    }

    /**
     * Top-k nearest chunks at or above the similarity threshold, in the
     * store's order. The threshold applies after the top-k cut.
     */
    async retrieve(query: string, topK?: number, filters?: Metadata): Promise<RetrievedChunk[]> {
        if (!query || !query.trim()) {
            throw new InputValidationError('Query cannot be empty');
        }
        const k = topK ?? this.topK;
        if (!Number.isInteger(k) || k < 1) {
            throw new InputValidationError(`topK must be a positive integer, got ${k}`);
        }

        try {
            this.logger.log(`🔍 Retrieving documents for query: "${query.slice(0, 100)}"`);

            const queryEmbedding = await this.embeddingProvider.embed(query);
            const result = await this.vectorStore.query([queryEmbedding], k, filters);

            const ids = result.ids[0] ?? [];
            const chunks = ids.map((id, i) =>
                toRetrievedChunk(id, result.documents[0][i], result.distances[0][i], result.metadatas[0][i]),
            );

            if (chunks.length > 0) {
                this.logger.debug(`Similarity scores: ${chunks.map((chunk) => chunk.similarityScore.toFixed(3)).join(', ')}`);
            }

            const filtered = chunks.filter((chunk) => chunk.similarityScore >= this.similarityThreshold);
            this.logger.log(
                `✅ Retrieved ${chunks.length} chunks, ${filtered.length} above threshold (${this.similarityThreshold})`,
            );
            return filtered;
        } catch (error) {
            this.logger.error(`❌ Retrieval failed: ${describeError(error)}`);
            throw new RetrievalError(`Failed to retrieve documents: ${describeError(error)}`, { cause: error });
        }
    }

    async retrieveWithContext(query: string, topK?: number, filters?: Metadata): Promise<RetrievalContext> {
        const chunks = await this.retrieve(query, topK, filters);

        const avgSimilarity =
            chunks.length > 0 ? chunks.reduce((sum, chunk) => sum + chunk.similarityScore, 0) / chunks.length : 0;
        const sources = [...new Set(chunks.map((chunk) => chunk.fileName))];

        return {
            query,
            chunks,
            totalChunks: chunks.length,
            avgSimilarity,
            numSources: sources.length,
            sources,
        };
    }
}

/**
 * Cosine distance in [0, 2] to a similarity in [0, 1].
 */
export function distanceToSimilarity(distance: number): number {
    return Math.min(1, Math.max(0, 1 - distance / 2));
}

const TEXT_FIELDS = ['fileType', 'filePath'] as const;
const NUMERIC_FIELDS = ['page', 'paragraph', 'chunkIndex', 'startOffset', 'endOffset', 'tokenCount', 'charCount'] as const;

function toRetrievedChunk(id: string, text: string, distance: number, metadata: Metadata): RetrievedChunk {
    const chunk: RetrievedChunk = {
        id,
        text,
        similarityScore: distanceToSimilarity(distance),
        distance,
        fileName: readString(metadata, 'fileName') ?? 'unknown',
        metadata,
    };

    for (const key of TEXT_FIELDS) {
        const value = readString(metadata, key);
        if (value !== undefined) chunk[key] = value;
    }
    for (const key of NUMERIC_FIELDS) {
        const value = readNumber(metadata, key);
        if (value !== undefined) chunk[key] = value;
    }

    return chunk;
}

function readString(metadata: Metadata, key: string): string | undefined {
    const value = metadata[key];
    return typeof value === 'string' ? value : undefined;
}

function readNumber(metadata: Metadata, key: string): number | undefined {
    const value = metadata[key];
    return typeof value === 'number' ? value : undefined;
}
