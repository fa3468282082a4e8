import { ConfigType } from '@nestjs/config';
import openaiConfig from '../src/config/openai.config';
import { RagSettings } from '../src/config/rag.config';
import vectorStoreConfig from '../src/config/vector-store.config';
import { batchArray } from '../src/common/utils/retry.util';
import { AnswerGenerator, EmbeddingProvider } from '../src/modules/rag/collaborators';
import { RetrievedChunk } from '../src/modules/rag/types';

export function buildRagSettings(overrides: Partial<RagSettings> = {}): RagSettings {
    return {
        chunkSize: 300,
        chunkOverlap: 50,
        maxChunkSize: 500,
        topK: 5,
        similarityThreshold: 0.3,
        rerankStrategy: 'diversity',
        maxExcerptLength: 800,
        embeddingBatchSize: 32,
        strictCitations: false,
        sentenceLocale: 'en',
        tokenizerEncoding: 'cl100k_base',
        ...overrides,
    };
}

export function buildOpenAIConfig(overrides: Partial<ConfigType<typeof openaiConfig>> = {}): ConfigType<typeof openaiConfig> {
    return {
        apiKey: 'test-secret',
        baseUrl: 'http://localhost:4010/v1',
        chatModel: 'gpt-4o-mini',
        embeddingModel: 'text-embedding-3-small',
        temperature: 0.1,
        maxTokens: 1000,
        maxRetries: 3,
        retryDelayMs: 1,
        ...overrides,
    };
}

export function buildVectorStoreConfig(
    overrides: Partial<ConfigType<typeof vectorStoreConfig>> = {},
): ConfigType<typeof vectorStoreConfig> {
    return {
        driver: 'memory',
        endpoint: 'http://localhost:19530',
        token: '',
        collection: 'documents',
        timeoutMs: 1000,
        dimensions: 3,
        ...overrides,
    };
}

/**
 * Deterministic embeddings: one dimension per vocabulary word, counting its
 * occurrences, L2-normalised. Text without vocabulary words maps to zeros.
 */
export class KeywordEmbeddingProvider extends EmbeddingProvider {
    readonly modelName = 'keyword-test-model';
    readonly batches: string[][] = [];

    constructor(private readonly vocabulary: string[]) {
        super();
    }

    async embed(text: string): Promise<number[]> {
        return this.vectorFor(text);
    }

    async embedMany(texts: string[], batchSize: number = 32): Promise<number[][]> {
        const vectors: number[][] = [];
        for (const batch of batchArray(texts, batchSize)) {
            this.batches.push(batch);
            vectors.push(...batch.map((text) => this.vectorFor(text)));
        }
        return vectors;
    }

    vectorFor(text: string): number[] {
        const words = text.toLowerCase().split(/[^a-z0-9]+/);
        const counts = this.vocabulary.map((term) => words.filter((word) => word === term).length);
        const norm = Math.sqrt(counts.reduce((sum, value) => sum + value * value, 0));
        return norm === 0 ? counts : counts.map((value) => value / norm);
    }
}

export class FailingEmbeddingProvider extends EmbeddingProvider {
    readonly modelName = 'failing-test-model';

    constructor(private readonly error: Error) {
        super();
    }

    async embed(): Promise<number[]> {
        throw this.error;
    }

    async embedMany(): Promise<number[][]> {
        throw this.error;
    }
}

/**
 * Returns a canned answer and records every prompt pair it receives.
 */
export class StubAnswerGenerator extends AnswerGenerator {
    readonly modelName = 'stub-test-model';
    readonly prompts: Array<{ systemPrompt: string; userPrompt: string }> = [];

    constructor(private readonly answer: string) {
        super();
    }

    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
        this.prompts.push({ systemPrompt, userPrompt });
        return this.answer;
    }
}

export function buildRetrievedChunk(overrides: Partial<RetrievedChunk> & Pick<RetrievedChunk, 'id'>): RetrievedChunk {
    return {
        text: `Text of ${overrides.id}`,
        similarityScore: 0.9,
        distance: 0.2,
        fileName: 'report.txt',
        metadata: {},
        ...overrides,
    };
}
