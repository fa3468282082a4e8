import { VectorStoreError } from '../../common/errors/rag.errors';
import { Metadata } from '../rag/types';
import { VectorRecords } from './vector-store';

/**
 * Utility functions for vector store operations
 */

/**
 * Restrict metadata to the scalar types vector stores accept. Null and
 * undefined entries are dropped, other values are stringified.
 */
export function sanitizeMetadata(metadata: Record<string, unknown>): Metadata {
    const sanitized: Metadata = {};

    for (const [key, value] of Object.entries(metadata)) {
        if (value === null || value === undefined) {
            continue;
        }
        if (typeof value === 'string' || typeof value === 'boolean') {
            sanitized[key] = value;
        } else if (typeof value === 'number' && Number.isFinite(value)) {
            sanitized[key] = value;
        } else if (value instanceof Date) {
            sanitized[key] = value.toISOString();
        } else if (typeof value === 'object') {
            sanitized[key] = JSON.stringify(value);
        } else {
            sanitized[key] = String(value);
        }
    }

    return sanitized;
}

export function assertAlignedRecords(records: VectorRecords): void {
    const { ids, embeddings, documents, metadatas } = records;
    if (embeddings.length !== documents.length || ids.length !== documents.length || metadatas.length !== documents.length) {
        throw new VectorStoreError(
            `Mismatch: ${ids.length} ids, ${documents.length} texts, ${embeddings.length} embeddings, ${metadatas.length} metadatas`,
        );
    }
}

/**
 * Whether every filter entry equals the corresponding metadata value.
 */
export function matchesFilter(metadata: Metadata, filter?: Metadata): boolean {
    if (!filter) {
        return true;
    }
    return Object.entries(filter).every(([key, value]) => metadata[key] === value);
}

function formatLiteral(value: string | number | boolean): string {
    if (typeof value === 'string') {
        return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
    }
    return String(value);
}

/**
 * Build a Milvus boolean expression matching metadata entries stored in the
 * JSON field `field`. An empty filter yields an empty expression.
 */
export function buildFilterExpression(filter: Metadata, field: string = 'metadata'): string {
    return Object.entries(filter)
        .map(([key, value]) => `${field}[${formatLiteral(key)}] == ${formatLiteral(value)}`)
        .join(' and ');
}

/**
 * Normalize embedding vector
 */
export function normalizeEmbedding(embedding: number[]): number[] {
    const norm = Math.sqrt(embedding.reduce((sum, val) => sum + val * val, 0));

    if (norm === 0) {
        return embedding;
    }

    return embedding.map((val) => val / norm);
}

/**
 * Cosine distance (1 - cosine similarity), in [0, 2].
 */
export function cosineDistance(a: number[], b: number[]): number {
    if (a.length !== b.length) {
        throw new VectorStoreError(`Embedding dimension mismatch: expected ${a.length}, got ${b.length}`);
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
        dotProduct += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);

    if (denominator === 0) {
        return 1;
    }

    return 1 - dotProduct / denominator;
}

/**
 * Parse metadata returned by Milvus, which may come back as a JSON string.
 */
export function parseMetadata(raw: unknown): Metadata {
    let value = raw;
    if (typeof raw === 'string') {
        try {
            value = JSON.parse(raw);
        } catch {
            return { raw };
        }
    }
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return {};
    }
    return sanitizeMetadata(Object.fromEntries(Object.entries(value)));
}
