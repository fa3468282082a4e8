import { Metadata } from '../rag/types';

export interface VectorRecords {
    ids: string[];
    embeddings: number[][];
    documents: string[];
    metadatas: Metadata[];
}

/**
 * One inner list per query vector, nearest first.
 */
export interface VectorQueryResult {
    ids: string[][];
    distances: number[][];
    documents: string[][];
    metadatas: Metadata[][];
}

export interface VectorStoreStats {
    collectionName: string;
    totalChunks: number;
    driver: string;
}

/**
 * Persistence and nearest-neighbour search over chunk embeddings. Distances
 * are cosine distances in [0, 2]; filters are equality matches on metadata.
 */
export abstract class VectorStore {
    abstract add(records: VectorRecords): Promise<string[]>;

    abstract query(embeddings: number[][], k: number, filter?: Metadata): Promise<VectorQueryResult>;

    /** Returns the number of deleted records. */
    abstract delete(filter: Metadata): Promise<number>;

    /** Removes every record and leaves an empty collection. Returns how many were removed. */
    abstract clear(): Promise<number>;

    abstract count(): Promise<number>;

    abstract getStats(): Promise<VectorStoreStats>;

    abstract checkHealth(): Promise<boolean>;
}
