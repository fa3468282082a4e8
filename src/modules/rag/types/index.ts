/**
 * Core RAG Type Definitions (Framework-Free)
 */

/** Scalar values a vector store accepts as metadata. */
export type MetadataValue = string | number | boolean;

export type Metadata = Record<string, MetadataValue>;

/**
 * One page (PDF-like sources) or paragraph (DOCX-like sources) of extracted text.
 */
export interface ExtractedSection {
    page?: number;
    paragraph?: number;
    text: string;
    charCount: number;
    wordCount: number;
}

/**
 * Output of the extraction collaborator.
 */
export interface ExtractedDocument {
    fileName: string;
    fileType: string;
    filePath: string;
    totalPages: number;
    content: ExtractedSection[];
}

/**
 * Raw document handed to the indexer.
 */
export interface DocumentSource {
    fileName: string;
    filePath: string;
    content: Buffer;
    mimeType?: string;
}

/**
 * Chunk representation
 */
export interface Chunk {
    text: string;
    /** 0-based, continuous across the pages of one document. */
    chunkIndex: number;
    startOffset: number;
    endOffset: number;
    tokenCount: number;
    charCount: number;
    metadata: Record<string, unknown>;
}

/**
 * A stored chunk returned for a query, with its provenance flattened out of
 * the metadata.
 */
export interface RetrievedChunk {
    id: string;
    text: string;
    /** 1 - distance / 2, in [0, 1]. */
    similarityScore: number;
    /** Cosine distance reported by the vector store, in [0, 2]. */
    distance: number;
    fileName: string;
    fileType?: string;
    filePath?: string;
    page?: number;
    paragraph?: number;
    chunkIndex?: number;
    startOffset?: number;
    endOffset?: number;
    tokenCount?: number;
    charCount?: number;
    metadata: Metadata;
}

export interface RetrievalContext {
    query: string;
    chunks: RetrievedChunk[];
    totalChunks: number;
    avgSimilarity: number;
    numSources: number;
    sources: string[];
}

/**
 * Provenance snapshot of a cited chunk
 */
export interface CitationSource {
    fileName: string;
    page?: number;
    paragraph?: number;
    text: string;
    similarityScore: number;
}

export type CitationMap = Record<number, CitationSource>;

export interface CitationValidation {
    isValid: boolean;
    errors: string[];
}

export interface ResolvedCitations extends CitationValidation {
    citations: number[];
    citationMap: CitationMap;
}

export type IndexingStage = 'extracting' | 'chunking' | 'embedding' | 'storing';

export type IndexingResult =
    | {
        fileName: string;
        status: 'success';
        chunksCreated: number;
        chunksStored: number;
        totalPages: number;
    }
    | { fileName: string; status: 'skipped'; reason: string }
    | { fileName: string; status: 'failed'; error: string; stage: IndexingStage };

/**
 * Query request
 */
export interface QueryRequest {
    query: string;
    topK?: number;
    filters?: Metadata;
    rerank?: boolean;
}

export interface SourceChunk {
    id: string;
    text: string;
    fileName: string;
    page?: number;
    paragraph?: number;
    similarityScore: number;
    chunkIndex?: number;
}

/**
 * Query response
 */
export interface RagAnswer {
    query: string;
    answer: string;
    sources: SourceChunk[];
    citations: number[];
    citationMap: CitationMap;
    citationErrors: string[];
    references: string;
    numSources: number;
    avgSimilarity: number;
}

export interface SystemStats {
    totalChunks: number;
    collectionName: string;
    vectorStoreDriver: string;
    embeddingModel: string;
    llmModel: string;
}
