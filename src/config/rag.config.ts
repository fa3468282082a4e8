import { registerAs } from '@nestjs/config';
import { loadEnv } from './env.schema';

/**
 * Settings shared by the chunking, retrieval, reranking and citation stages.
 * Built once at startup and injected into each service.
 */
export interface RagSettings {
  /** Target chunk size in tokens. */
  chunkSize: number;
  /** Token budget of the trailing sentence window copied into the next chunk. */
  chunkOverlap: number;
  /** Sentences above this many tokens are split on word boundaries. */
  maxChunkSize: number;
  topK: number;
  similarityThreshold: number;
  /** Validated by the reranker when it is constructed. */
  rerankStrategy: string;
  maxExcerptLength: number;
  embeddingBatchSize: number;
  strictCitations: boolean;
  sentenceLocale: string;
  tokenizerEncoding: 'cl100k_base' | 'o200k_base' | 'p50k_base' | 'r50k_base';
}

export default registerAs('rag', (): RagSettings => {
  const env = loadEnv();
  return {
    chunkSize: env.RAG_CHUNK_SIZE,
    chunkOverlap: env.RAG_CHUNK_OVERLAP,
    maxChunkSize: env.RAG_MAX_CHUNK_SIZE,
    topK: env.RAG_TOP_K,
    similarityThreshold: env.RAG_SIMILARITY_THRESHOLD,
    rerankStrategy: env.RAG_RERANK_STRATEGY,
    maxExcerptLength: env.RAG_MAX_EXCERPT_LENGTH,
    embeddingBatchSize: env.RAG_EMBEDDING_BATCH_SIZE,
    strictCitations: env.RAG_STRICT_CITATIONS,
    sentenceLocale: env.RAG_SENTENCE_LOCALE,
    tokenizerEncoding: env.RAG_TOKENIZER_ENCODING,
  };
});
