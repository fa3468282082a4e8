import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import ragConfig, { RagSettings } from '../../../config/rag.config';
import { InputValidationError, VectorStoreError } from '../../../common/errors/rag.errors';
import { describeError } from '../../../common/utils/error.util';
import { DocumentExtractor, EmbeddingProvider } from '../collaborators';
import { ChunkerService } from './chunker.service';
import { Chunk, DocumentSource, IndexingResult, IndexingStage, Metadata } from '../types';
import { VectorStore, VectorStoreStats } from '../../vector-store/vector-store';
import { sanitizeMetadata } from '../../vector-store/vector-store.utils';

/**
 * Extract, chunk, embed and store documents. One document's failure never
 * stops the others; it is reported in that document's result.
 *
 * Writes are not transactional: chunks stored before a failure stay in the
 * store.
 */
@Injectable()
export class IndexerService {
    private readonly logger = new Logger(IndexerService.name);
    private readonly batchSize: number;

    constructor(
        @Inject(ragConfig.KEY) settings: RagSettings,
        private readonly extractor: DocumentExtractor,
        private readonly chunker: ChunkerService,
        private readonly embeddingProvider: EmbeddingProvider,
        private readonly vectorStore: VectorStore,
    ) {
        this.batchSize = settings.embeddingBatchSize;
    }

    async indexDocument(source: DocumentSource): Promise<IndexingResult> {
        const { fileName } = source;
        let stage: IndexingStage = 'extracting';
        this.logger.log(`📥 Indexing document: ${fileName}`);

        try {
            const document = await this.extractor.extract(source);

            stage = 'chunking';
            const chunks = this.chunker.chunkDocument(document);
            if (chunks.length === 0) {
                this.logger.warn(`No chunks generated for ${fileName}`);
                return { fileName, status: 'skipped', reason: 'No text content' };
            }

            stage = 'embedding';
            const texts = chunks.map((chunk) => chunk.text);
            const embeddings = await this.embeddingProvider.embedMany(texts, this.batchSize);

            // Not transactional: a failure mid-write leaves earlier chunks stored until deleteDocument runs.
            stage = 'storing';
            const storedIds = await this.vectorStore.add({
                ids: chunks.map(() => randomUUID()),
                embeddings,
                documents: texts,
                metadatas: chunks.map(toStoredMetadata),
            });

            this.logger.log(`✅ Indexed ${fileName}: ${chunks.length} chunks, ${storedIds.length} stored`);
            return {
                fileName,
                status: 'success',
                chunksCreated: chunks.length,
                chunksStored: storedIds.length,
                totalPages: document.totalPages,
            };
        } catch (error) {
            this.logger.error(`❌ Failed to index ${fileName} while ${stage}: ${describeError(error)}`);
            return { fileName, status: 'failed', error: describeError(error), stage };
        }
    }

    /**
     * Sequential on purpose: embedding and storage calls are rate limited.
     */
    async indexDocuments(sources: DocumentSource[]): Promise<IndexingResult[]> {
        this.logger.log(`📚 Indexing ${sources.length} documents`);

        const results: IndexingResult[] = [];
        for (const source of sources) {
            results.push(await this.indexDocument(source));
        }

        const count = (status: IndexingResult['status']) => results.filter((result) => result.status === status).length;
        this.logger.log(
            `Indexing complete: ${count('success')} successful, ${count('failed')} failed, ${count('skipped')} skipped`,
        );
        return results;
    }

    /**
     * Remove every chunk of `fileName`. Returns the number of deleted chunks.
     */
    async deleteDocument(fileName: string): Promise<number> {
        if (!fileName.trim()) {
            throw new InputValidationError('File name cannot be empty');
        }

        try {
            const deleted = await this.vectorStore.delete({ fileName });
            this.logger.log(`🗑️ Deleted document ${fileName} (${deleted} chunks)`);
            return deleted;
        } catch (error) {
            this.logger.error(`Failed to delete ${fileName}: ${describeError(error)}`);
            throw new VectorStoreError(`Document deletion failed: ${describeError(error)}`, { cause: error });
        }
    }

    /**
     * Remove every stored chunk. Returns the number of removed chunks.
     */
    async clearAll(): Promise<number> {
        try {
            const removed = await this.vectorStore.clear();
            this.logger.warn(`🗑️ Cleared all documents (${removed} chunks)`);
            return removed;
        } catch (error) {
            this.logger.error(`Failed to clear documents: ${describeError(error)}`);
            throw new VectorStoreError(`Clearing documents failed: ${describeError(error)}`, { cause: error });
        }
    }

    async getStats(): Promise<VectorStoreStats> {
        return this.vectorStore.getStats();
    }
}

function toStoredMetadata(chunk: Chunk): Metadata {
    return sanitizeMetadata({
        ...chunk.metadata,
        chunkIndex: chunk.chunkIndex,
        startOffset: chunk.startOffset,
        endOffset: chunk.endOffset,
        tokenCount: chunk.tokenCount,
        charCount: chunk.charCount,
    });
}
