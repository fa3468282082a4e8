import { Inject, Injectable, Logger } from '@nestjs/common';
import ragConfig, { RagSettings } from '../../../config/rag.config';
import { CitationValidationError } from '../../../common/errors/rag.errors';
import { AnswerGenerator, EmbeddingProvider } from '../collaborators';
import { DocumentSource, IndexingResult, QueryRequest, RagAnswer, RetrievedChunk, SourceChunk, SystemStats } from '../types';
import { CitationService } from './citation.service';
import { IndexerService } from './indexer.service';
import { PromptBuilderService } from './prompt-builder.service';
import { RerankerService } from './reranker.service';
import { RetrieverService } from './retriever.service';

export const NO_RELEVANT_INFORMATION_ANSWER =
    "I couldn't find any relevant information in the indexed documents to answer your question.";

/**
 * Question answering over the indexed documents. The list of sources is
 * fixed once, after reranking; the prompt numbering and the citation
 * mapping both use that same list.
 */
@Injectable()
export class RagService {
    private readonly logger = new Logger(RagService.name);
    private readonly strictCitations: boolean;

    constructor(
        @Inject(ragConfig.KEY) settings: RagSettings,
        private readonly retriever: RetrieverService,
        private readonly reranker: RerankerService,
        private readonly promptBuilder: PromptBuilderService,
        private readonly citationService: CitationService,
        private readonly answerGenerator: AnswerGenerator,
        private readonly embeddingProvider: EmbeddingProvider,
        private readonly indexer: IndexerService,
    ) {
        this.strictCitations = settings.strictCitations;
    }

    async query(request: QueryRequest): Promise<RagAnswer> {
        const { query, topK, filters, rerank = true } = request;
        const startTime = Date.now();

        const context = await this.retriever.retrieveWithContext(query, topK, filters);
        if (context.chunks.length === 0) {
            this.logger.warn('No relevant chunks found');
            return {
                query,
                answer: NO_RELEVANT_INFORMATION_ANSWER,
                sources: [],
                citations: [],
                citationMap: {},
                citationErrors: [],
                references: this.citationService.formatReferences({}),
                numSources: 0,
                avgSimilarity: 0,
            };
        }

        const sources: readonly RetrievedChunk[] = Object.freeze(
            rerank ? this.reranker.rerank(context.chunks, query) : [...context.chunks],
        );

        const { systemPrompt, userPrompt } = this.promptBuilder.buildRagPrompt(query, sources);
        const answer = await this.answerGenerator.generate(systemPrompt, userPrompt);

        const resolved = this.citationService.resolve(answer, sources);
        if (!resolved.isValid) {
            for (const error of resolved.errors) {
                this.logger.warn(`⚠️ ${error}`);
            }
            if (this.strictCitations) {
                throw new CitationValidationError(resolved.errors);
            }
        }

        this.logger.log(
            `✅ Answered with ${resolved.citations.length} citations over ${sources.length} sources in ${Date.now() - startTime}ms`,
        );

        return {
            query,
            answer,
            sources: sources.map((chunk) => toSourceChunk(chunk)),
            citations: resolved.citations,
            citationMap: resolved.citationMap,
            citationErrors: resolved.errors,
            references: this.citationService.formatReferences(resolved.citationMap),
            numSources: sources.length,
            avgSimilarity: context.avgSimilarity,
        };
    }

    async indexDocuments(sources: DocumentSource[]): Promise<IndexingResult[]> {
        return this.indexer.indexDocuments(sources);
    }

    async deleteDocument(fileName: string): Promise<number> {
        return this.indexer.deleteDocument(fileName);
    }

    async clearAll(): Promise<number> {
        return this.indexer.clearAll();
    }

    async getStats(): Promise<SystemStats> {
        const stats = await this.indexer.getStats();
        return {
            totalChunks: stats.totalChunks,
            collectionName: stats.collectionName,
            vectorStoreDriver: stats.driver,
            embeddingModel: this.embeddingProvider.modelName,
            llmModel: this.answerGenerator.modelName,
        };
    }
}

function toSourceChunk(chunk: RetrievedChunk): SourceChunk {
    const source: SourceChunk = {
        id: chunk.id,
        text: chunk.text,
        fileName: chunk.fileName,
        similarityScore: chunk.similarityScore,
    };
    if (chunk.chunkIndex !== undefined) {
        source.chunkIndex = chunk.chunkIndex;
    }
    if (chunk.page !== undefined) {
        source.page = chunk.page;
    }
    if (chunk.paragraph !== undefined) {
        source.paragraph = chunk.paragraph;
    }
    return source;
}
