import { Logger, Module } from '@nestjs/common';
import ragConfig, { RagSettings } from '../../config/rag.config';
import { RedisModule } from '../redis/redis.module';
import { VectorStoreModule } from '../vector-store/vector-store.module';
import { AnswerGenerator, DocumentExtractor, EmbeddingProvider } from './collaborators';
import { ChunkerService } from './services/chunker.service';
import { CitationService } from './services/citation.service';
import { EmbeddingService } from './services/embedding.service';
import { IndexerService } from './services/indexer.service';
import { OpenAIService } from './services/openai.service';
import { PromptBuilderService } from './services/prompt-builder.service';
import { RagService } from './services/rag.service';
import { RerankerService } from './services/reranker.service';
import { RetrieverService } from './services/retriever.service';
import { TextExtractorService } from './services/text-extractor.service';
import { IntlSentenceSplitter, SentenceSplitter } from './tokenization/sentence-splitter';
import { createTokenCounter, TokenCounter } from './tokenization/token-counter';

/**
 * RAG Module - chunking, indexing, retrieval and cited answers
 */
@Module({
    imports: [VectorStoreModule, RedisModule],
    providers: [
        RagService,
        OpenAIService,
        EmbeddingService,
        ChunkerService,
        RetrieverService,
        RerankerService,
        PromptBuilderService,
        CitationService,
        IndexerService,
        TextExtractorService,
        {
            provide: TokenCounter,
            inject: [ragConfig.KEY],
            useFactory: (settings: RagSettings) =>
                createTokenCounter(settings.tokenizerEncoding, new Logger(TokenCounter.name)),
        },
        {
            provide: SentenceSplitter,
            inject: [ragConfig.KEY],
            useFactory: (settings: RagSettings) => new IntlSentenceSplitter(settings.sentenceLocale),
        },
        { provide: EmbeddingProvider, useExisting: EmbeddingService },
        { provide: AnswerGenerator, useExisting: OpenAIService },
        { provide: DocumentExtractor, useExisting: TextExtractorService },
    ],
    exports: [RagService, IndexerService, OpenAIService],
})
export class RagModule { }
