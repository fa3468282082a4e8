import { Inject, Injectable, Logger } from '@nestjs/common';
import ragConfig, { RagSettings } from '../../../config/rag.config';
import { ChunkingError, ConfigurationError } from '../../../common/errors/rag.errors';
import { describeError } from '../../../common/utils/error.util';
import { SentenceSplitter } from '../tokenization/sentence-splitter';
import { TokenCounter } from '../tokenization/token-counter';
import { Chunk, ExtractedDocument } from '../types';

interface Sentence {
    text: string;
    tokens: number;
}

/**
 * Sentence-aware, token-budgeted chunking with overlap between consecutive
 * chunks.
 */
@Injectable()
export class ChunkerService {
    private readonly logger = new Logger(ChunkerService.name);
    private readonly chunkSize: number;
    private readonly chunkOverlap: number;
    private readonly maxChunkSize: number;

    constructor(
        @Inject(ragConfig.KEY) settings: RagSettings,
        private readonly tokenCounter: TokenCounter,
        private readonly sentenceSplitter: SentenceSplitter,
    ) {
        this.chunkSize = settings.chunkSize;
        this.chunkOverlap = settings.chunkOverlap;
        this.maxChunkSize = settings.maxChunkSize;

        if (this.chunkSize <= 0) {
            throw new ConfigurationError('Chunk size must be positive');
        }
        if (this.chunkOverlap < 0 || this.chunkOverlap >= this.chunkSize) {
            throw new ConfigurationError('Chunk overlap must be between 0 and the chunk size');
        }
        if (this.maxChunkSize < this.chunkSize) {
            throw new ConfigurationError('Maximum chunk size must not be smaller than the chunk size');
        }

        this.logger.log(
            `Chunker initialized: chunkSize=${this.chunkSize}, overlap=${this.chunkOverlap}, max=${this.maxChunkSize}` +
                (this.tokenCounter.exact ? '' : ' (approximate token counts)'),
        );
    }

    countTokens(text: string): number {
        return this.tokenCounter.count(text);
    }

    /**
     * Split text into overlapping chunks. Every chunk carries a copy of
     * `metadata`. Blank input yields no chunks.
     */
    chunkText(text: string, metadata: Record<string, unknown> = {}): Chunk[] {
        if (!text || !text.trim()) {
            return [];
        }

        try {
            const sentences = this.sentenceSplitter.split(text);
            this.logger.debug(`📄 Split text (${text.length} chars) into ${sentences.length} sentences`);

            const chunks: Chunk[] = [];
            let current: Sentence[] = [];
            let currentTokens = 0;
            let chunkStart = 0;

            for (const sentenceText of sentences) {
                const sentence = { text: sentenceText, tokens: this.countTokens(sentenceText) };

                if (sentence.tokens > this.maxChunkSize) {
                    this.logger.warn(`Sentence exceeds max chunk size (${sentence.tokens} tokens), splitting by words`);

                    if (current.length > 0) {
                        const closed = this.createChunk(joinSentences(current), chunkStart, metadata, chunks.length);
                        chunks.push(closed);
                        chunkStart = closed.endOffset + 1;
                        current = [];
                        currentTokens = 0;
                    }

                    for (const piece of this.splitLongSentence(sentence.text)) {
                        const chunk = this.createChunk(piece, chunkStart, metadata, chunks.length);
                        chunks.push(chunk);
                        chunkStart = chunk.endOffset + 1;
                    }
                    continue;
                }

                if (currentTokens + sentence.tokens > this.chunkSize && current.length > 0) {
                    const closed = this.createChunk(joinSentences(current), chunkStart, metadata, chunks.length);
                    chunks.push(closed);

                    let overlap = this.getOverlapSentences(current);
                    // A chunk must never consist of overlap alone.
                    while (overlap.length > 0 && sumTokens(overlap) + sentence.tokens > this.chunkSize) {
                        overlap = overlap.slice(1);
                    }

                    chunkStart = this.nextChunkStart(closed, overlap);
                    current = overlap;
                    currentTokens = sumTokens(overlap);
                }

                current.push(sentence);
                currentTokens += sentence.tokens;
            }

            if (current.length > 0) {
                chunks.push(this.createChunk(joinSentences(current), chunkStart, metadata, chunks.length));
            }

            this.logger.debug(`✅ Created ${chunks.length} chunks from text`);
            return chunks;
        } catch (error) {
            this.logger.error(`❌ Chunking failed: ${describeError(error)}`);
            throw new ChunkingError(`Failed to chunk text: ${describeError(error)}`, { cause: error });
        }
    }

    /**
     * Chunk every page or paragraph of an extracted document. Section
     * positions are merged into chunk metadata and chunk indexes run
     * continuously across sections.
     */
    chunkDocument(document: ExtractedDocument): Chunk[] {
        const fileMetadata = {
            fileName: document.fileName,
            fileType: document.fileType,
            filePath: document.filePath,
        };

        const chunks: Chunk[] = [];
        for (const section of document.content) {
            const sectionMetadata: Record<string, unknown> = { ...fileMetadata };
            if (section.page !== undefined) {
                sectionMetadata.page = section.page;
            }
            if (section.paragraph !== undefined) {
                sectionMetadata.paragraph = section.paragraph;
            }

            for (const chunk of this.chunkText(section.text, sectionMetadata)) {
                chunks.push({ ...chunk, chunkIndex: chunks.length });
            }
        }

        this.logger.log(`✅ Chunked document '${document.fileName}' into ${chunks.length} chunks`);
        return chunks;
    }

    private createChunk(text: string, startOffset: number, metadata: Record<string, unknown>, chunkIndex: number): Chunk {
        const trimmed = text.trim();
        return {
            text: trimmed,
            chunkIndex,
            startOffset,
            endOffset: startOffset + trimmed.length,
            tokenCount: this.countTokens(trimmed),
            charCount: trimmed.length,
            metadata: { ...metadata },
        };
    }

    /**
     * Longest run of trailing sentences whose token total fits the overlap budget.
     */
    private getOverlapSentences(sentences: Sentence[]): Sentence[] {
        const overlap: Sentence[] = [];
        let total = 0;

        for (let i = sentences.length - 1; i >= 0; i--) {
            if (total + sentences[i].tokens > this.chunkOverlap) {
                break;
            }
            overlap.unshift(sentences[i]);
            total += sentences[i].tokens;
        }

        return overlap;
    }

    /**
     * Offsets are approximate: chunk text is rebuilt from trimmed sentences,
     * so the overlap is located inside the previous chunk's text. When it
     * cannot be found, or there is no overlap, a running cursor past the
     * previous chunk is used instead. The cursor assumes one separator
     * character between chunks, so offsets drift by one for every extra
     * character when sentences were split across a paragraph break.
     */
    private nextChunkStart(previous: Chunk, overlap: Sentence[]): number {
        const cursor = previous.endOffset + 1;
        if (overlap.length === 0) {
            return cursor;
        }

        const position = previous.text.lastIndexOf(joinSentences(overlap));
        if (position === -1) {
            this.logger.debug('Overlap text not found in previous chunk, falling back to cursor offset');
            return cursor;
        }
        return previous.startOffset + position;
    }

    /**
     * Split an oversized sentence on word boundaries into pieces of at most
     * `chunkSize` tokens. A single word above the budget becomes its own piece.
     */
    private splitLongSentence(sentence: string): string[] {
        const words = sentence.split(/\s+/).filter((word) => word.length > 0);
        const pieces: string[] = [];
        let current: string[] = [];

        for (const word of words) {
            if (current.length > 0 && this.countTokens([...current, word].join(' ')) > this.chunkSize) {
                pieces.push(current.join(' '));
                current = [word];
            } else {
                current.push(word);
            }
        }

        if (current.length > 0) {
            pieces.push(current.join(' '));
        }

        return pieces;
    }
}

function joinSentences(sentences: Sentence[]): string {
    return sentences.map((sentence) => sentence.text).join(' ');
}

function sumTokens(sentences: Sentence[]): number {
    return sentences.reduce((total, sentence) => total + sentence.tokens, 0);
}
