import { Inject, Injectable } from '@nestjs/common';
import ragConfig, { RagSettings } from '../../../config/rag.config';
import { RetrievedChunk } from '../types';
import { describeLocation } from '../utils/source-location';

export interface RagPrompt {
    systemPrompt: string;
    userPrompt: string;
}

/**
 * Prompt templates for citation-grounded answers. Sources are numbered from
 * 1 in the order given, which is the order citations resolve against.
 */
@Injectable()
export class PromptBuilderService {
    private readonly maxExcerptLength: number;

    constructor(@Inject(ragConfig.KEY) settings: RagSettings) {
        this.maxExcerptLength = settings.maxExcerptLength;
    }

    buildRagSystemPrompt(): string {
        return `You are a helpful assistant that answers questions based ONLY on the provided source documents.

Your task:
1. Read the sources carefully
2. Provide a thorough answer to the user's question
3. ALWAYS cite your sources using [1], [2], etc. after each statement
4. If the information is not found in the sources, clearly state: "I don't find supporting information in the provided sources."
5. Do not make up or infer information beyond what is explicitly stated in the sources

Guidelines:
- Support each claim with citations [1], [2], etc.
- Only cite source numbers that appear in the list of sources
- Include relevant details and context from the sources`;
    }

    buildRagUserPrompt(question: string, sources: readonly RetrievedChunk[]): string {
        return `Sources:
${this.formatSources(sources)}

Question: ${question}

Please answer the question using only the sources provided above. Remember to cite your sources using [1], [2], etc.`;
    }

    buildRagPrompt(question: string, sources: readonly RetrievedChunk[]): RagPrompt {
        return {
            systemPrompt: this.buildRagSystemPrompt(),
            userPrompt: this.buildRagUserPrompt(question, sources),
        };
    }

    /**
     * One block per source: `[n] <file> - <location>` followed by the quoted,
     * possibly truncated excerpt. Blocks are separated by a blank line.
     */
    formatSources(sources: readonly RetrievedChunk[]): string {
        return sources
            .map((source, i) => `[${i + 1}] ${source.fileName} - ${describeLocation(source)}\n"${this.excerpt(source.text)}"`)
            .join('\n\n');
    }

    private excerpt(text: string): string {
        return text.length > this.maxExcerptLength ? `${text.slice(0, this.maxExcerptLength)}...` : text;
    }
}
