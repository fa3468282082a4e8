import { Injectable, Logger } from '@nestjs/common';
import { CitationMap, CitationSource, CitationValidation, ResolvedCitations, RetrievedChunk } from '../types';
import { describeLocation } from '../utils/source-location';

const CITATION_PATTERN = /\[(\d+)\]/g;

/**
 * Parses `[n]` markers out of generated answers and maps them back onto the
 * ordered source list the prompt was built from. Citation `n` always refers
 * to `chunks[n - 1]`.
 */
@Injectable()
export class CitationService {
    private readonly logger = new Logger(CitationService.name);

    /**
     * Distinct citation numbers, ascending.
     */
    extractCitations(text: string): number[] {
        const numbers = new Set<number>();
        for (const match of text.matchAll(CITATION_PATTERN)) {
            numbers.add(Number.parseInt(match[1], 10));
        }
        return [...numbers].sort((a, b) => a - b);
    }

    validateCitations(text: string, numSources: number): CitationValidation {
        const errors = this.extractCitations(text)
            .filter((n) => n < 1 || n > numSources)
            .map((n) => `Invalid citation [${n}]: only ${numSources} sources available`);

        return { isValid: errors.length === 0, errors };
    }

    /**
     * Out-of-range citations are left out; `validateCitations` reports them.
     */
    mapCitationsToSources(text: string, chunks: readonly RetrievedChunk[]): CitationMap {
        const citationMap: CitationMap = {};

        for (const n of this.extractCitations(text)) {
            if (n >= 1 && n <= chunks.length) {
                citationMap[n] = toCitationSource(chunks[n - 1]);
            }
        }

        return citationMap;
    }

    resolve(text: string, chunks: readonly RetrievedChunk[]): ResolvedCitations {
        const citations = this.extractCitations(text);
        const { isValid, errors } = this.validateCitations(text, chunks.length);
        const citationMap = this.mapCitationsToSources(text, chunks);

        this.logger.debug(
            `🔗 Resolved ${Object.keys(citationMap).length}/${citations.length} citations against ${chunks.length} sources`,
        );

        return { citations, isValid, errors, citationMap };
    }

    formatReferences(citationMap: CitationMap): string {
        const numbers = Object.keys(citationMap)
            .map(Number)
            .sort((a, b) => a - b);

        if (numbers.length === 0) {
            return 'No citations found.';
        }

        const lines = numbers.map((n) => {
            const source = citationMap[n];
            return `[${n}] ${source.fileName} (${describeLocation(source)}) - Relevance: ${source.similarityScore.toFixed(2)}`;
        });

        return ['References:', ...lines].join('\n');
    }
}

function toCitationSource(chunk: RetrievedChunk): CitationSource {
    const source: CitationSource = {
        fileName: chunk.fileName,
        text: chunk.text,
        similarityScore: chunk.similarityScore,
    };
    if (chunk.page !== undefined) {
        source.page = chunk.page;
    }
    if (chunk.paragraph !== undefined) {
        source.paragraph = chunk.paragraph;
    }
    return source;
}
