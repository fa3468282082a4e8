import { DocumentSource, ExtractedDocument } from './types';

/**
 * Turns text into L2-normalised vectors of a fixed dimensionality.
 */
export abstract class EmbeddingProvider {
    abstract readonly modelName: string;

    abstract embed(text: string): Promise<number[]>;

    abstract embedMany(texts: string[], batchSize?: number): Promise<number[][]>;
}

/**
 * Produces free text from a system prompt and a user prompt.
 */
export abstract class AnswerGenerator {
    abstract readonly modelName: string;

    abstract generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

/**
 * Extracts per-page or per-paragraph text from a raw document.
 */
export abstract class DocumentExtractor {
    abstract extract(source: DocumentSource): Promise<ExtractedDocument>;
}
