import { Logger } from '@nestjs/common';
import { getEncoding, Tiktoken, TiktokenEncoding } from 'js-tiktoken';
import { describeError } from '../../../common/utils/error.util';

export abstract class TokenCounter {
    /** False when counts are estimated rather than produced by a tokenizer. */
    abstract readonly exact: boolean;

    abstract count(text: string): number;
}

/**
 * BPE token counts from a tiktoken encoding.
 */
export class TiktokenCounter extends TokenCounter {
    readonly exact = true;

    constructor(private readonly encoder: Tiktoken) {
        super();
    }

    count(text: string): number {
        return this.encoder.encode(text).length;
    }
}

/**
 * Approximation used when no tokenizer is available: round(words * 1.33).
 * English prose averages about 0.75 words per token; counts for code, numbers
 * or other languages can be far off.
 */
export class WordCountApproximation extends TokenCounter {
    readonly exact = false;

    count(text: string): number {
        const words = text.split(/\s+/).filter((word) => word.length > 0).length;
        return Math.round(words * 1.33);
    }
}

export function createTokenCounter(encoding: TiktokenEncoding, logger: Logger): TokenCounter {
    try {
        return new TiktokenCounter(getEncoding(encoding));
    } catch (error) {
        logger.warn(`Failed to load tiktoken encoding ${encoding} (${describeError(error)}), using word-based estimation`);
        return new WordCountApproximation();
    }
}
