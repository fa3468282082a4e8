import { Logger } from '@nestjs/common';
import { IntlSentenceSplitter } from './sentence-splitter';
import { createTokenCounter, WordCountApproximation } from './token-counter';

describe('WordCountApproximation', () => {
    const counter = new WordCountApproximation();

    it('rounds word count times 1.33', () => {
        expect(counter.count('Apples are red.')).toBe(4);
        expect(counter.count('one two three four five six')).toBe(8);
        expect(counter.count('single')).toBe(1);
    });

    it('counts nothing for blank text', () => {
        expect(counter.count('   ')).toBe(0);
        expect(counter.exact).toBe(false);
    });
});

describe('TiktokenCounter', () => {
    it('loads a real encoding', () => {
        const counter = createTokenCounter('cl100k_base', new Logger('test'));

        expect(counter.exact).toBe(true);
        expect(counter.count('hello')).toBe(1);
        expect(counter.count('')).toBe(0);
    });
});

describe('IntlSentenceSplitter', () => {
    const splitter = new IntlSentenceSplitter('en');

    it('splits prose into trimmed sentences', () => {
        expect(splitter.split('Revenue grew. Costs fell! Did margins improve?  Yes.')).toEqual([
            'Revenue grew.',
            'Costs fell!',
            'Did margins improve?',
            'Yes.',
        ]);
    });

    it('returns nothing for whitespace', () => {
        expect(splitter.split(' \n\t ')).toEqual([]);
    });
});
