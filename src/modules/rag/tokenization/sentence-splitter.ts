export abstract class SentenceSplitter {
    abstract split(text: string): string[];
}

/**
 * Sentence boundaries from the ICU rules behind `Intl.Segmenter`.
 */
export class IntlSentenceSplitter extends SentenceSplitter {
    private readonly segmenter: Intl.Segmenter;

    constructor(locale: string = 'en') {
        super();
        this.segmenter = new Intl.Segmenter(locale, { granularity: 'sentence' });
    }

    split(text: string): string[] {
        return Array.from(this.segmenter.segment(text), ({ segment }) => segment.trim()).filter(
            (sentence) => sentence.length > 0,
        );
    }
}
