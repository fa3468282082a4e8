import { buildRagSettings, KeywordEmbeddingProvider, StubAnswerGenerator } from '../../../../test/fixtures';
import { RagSettings } from '../../../config/rag.config';
import { CitationValidationError } from '../../../common/errors/rag.errors';
import { InMemoryVectorStore } from '../../vector-store/in-memory-vector-store';
import { IntlSentenceSplitter } from '../tokenization/sentence-splitter';
import { WordCountApproximation } from '../tokenization/token-counter';
import { ChunkerService } from './chunker.service';
import { CitationService } from './citation.service';
import { IndexerService } from './indexer.service';
import { PromptBuilderService } from './prompt-builder.service';
import { NO_RELEVANT_INFORMATION_ANSWER, RagService } from './rag.service';
import { RerankerService } from './reranker.service';
import { RetrieverService } from './retriever.service';
import { TextExtractorService } from './text-extractor.service';

const mockExtractRawText = jest.fn();

jest.mock('mammoth', () => ({
    extractRawText: (input: unknown) => mockExtractRawText(input),
}));

const DOCUMENTS = {
    'a.txt': 'Revenue grew strongly. Revenue fell sharply.',
    'b.txt': 'Revenue and costs rose.',
    'c.txt': 'Staff count was flat.',
};

interface Harness {
    rag: RagService;
    generator: StubAnswerGenerator;
}

async function createHarness(answer: string, overrides: Partial<RagSettings> = {}, seed: boolean = true): Promise<Harness> {
    const settings = buildRagSettings({ chunkSize: 5, chunkOverlap: 0, maxChunkSize: 20, ...overrides });
    const store = new InMemoryVectorStore('test');
    const embeddings = new KeywordEmbeddingProvider(['revenue', 'costs', 'staff']);
    const generator = new StubAnswerGenerator(answer);
    const chunker = new ChunkerService(settings, new WordCountApproximation(), new IntlSentenceSplitter('en'));
    const indexer = new IndexerService(settings, new TextExtractorService(), chunker, embeddings, store);

    const rag = new RagService(
        settings,
        new RetrieverService(settings, embeddings, store),
        new RerankerService(settings),
        new PromptBuilderService(settings),
        new CitationService(),
        generator,
        embeddings,
        indexer,
    );

    if (seed) {
        await rag.indexDocuments(
            Object.entries(DOCUMENTS).map(([fileName, text]) => ({ fileName, filePath: fileName, content: Buffer.from(text) })),
        );
    }
    return { rag, generator };
}

describe('RagService', () => {
    it('builds the prompt and resolves citations against the reranked sources', async () => {
        const { rag, generator } = await createHarness('Revenue grew [1] while costs rose [2].');

        const result = await rag.query({ query: 'revenue' });

        expect(result.sources.map((source) => source.text)).toEqual([
            'Revenue grew strongly.',
            'Revenue and costs rose.',
            'Staff count was flat.',
            'Revenue fell sharply.',
        ]);
        expect(generator.prompts[0].userPrompt).toContain('[2] b.txt - Page 1\n"Revenue and costs rose."');
        expect(result.citations).toEqual([1, 2]);
        expect(result.citationMap[2]).toMatchObject({ fileName: 'b.txt', page: 1, text: 'Revenue and costs rose.' });
        expect(result.citationErrors).toEqual([]);
        expect(result.references).toBe(
            'References:\n[1] a.txt (Page 1) - Relevance: 1.00\n[2] b.txt (Page 1) - Relevance: 0.85',
        );
        expect(result.numSources).toBe(4);
        expect(result.avgSimilarity).toBeCloseTo((1 + 1 + (1 - (1 - Math.SQRT1_2) / 2) + 0.5) / 4, 6);
    });

    it('keeps the store order when reranking is turned off', async () => {
        const { rag, generator } = await createHarness('Revenue fell [2].');

        const result = await rag.query({ query: 'revenue', rerank: false });

        expect(result.sources.map((source) => source.text)).toEqual([
            'Revenue grew strongly.',
            'Revenue fell sharply.',
            'Revenue and costs rose.',
            'Staff count was flat.',
        ]);
        expect(generator.prompts[0].userPrompt).toContain('[2] a.txt - Page 1\n"Revenue fell sharply."');
        expect(result.citationMap[2].text).toBe('Revenue fell sharply.');
    });

    it('passes topK and filters to retrieval', async () => {
        const { rag } = await createHarness('Costs rose [1].');

        const result = await rag.query({ query: 'revenue', topK: 1, filters: { fileName: 'b.txt' } });

        expect(result.sources.map((source) => source.fileName)).toEqual(['b.txt']);
    });

    it('answers without the generator when nothing is retrieved', async () => {
        const { rag, generator } = await createHarness('unused', {}, false);

        const result = await rag.query({ query: 'revenue' });

        expect(result).toEqual({
            query: 'revenue',
            answer: NO_RELEVANT_INFORMATION_ANSWER,
            sources: [],
            citations: [],
            citationMap: {},
            citationErrors: [],
            references: 'No citations found.',
            numSources: 0,
            avgSimilarity: 0,
        });
        expect(generator.prompts).toEqual([]);
    });

    it('cites DOCX sources by paragraph', async () => {
        mockExtractRawText.mockResolvedValueOnce({ value: 'Staff count rose.\n\n\n\nStaff morale held.', messages: [] });
        const { rag, generator } = await createHarness('Morale held [2].', {}, false);
        await rag.indexDocuments([{ fileName: 'hr.docx', filePath: 'hr.docx', content: Buffer.from('docx') }]);

        const result = await rag.query({ query: 'staff' });

        expect(generator.prompts[0].userPrompt).toContain('[2] hr.docx - Paragraph 3\n"Staff morale held."');
        expect(result.citationMap[2]).toMatchObject({ fileName: 'hr.docx', paragraph: 3, text: 'Staff morale held.' });
        expect(result.sources[1]).toMatchObject({ fileType: 'docx', paragraph: 3 });
        expect(result.references).toBe('References:\n[2] hr.docx (Paragraph 3) - Relevance: 1.00');
    });

    it('returns invalid citations alongside the answer', async () => {
        const { rag } = await createHarness('Profit tripled [9].');

        const result = await rag.query({ query: 'revenue' });

        expect(result.answer).toBe('Profit tripled [9].');
        expect(result.citations).toEqual([9]);
        expect(result.citationMap).toEqual({});
        expect(result.citationErrors).toEqual(['Invalid citation [9]: only 4 sources available']);
    });

    it('rejects invalid citations in strict mode', async () => {
        const { rag } = await createHarness('Profit tripled [9].', { strictCitations: true });

        const error = await rag.query({ query: 'revenue' }).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(CitationValidationError);
        expect(error).toHaveProperty('errors', ['Invalid citation [9]: only 4 sources available']);
    });

    it('reports statistics of the store and models', async () => {
        const { rag } = await createHarness('unused');

        await expect(rag.getStats()).resolves.toEqual({
            totalChunks: 4,
            collectionName: 'test',
            vectorStoreDriver: 'memory',
            embeddingModel: 'keyword-test-model',
            llmModel: 'stub-test-model',
        });
    });

    it('deletes a document by file name', async () => {
        const { rag } = await createHarness('unused');

        await expect(rag.deleteDocument('a.txt')).resolves.toBe(2);
        await expect(rag.getStats()).resolves.toMatchObject({ totalChunks: 2 });
    });

    it('clears every document and then answers with nothing found', async () => {
        const { rag } = await createHarness('unused');

        await expect(rag.clearAll()).resolves.toBe(4);
        await expect(rag.query({ query: 'revenue' })).resolves.toMatchObject({ sources: [], citations: [] });
    });
});
