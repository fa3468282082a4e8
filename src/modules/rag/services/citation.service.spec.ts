import { buildRetrievedChunk } from '../../../../test/fixtures';
import { CitationService } from './citation.service';

describe('CitationService', () => {
    const service = new CitationService();
    const chunks = [
        buildRetrievedChunk({ id: 'a', fileName: 'costs.txt', page: 4, text: 'Costs fell by 3%.', similarityScore: 0.812 }),
        buildRetrievedChunk({ id: 'b', fileName: 'revenue.txt', paragraph: 2, text: 'Revenue grew 10%.', similarityScore: 0.874 }),
    ];

    describe('extractCitations', () => {
        it('returns distinct numbers in ascending order', () => {
            expect(service.extractCitations('See [3], then [1] and [3] again, [10].')).toEqual([1, 3, 10]);
        });

        it('ignores bracketed text that is not a number', () => {
            expect(service.extractCitations('No refs [a] [ 1 ] [].')).toEqual([]);
        });
    });

    describe('validateCitations', () => {
        it('accepts citations within range', () => {
            expect(service.validateCitations('A [1]. B [2].', 2)).toEqual({ isValid: true, errors: [] });
        });

        it('reports each out-of-range citation once', () => {
            expect(service.validateCitations('A [5]. B [0]. C [5].', 2)).toEqual({
                isValid: false,
                errors: ['Invalid citation [0]: only 2 sources available', 'Invalid citation [5]: only 2 sources available'],
            });
        });
    });

    describe('mapCitationsToSources', () => {
        it('maps citation n to the n-th chunk', () => {
            expect(service.mapCitationsToSources('Revenue grew [2].', chunks)).toEqual({
                2: { fileName: 'revenue.txt', paragraph: 2, text: 'Revenue grew 10%.', similarityScore: 0.874 },
            });
        });

        it('leaves out citations without a chunk', () => {
            expect(service.mapCitationsToSources('Claim [5].', chunks)).toEqual({});
        });
    });

    describe('resolve', () => {
        it('resolves a well-cited answer against the source list', () => {
            const resolved = service.resolve('Revenue grew [2]. Costs fell [1][1].', chunks);

            expect(resolved.citations).toEqual([1, 2]);
            expect(resolved.isValid).toBe(true);
            expect(resolved.errors).toEqual([]);
            expect(Object.keys(resolved.citationMap)).toEqual(['1', '2']);
            expect(resolved.citationMap[1].fileName).toBe('costs.txt');
        });

        it('flags an out-of-range citation and maps the rest', () => {
            const resolved = service.resolve('Revenue grew [2]. Profit tripled [5].', chunks);

            expect(resolved.citations).toEqual([2, 5]);
            expect(resolved.isValid).toBe(false);
            expect(resolved.errors).toEqual(['Invalid citation [5]: only 2 sources available']);
            expect(Object.keys(resolved.citationMap)).toEqual(['2']);
        });
    });

    describe('formatReferences', () => {
        it('lists each citation with its location and relevance', () => {
            const citationMap = service.mapCitationsToSources('[2] [1]', chunks);

            expect(service.formatReferences(citationMap)).toBe(
                [
                    'References:',
                    '[1] costs.txt (Page 4) - Relevance: 0.81',
                    '[2] revenue.txt (Paragraph 2) - Relevance: 0.87',
                ].join('\n'),
            );
        });

        it('says so when nothing was cited', () => {
            expect(service.formatReferences({})).toBe('No citations found.');
        });
    });
});
