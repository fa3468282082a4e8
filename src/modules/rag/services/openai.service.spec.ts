import { buildOpenAIConfig, buildVectorStoreConfig } from '../../../../test/fixtures';
import { EmbeddingGenerationError, GenerationError } from '../../../common/errors/rag.errors';
import { OpenAIService } from './openai.service';

const mockEmbeddingsCreate = jest.fn();
const mockCompletionsCreate = jest.fn();

jest.mock('openai', () => ({
    __esModule: true,
    default: jest.fn().mockImplementation(() => ({
        embeddings: { create: mockEmbeddingsCreate },
        chat: { completions: { create: mockCompletionsCreate } },
    })),
}));

describe('OpenAIService', () => {
    let service: OpenAIService;

    beforeEach(() => {
        mockEmbeddingsCreate.mockReset();
        mockCompletionsCreate.mockReset();
        service = new OpenAIService(buildOpenAIConfig(), buildVectorStoreConfig({ dimensions: 3 }));
    });

    describe('generate', () => {
        it('sends the system and user prompts to the chat model', async () => {
            mockCompletionsCreate.mockResolvedValue({
                choices: [{ message: { content: 'Revenue grew [1].' } }],
                usage: { total_tokens: 42 },
            });

            const answer = await service.generate('Cite everything.', 'How did revenue change?');

            expect(answer).toBe('Revenue grew [1].');
            expect(mockCompletionsCreate).toHaveBeenCalledWith({
                model: 'gpt-4o-mini',
                messages: [
                    { role: 'system', content: 'Cite everything.' },
                    { role: 'user', content: 'How did revenue change?' },
                ],
                temperature: 0.1,
                max_tokens: 1000,
            });
        });

        it('retries transient failures', async () => {
            mockCompletionsCreate
                .mockRejectedValueOnce(new Error('rate limited'))
                .mockResolvedValueOnce({ choices: [{ message: { content: 'Done [1].' } }] });

            await expect(service.generate('system', 'user')).resolves.toBe('Done [1].');
            expect(mockCompletionsCreate).toHaveBeenCalledTimes(2);
        });

        it('raises GenerationError once retries are exhausted', async () => {
            mockCompletionsCreate.mockRejectedValue(new Error('service unavailable'));

            const error = await service.generate('system', 'user').catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(GenerationError);
            expect(error).toHaveProperty('message', 'Failed to generate answer: service unavailable');
            expect(mockCompletionsCreate).toHaveBeenCalledTimes(3);
        });

        it('rejects an empty completion', async () => {
            mockCompletionsCreate.mockResolvedValue({ choices: [{ message: { content: null } }] });

            await expect(service.generate('system', 'user')).rejects.toThrow('Model returned an empty response');
        });
    });

    describe('createEmbeddings', () => {
        it('returns vectors in input order', async () => {
            mockEmbeddingsCreate.mockResolvedValue({
                data: [
                    { index: 1, embedding: [0, 1, 0] },
                    { index: 0, embedding: [1, 0, 0] },
                ],
            });

            const embeddings = await service.createEmbeddings(['first', 'second']);

            expect(embeddings).toEqual([
                [1, 0, 0],
                [0, 1, 0],
            ]);
            expect(mockEmbeddingsCreate).toHaveBeenCalledWith({
                model: 'text-embedding-3-small',
                input: ['first', 'second'],
                encoding_format: 'float',
                dimensions: 3,
            });
        });

        it('omits dimensions for models that do not accept them', async () => {
            service = new OpenAIService(
                buildOpenAIConfig({ embeddingModel: 'text-embedding-ada-002' }),
                buildVectorStoreConfig(),
            );
            mockEmbeddingsCreate.mockResolvedValue({ data: [{ index: 0, embedding: [1, 0, 0] }] });

            await service.createEmbeddings(['only']);

            expect(mockEmbeddingsCreate).toHaveBeenCalledWith({
                model: 'text-embedding-ada-002',
                input: ['only'],
                encoding_format: 'float',
            });
        });

        it('raises EmbeddingGenerationError on failure', async () => {
            mockEmbeddingsCreate.mockRejectedValue(new Error('invalid api key'));

            await expect(service.createEmbeddings(['text'])).rejects.toThrow(EmbeddingGenerationError);
        });
    });
});
