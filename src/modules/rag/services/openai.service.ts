import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import OpenAI from 'openai';
import { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import openaiConfig from '../../../config/openai.config';
import vectorStoreConfig from '../../../config/vector-store.config';
import { EmbeddingGenerationError, GenerationError } from '../../../common/errors/rag.errors';
import { describeError } from '../../../common/utils/error.util';
import { retryWithBackoff } from '../../../common/utils/retry.util';
import { AnswerGenerator } from '../collaborators';

export interface OpenAIModelInfo {
    llm: { provider: 'openai'; model: string; temperature: number; maxTokens: number };
    embedding: { model: string; dimensions: number };
}

/**
 * OpenAI Service - Native OpenAI SDK Integration
 */
@Injectable()
export class OpenAIService extends AnswerGenerator {
    private readonly logger = new Logger(OpenAIService.name);
    private readonly client: OpenAI;
    readonly modelName: string;
    readonly embeddingModel: string;
    readonly embeddingDimensions: number;

    constructor(
        @Inject(openaiConfig.KEY) private readonly config: ConfigType<typeof openaiConfig>,
        @Inject(vectorStoreConfig.KEY) vectorStore: ConfigType<typeof vectorStoreConfig>,
    ) {
        super();
        this.modelName = config.chatModel;
        this.embeddingModel = config.embeddingModel;
        this.embeddingDimensions = vectorStore.dimensions;

        // Retries are handled here with backoff, not by the SDK.
        this.client = new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseUrl,
            maxRetries: 0,
        });

        this.logger.log(`✅ OpenAI client initialized`);
        this.logger.log(`📊 Embedding model: ${this.embeddingModel}`);
        this.logger.log(`💬 Chat model: ${this.modelName}`);
    }

    /**
     * Raw embeddings in input order. Vectors are not normalised here.
     */
    async createEmbeddings(texts: string[]): Promise<number[][]> {
        try {
            this.logger.debug(`🔄 Generating embeddings for ${texts.length} texts`);

            const response = await this.withRetry('embeddings', async () =>
                this.client.embeddings.create({
                    model: this.embeddingModel,
                    input: texts,
                    encoding_format: 'float',
                    ...(this.supportsDimensions() ? { dimensions: this.embeddingDimensions } : {}),
                }),
            );

            const embeddings = [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);

            this.logger.debug(`✅ Generated ${embeddings.length} embeddings`);
            return embeddings;
        } catch (error) {
            this.logger.error(`❌ Failed to generate embeddings: ${describeError(error)}`);
            throw new EmbeddingGenerationError(`Failed to generate embeddings: ${describeError(error)}`, { cause: error });
        }
    }

    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
        return this.generateChatResponse([
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
        ]);
    }

    async generateChatResponse(messages: ChatCompletionMessageParam[]): Promise<string> {
        let content: string | null | undefined;
        try {
            this.logger.debug(`💬 Generating chat response (${messages.length} messages)`);

            const response = await this.withRetry('chat completion', async () =>
                this.client.chat.completions.create({
                    model: this.modelName,
                    messages,
                    temperature: this.config.temperature,
                    max_tokens: this.config.maxTokens,
                }),
            );

            content = response.choices[0]?.message.content;
            this.logger.debug(`📊 Tokens used: ${response.usage?.total_tokens ?? 0}`);
        } catch (error) {
            this.logger.error(`❌ Failed to generate chat response: ${describeError(error)}`);
            throw new GenerationError(`Failed to generate answer: ${describeError(error)}`, { cause: error });
        }

        if (!content) {
            throw new GenerationError('Model returned an empty response');
        }

        this.logger.debug(`✅ Chat response generated`);
        return content;
    }

    getModelInfo(): OpenAIModelInfo {
        return {
            llm: {
                provider: 'openai',
                model: this.modelName,
                temperature: this.config.temperature,
                maxTokens: this.config.maxTokens,
            },
            embedding: {
                model: this.embeddingModel,
                dimensions: this.embeddingDimensions,
            },
        };
    }

    private withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        return retryWithBackoff(fn, this.config.maxRetries, this.config.retryDelayMs, (attempt, error) =>
            this.logger.warn(`⚠️ OpenAI ${operation} failed (attempt ${attempt}/${this.config.maxRetries}): ${error.message}`),
        );
    }

    /** Only the text-embedding-3 family accepts a requested output size. */
    private supportsDimensions(): boolean {
        return this.embeddingModel.startsWith('text-embedding-3');
    }
}
