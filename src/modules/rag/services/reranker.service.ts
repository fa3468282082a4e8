import { Inject, Injectable, Logger } from '@nestjs/common';
import ragConfig, { RagSettings } from '../../../config/rag.config';
import { ConfigurationError } from '../../../common/errors/rag.errors';
import { RetrievedChunk } from '../types';

export const RERANK_STRATEGIES = ['identity', 'diversity'] as const;

export type RerankStrategy = (typeof RERANK_STRATEGIES)[number];

export function isRerankStrategy(value: string): value is RerankStrategy {
    return RERANK_STRATEGIES.some((strategy) => strategy === value);
}

/**
 * Reorders retrieved chunks before they become the prompt's source list.
 */
@Injectable()
export class RerankerService {
    private readonly logger = new Logger(RerankerService.name);
    readonly strategy: RerankStrategy;

    constructor(@Inject(ragConfig.KEY) settings: RagSettings) {
        if (!isRerankStrategy(settings.rerankStrategy)) {
            throw new ConfigurationError(
                `Unknown rerank strategy '${settings.rerankStrategy}', expected one of: ${RERANK_STRATEGIES.join(', ')}`,
            );
        }
        this.strategy = settings.rerankStrategy;
        this.logger.log(`Reranker initialized with '${this.strategy}' strategy`);
    }

    /**
     * Always returns a permutation of the input. `query` is accepted for
     * query-aware strategies; neither current strategy reads it.
     */
    rerank(chunks: readonly RetrievedChunk[], query?: string): RetrievedChunk[] {
        this.logger.debug(`Reranking ${chunks.length} chunks${query ? ` for '${query}'` : ''}`);
        switch (this.strategy) {
            case 'identity':
                return [...chunks];
            case 'diversity':
                return this.diversityRerank(chunks);
        }
    }

    /**
     * Round-robin over source files: first the best chunk of every file,
     * then the second best, and so on. Files keep the order in which they
     * first appear.
     */
    private diversityRerank(chunks: readonly RetrievedChunk[]): RetrievedChunk[] {
        const bySource = new Map<string, RetrievedChunk[]>();
        for (const chunk of chunks) {
            const group = bySource.get(chunk.fileName);
            if (group) {
                group.push(chunk);
            } else {
                bySource.set(chunk.fileName, [chunk]);
            }
        }

        const groups = [...bySource.values()];
        const rounds = Math.max(0, ...groups.map((group) => group.length));
        const reranked: RetrievedChunk[] = [];

        for (let rank = 0; rank < rounds; rank++) {
            for (const group of groups) {
                if (rank < group.length) {
                    reranked.push(group[rank]);
                }
            }
        }

        this.logger.debug(`🔄 Diversity reranking: ${chunks.length} chunks from ${groups.length} sources`);
        return reranked;
    }
}
