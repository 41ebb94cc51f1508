import { logger, ILogger } from '../config/logger';
import { IChunkStore, getChunkStoreService } from './chunk-store.service';
import { FusionRequest, FusionService, getFusionService } from './fusion.service';
import { CitationService, getCitationService } from './citation.service';
import { LanguageModel, getOpenAIService } from './openai.service';
import type {
    Citation,
    FusedCandidate,
    FusionDiagnostics,
    QuerySpec,
    RetrievalSource,
    SupplementaryCandidate
} from '../types/retrieval';

export type SearchOptions = Omit<FusionRequest, 'spec'>;

export interface SearchResult {
    results: Array<FusedCandidate & { text: string; citation: Citation }>;
    supplementary: Array<SupplementaryCandidate & { text: string; citation: Citation }>;
    degraded: boolean;
    degradedSources: RetrievalSource[];
    diagnostics: FusionDiagnostics;
}

export interface AskOptions {
    limit?: number;
    includeHistorical?: boolean;
    signal?: AbortSignal;
}

export interface AskResult {
    answer: string;
    /** True when nothing matched and the model was not consulted */
    noMatch: boolean;
    citations: Citation[];
    degraded: boolean;
    spec: QuerySpec;
}

export const NO_MATCH_ANSWER = 'No matching passages were found in the indexed documents.';

const DEFAULT_ANSWER_PASSAGES = 5;

/**
 * Retrieval Service
 *
 * Public face of the engine: fused search with citations, and question
 * answering grounded in the retrieved passages.
 */
export class RetrievalService {
    constructor(
        private fusion: Pick<FusionService, 'query'>,
        private citations: CitationService,
        private chunkStore: IChunkStore,
        private languageModel: LanguageModel,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): RetrievalService {
        return new RetrievalService(
            getFusionService(),
            getCitationService(),
            getChunkStoreService(),
            getOpenAIService(),
            logger
        );
    }

    async search(spec: QuerySpec, options: SearchOptions = {}): Promise<SearchResult> {
        const fused = await this.fusion.query({ ...options, spec });

        const chunkIds = [
            ...fused.candidates.map(candidate => candidate.chunkId),
            ...fused.supplementary.map(candidate => candidate.chunkId)
        ];
        const [citations, contexts] = await Promise.all([
            this.citations.buildMany(chunkIds),
            this.chunkStore.getChunkContexts(chunkIds)
        ]);
        const citationByChunk = new Map(citations.map(citation => [citation.chunkId, citation]));
        const textByChunk = new Map(contexts.map(context => [context.chunk.chunkId, context.chunk.text]));

        const attach = <T extends { chunkId: string }>(candidate: T): T & { text: string; citation: Citation } | null => {
            const citation = citationByChunk.get(candidate.chunkId);
            const text = textByChunk.get(candidate.chunkId);
            return citation && text !== undefined ? { ...candidate, text, citation } : null;
        };

        return {
            results: fused.candidates.map(attach).filter(isPresent),
            supplementary: fused.supplementary.map(attach).filter(isPresent),
            degraded: fused.degraded,
            degradedSources: fused.degradedSources,
            diagnostics: fused.diagnostics
        };
    }

    async ask(userText: string, options: AskOptions = {}): Promise<AskResult> {
        const spec = await this.languageModel.parseIntent(userText, options.signal);

        const found = await this.search(spec, {
            queryText: userText,
            limit: options.limit ?? DEFAULT_ANSWER_PASSAGES,
            includeHistorical: options.includeHistorical,
            signal: options.signal
        });

        if (found.results.length === 0) {
            this.logger.info({ intent: spec.intent, slots: spec.slots }, 'No passages matched, skipping synthesis');
            return { answer: NO_MATCH_ANSWER, noMatch: true, citations: [], degraded: found.degraded, spec };
        }

        const passages = found.results.map(result => ({
            label: this.citations.format(result.citation),
            text: result.text
        }));
        const answer = await this.languageModel.synthesize(passages, userText, options.signal);

        this.logger.info({
            intent: spec.intent,
            passagesCount: passages.length,
            degraded: found.degraded,
            answerLength: answer.length
        }, 'Answer synthesized');

        return {
            answer,
            noMatch: false,
            citations: found.results.map(result => result.citation),
            degraded: found.degraded,
            spec
        };
    }
}

function isPresent<T>(value: T | null): value is T {
    return value !== null;
}

// Singleton instance
let retrievalService: RetrievalService | null = null;

export function getRetrievalService(): RetrievalService {
    if (!retrievalService) {
        retrievalService = RetrievalService.create();
    }
    return retrievalService;
}
