import { getSettings, FusionSettings } from '../config/settings';
import { logger, ILogger } from '../config/logger';
import { withTimeout } from '../utils/timeout.util';
import { minMaxNormalize } from '../utils/score.util';
import {
    DanglingIndexEntryError,
    InvalidMatchExpressionError,
    RetrievalError,
    RetrievalErrorCode,
    getErrorMessage
} from '../types/errors';
import { compileMatchExpression, MatchExpression } from './match-expression';
import { IChunkStore, getChunkStoreService } from './chunk-store.service';
import { IVectorIndex, getVectorIndexService } from './vector-index.service';
import { normalizeEmbedding } from './embedding-cache.service';
import { EmbeddingFunction, getOpenAIService } from './openai.service';
import { IRelationExpander, getRelationExpanderService } from './relation-expander.service';
import type {
    ChunkContext,
    DocumentRecord,
    FusedCandidate,
    FusionResult,
    LexicalSearchResult,
    QuerySlots,
    QuerySpec,
    RetrievalSource,
    SearchFilters,
    VectorSearchResult
} from '../types/retrieval';

export interface FusionRequest {
    spec: QuerySpec;
    /** Text embedded for the vector branch; defaults to the topic slot */
    queryText?: string;
    alpha?: number;
    limit?: number;
    overfetch?: number;
    includeHistorical?: boolean;
    filters?: SearchFilters;
    expandRelations?: boolean;
    signal?: AbortSignal;
}

export interface FusionOptions extends FusionSettings {
    embeddingTimeoutMs: number;
}

function throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new RetrievalError(RetrievalErrorCode.CANCELLED, 'Query cancelled');
    }
}

function sameId(slot: string | undefined, value: string | null): boolean {
    return slot !== undefined && value !== null && slot.toLowerCase() === value.toLowerCase();
}

function entityMatches(slots: QuerySlots, document: DocumentRecord): boolean {
    return sameId(slots.asset, document.assetId) || sameId(slots.equipment, document.equipmentId);
}

function passesFilters(document: DocumentRecord, filters: SearchFilters, includeHistorical: boolean): boolean {
    if (!includeHistorical && document.status !== 'active') return false;
    if (filters.bu !== undefined && document.bu !== filters.bu) return false;
    if (filters.assetId !== undefined && document.assetId !== filters.assetId) return false;
    if (filters.equipmentId !== undefined && document.equipmentId !== filters.equipmentId) return false;
    return true;
}

/**
 * Final score descending, then page_start ascending, then chunk_id ascending.
 */
export function compareCandidates(a: FusedCandidate, b: FusedCandidate): number {
    if (a.finalScore !== b.finalScore) {
        return b.finalScore - a.finalScore;
    }
    if (a.pageStart !== b.pageStart) {
        return a.pageStart - b.pageStart;
    }
    if (a.chunkId === b.chunkId) {
        return 0;
    }
    return a.chunkId < b.chunkId ? -1 : 1;
}

/**
 * Fusion Service
 *
 * Runs the keyword and vector branches concurrently, normalises each list
 * into [0, 1], fuses them with a weighted sum, applies the entity boost and
 * the status filter, and returns a deterministically ordered top N.
 */
export class FusionService {
    constructor(
        private chunkStore: IChunkStore,
        private vectorIndex: IVectorIndex,
        private embedder: EmbeddingFunction,
        private relationExpander: IRelationExpander | null,
        private logger: ILogger,
        private options: FusionOptions
    ) { }

    /**
     * Factory method for production use
     */
    static create(): FusionService {
        const settings = getSettings();
        return new FusionService(
            getChunkStoreService(),
            getVectorIndexService(),
            getOpenAIService(),
            getRelationExpanderService(),
            logger,
            { ...settings.fusion, embeddingTimeoutMs: settings.embeddingTimeoutMs }
        );
    }

    async query(request: FusionRequest): Promise<FusionResult> {
        const startedAt = Date.now();
        const { spec, signal } = request;
        throwIfCancelled(signal);

        const alpha = request.alpha ?? this.options.alpha;
        if (!(alpha >= 0 && alpha <= 1)) {
            throw new RangeError(`alpha must be within [0, 1], got ${alpha}`);
        }
        const limit = request.limit ?? this.options.topN;
        const overfetch = Math.max(request.overfetch ?? this.options.overfetch, limit);
        const includeHistorical = request.includeHistorical === true || spec.slots.latestOnly === false;
        const filters = this.resolveFilters(spec.slots, request.filters);

        const expression = spec.slots.topic !== undefined ? compileMatchExpression(spec.slots.topic) : null;
        const vectorText = (request.queryText ?? spec.slots.topic)?.trim();
        if (!expression && !vectorText) {
            throw new InvalidMatchExpressionError('', 'query has neither a topic nor query text');
        }

        const [lexicalOutcome, vectorOutcome] = await Promise.allSettled([
            expression ? this.searchLexical(expression, filters, includeHistorical, overfetch) : Promise.resolve(null),
            vectorText ? this.searchVectors(vectorText, overfetch, signal) : Promise.resolve(null)
        ]);
        throwIfCancelled(signal);

        const failures: Array<{ source: RetrievalSource; reason: unknown }> = [];
        const lexical = lexicalOutcome.status === 'fulfilled' ? lexicalOutcome.value : null;
        const vector = vectorOutcome.status === 'fulfilled' ? vectorOutcome.value : null;
        if (lexicalOutcome.status === 'rejected') {
            failures.push({ source: 'lexical', reason: lexicalOutcome.reason });
        }
        if (vectorOutcome.status === 'rejected') {
            failures.push({ source: 'vector', reason: vectorOutcome.reason });
        }

        if (!lexical && !vector) {
            if (failures.length === 1) {
                throw failures[0].reason;
            }
            throw new RetrievalError(
                RetrievalErrorCode.SEARCH_UNAVAILABLE,
                `Both retrieval branches failed: ${failures.map(f => `${f.source}: ${getErrorMessage(f.reason)}`).join('; ')}`,
                new AggregateError(failures.map(f => f.reason))
            );
        }

        failures.forEach(failure => {
            this.logger.warn({
                source: failure.source,
                error: getErrorMessage(failure.reason)
            }, 'Retrieval branch failed, continuing degraded');
        });

        const ranked = await this.fuse(spec.slots, lexical, vector, {
            alpha,
            limit,
            filters,
            includeHistorical
        });
        throwIfCancelled(signal);

        const supplementary = request.expandRelations && this.relationExpander
            ? await this.relationExpander.expand(ranked.candidates)
            : [];

        const result: FusionResult = {
            candidates: ranked.candidates,
            supplementary,
            degraded: failures.length > 0,
            degradedSources: failures.map(failure => failure.source),
            diagnostics: {
                lexicalHits: lexical?.hits.length ?? 0,
                vectorHits: vector?.hits.length ?? 0,
                danglingIds: [...(vector?.danglingIds ?? []), ...ranked.danglingChunkIds],
                filteredOut: ranked.filteredOut,
                elapsedMs: Date.now() - startedAt
            }
        };

        this.logger.info({
            intent: spec.intent,
            candidatesCount: result.candidates.length,
            supplementaryCount: supplementary.length,
            degradedSources: result.degradedSources,
            lexicalHits: result.diagnostics.lexicalHits,
            vectorHits: result.diagnostics.vectorHits,
            elapsedMs: result.diagnostics.elapsedMs
        }, 'Fusion query completed');

        return result;
    }

    private resolveFilters(slots: QuerySlots, requested: SearchFilters | undefined): SearchFilters {
        const filters: SearchFilters = {};
        const bu = requested?.bu ?? slots.bu;
        if (bu !== undefined) filters.bu = bu;
        if (requested?.assetId !== undefined) filters.assetId = requested.assetId;
        if (requested?.equipmentId !== undefined) filters.equipmentId = requested.equipmentId;
        return filters;
    }

    private async searchLexical(
        expression: MatchExpression,
        filters: SearchFilters,
        includeHistorical: boolean,
        overfetch: number
    ): Promise<LexicalSearchResult> {
        return await this.chunkStore.lexicalSearch(expression, { ...filters, includeHistorical }, overfetch);
    }

    private async searchVectors(text: string, overfetch: number, signal?: AbortSignal): Promise<VectorSearchResult> {
        const raw = await withTimeout(
            embedSignal => this.embedder.embed(text, embedSignal),
            this.options.embeddingTimeoutMs,
            'Query embedding',
            signal
        );
        const queryVector = normalizeEmbedding(raw, this.vectorIndex.dimension);
        return await this.vectorIndex.search(queryVector, overfetch);
    }

    private async fuse(
        slots: QuerySlots,
        lexical: LexicalSearchResult | null,
        vector: VectorSearchResult | null,
        params: { alpha: number; limit: number; filters: SearchFilters; includeHistorical: boolean }
    ): Promise<{ candidates: FusedCandidate[]; danglingChunkIds: string[]; filteredOut: number }> {
        const lexicalHits = lexical?.hits ?? [];
        const vectorHits = vector?.hits ?? [];

        const chunkIds = new Set<string>();
        lexicalHits.forEach(hit => chunkIds.add(hit.chunkId));
        vectorHits.forEach(hit => chunkIds.add(hit.chunkId));

        const contexts = await this.chunkStore.getChunkContexts(Array.from(chunkIds));
        const contextByChunk = new Map<string, ChunkContext>(contexts.map(context => [context.chunk.chunkId, context]));

        const danglingChunkIds: string[] = [];
        for (const chunkId of chunkIds) {
            if (!contextByChunk.has(chunkId)) {
                const dangling = new DanglingIndexEntryError(chunkId, 'chunk no longer in the chunk store');
                this.logger.warn({ chunkId, code: dangling.code }, dangling.message);
                danglingChunkIds.push(chunkId);
            }
        }

        const knownLexical = lexicalHits.filter(hit => contextByChunk.has(hit.chunkId));
        const knownVector = vectorHits.filter(hit => contextByChunk.has(hit.chunkId));

        const lexicalNorm = new Map<string, number>();
        minMaxNormalize(knownLexical.map(hit => hit.rawScore), lexical?.scoreOrder)
            .forEach((score, index) => lexicalNorm.set(knownLexical[index].chunkId, score));

        const vectorNorm = new Map<string, number>();
        minMaxNormalize(knownVector.map(hit => hit.similarity))
            .forEach((score, index) => vectorNorm.set(knownVector[index].chunkId, score));

        const candidates: FusedCandidate[] = [];
        let filteredOut = 0;

        for (const [chunkId, { chunk, document }] of contextByChunk) {
            if (!passesFilters(document, params.filters, params.includeHistorical)) {
                filteredOut++;
                continue;
            }

            const lexicalScore = lexicalNorm.get(chunkId) ?? 0;
            const vectorScore = vectorNorm.get(chunkId) ?? 0;
            const boost = entityMatches(slots, document) ? this.options.entityBoost : 0;

            const matchedBy: RetrievalSource[] = [];
            if (lexicalNorm.has(chunkId)) matchedBy.push('lexical');
            if (vectorNorm.has(chunkId)) matchedBy.push('vector');

            candidates.push({
                chunkId,
                docId: chunk.docId,
                sectionPath: chunk.sectionPath,
                pageStart: chunk.pageStart,
                pageEnd: chunk.pageEnd,
                lexicalScore,
                vectorScore,
                boost,
                finalScore: params.alpha * lexicalScore + (1 - params.alpha) * vectorScore + boost,
                matchedBy
            });
        }

        candidates.sort(compareCandidates);
        return {
            candidates: candidates.slice(0, params.limit),
            danglingChunkIds,
            filteredOut
        };
    }
}

// Singleton instance
let fusionService: FusionService | null = null;

export function getFusionService(): FusionService {
    if (!fusionService) {
        fusionService = FusionService.create();
    }
    return fusionService;
}
