import OpenAI from 'openai';
import { z } from 'zod';
import { getSettings } from '../config/settings';
import { logger, ILogger } from '../config/logger';
import { RetryUtil, IRetryUtil } from '../utils/retry.util';
import { withTimeout } from '../utils/timeout.util';
import type { QuerySlots, QuerySpec } from '../types/retrieval';

export type ChatMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string };

// Interfaces for better testability
export interface IOpenAIClient {
    embeddings: {
        create(params: {
            model: string;
            input: string[];
            encoding_format: 'float';
        }, options?: { signal?: AbortSignal }): Promise<{
            data: Array<{ embedding: number[] }>;
        }>;
    };
    chat: {
        completions: {
            create(params: {
                model: string;
                messages: ChatMessage[];
                temperature: number;
                max_tokens: number;
                response_format?: { type: 'json_object' };
            }, options?: { signal?: AbortSignal }): Promise<{
                choices: Array<{ message: { content: string | null } }>;
                usage?: { total_tokens: number };
            }>;
        };
    };
}

/**
 * Text → dense vector. Retry policy belongs to the implementation; callers
 * only bound it with a deadline.
 */
export interface EmbeddingFunction {
    readonly model: string;
    embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface AnswerPassage {
    label: string;
    text: string;
}

export interface LanguageModel {
    parseIntent(userText: string, signal?: AbortSignal): Promise<QuerySpec>;
    synthesize(passages: AnswerPassage[], userText: string, signal?: AbortSignal): Promise<string>;
}

export interface OpenAIServiceOptions {
    embeddingModel: string;
    llmModel: string;
    temperature: number;
    llmTimeoutMs: number;
}

const INTENT_PROMPT = `You turn questions about technical documents (procedures, manuals, standards) into a search request.
Respond with a JSON object: {"intent": string, "slots": {"topic": string|null, "asset": string|null, "equipment": string|null, "bu": string|null, "latestOnly": boolean|null}}.
- intent: a short verb phrase such as "lookup_procedure" or "find_specification".
- topic: the subject as plain keywords. Use quotes for exact phrases and AND / OR between alternatives. No other punctuation.
- asset, equipment, bu: identifiers only when the question names them, otherwise null.
- latestOnly: false only when the question asks for historical or superseded revisions.`;

const ANSWER_PROMPT = `Answer the question using only the numbered passages supplied.
Cite every statement with the passage number in square brackets, e.g. [2].
If the passages do not contain the answer, say that the documents do not cover it.`;

const optionalSlot = z.string().trim().nullish().transform(value => (value ? value : undefined));

const intentSchema = z.object({
    intent: z.string().trim().min(1).default('lookup'),
    slots: z.object({
        topic: optionalSlot,
        asset: optionalSlot,
        equipment: optionalSlot,
        bu: optionalSlot,
        latestOnly: z.boolean().nullish().transform(value => value ?? undefined)
    }).default({})
});

/**
 * Drop absent slots so "no constraint" is always a missing key.
 */
function compactSlots(slots: z.infer<typeof intentSchema>['slots']): QuerySlots {
    const compact: QuerySlots = {};
    if (slots.topic !== undefined) compact.topic = slots.topic;
    if (slots.asset !== undefined) compact.asset = slots.asset;
    if (slots.equipment !== undefined) compact.equipment = slots.equipment;
    if (slots.bu !== undefined) compact.bu = slots.bu;
    if (slots.latestOnly !== undefined) compact.latestOnly = slots.latestOnly;
    return compact;
}

/**
 * OpenAI Service with Dependency Injection
 *
 * Embedding function and language model behind the retrieval core: query and
 * chunk embeddings, intent parsing into a structured query, and grounded
 * answer synthesis.
 */
export class OpenAIService implements EmbeddingFunction, LanguageModel {
    constructor(
        private client: IOpenAIClient,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private options: OpenAIServiceOptions
    ) { }

    /**
     * Factory method for production use
     */
    static create(): OpenAIService {
        const settings = getSettings();
        const client = new OpenAI({
            apiKey: settings.openaiApiKey
        });

        return new OpenAIService(client, RetryUtil, logger, {
            embeddingModel: settings.embeddingModel,
            llmModel: settings.llmModel,
            temperature: settings.llmTemperature,
            llmTimeoutMs: settings.llmTimeoutMs
        });
    }

    get model(): string {
        return this.options.embeddingModel;
    }

    /**
     * Generate embeddings for a batch of texts
     */
    async generateEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        return await this.retryUtil.executeWithRetry(
            async () => {
                const response = await this.client.embeddings.create({
                    model: this.options.embeddingModel,
                    input: texts,
                    encoding_format: 'float'
                }, { signal });

                const embeddings = response.data.map(item => item.embedding);

                this.logger.debug({
                    textsCount: texts.length,
                    model: this.options.embeddingModel,
                    dimension: embeddings[0]?.length ?? 0
                }, 'OpenAI embeddings generated');

                return embeddings;
            },
            {
                maxAttempts: 3,
                baseDelay: 1000,
                maxDelay: 5000,
                operationName: 'OpenAI embeddings generation'
            }
        );
    }

    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
        const [embedding] = await this.generateEmbeddings([text], signal);
        if (!embedding) {
            throw new Error('No embedding returned from OpenAI');
        }
        return embedding;
    }

    /**
     * Generate LLM completion
     */
    async generateCompletion(messages: ChatMessage[], options: {
        jsonMode?: boolean;
        maxTokens?: number;
        signal?: AbortSignal;
    } = {}): Promise<string> {
        return await withTimeout(
            signal => this.retryUtil.executeWithRetry(
                async () => {
                    const response = await this.client.chat.completions.create({
                        model: this.options.llmModel,
                        messages,
                        temperature: this.options.temperature,
                        max_tokens: options.maxTokens ?? 1000,
                        ...(options.jsonMode ? { response_format: { type: 'json_object' as const } } : {})
                    }, { signal });

                    const content = response.choices[0]?.message.content;
                    if (!content) {
                        throw new Error('No content returned from OpenAI');
                    }

                    this.logger.info({
                        model: this.options.llmModel,
                        tokensUsed: response.usage?.total_tokens ?? 0,
                        contentLength: content.length
                    }, 'OpenAI completion generated');

                    return content;
                },
                {
                    maxAttempts: 3,
                    baseDelay: 1000,
                    maxDelay: 5000,
                    operationName: 'OpenAI completion generation'
                }
            ),
            this.options.llmTimeoutMs,
            'OpenAI completion',
            options.signal
        );
    }

    /**
     * Parse a user question into an intent and slots. The model's JSON is
     * validated; malformed output is an error, never a partial spec.
     */
    async parseIntent(userText: string, signal?: AbortSignal): Promise<QuerySpec> {
        const content = await this.generateCompletion([
            { role: 'system', content: INTENT_PROMPT },
            { role: 'user', content: userText }
        ], { jsonMode: true, maxTokens: 300, signal });

        let json: unknown;
        try {
            json = JSON.parse(content);
        } catch (error: unknown) {
            throw new Error('Intent parser returned invalid JSON', { cause: error });
        }

        const parsed = intentSchema.parse(json);
        const spec: QuerySpec = { intent: parsed.intent, slots: compactSlots(parsed.slots) };

        this.logger.info({ intent: spec.intent, slots: spec.slots }, 'User intent parsed');
        return spec;
    }

    async synthesize(passages: AnswerPassage[], userText: string, signal?: AbortSignal): Promise<string> {
        const context = passages
            .map((passage, index) => `[${index + 1}] ${passage.label}\n${passage.text}`)
            .join('\n\n');

        return await this.generateCompletion([
            { role: 'system', content: ANSWER_PROMPT },
            { role: 'user', content: `Passages:\n\n${context}\n\nQuestion: ${userText}` }
        ], { signal });
    }
}

// Singleton instance
let openaiService: OpenAIService | null = null;

export function getOpenAIService(): OpenAIService {
    if (!openaiService) {
        openaiService = OpenAIService.create();
    }
    return openaiService;
}
