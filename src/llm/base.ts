import pLimit from "p-limit";
import pRetry from "p-retry";
import Bottleneck from "bottleneck";
import { APICallError, type LanguageModelUsage } from "ai";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import {
    EmbeddingUnavailableError,
    GenerationUnavailableError,
    InvalidConfigurationError,
    InvalidCredentialError,
    RagError,
    describeError,
} from "../errors";
import { batchChunks } from "../utils/batchChunks";
import { createRateLimiter } from "../utils/rateLimiter";
import { countTokens, countTokensInBatch } from "../utils/tokenEncoder";
import { buildPromptMessages } from "./prompt";
import type {
    ChatProvider,
    EmbedOptions,
    EmbeddingProvider,
    GenerateAnswerOptions,
    GeneratedAnswer,
    TokenUsage,
} from "./types";

export interface ProviderRateLimits {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
    /** Delay before the first retry; later retries back off exponentially. */
    retryDelayMs?: number;
}

interface ScheduleOptions {
    logPrefix: string;
    timeoutMs: number;
    signal?: AbortSignal;
}

const DEFAULT_EMBEDDING_TIMEOUT_MS = 30_000;
const DEFAULT_CHAT_TIMEOUT_MS = 60_000;

function isCredentialFailure(error: unknown): boolean {
    return APICallError.isInstance(error) && (error.statusCode === 401 || error.statusCode === 403);
}

function attemptSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export function toTokenUsage(usage: LanguageModelUsage | undefined): TokenUsage {
    const inputTokens = usage?.promptTokens ?? 0;
    const outputTokens = usage?.completionTokens ?? 0;
    return {
        inputTokens: Number.isFinite(inputTokens) ? inputTokens : 0,
        outputTokens: Number.isFinite(outputTokens) ? outputTokens : 0,
    };
}

/**
 * Request scheduling shared by embedding and chat providers: a request limiter, an optional
 * token-weighted limiter, and bounded retries where each attempt gets its own timeout.
 */
abstract class RateLimitedProvider {
    protected readonly concurrencyLimit: number;
    protected readonly retries: number;
    protected readonly retryDelayMs: number;

    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;

    protected constructor(limits: ProviderRateLimits, protected readonly logger?: Logger) {
        this.retries = Math.max(0, limits.retries ?? 5);
        this.retryDelayMs = Math.max(1, limits.retryDelayMs ?? 1_000);
        this.concurrencyLimit = Math.max(1, limits.concurrency ?? 5);

        this.requestLimiter = createRateLimiter(this.concurrencyLimit, limits.maxRequestsPerMinute);

        if (limits.maxTokensPerMinute && Number.isFinite(limits.maxTokensPerMinute)) {
            const tokenConcurrency = Math.max(
                this.concurrencyLimit,
                Math.ceil(limits.maxTokensPerMinute)
            );
            this.tokenLimiter = createRateLimiter(tokenConcurrency, limits.maxTokensPerMinute);
        }
    }

    protected async scheduleWithRateLimits<T>(
        tokens: number,
        task: (signal: AbortSignal) => Promise<T>,
        { logPrefix, timeoutMs, signal }: ScheduleOptions
    ): Promise<T> {
        await this.reserveTokens(tokens);
        return this.requestLimiter.schedule(() =>
            pRetry(
                async () => {
                    try {
                        return await task(attemptSignal(timeoutMs, signal));
                    } catch (error) {
                        if (isCredentialFailure(error)) {
                            throw new pRetry.AbortError(
                                new InvalidCredentialError(`${logPrefix} rejected the configured credentials.`, { cause: error })
                            );
                        }
                        if (error instanceof RagError) {
                            throw new pRetry.AbortError(error);
                        }
                        throw error;
                    }
                },
                {
                    retries: this.retries,
                    minTimeout: this.retryDelayMs,
                    onFailedAttempt: (error) => {
                        this.logger?.warn(
                            {
                                attemptNumber: error.attemptNumber,
                                retriesLeft: error.retriesLeft,
                                err: error,
                            },
                            `${logPrefix} failed attempt`
                        );
                        if (signal?.aborted) {
                            throw error;
                        }
                    },
                }
            )
        );
    }

    private async reserveTokens(tokens: number): Promise<void> {
        if (!this.tokenLimiter || tokens <= 0) {
            return;
        }

        const weight = Math.max(1, Math.ceil(tokens));
        await this.tokenLimiter.schedule({ weight }, async () => undefined);
    }
}

export abstract class BaseEmbeddingProvider extends RateLimitedProvider implements EmbeddingProvider {
    readonly dimension: number;
    protected readonly batchSize: number;

    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        logger?: Logger
    ) {
        super(limits, logger);
        this.dimension = config.dimensions;
        this.batchSize = Math.max(1, limits.batchSize ?? 50);
    }

    async embedDocuments(texts: string[], options?: EmbedOptions): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const batches = batchChunks(texts, this.batchSize)
            .map((batch, idx) => ({
                idx, batch, tokens: countTokensInBatch(batch, this.config.model)
            }));

        const limit = pLimit(this.concurrencyLimit);
        const logPrefix = `${this.config.provider}:embed`;

        try {
            const results = await Promise.all(
                batches.map(({ batch, idx, tokens }) =>
                    limit(async () => {
                        const embeddings = await this.scheduleWithRateLimits(
                            tokens,
                            async (signal) => this.checkDimensions(await this.sendEmbeddingRequest(batch, signal), batch.length),
                            { logPrefix, timeoutMs: this.config.timeoutMs ?? DEFAULT_EMBEDDING_TIMEOUT_MS, signal: options?.signal }
                        );
                        return { idx, embeddings };
                    })
                )
            );

            const ordered = results.sort((a, b) => a.idx - b.idx);
            return ordered.flatMap((entry) => entry.embeddings);
        } catch (error) {
            if (error instanceof RagError) {
                throw error;
            }
            throw new EmbeddingUnavailableError(
                `${logPrefix} failed after ${this.retries + 1} attempts: ${describeError(error)}`,
                { cause: error }
            );
        }
    }

    async embedQuery(text: string, options?: EmbedOptions): Promise<number[]> {
        const [embedding] = await this.embedDocuments([text], options);
        return embedding;
    }

    protected abstract sendEmbeddingRequest(texts: string[], signal: AbortSignal): Promise<number[][]>;

    private checkDimensions(embeddings: number[][], expectedCount: number): number[][] {
        if (embeddings.length !== expectedCount) {
            throw new EmbeddingUnavailableError(
                `${this.config.provider}:embed returned ${embeddings.length} vectors for ${expectedCount} inputs.`
            );
        }

        const mismatch = embeddings.find((vector) => vector.length !== this.dimension);
        if (mismatch) {
            throw new InvalidConfigurationError(
                `Embedding model "${this.config.model}" returned ${mismatch.length}-dimensional vectors, but ${this.dimension} are configured.`
            );
        }
        return embeddings;
    }
}

export abstract class BaseChatProvider extends RateLimitedProvider implements ChatProvider {
    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderRateLimits,
        logger?: Logger
    ) {
        super(limits, logger);
    }

    async generateAnswer(options: GenerateAnswerOptions): Promise<GeneratedAnswer> {
        const tokens = this.estimateChatTokens(options);
        const logPrefix = `${this.config.provider}:chat`;

        try {
            return await this.scheduleWithRateLimits(tokens, (signal) => this.complete(options, signal), {
                logPrefix,
                timeoutMs: this.config.timeoutMs ?? DEFAULT_CHAT_TIMEOUT_MS,
                signal: options.signal,
            });
        } catch (error) {
            if (error instanceof RagError) {
                throw error;
            }
            throw new GenerationUnavailableError(
                `${logPrefix} failed after ${this.retries + 1} attempts: ${describeError(error)}`,
                { cause: error }
            );
        }
    }

    /** Prompt pieces every provider hands to `generateText`. */
    protected buildRequest(options: GenerateAnswerOptions) {
        const { system, user } = buildPromptMessages(options);
        return {
            system,
            prompt: user,
            temperature: options.temperature ?? this.config.temperature,
            maxTokens: options.maxTokens ?? this.config.maxOutputTokens,
        };
    }

    protected estimateChatTokens(options: GenerateAnswerOptions): number {
        const model = this.config.model;
        let tokens = countTokens(options.prompt, model);

        if (options.systemPrompt) {
            tokens += countTokens(options.systemPrompt, model);
        }

        tokens += options.context.reduce((sum, source) => sum + countTokens(source.text, model), 0);
        tokens += options.maxTokens ?? this.config.maxOutputTokens ?? 2000;
        return tokens;
    }

    protected abstract complete(options: GenerateAnswerOptions, signal: AbortSignal): Promise<GeneratedAnswer>;
}
