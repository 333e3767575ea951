import type { Logger } from "pino";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { embedMany, generateText } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider, toTokenUsage } from "../base";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import { InvalidConfigurationError } from "../../errors";
import type { GenerateAnswerOptions, GeneratedAnswer } from "../types";
import { resolveBaseUrl, mergeLimits } from "../../utils/providerUtils";

const GEMINI_DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/";

export class GoogleEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new InvalidConfigurationError("Google Generative AI API key is required for embeddings.");
        }

        super(
            config,
            mergeLimits(
                {
                    batchSize: 16,
                    concurrency: 3,
                    maxRequestsPerMinute: 300,
                    maxTokensPerMinute: 1_000_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, GEMINI_DEFAULT_BASE_URL),
        });
    }

    protected async sendEmbeddingRequest(texts: string[], signal: AbortSignal): Promise<number[][]> {
        const model = this.sdk.textEmbeddingModel(this.config.model, { outputDimensionality: this.dimension });
        const { embeddings } = await embedMany({
            model,
            values: texts,
            abortSignal: signal,
            maxRetries: 0,
        });

        return embeddings;
    }
}

export class GoogleChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        if (!config.apiKey) {
            throw new InvalidConfigurationError("Google Generative AI API key is required for chat completions.");
        }

        super(
            config,
            mergeLimits(
                {
                    concurrency: 3,
                    maxRequestsPerMinute: 60,
                    maxTokensPerMinute: 120_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey: config.apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, GEMINI_DEFAULT_BASE_URL),
        });
    }

    protected async complete(options: GenerateAnswerOptions, signal: AbortSignal): Promise<GeneratedAnswer> {
        const { text, usage } = await generateText({
            model: this.sdk(this.config.model),
            ...this.buildRequest(options),
            abortSignal: signal,
            maxRetries: 0,
        });

        return { text, usage: toTokenUsage(usage) };
    }
}
