import type { Logger } from "pino";
import { createOllama } from "ollama-ai-provider";
import { embedMany, generateText } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider, toTokenUsage } from "../base";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import type { GenerateAnswerOptions, GeneratedAnswer } from "../types";
import { mergeLimits } from "../../utils/providerUtils";

// Runs on the local machine; no API key.
const OLLAMA_DEFAULT_BASE_URL = "http://127.0.0.1:11434/api";

// The provider adds its own slash before each endpoint path.
function ollamaBaseUrl(baseUrl: string | undefined): string {
    return (baseUrl ?? OLLAMA_DEFAULT_BASE_URL).replace(/\/+$/, "");
}

export class OllamaEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createOllama>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        super(
            config,
            mergeLimits(
                {
                    batchSize: 32,
                    concurrency: 2,
                    retries: 3,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOllama({ baseURL: ollamaBaseUrl(config.baseUrl) });
    }

    protected async sendEmbeddingRequest(texts: string[], signal: AbortSignal): Promise<number[][]> {
        const { embeddings } = await embedMany({
            model: this.sdk.embedding(this.config.model),
            values: texts,
            abortSignal: signal,
            maxRetries: 0,
        });

        return embeddings;
    }
}

export class OllamaChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createOllama>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        super(
            config,
            mergeLimits(
                {
                    concurrency: 1,
                    retries: 3,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOllama({ baseURL: ollamaBaseUrl(config.baseUrl) });
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
