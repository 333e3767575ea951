import pino from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import type {
    ChatProvider,
    EmbeddingProvider,
    GenerateAnswerOptions,
    GeneratedAnswer,
} from "../llm/types";
import type { Tokenizer } from "../utils/tokenEncoder";

export const silentLogger = pino({ level: "silent" });

/** One token per whitespace-separated word. */
export const wordTokenizer: Tokenizer = {
    name: "words",
    count: (text) => text.split(/\s+/).filter(Boolean).length,
};

/** One token per UTF-16 code unit. */
export const charTokenizer: Tokenizer = {
    name: "chars",
    count: (text) => text.length,
};

export function embeddingConfig(dimensions: number): EmbeddingModelConfig {
    return {
        provider: "openai",
        model: "test-embedding",
        dimensions,
        apiKey: "test-secret",
    };
}

export function chatConfig(): ChatModelConfig {
    return {
        provider: "openai",
        model: "test-chat",
        apiKey: "test-secret",
        temperature: 0,
    };
}

/**
 * Embeds text as keyword counts, one dimension per keyword, plus a constant final component so
 * no vector is all zeros.
 */
export function keywordVectors(keywords: string[]): (text: string) => number[] {
    return (text) => {
        const lowered = text.toLowerCase();
        return [...keywords.map((keyword) => lowered.split(keyword).length - 1), 0.1];
    };
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
    readonly config: EmbeddingModelConfig;
    readonly calls: string[][] = [];
    failure?: Error;

    constructor(
        readonly dimension: number,
        private readonly embed: (text: string) => number[]
    ) {
        this.config = embeddingConfig(dimension);
    }

    async embedDocuments(texts: string[]): Promise<number[][]> {
        this.calls.push(texts);
        if (this.failure) {
            throw this.failure;
        }
        return texts.map((text) => this.embed(text));
    }

    async embedQuery(text: string): Promise<number[]> {
        const [vector] = await this.embedDocuments([text]);
        return vector;
    }
}

export class FakeChatProvider implements ChatProvider {
    readonly config = chatConfig();
    readonly calls: GenerateAnswerOptions[] = [];
    failure?: Error;

    constructor(private readonly respond: (options: GenerateAnswerOptions) => string) {}

    async generateAnswer(options: GenerateAnswerOptions): Promise<GeneratedAnswer> {
        this.calls.push(options);
        if (this.failure) {
            throw this.failure;
        }
        return {
            text: this.respond(options),
            usage: { inputTokens: 120, outputTokens: 30 },
        };
    }
}
