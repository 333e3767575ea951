import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";

export interface EmbedOptions {
    signal?: AbortSignal;
}

/** One retrieved passage as the generator sees it. */
export interface ContextSource {
    sourceId: string;
    title: string;
    text: string;
}

export interface GenerateAnswerOptions {
    prompt: string;
    context: ContextSource[];
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
    systemPrompt?: string;
}

export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
}

export interface GeneratedAnswer {
    text: string;
    usage: TokenUsage;
}

export interface EmbeddingProvider {
    readonly config: EmbeddingModelConfig;
    /** Length of every vector this provider returns. */
    readonly dimension: number;
    embedDocuments(texts: string[], options?: EmbedOptions): Promise<number[][]>;
    embedQuery(text: string, options?: EmbedOptions): Promise<number[]>;
}

export interface ChatProvider {
    readonly config: ChatModelConfig;
    generateAnswer(options: GenerateAnswerOptions): Promise<GeneratedAnswer>;
}

export interface LLMClientBundle {
    embedding: EmbeddingProvider;
    chat: ChatProvider;
}
