export interface LoggingConfig {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
    pretty: boolean;
}

export type VectorIndexBackend = "local" | "supabase";

export type DistanceMetric = "cosine" | "euclidean";

export interface LocalIndexConfig {
    directory: string;
}

export interface SupabaseIndexConfig {
    url: string;
    serviceRoleKey: string;
    chunksTable: string;
    collectionsTable: string;
}

export interface IndexConfig {
    backend: VectorIndexBackend;
    collection: string;
    metric: DistanceMetric;
    upsertBatchSize: number;
    local: LocalIndexConfig;
    supabase?: SupabaseIndexConfig;
}

export interface ChunkingConfig {
    targetTokens: number;
    overlapTokens: number;
    tokenizer: string;
}

export interface RetrievalConfig {
    topK: number;
    contextTokenBudget: number;
    similarityThreshold: number;
    searchRetries: number;
}

export interface IngestConfig {
    documentsDir: string;
    concurrency: number;
    writeRetries: number;
}

export type EmbeddingProviderName =
    | "openai"
    | "google"
    | "ollama"

export type ChatProviderName =
    | "openai"
    | "google"
    | "anthropic"
    | "ollama"

export interface ProviderLimitsConfig {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface BaseModelConfig {
    model: string;
    apiKey?: string;
    baseUrl?: string;
    timeoutMs?: number;
    limits?: ProviderLimitsConfig;
}

export interface EmbeddingModelConfig extends BaseModelConfig {
    provider: EmbeddingProviderName;
    dimensions: number;
}

export interface ChatModelConfig extends BaseModelConfig {
    provider: ChatProviderName;
    maxOutputTokens?: number;
    temperature: number;
}

export interface LLMConfig {
    embedding: EmbeddingModelConfig;
    chat: ChatModelConfig;
}

export interface AppConfig {
    logging: LoggingConfig;
    index: IndexConfig;
    chunking: ChunkingConfig;
    retrieval: RetrievalConfig;
    ingest: IngestConfig;
    llm: LLMConfig;
}
