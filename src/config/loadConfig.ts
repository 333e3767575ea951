import { config as loadDotenv } from "dotenv";
import path from "node:path";
import { InvalidConfigurationError } from "../errors";
import { assertChunkingOptions } from "../ingest/chunker";
import type {
    AppConfig,
    ChatProviderName,
    DistanceMetric,
    EmbeddingProviderName,
    LoggingConfig,
    SupabaseIndexConfig,
    VectorIndexBackend,
} from "./types";

const PACKAGE_ROOT = path.resolve(__dirname, "..", "..");

const LOG_LEVELS: readonly LoggingConfig["level"][] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];
const BACKENDS: readonly VectorIndexBackend[] = ["local", "supabase"];
const METRICS: readonly DistanceMetric[] = ["cosine", "euclidean"];
const EMBEDDING_PROVIDERS: readonly EmbeddingProviderName[] = ["openai", "google", "ollama"];
const CHAT_PROVIDERS: readonly ChatProviderName[] = ["openai", "google", "anthropic", "ollama"];

function getEnv(key: string, required: true): string;
function getEnv(key: string, required?: boolean): string | undefined;
function getEnv(key: string, required = true): string | undefined {
    const value = process.env[key]?.trim();
    if (required && !value) {
        throw new InvalidConfigurationError(`Missing required environment variable: ${key}`);
    }
    return value || undefined;
}

function getEnvNumber(key: string): number | undefined;
function getEnvNumber(key: string, defaultValue: number): number;
function getEnvNumber(key: string, defaultValue?: number): number | undefined {
    const value = process.env[key]?.trim();
    if (!value) {
        return defaultValue;
    }
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
        throw new InvalidConfigurationError(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getEnvInteger(key: string, defaultValue: number | undefined, minimum: number): number {
    const value = defaultValue === undefined ? getEnvNumber(key) : getEnvNumber(key, defaultValue);
    if (value === undefined) {
        throw new InvalidConfigurationError(`Missing required environment variable: ${key}`);
    }
    if (!Number.isInteger(value) || value < minimum) {
        throw new InvalidConfigurationError(`Environment variable ${key} must be an integer >= ${minimum}, got: ${value}`);
    }
    return value;
}

function getEnvBoolean(key: string, defaultValue = false): boolean {
    const value = process.env[key];
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase().trim();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue?: T): T {
    const value = getEnv(key, defaultValue === undefined)?.toLowerCase() ?? defaultValue;
    const match = choices.find((choice) => choice === value);
    if (!match) {
        throw new InvalidConfigurationError(`Environment variable ${key} must be one of ${choices.join(", ")}, got: ${value}`);
    }
    return match;
}

function resolveSupabaseConfig(backend: VectorIndexBackend): SupabaseIndexConfig | undefined {
    const required = backend === "supabase";
    const url = getEnv("RAG_SUPABASE_URL", required);
    const serviceRoleKey = getEnv("RAG_SUPABASE_SERVICE_ROLE_KEY", required);

    if (!url || !serviceRoleKey) {
        return undefined;
    }

    return {
        url,
        serviceRoleKey,
        chunksTable: getEnv("RAG_SUPABASE_CHUNKS_TABLE", false) ?? "rag_chunks",
        collectionsTable: getEnv("RAG_SUPABASE_COLLECTIONS_TABLE", false) ?? "rag_collections",
    };
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.RAG_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.RAG_CONFIG_PATH);
    }

    return path.join(PACKAGE_ROOT, ".env");
}

export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
    const envPath = configPath ?? resolveConfigPath();
    const result = loadDotenv({ path: envPath });

    if (result.error && configPath) {
        throw new InvalidConfigurationError(
            `Failed to load environment file from "${configPath}": ${result.error.message}`,
            { cause: result.error }
        );
    }

    const backend = getEnvChoice("RAG_INDEX_BACKEND", BACKENDS, "local");

    const config: AppConfig = {
        logging: {
            level: getEnvChoice("RAG_LOGGING_LEVEL", LOG_LEVELS, "info"),
            pretty: getEnvBoolean("RAG_LOGGING_PRETTY", true),
        },
        index: {
            backend,
            collection: getEnv("RAG_INDEX_COLLECTION", false) ?? "documents",
            metric: getEnvChoice("RAG_INDEX_METRIC", METRICS, "cosine"),
            upsertBatchSize: getEnvInteger("RAG_INDEX_UPSERT_BATCH_SIZE", 100, 1),
            local: {
                directory: path.resolve(process.cwd(), getEnv("RAG_LOCAL_INDEX_DIR", false) ?? "./data/index"),
            },
            supabase: resolveSupabaseConfig(backend),
        },
        chunking: {
            targetTokens: getEnvNumber("RAG_CHUNK_TARGET_TOKENS", 500),
            overlapTokens: getEnvNumber("RAG_CHUNK_OVERLAP_TOKENS", 50),
            tokenizer: getEnv("RAG_TOKENIZER", false) ?? "cl100k_base",
        },
        retrieval: {
            topK: getEnvInteger("RAG_RETRIEVAL_TOP_K", 5, 1),
            contextTokenBudget: getEnvInteger("RAG_RETRIEVAL_CONTEXT_TOKEN_BUDGET", 3000, 1),
            similarityThreshold: getEnvNumber("RAG_RETRIEVAL_SIMILARITY_THRESHOLD", 0),
            searchRetries: getEnvInteger("RAG_RETRIEVAL_SEARCH_RETRIES", 2, 0),
        },
        ingest: {
            documentsDir: path.resolve(process.cwd(), getEnv("RAG_INGEST_DOCUMENTS_DIR", false) ?? "./documents"),
            concurrency: getEnvInteger("RAG_INGEST_CONCURRENCY", 4, 1),
            writeRetries: getEnvInteger("RAG_INGEST_WRITE_RETRIES", 2, 0),
        },
        llm: {
            embedding: {
                provider: getEnvChoice("RAG_LLM_EMBEDDING_PROVIDER", EMBEDDING_PROVIDERS),
                model: getEnv("RAG_LLM_EMBEDDING_MODEL", true),
                dimensions: getEnvInteger("RAG_LLM_EMBEDDING_DIMENSIONS", undefined, 1),
                apiKey: getEnv("RAG_LLM_EMBEDDING_API_KEY", false),
                baseUrl: getEnv("RAG_LLM_EMBEDDING_BASE_URL", false),
                timeoutMs: getEnvInteger("RAG_LLM_EMBEDDING_TIMEOUT_MS", 30_000, 1),
                limits: {
                    batchSize: getEnvNumber("RAG_LLM_EMBEDDING_LIMITS_BATCH_SIZE"),
                    concurrency: getEnvNumber("RAG_LLM_EMBEDDING_LIMITS_CONCURRENCY"),
                    maxRequestsPerMinute: getEnvNumber("RAG_LLM_EMBEDDING_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getEnvNumber("RAG_LLM_EMBEDDING_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getEnvNumber("RAG_LLM_EMBEDDING_LIMITS_RETRIES"),
                },
            },
            chat: {
                provider: getEnvChoice("RAG_LLM_CHAT_PROVIDER", CHAT_PROVIDERS),
                model: getEnv("RAG_LLM_CHAT_MODEL", true),
                apiKey: getEnv("RAG_LLM_CHAT_API_KEY", false),
                baseUrl: getEnv("RAG_LLM_CHAT_BASE_URL", false),
                temperature: getEnvNumber("RAG_LLM_CHAT_TEMPERATURE", 0),
                maxOutputTokens: getEnvNumber("RAG_LLM_CHAT_MAX_OUTPUT_TOKENS", 1024),
                timeoutMs: getEnvInteger("RAG_LLM_CHAT_TIMEOUT_MS", 60_000, 1),
                limits: {
                    concurrency: getEnvNumber("RAG_LLM_CHAT_LIMITS_CONCURRENCY"),
                    maxRequestsPerMinute: getEnvNumber("RAG_LLM_CHAT_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getEnvNumber("RAG_LLM_CHAT_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getEnvNumber("RAG_LLM_CHAT_LIMITS_RETRIES"),
                },
            },
        },
    };

    assertChunkingOptions(config.chunking.targetTokens, config.chunking.overlapTokens);

    return config;
}
