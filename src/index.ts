export * from "./errors";
export type * from "./config/types";
export { loadAppConfig, resolveConfigPath } from "./config/loadConfig";
export { configureLogger, getLogger } from "./utils/logger";
export { createTokenizer, countTokens, type Tokenizer } from "./utils/tokenEncoder";

export { assertChunkingOptions, chunkDocument, chunkText } from "./ingest/chunker";
export type { ChunkingOptions, DocumentChunk, TextChunk } from "./ingest/chunker";
export { SUPPORTED_EXTENSIONS, loadDocument, normaliseText, resolveFormat } from "./ingest/loader";
export type { DocumentFormat, DocumentInput, LoadedDocument } from "./ingest/loader";
export { DocumentIngestor, collectDocumentFiles, runIngestionPipeline } from "./ingest/pipeline";
export type {
    FailedDocument,
    IngestResult,
    IngestionPipelineResult,
    IngestionPipelineStats,
    IngestorDependencies,
    IngestorOptions,
} from "./ingest/pipeline";

export { BaseChatProvider, BaseEmbeddingProvider, type ProviderRateLimits } from "./llm/base";
export { createChatProvider, createEmbeddingProvider, createLLMClient } from "./llm/factory";
export { extractCitations, type Citation, type CitationReport } from "./llm/citations";
export { DEFAULT_SYSTEM_PROMPT, buildPromptMessages, formatContext } from "./llm/prompt";
export type * from "./llm/types";

export { createVectorIndex } from "./vectorIndex/factory";
export { LocalVectorIndex } from "./vectorIndex/localIndex";
export { SupabaseVectorIndex } from "./vectorIndex/supabaseIndex";
export { toEntryId } from "./vectorIndex/schema";
export type * from "./vectorIndex/types";

export { assembleContext, type AssembledContext } from "./query/contextBuilder";
export { QueryFailedError, askAi } from "./query/askAi";
export type { AskAiDependencies, AskAiOptions, AskAiResult, QueryStage, QueryTransition } from "./query/askAi";

export { createRagRuntime, type RagRuntime } from "./runtime";
