import pRetry from "p-retry";
import type { Logger } from "pino";
import type { RetrievalConfig } from "../config/types";
import {
    EmbeddingUnavailableError,
    GenerationUnavailableError,
    IndexUnavailableError,
    InvalidQuestionError,
    RagError,
    SchemaConflictError,
    describeError,
    isRetryableError,
} from "../errors";
import { type Citation, extractCitations } from "../llm/citations";
import type { ChatProvider, EmbeddingProvider, TokenUsage } from "../llm/types";
import { childLogger } from "../utils/logger";
import type { Tokenizer } from "../utils/tokenEncoder";
import type { RetrievedChunk, VectorIndex } from "../vectorIndex/types";
import { assembleContext } from "./contextBuilder";

export type QueryStage =
    | "Received"
    | "Embedding"
    | "Searching"
    | "ContextAssembled"
    | "Generating"
    | "Completed"
    | "Failed";

export interface QueryTransition {
    from: QueryStage;
    to: QueryStage;
}

/**
 * A query that ended in `Failed`. `cause` is the typed error and `code` is copied from it.
 */
export class QueryFailedError extends RagError {
    constructor(readonly stage: QueryStage, readonly error: RagError) {
        super(error.code, `Query failed during ${stage}: ${error.message}`, { cause: error });
    }
}

export interface AskAiDependencies {
    index: VectorIndex;
    embedding: EmbeddingProvider;
    chat: ChatProvider;
    tokenizer: Tokenizer;
    logger?: Logger;
}

export interface AskAiOptions extends Partial<RetrievalConfig> {
    systemPrompt?: string;
    temperature?: number;
    maxTokens?: number;
    /** Delay before the first search retry. */
    retryDelayMs?: number;
    signal?: AbortSignal;
    onTransition?: (transition: QueryTransition) => void;
}

export interface AskAiResult {
    answer: string;
    citations: Citation[];
    /** Link targets in the answer that were not among the context sources. */
    rejectedCitations: string[];
    usage: TokenUsage;
    /** Chunks handed to the generator, best first. */
    chunks: RetrievedChunk[];
}

const DEFAULT_RETRIEVAL: RetrievalConfig = {
    topK: 5,
    contextTokenBudget: 3000,
    similarityThreshold: 0,
    searchRetries: 2,
};

function toStageError(stage: QueryStage, error: unknown): RagError {
    if (error instanceof RagError) {
        return error;
    }

    const message = describeError(error);
    switch (stage) {
        case "Embedding":
            return new EmbeddingUnavailableError(message, { cause: error });
        case "Searching":
            return new IndexUnavailableError(message, { cause: error });
        default:
            return new GenerationUnavailableError(message, { cause: error });
    }
}

/**
 * Answers a question from the index. Runs
 * `Received → Embedding → Searching → ContextAssembled → Generating → Completed`, and moves to
 * `Failed` with a `QueryFailedError` on the first error; no partial answer is returned.
 *
 * An empty search result is not a failure: the generator still runs, with no context, and is
 * told to say that nothing relevant was found.
 */
export async function askAi(question: string, deps: AskAiDependencies, options: AskAiOptions = {}): Promise<AskAiResult> {
    const logger = childLogger(deps.logger, { module: "query" });
    const retrieval: RetrievalConfig = {
        topK: options.topK ?? DEFAULT_RETRIEVAL.topK,
        contextTokenBudget: options.contextTokenBudget ?? DEFAULT_RETRIEVAL.contextTokenBudget,
        similarityThreshold: options.similarityThreshold ?? DEFAULT_RETRIEVAL.similarityThreshold,
        searchRetries: options.searchRetries ?? DEFAULT_RETRIEVAL.searchRetries,
    };

    let stage: QueryStage = "Received";
    const advance = (next: QueryStage) => {
        const transition = { from: stage, to: next };
        stage = next;
        logger.debug(transition, `Query ${transition.from} -> ${transition.to}`);
        options.onTransition?.(transition);
    };

    try {
        const trimmedQuestion = question.trim();
        if (!trimmedQuestion) {
            throw new InvalidQuestionError("Question cannot be empty.");
        }

        advance("Embedding");
        const schema = await deps.index.describe();
        if (schema && schema.dimension !== deps.embedding.dimension) {
            throw new SchemaConflictError(
                `Embedding model produces ${deps.embedding.dimension}-dimensional vectors but collection ` +
                `"${deps.index.collection}" stores ${schema.dimension}-dimensional vectors.`
            );
        }
        const vector = await deps.embedding.embedQuery(trimmedQuestion, { signal: options.signal });

        advance("Searching");
        let matches: RetrievedChunk[] = [];
        if (schema) {
            matches = await pRetry(
                async () => {
                    try {
                        return await deps.index.query(vector, retrieval.topK);
                    } catch (error) {
                        if (isRetryableError(error)) {
                            throw error;
                        }
                        throw new pRetry.AbortError(toStageError("Searching", error));
                    }
                },
                {
                    retries: retrieval.searchRetries,
                    minTimeout: options.retryDelayMs ?? 500,
                    onFailedAttempt: (error) => {
                        logger.warn(
                            { attemptNumber: error.attemptNumber, retriesLeft: error.retriesLeft, err: error },
                            "index:query failed attempt"
                        );
                    },
                }
            );
        } else {
            logger.warn({ collection: deps.index.collection }, "Collection has not been created; answering without context.");
        }

        const relevant = retrieval.similarityThreshold > 0
            ? matches.filter((chunk) => chunk.score >= retrieval.similarityThreshold)
            : matches;

        const context = assembleContext(relevant, deps.tokenizer, retrieval.contextTokenBudget);
        advance("ContextAssembled");
        logger.info(
            { matches: matches.length, used: context.chunks.length, dropped: context.droppedChunks, contextTokens: context.tokenCount },
            context.chunks.length > 0 ? "Assembled context." : "No relevant context found."
        );

        advance("Generating");
        const generated = await deps.chat.generateAnswer({
            prompt: trimmedQuestion,
            context: context.sources,
            systemPrompt: options.systemPrompt,
            temperature: options.temperature,
            maxTokens: options.maxTokens,
            signal: options.signal,
        });

        const { citations, rejected } = extractCitations(generated.text, context.sources);
        if (rejected.length > 0) {
            logger.warn({ rejected }, "Answer cited sources that were not in the context.");
        }

        advance("Completed");
        return {
            answer: generated.text,
            citations,
            rejectedCitations: rejected,
            usage: generated.usage,
            chunks: context.chunks,
        };
    } catch (error) {
        const failedAt = stage;
        const typed = toStageError(failedAt, error);
        advance("Failed");
        logger.error({ err: typed, stage: failedAt }, "Query failed.");
        throw new QueryFailedError(failedAt, typed);
    }
}
