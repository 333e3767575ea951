import { readdir } from "node:fs/promises";
import path from "node:path";
import pLimit from "p-limit";
import pRetry from "p-retry";
import type { Logger } from "pino";
import type { AppConfig, DistanceMetric } from "../config/types";
import {
    InvalidConfigurationError,
    RagError,
    type RagErrorCode,
    describeError,
    isFatalError,
    isRetryableError,
} from "../errors";
import type { EmbeddingProvider } from "../llm/types";
import { batchChunks } from "../utils/batchChunks";
import { KeyedLock } from "../utils/keyedLock";
import { childLogger } from "../utils/logger";
import type { Tokenizer } from "../utils/tokenEncoder";
import { toEntryId } from "../vectorIndex/schema";
import type { IndexEntry, VectorIndex } from "../vectorIndex/types";
import { chunkDocument } from "./chunker";
import { type DocumentFormat, type DocumentInput, SUPPORTED_EXTENSIONS, loadDocument, readDocumentFile, resolveFormat, toSourceId } from "./loader";

export interface IngestorDependencies {
    index: VectorIndex;
    embedding: EmbeddingProvider;
    tokenizer: Tokenizer;
    logger?: Logger;
}

export interface IngestorOptions {
    targetTokens: number;
    overlapTokens: number;
    metric: DistanceMetric;
    upsertBatchSize: number;
    writeRetries: number;
    /** Delay before the first write retry. */
    retryDelayMs?: number;
}

export interface IngestResult {
    sourceId: string;
    title: string;
    format: DocumentFormat;
    chunks: number;
    deletedChunks: number;
}

export interface FailedDocument {
    sourceId: string;
    code: RagErrorCode | "UNEXPECTED";
    message: string;
}

export interface IngestionPipelineStats {
    discoveredDocuments: number;
    processedDocuments: number;
    failedDocuments: FailedDocument[];
    insertedChunks: number;
    deletedChunks: number;
}

export interface IngestionPipelineResult {
    documents: IngestResult[];
    stats: IngestionPipelineStats;
}

/**
 * Load, chunk, embed and store one document at a time. Stored chunks of a source are replaced
 * as a whole: the delete and every upsert batch for one source never interleave with another
 * write to the same source, and a write that cannot complete removes what it stored.
 */
export class DocumentIngestor {
    private readonly locks = new KeyedLock();
    private readonly logger: Logger;
    private collectionReady?: Promise<void>;

    constructor(
        private readonly deps: IngestorDependencies,
        private readonly options: IngestorOptions
    ) {
        this.logger = childLogger(deps.logger, { module: "ingest" });
    }

    async ingestDocument(input: DocumentInput): Promise<IngestResult> {
        resolveFormat(input.formatHint, input.fileName ?? input.sourceId);
        await this.ensureCollection();

        const document = await loadDocument(input);
        const documentLogger = this.logger.child({ sourceId: document.sourceId });

        const chunks = chunkDocument(document, {
            targetTokens: this.options.targetTokens,
            overlapTokens: this.options.overlapTokens,
            tokenizer: this.deps.tokenizer,
        });

        const vectors = chunks.length > 0
            ? await this.deps.embedding.embedDocuments(chunks.map((chunk) => chunk.text))
            : [];

        const entries: IndexEntry[] = chunks.map((chunk, i) => ({
            id: toEntryId(document.sourceId, chunk.index),
            sourceId: document.sourceId,
            title: document.title,
            chunkIndex: chunk.index,
            text: chunk.text,
            tokenCount: chunk.tokenCount,
            startOffset: chunk.startOffset,
            endOffset: chunk.endOffset,
            vector: vectors[i],
            metadata: document.metadata,
        }));

        const deletedChunks = await this.locks.run(document.sourceId, async () => {
            const deleted = await this.deps.index.deleteBySource(document.sourceId);
            try {
                for (const batch of batchChunks(entries, this.options.upsertBatchSize)) {
                    await this.writeBatch(batch, documentLogger);
                }
            } catch (error) {
                await this.rollback(document.sourceId, documentLogger);
                throw error;
            }
            return deleted;
        });

        documentLogger.info(
            { chunks: entries.length, deletedChunks, format: document.format },
            `Ingested ${entries.length} chunk${entries.length === 1 ? "" : "s"}.`
        );

        return {
            sourceId: document.sourceId,
            title: document.title,
            format: document.format,
            chunks: entries.length,
            deletedChunks,
        };
    }

    private ensureCollection(): Promise<void> {
        if (!this.collectionReady) {
            this.collectionReady = this.deps.index
                .create(this.deps.embedding.dimension, this.options.metric)
                .catch((error: unknown) => {
                    this.collectionReady = undefined;
                    throw error;
                });
        }
        return this.collectionReady;
    }

    /** Retries the same batch on transient failures only. */
    private async writeBatch(batch: IndexEntry[], logger: Logger): Promise<void> {
        await pRetry(
            async () => {
                try {
                    await this.deps.index.upsert(batch);
                } catch (error) {
                    if (isRetryableError(error)) {
                        throw error;
                    }
                    throw new pRetry.AbortError(error instanceof Error ? error : new Error(describeError(error)));
                }
            },
            {
                retries: this.options.writeRetries,
                minTimeout: this.options.retryDelayMs ?? 1_000,
                onFailedAttempt: (error) => {
                    logger.warn(
                        {
                            attemptNumber: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            err: error,
                        },
                        "index:upsert failed attempt"
                    );
                },
            }
        );
    }

    private async rollback(sourceId: string, logger: Logger): Promise<void> {
        try {
            const removed = await this.deps.index.deleteBySource(sourceId);
            logger.warn({ removed }, "Rolled back partially written chunks.");
        } catch (rollbackError) {
            logger.error({ err: rollbackError }, "Rollback failed; stored chunks for this source may be incomplete.");
        }
    }
}

/**
 * Every file below `root` with a supported extension, skipping dot-directories, in a stable order.
 */
export async function collectDocumentFiles(root: string): Promise<string[]> {
    const files: string[] = [];
    const pending = [root];

    while (pending.length > 0) {
        const directory = pending.pop();
        if (directory === undefined) break;

        const entries = await readdir(directory, { withFileTypes: true });
        for (const entry of entries) {
            const fullPath = path.join(directory, entry.name);
            if (entry.isDirectory()) {
                if (!entry.name.startsWith(".")) {
                    pending.push(fullPath);
                }
            } else if (entry.isFile() && SUPPORTED_EXTENSIONS.includes(path.extname(entry.name).toLowerCase())) {
                files.push(fullPath);
            }
        }
    }

    return files.sort();
}

export async function runIngestionPipeline(
    appConfig: AppConfig,
    deps: IngestorDependencies
): Promise<IngestionPipelineResult> {
    const ingestionLogger = childLogger(deps.logger, { module: "ingest" });
    const root = appConfig.ingest.documentsDir;

    let files: string[];
    try {
        files = await collectDocumentFiles(root);
    } catch (error) {
        throw new InvalidConfigurationError(
            `Could not read documents directory "${root}": ${describeError(error)}`,
            { cause: error }
        );
    }

    ingestionLogger.info(`Processing ${files.length} document${files.length === 1 ? "" : "s"} from ${root}.`);

    const ingestor = new DocumentIngestor(deps, {
        targetTokens: appConfig.chunking.targetTokens,
        overlapTokens: appConfig.chunking.overlapTokens,
        metric: appConfig.index.metric,
        upsertBatchSize: appConfig.index.upsertBatchSize,
        writeRetries: appConfig.ingest.writeRetries,
    });

    const stats: IngestionPipelineStats = {
        discoveredDocuments: files.length,
        processedDocuments: 0,
        failedDocuments: [],
        insertedChunks: 0,
        deletedChunks: 0,
    };
    const documents: IngestResult[] = [];
    const limit = pLimit(appConfig.ingest.concurrency);

    await Promise.all(
        files.map((filePath) =>
            limit(async () => {
                const sourceId = toSourceId(root, filePath);
                try {
                    const result = await ingestor.ingestDocument(await readDocumentFile(root, filePath));
                    documents.push(result);
                    stats.processedDocuments += 1;
                    stats.insertedChunks += result.chunks;
                    stats.deletedChunks += result.deletedChunks;
                } catch (error) {
                    if (isFatalError(error)) {
                        limit.clearQueue();
                        throw error;
                    }
                    ingestionLogger.error({ err: error, sourceId }, "Failed to ingest document.");
                    stats.failedDocuments.push({
                        sourceId,
                        code: error instanceof RagError ? error.code : "UNEXPECTED",
                        message: describeError(error),
                    });
                }
            })
        )
    );

    documents.sort((a, b) => a.sourceId.localeCompare(b.sourceId));
    stats.failedDocuments.sort((a, b) => a.sourceId.localeCompare(b.sourceId));

    ingestionLogger.info(
        {
            processed: stats.processedDocuments,
            failed: stats.failedDocuments.length,
            inserted: stats.insertedChunks,
            deleted: stats.deletedChunks,
        },
        "Ingestion pipeline complete."
    );

    return { documents, stats };
}
