import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import pLimit from "p-limit";
import type { Logger } from "pino";
import { LocalIndex } from "vectra";
import { z } from "zod";
import type { DistanceMetric, LocalIndexConfig } from "../config/types";
import { IndexUnavailableError, RagError, describeError } from "../errors";
import { childLogger } from "../utils/logger";
import {
    assertDimension,
    assertSameSchema,
    assertTopK,
    assertVectorFits,
    entryMetadataSchema,
    indexSchemaSchema,
    missingCollection,
} from "./schema";
import { compareRanked, scoreVectors } from "./scoring";
import type { EntryMetadata, IndexEntry, IndexSchema, RetrievedChunk, StoredChunk, VectorIndex } from "./types";

const SCHEMA_FILE = "schema.json";

// vectra metadata holds only flat scalars, so the caller's metadata map travels as JSON.
const itemMetadataSchema = z.object({
    sourceId: z.string(),
    title: z.string(),
    chunkIndex: z.number().int(),
    text: z.string(),
    tokenCount: z.number(),
    startOffset: z.number(),
    endOffset: z.number(),
    seq: z.number().int(),
    metadata: z.string(),
});

type ItemMetadata = z.infer<typeof itemMetadataSchema>;

interface StoredItem {
    id: string;
    vector: number[];
    metadata: ItemMetadata;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function toItemMetadata(entry: IndexEntry, seq: number): ItemMetadata {
    return {
        sourceId: entry.sourceId,
        title: entry.title,
        chunkIndex: entry.chunkIndex,
        text: entry.text,
        tokenCount: entry.tokenCount,
        startOffset: entry.startOffset,
        endOffset: entry.endOffset,
        seq,
        metadata: JSON.stringify(entry.metadata),
    };
}

function parseEntryMetadata(raw: string): EntryMetadata {
    const parsed = entryMetadataSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
}

function toStoredChunk(item: StoredItem): StoredChunk {
    const { metadata } = item;
    return {
        id: item.id,
        sourceId: metadata.sourceId,
        title: metadata.title,
        chunkIndex: metadata.chunkIndex,
        text: metadata.text,
        tokenCount: metadata.tokenCount,
        startOffset: metadata.startOffset,
        endOffset: metadata.endOffset,
        metadata: parseEntryMetadata(metadata.metadata),
    };
}

/**
 * Embedded backend: one vectra index per collection under `<directory>/<collection>`, with the
 * collection's dimension and metric in a `schema.json` beside it.
 *
 * Every operation runs through a single queue. vectra allows one pending update per index, and
 * queries only ever observe committed updates.
 */
export class LocalVectorIndex implements VectorIndex {
    readonly backend = "local" as const;

    private readonly folder: string;
    private readonly queue = pLimit(1);
    private readonly logger: Logger;
    private index: LocalIndex;
    private schema: IndexSchema | null | undefined;

    constructor(
        config: LocalIndexConfig,
        readonly collection: string,
        logger?: Logger
    ) {
        this.folder = path.join(config.directory, collection);
        this.index = new LocalIndex(this.folder);
        this.logger = childLogger(logger, { module: "vector-index", backend: "local", collection });
    }

    async create(dimension: number, metric: DistanceMetric): Promise<void> {
        assertDimension(dimension);

        return this.run("create", async () => {
            const existing = await this.loadSchema();
            if (existing) {
                assertSameSchema(this.collection, existing, dimension, metric);
            }

            if (!(await this.index.isIndexCreated())) {
                await this.index.createIndex({ version: 1 });
            }

            if (!existing) {
                const schema: IndexSchema = { dimension, metric };
                await mkdir(this.folder, { recursive: true });
                await writeFile(path.join(this.folder, SCHEMA_FILE), JSON.stringify(schema, null, 2));
                this.schema = schema;
                this.logger.info({ dimension, metric }, "Created collection.");
            }
        });
    }

    describe(): Promise<IndexSchema | null> {
        return this.run("describe", () => this.loadSchema());
    }

    async upsert(entries: IndexEntry[]): Promise<void> {
        if (entries.length === 0) {
            return;
        }

        await this.run("upsert", async () => {
            const schema = await this.requireSchema();
            for (const entry of entries) {
                assertVectorFits(this.collection, schema, entry.vector);
            }

            const items = await this.listStoredItems();
            const positions = new Map(items.map((item) => [item.id, item.metadata.seq]));
            let nextSeq = items.reduce((max, item) => Math.max(max, item.metadata.seq + 1), 0);

            await this.update(async () => {
                for (const entry of entries) {
                    const previous = positions.get(entry.id);
                    if (previous !== undefined) {
                        await this.index.deleteItem(entry.id);
                    }

                    const seq = previous ?? nextSeq++;
                    positions.set(entry.id, seq);

                    await this.index.insertItem({
                        id: entry.id,
                        vector: entry.vector,
                        metadata: toItemMetadata(entry, seq),
                    });
                }
            });

            this.logger.debug({ count: entries.length }, "Upserted entries.");
        });
    }

    async query(vector: number[], k: number): Promise<RetrievedChunk[]> {
        assertTopK(k);

        return this.run("query", async () => {
            const schema = await this.requireSchema();
            assertVectorFits(this.collection, schema, vector);

            const ranked = (await this.listStoredItems())
                .map((item) => ({
                    item,
                    seq: item.metadata.seq,
                    score: scoreVectors(schema.metric, vector, item.vector),
                }))
                .sort(compareRanked)
                .slice(0, k);

            return ranked.map(({ item, score }) => ({ ...toStoredChunk(item), score }));
        });
    }

    deleteBySource(sourceId: string): Promise<number> {
        return this.run("deleteBySource", async () => {
            if (!(await this.loadSchema())) {
                return 0;
            }

            const matching = (await this.listStoredItems()).filter((item) => item.metadata.sourceId === sourceId);
            if (matching.length === 0) {
                return 0;
            }

            await this.update(async () => {
                for (const item of matching) {
                    await this.index.deleteItem(item.id);
                }
            });

            this.logger.debug({ sourceId, count: matching.length }, "Deleted entries for source.");
            return matching.length;
        });
    }

    clear(): Promise<void> {
        return this.run("clear", async () => {
            if (!(await this.loadSchema())) {
                return;
            }

            const items = await this.listStoredItems();
            if (items.length === 0) {
                return;
            }

            await this.update(async () => {
                for (const item of items) {
                    await this.index.deleteItem(item.id);
                }
            });
            this.logger.info({ count: items.length }, "Cleared collection.");
        });
    }

    drop(): Promise<void> {
        return this.run("drop", async () => {
            await rm(this.folder, { recursive: true, force: true });
            this.index = new LocalIndex(this.folder);
            this.schema = null;
            this.logger.info("Dropped collection.");
        });
    }

    count(): Promise<number> {
        return this.run("count", async () => {
            if (!(await this.loadSchema())) {
                return 0;
            }
            return (await this.listStoredItems()).length;
        });
    }

    private async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
        return this.queue(async () => {
            try {
                return await task();
            } catch (error) {
                if (error instanceof RagError) {
                    throw error;
                }
                throw new IndexUnavailableError(
                    `Local index "${this.collection}" failed during ${operation}: ${describeError(error)}`,
                    { cause: error }
                );
            }
        });
    }

    /**
     * Applies `mutate` as one vectra update. On failure the pending update is discarded and the
     * index reloaded from disk, so nothing from the failed call stays visible.
     */
    private async update(mutate: () => Promise<void>): Promise<void> {
        await this.index.beginUpdate();
        try {
            await mutate();
            await this.index.endUpdate();
        } catch (error) {
            this.index.cancelUpdate();
            this.index = new LocalIndex(this.folder);
            throw error;
        }
    }

    private async loadSchema(): Promise<IndexSchema | null> {
        if (this.schema !== undefined) {
            return this.schema;
        }

        let raw: string;
        try {
            raw = await readFile(path.join(this.folder, SCHEMA_FILE), "utf8");
        } catch (error) {
            if (isMissingFile(error)) {
                this.schema = null;
                return null;
            }
            throw error;
        }

        const parsed = indexSchemaSchema.safeParse(JSON.parse(raw));
        if (!parsed.success) {
            throw new IndexUnavailableError(`Schema file for collection "${this.collection}" is invalid: ${parsed.error.message}`);
        }

        this.schema = parsed.data;
        return this.schema;
    }

    private async requireSchema(): Promise<IndexSchema> {
        const schema = await this.loadSchema();
        if (!schema) {
            throw missingCollection(this.collection);
        }
        return schema;
    }

    private async listStoredItems(): Promise<StoredItem[]> {
        if (!(await this.index.isIndexCreated())) {
            return [];
        }

        const items = await this.index.listItems();
        return items.map((item) => {
            const metadata = itemMetadataSchema.safeParse(item.metadata);
            if (!metadata.success) {
                throw new IndexUnavailableError(
                    `Entry "${item.id}" in collection "${this.collection}" has unreadable metadata: ${metadata.error.message}`
                );
            }
            return { id: item.id, vector: item.vector, metadata: metadata.data };
        });
    }
}
