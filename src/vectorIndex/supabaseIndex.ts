import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { Logger } from "pino";
import { z } from "zod";
import type { DistanceMetric, SupabaseIndexConfig } from "../config/types";
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
import { compareRanked, distanceToScore } from "./scoring";
import type { IndexEntry, IndexSchema, RetrievedChunk, VectorIndex } from "./types";

const MATCH_FUNCTION = "match_rag_chunks";
const UNIQUE_VIOLATION = "23505";

const matchRowSchema = z.object({
    id: z.coerce.number(),
    entry_id: z.string(),
    source_id: z.string(),
    title: z.string(),
    chunk_index: z.number().int(),
    content: z.string(),
    token_count: z.number(),
    start_offset: z.number(),
    end_offset: z.number(),
    metadata: entryMetadataSchema.nullable(),
    // Postgres writes a NaN float as the string "NaN" in JSON.
    distance: z.union([z.literal("NaN").transform(() => Number.NaN), z.coerce.number()]),
});

type MatchRow = z.infer<typeof matchRowSchema>;

interface PostgrestFailure {
    message: string;
    code?: string;
}

function toRetrievedChunk(row: MatchRow, score: number): RetrievedChunk {
    return {
        id: row.entry_id,
        sourceId: row.source_id,
        title: row.title,
        chunkIndex: row.chunk_index,
        text: row.content,
        tokenCount: row.token_count,
        startOffset: row.start_offset,
        endOffset: row.end_offset,
        metadata: row.metadata ?? {},
        score,
    };
}

/**
 * Managed backend on Supabase Postgres with pgvector (`sql/schema.sql`). Insertion order is the
 * `rag_chunks.id` sequence, which an upsert of an existing entry keeps.
 *
 * Each `upsert` call is sent as one PostgREST request and therefore runs as one statement.
 */
export class SupabaseVectorIndex implements VectorIndex {
    readonly backend = "supabase" as const;

    private readonly client: SupabaseClient;
    private readonly logger: Logger;
    private schema: IndexSchema | undefined;

    constructor(
        private readonly config: SupabaseIndexConfig,
        readonly collection: string,
        logger?: Logger
    ) {
        this.logger = childLogger(logger, { module: "vector-index", backend: "supabase", collection });
        this.client = createClient(config.url, config.serviceRoleKey, {
            auth: {
                persistSession: false,
            },
            global: {
                headers: {
                    "X-Client-Info": "cited-rag/0.1.0",
                },
            },
        });
    }

    async verifyConnection(): Promise<void> {
        const { error } = await this.client.from(this.config.collectionsTable).select("name").limit(1);

        if (error && error.code !== "PGRST116") {
            throw this.failure(`connect to table "${this.config.collectionsTable}"`, error);
        }

        this.logger.info(`Connected to the table "${this.config.collectionsTable}"`);
    }

    async create(dimension: number, metric: DistanceMetric): Promise<void> {
        assertDimension(dimension);

        const existing = await this.describe();
        if (existing) {
            assertSameSchema(this.collection, existing, dimension, metric);
            return;
        }

        const { error } = await this.client
            .from(this.config.collectionsTable)
            .insert({ name: this.collection, dimension, metric });

        if (error) {
            // Another writer created the collection first; its schema still has to match.
            if (error.code === UNIQUE_VIOLATION) {
                const winner = await this.describe();
                if (winner) {
                    assertSameSchema(this.collection, winner, dimension, metric);
                    return;
                }
            }
            throw this.failure("create collection", error);
        }

        this.schema = { dimension, metric };
        this.logger.info({ dimension, metric }, "Created collection.");
    }

    async describe(): Promise<IndexSchema | null> {
        if (this.schema) {
            return this.schema;
        }

        const { data, error } = await this.client
            .from(this.config.collectionsTable)
            .select("dimension, metric")
            .eq("name", this.collection)
            .maybeSingle();

        if (error) {
            throw this.failure("read collection schema", error);
        }
        if (!data) {
            return null;
        }

        const parsed = indexSchemaSchema.safeParse(data);
        if (!parsed.success) {
            throw new IndexUnavailableError(
                `Collection "${this.collection}" has an invalid schema row: ${parsed.error.message}`
            );
        }

        this.schema = parsed.data;
        return this.schema;
    }

    async upsert(entries: IndexEntry[]): Promise<void> {
        if (entries.length === 0) {
            return;
        }

        const schema = await this.requireSchema();
        for (const entry of entries) {
            assertVectorFits(this.collection, schema, entry.vector);
        }

        const payload = entries.map((entry) => ({
            collection: this.collection,
            entry_id: entry.id,
            source_id: entry.sourceId,
            title: entry.title,
            chunk_index: entry.chunkIndex,
            content: entry.text,
            token_count: entry.tokenCount,
            start_offset: entry.startOffset,
            end_offset: entry.endOffset,
            metadata: entry.metadata,
            embedding: entry.vector,
        }));

        const { error } = await this.guard("upsert entries", () =>
            this.client
                .from(this.config.chunksTable)
                .upsert(payload, { onConflict: "collection,entry_id" })
        );

        if (error) {
            throw this.failure("upsert entries", error);
        }

        this.logger.debug({ count: entries.length }, "Upserted entries.");
    }

    async query(vector: number[], k: number): Promise<RetrievedChunk[]> {
        assertTopK(k);
        const schema = await this.requireSchema();
        assertVectorFits(this.collection, schema, vector);

        const { data, error } = await this.guard("query", () =>
            this.client.rpc(MATCH_FUNCTION, {
                p_collection: this.collection,
                p_query_embedding: vector,
                p_match_count: k,
                p_metric: schema.metric,
            })
        );

        if (error) {
            throw this.failure(`execute ${MATCH_FUNCTION}`, error);
        }

        const rows = z.array(matchRowSchema).safeParse(data ?? []);
        if (!rows.success) {
            throw new IndexUnavailableError(`${MATCH_FUNCTION} returned unexpected rows: ${rows.error.message}`);
        }

        return rows.data
            .map((row) => ({ row, seq: row.id, score: distanceToScore(schema.metric, row.distance) }))
            .sort(compareRanked)
            .slice(0, k)
            .map(({ row, score }) => toRetrievedChunk(row, score));
    }

    async deleteBySource(sourceId: string): Promise<number> {
        const { error, count } = await this.guard("delete entries", () =>
            this.client
                .from(this.config.chunksTable)
                .delete({ count: "exact" })
                .eq("collection", this.collection)
                .eq("source_id", sourceId)
        );

        if (error) {
            throw this.failure(`delete entries for ${sourceId}`, error);
        }

        const deleted = count ?? 0;
        this.logger.debug({ sourceId, count: deleted }, "Deleted entries for source.");
        return deleted;
    }

    async clear(): Promise<void> {
        const { error, count } = await this.guard("clear", () =>
            this.client
                .from(this.config.chunksTable)
                .delete({ count: "exact" })
                .eq("collection", this.collection)
        );

        if (error) {
            throw this.failure("clear collection", error);
        }

        this.logger.info({ count: count ?? 0 }, "Cleared collection.");
    }

    async drop(): Promise<void> {
        await this.clear();

        const { error } = await this.guard("drop", () =>
            this.client
                .from(this.config.collectionsTable)
                .delete()
                .eq("name", this.collection)
        );

        if (error) {
            throw this.failure("drop collection", error);
        }

        this.schema = undefined;
        this.logger.info("Dropped collection.");
    }

    async count(): Promise<number> {
        const { error, count } = await this.guard("count", () =>
            this.client
                .from(this.config.chunksTable)
                .select("id", { count: "exact", head: true })
                .eq("collection", this.collection)
        );

        if (error) {
            throw this.failure("count entries", error);
        }

        return count ?? 0;
    }

    private async requireSchema(): Promise<IndexSchema> {
        const schema = await this.describe();
        if (!schema) {
            throw missingCollection(this.collection);
        }
        return schema;
    }

    /** Turns a thrown transport error into an `IndexUnavailableError`. */
    private async guard<T>(operation: string, request: () => PromiseLike<T>): Promise<T> {
        try {
            return await request();
        } catch (error) {
            if (error instanceof RagError) {
                throw error;
            }
            throw new IndexUnavailableError(
                `Supabase request failed during ${operation}: ${describeError(error)}`,
                { cause: error }
            );
        }
    }

    private failure(action: string, error: PostgrestFailure): IndexUnavailableError {
        this.logger.error({ code: error.code }, `Failed to ${action}: ${error.message}`);
        return new IndexUnavailableError(`Failed to ${action} in Supabase: ${error.message}`, { cause: error });
    }
}
