import { beforeEach, describe, expect, it, vi } from "vitest";
import { IndexUnavailableError, InvalidConfigurationError, SchemaConflictError } from "../errors";
import { fakeSupabase } from "../test/fakeSupabase";
import { silentLogger } from "../test/fakes";
import { toEntryId } from "./schema";
import { SupabaseVectorIndex } from "./supabaseIndex";
import type { IndexEntry } from "./types";

vi.mock("@supabase/supabase-js", async () => {
    const { fakeSupabase: client } = await import("../test/fakeSupabase");
    return { createClient: () => client };
});

const config = {
    url: "http://localhost:54321",
    serviceRoleKey: "test-secret",
    chunksTable: "rag_chunks",
    collectionsTable: "rag_collections",
};

function entry(sourceId: string, chunkIndex: number, vector: number[], text = `${sourceId} chunk ${chunkIndex}`): IndexEntry {
    return {
        id: toEntryId(sourceId, chunkIndex),
        sourceId,
        title: `Title ${sourceId}`,
        chunkIndex,
        text,
        tokenCount: 3,
        startOffset: 0,
        endOffset: text.length,
        vector,
        metadata: { format: "md" },
    };
}

function openIndex(collection = "docs"): SupabaseVectorIndex {
    return new SupabaseVectorIndex(config, collection, silentLogger);
}

describe("SupabaseVectorIndex", () => {
    beforeEach(() => {
        fakeSupabase.reset();
    });

    it("behaves as empty before the collection is created", async () => {
        const index = openIndex();

        await expect(index.describe()).resolves.toBeNull();
        await expect(index.count()).resolves.toBe(0);
        await expect(index.deleteBySource("a")).resolves.toBe(0);
        await expect(index.query([1, 0, 0], 3)).rejects.toBeInstanceOf(InvalidConfigurationError);
        await expect(index.upsert([entry("a", 0, [1, 0, 0])])).rejects.toBeInstanceOf(InvalidConfigurationError);
    });

    it("records the schema once and refuses a different one", async () => {
        const index = openIndex();
        await index.create(384, "cosine");
        await index.create(384, "cosine");

        expect(fakeSupabase.rows("rag_collections")).toMatchObject([{ name: "docs", dimension: 384, metric: "cosine" }]);
        await expect(index.create(1536, "cosine")).rejects.toBeInstanceOf(SchemaConflictError);
        await expect(openIndex().create(384, "euclidean")).rejects.toBeInstanceOf(SchemaConflictError);
        await expect(openIndex().describe()).resolves.toEqual({ dimension: 384, metric: "cosine" });
    });

    it("checks the winning schema when two writers create at once", async () => {
        const [first, second] = await Promise.allSettled([
            openIndex().create(3, "cosine"),
            openIndex().create(4, "cosine"),
        ]);

        expect(first.status).toBe("fulfilled");
        expect(second.status).toBe("rejected");
        if (second.status === "rejected") {
            expect(second.reason).toBeInstanceOf(SchemaConflictError);
        }
        expect(fakeSupabase.rows("rag_collections")).toHaveLength(1);
    });

    it("ranks by normalised distance and breaks ties by insertion order", async () => {
        const index = openIndex();
        await index.create(3, "cosine");
        await index.upsert([entry("a", 0, [1, 0, 0]), entry("b", 0, [0, 1, 0])]);
        await index.upsert([entry("c", 0, [1, 0, 0])]);

        const results = await index.query([1, 0, 0], 3);

        expect(results.map((result) => [result.id, result.score])).toEqual([
            ["a#0", 1],
            ["c#0", 1],
            ["b#0", 0.5],
        ]);
        expect(results[0]).toMatchObject({
            sourceId: "a",
            title: "Title a",
            chunkIndex: 0,
            text: "a chunk 0",
            metadata: { format: "md" },
        });
    });

    it("keeps the row id of an entry that is upserted again", async () => {
        const index = openIndex();
        await index.create(3, "cosine");
        await index.upsert([entry("a", 0, [1, 0, 0]), entry("c", 0, [1, 0, 0])]);
        await index.upsert([entry("a", 0, [1, 0, 0], "a rewritten")]);

        const results = await index.query([1, 0, 0], 2);

        expect(results.map((result) => [result.id, result.text])).toEqual([
            ["a#0", "a rewritten"],
            ["c#0", "c chunk 0"],
        ]);
        await expect(index.count()).resolves.toBe(2);
    });

    it("scores a 0.84 cosine match as 0.92", async () => {
        const index = openIndex();
        await index.create(2, "cosine");
        await index.upsert([entry("a", 0, [0.84, Math.sqrt(1 - 0.84 * 0.84)])]);

        const [result] = await index.query([1, 0], 1);
        expect(result.score).toBeCloseTo(0.92, 10);
    });

    it("scores euclidean collections by distance", async () => {
        const index = openIndex();
        await index.create(2, "euclidean");
        await index.upsert([entry("far", 0, [3, 4]), entry("near", 0, [0, 1])]);

        const results = await index.query([0, 0], 2);

        expect(results.map((result) => [result.id, result.score])).toEqual([
            ["near#0", 0.5],
            ["far#0", 1 / 6],
        ]);
    });

    it("scores a zero vector the way the local backend does", async () => {
        const index = openIndex();
        await index.create(2, "cosine");
        await index.upsert([entry("zero", 0, [0, 0]), entry("aligned", 0, [1, 0])]);

        const results = await index.query([1, 0], 2);
        expect(results.map((result) => [result.id, result.score])).toEqual([
            ["aligned#0", 1],
            ["zero#0", 0.5],
        ]);

        const fromZeroQuery = await index.query([0, 0], 2);
        expect(fromZeroQuery.map((result) => [result.id, result.score])).toEqual([
            ["zero#0", 0.5],
            ["aligned#0", 0.5],
        ]);
    });

    it("rejects a wrong-sized vector without sending it", async () => {
        const index = openIndex();
        await index.create(3, "cosine");
        const before = fakeSupabase.requests.length;

        await expect(index.upsert([entry("a", 0, [1, 0])])).rejects.toBeInstanceOf(SchemaConflictError);
        expect(fakeSupabase.requests).toHaveLength(before);
    });

    it("deletes by source, clears and drops", async () => {
        const index = openIndex();
        await index.create(3, "cosine");
        await index.upsert([entry("a", 0, [1, 0, 0]), entry("a", 1, [0, 1, 0]), entry("b", 0, [0, 0, 1])]);

        await expect(index.deleteBySource("a")).resolves.toBe(2);
        await expect(index.count()).resolves.toBe(1);

        await index.clear();
        await expect(index.count()).resolves.toBe(0);
        await expect(index.describe()).resolves.toEqual({ dimension: 3, metric: "cosine" });

        await index.drop();
        await expect(index.describe()).resolves.toBeNull();
        expect(fakeSupabase.rows("rag_collections")).toHaveLength(0);
    });

    it("only touches its own collection", async () => {
        const docs = openIndex("docs");
        const other = openIndex("other");
        await docs.create(3, "cosine");
        await other.create(3, "cosine");
        await docs.upsert([entry("a", 0, [1, 0, 0])]);
        await other.upsert([entry("a", 0, [1, 0, 0])]);

        await other.clear();

        await expect(docs.count()).resolves.toBe(1);
        await expect(docs.query([1, 0, 0], 5)).resolves.toHaveLength(1);
    });

    it("reports PostgREST errors as an unavailable index", async () => {
        const index = openIndex();
        await index.create(3, "cosine");

        fakeSupabase.failNext({ message: "connection reset", code: "08006" });
        await expect(index.upsert([entry("a", 0, [1, 0, 0])])).rejects.toBeInstanceOf(IndexUnavailableError);

        fakeSupabase.throwNext(new Error("fetch failed"));
        await expect(index.query([1, 0, 0], 1)).rejects.toThrow(
            new IndexUnavailableError("Supabase request failed during query: fetch failed")
        );
    });

    it("verifies the connection against the collections table", async () => {
        const index = openIndex();
        await expect(index.verifyConnection()).resolves.toBeUndefined();

        fakeSupabase.failNext({ message: "relation \"rag_collections\" does not exist", code: "42P01" });
        await expect(index.verifyConnection()).rejects.toBeInstanceOf(IndexUnavailableError);
    });
});
