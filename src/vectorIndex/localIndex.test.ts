import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InvalidConfigurationError, SchemaConflictError } from "../errors";
import { silentLogger } from "../test/fakes";
import { LocalVectorIndex } from "./localIndex";
import { toEntryId } from "./schema";
import type { IndexEntry } from "./types";

function entry(sourceId: string, chunkIndex: number, vector: number[], text = `${sourceId} chunk ${chunkIndex}`): IndexEntry {
    return {
        id: toEntryId(sourceId, chunkIndex),
        sourceId,
        title: sourceId.toUpperCase(),
        chunkIndex,
        text,
        tokenCount: text.split(" ").length,
        startOffset: 0,
        endOffset: text.length,
        vector,
        metadata: { format: "txt", pageCount: null },
    };
}

describe("LocalVectorIndex", () => {
    let directory: string;
    let index: LocalVectorIndex;

    beforeEach(async () => {
        directory = await mkdtemp(path.join(os.tmpdir(), "rag-local-index-"));
        index = new LocalVectorIndex({ directory }, "docs", silentLogger);
    });

    afterEach(async () => {
        await rm(directory, { recursive: true, force: true });
    });

    it("behaves as empty before the collection is created", async () => {
        await expect(index.describe()).resolves.toBeNull();
        await expect(index.count()).resolves.toBe(0);
        await expect(index.deleteBySource("a")).resolves.toBe(0);
        await expect(index.clear()).resolves.toBeUndefined();
        await expect(index.query([1, 0, 0], 3)).rejects.toBeInstanceOf(InvalidConfigurationError);
        await expect(index.upsert([entry("a", 0, [1, 0, 0])])).rejects.toBeInstanceOf(InvalidConfigurationError);
    });

    it("creates idempotently and refuses a different schema", async () => {
        await index.create(384, "cosine");
        await index.create(384, "cosine");

        await expect(index.describe()).resolves.toEqual({ dimension: 384, metric: "cosine" });
        await expect(index.create(1536, "cosine")).rejects.toBeInstanceOf(SchemaConflictError);
        await expect(index.create(384, "euclidean")).rejects.toBeInstanceOf(SchemaConflictError);
    });

    it("rejects a non-positive dimension", async () => {
        await expect(index.create(0, "cosine")).rejects.toBeInstanceOf(InvalidConfigurationError);
    });

    it("returns nothing from an empty collection", async () => {
        await index.create(3, "cosine");
        await expect(index.query([1, 0, 0], 5)).resolves.toEqual([]);
    });

    it("ranks by normalised score and breaks ties by insertion order", async () => {
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
            title: "A",
            chunkIndex: 0,
            text: "a chunk 0",
            metadata: { format: "txt", pageCount: null },
        });
    });

    it("keeps an entry's insertion position when it is upserted again", async () => {
        await index.create(3, "cosine");
        await index.upsert([entry("a", 0, [1, 0, 0]), entry("c", 0, [1, 0, 0])]);
        await index.upsert([entry("a", 0, [1, 0, 0], "a rewritten")]);

        const results = await index.query([1, 0, 0], 2);

        expect(results.map((result) => result.id)).toEqual(["a#0", "c#0"]);
        expect(results[0].text).toBe("a rewritten");
        await expect(index.count()).resolves.toBe(2);
    });

    it("limits results to k", async () => {
        await index.create(3, "cosine");
        await index.upsert([entry("a", 0, [1, 0, 0]), entry("a", 1, [0, 1, 0]), entry("a", 2, [0, 0, 1])]);

        await expect(index.query([0, 0, 1], 1)).resolves.toMatchObject([{ id: "a#2" }]);
        await expect(index.query([0, 0, 1], 0)).rejects.toBeInstanceOf(InvalidConfigurationError);
    });

    it("scores a 0.84 cosine match as 0.92", async () => {
        await index.create(2, "cosine");
        await index.upsert([entry("a", 0, [0.84, Math.sqrt(1 - 0.84 * 0.84)])]);

        const [result] = await index.query([1, 0], 1);
        expect(result.score).toBeCloseTo(0.92, 10);
    });

    it("scores euclidean collections by distance", async () => {
        await index.create(2, "euclidean");
        await index.upsert([entry("near", 0, [0, 1]), entry("far", 0, [3, 4])]);

        const results = await index.query([0, 0], 2);

        expect(results.map((result) => result.id)).toEqual(["near#0", "far#0"]);
        expect(results[0].score).toBe(0.5);
        expect(results[1].score).toBeCloseTo(1 / 6, 10);
    });

    it("scores a zero vector as unrelated", async () => {
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

    it("stores nothing from an upsert with a wrong-sized vector", async () => {
        await index.create(3, "cosine");

        await expect(index.upsert([entry("a", 0, [1, 0, 0]), entry("a", 1, [1, 0])]))
            .rejects.toBeInstanceOf(SchemaConflictError);
        await expect(index.count()).resolves.toBe(0);
    });

    it("rejects non-finite vector values", async () => {
        await index.create(2, "cosine");
        await expect(index.upsert([entry("a", 0, [Number.NaN, 1])])).rejects.toBeInstanceOf(InvalidConfigurationError);
    });

    it("deletes every entry of one source", async () => {
        await index.create(3, "cosine");
        await index.upsert([entry("a", 0, [1, 0, 0]), entry("a", 1, [0, 1, 0]), entry("b", 0, [0, 0, 1])]);

        await expect(index.deleteBySource("a")).resolves.toBe(2);
        await expect(index.deleteBySource("a")).resolves.toBe(0);

        const results = await index.query([1, 0, 0], 5);
        expect(results.map((result) => result.id)).toEqual(["b#0"]);
    });

    it("clears entries but keeps the schema", async () => {
        await index.create(3, "cosine");
        await index.upsert([entry("a", 0, [1, 0, 0])]);

        await index.clear();

        await expect(index.count()).resolves.toBe(0);
        await expect(index.describe()).resolves.toEqual({ dimension: 3, metric: "cosine" });
    });

    it("drops the collection so it can be recreated with another schema", async () => {
        await index.create(3, "cosine");
        await index.upsert([entry("a", 0, [1, 0, 0])]);

        await index.drop();
        await expect(index.describe()).resolves.toBeNull();

        await index.create(2, "euclidean");
        await expect(index.describe()).resolves.toEqual({ dimension: 2, metric: "euclidean" });
        await expect(index.count()).resolves.toBe(0);
    });

    it("persists entries and schema across instances", async () => {
        await index.create(3, "cosine");
        await index.upsert([entry("a", 0, [1, 0, 0]), entry("b", 0, [1, 0, 0])]);

        const reopened = new LocalVectorIndex({ directory }, "docs", silentLogger);

        await expect(reopened.describe()).resolves.toEqual({ dimension: 3, metric: "cosine" });
        await reopened.upsert([entry("c", 0, [1, 0, 0])]);
        const results = await reopened.query([1, 0, 0], 3);
        expect(results.map((result) => result.id)).toEqual(["a#0", "b#0", "c#0"]);
    });

    it("keeps collections in separate folders", async () => {
        const other = new LocalVectorIndex({ directory }, "other", silentLogger);
        await index.create(3, "cosine");
        await other.create(2, "cosine");
        await index.upsert([entry("a", 0, [1, 0, 0])]);

        await expect(other.count()).resolves.toBe(0);
        await expect(index.count()).resolves.toBe(1);
    });
});
