import type { DistanceMetric, VectorIndexBackend } from "../config/types";

export type EntryMetadataValue = string | number | boolean | null;

export type EntryMetadata = Record<string, EntryMetadataValue>;

/** One chunk with its embedding, as persisted by a backend. */
export interface IndexEntry {
    /** `<sourceId>#<chunkIndex>` */
    id: string;
    sourceId: string;
    title: string;
    chunkIndex: number;
    text: string;
    tokenCount: number;
    startOffset: number;
    endOffset: number;
    vector: number[];
    metadata: EntryMetadata;
}

export type StoredChunk = Omit<IndexEntry, "vector">;

export interface RetrievedChunk extends StoredChunk {
    /** Normalised to [0, 1]; higher is more similar. */
    score: number;
}

export interface IndexSchema {
    dimension: number;
    metric: DistanceMetric;
}

/**
 * Storage for chunk embeddings. Both backends rank identically: scores in [0, 1] descending,
 * ties resolved by insertion order.
 */
export interface VectorIndex {
    readonly backend: VectorIndexBackend;
    readonly collection: string;

    /** Idempotent for matching parameters; a different schema is a `SchemaConflictError`. */
    create(dimension: number, metric: DistanceMetric): Promise<void>;
    describe(): Promise<IndexSchema | null>;
    /** Each call is applied as one unit: all entries become visible together or none do. */
    upsert(entries: IndexEntry[]): Promise<void>;
    query(vector: number[], k: number): Promise<RetrievedChunk[]>;
    /** Returns how many entries were removed. */
    deleteBySource(sourceId: string): Promise<number>;
    /** Removes every entry and keeps the schema. */
    clear(): Promise<void>;
    /** Removes every entry and the schema. */
    drop(): Promise<void>;
    count(): Promise<number>;
}
