import { z } from "zod";
import type { DistanceMetric } from "../config/types";
import { InvalidConfigurationError, SchemaConflictError } from "../errors";
import type { IndexSchema } from "./types";

export const indexSchemaSchema = z.object({
    dimension: z.number().int().positive(),
    metric: z.enum(["cosine", "euclidean"]),
});

export const entryMetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

export function toEntryId(sourceId: string, chunkIndex: number): string {
    return `${sourceId}#${chunkIndex}`;
}

export function assertDimension(dimension: number): void {
    if (!Number.isInteger(dimension) || dimension <= 0) {
        throw new InvalidConfigurationError(`Index dimension must be a positive integer, got ${dimension}.`);
    }
}

export function assertTopK(k: number): void {
    if (!Number.isInteger(k) || k <= 0) {
        throw new InvalidConfigurationError(`Top-k must be a positive integer, got ${k}.`);
    }
}

export function assertSameSchema(collection: string, existing: IndexSchema, dimension: number, metric: DistanceMetric): void {
    if (existing.dimension !== dimension || existing.metric !== metric) {
        throw new SchemaConflictError(
            `Collection "${collection}" was created for ${existing.dimension}-dimensional ${existing.metric} vectors; ` +
            `requested ${dimension}-dimensional ${metric}. Clear or drop the collection to change it.`
        );
    }
}

export function assertVectorFits(collection: string, schema: IndexSchema, vector: number[]): void {
    if (vector.length !== schema.dimension) {
        throw new SchemaConflictError(
            `Collection "${collection}" stores ${schema.dimension}-dimensional vectors, got ${vector.length}.`
        );
    }
    if (!vector.every(Number.isFinite)) {
        throw new InvalidConfigurationError(`Vectors for collection "${collection}" must contain only finite numbers.`);
    }
}

export function missingCollection(collection: string): InvalidConfigurationError {
    return new InvalidConfigurationError(`Collection "${collection}" has not been created yet.`);
}
