import type { DistanceMetric } from "../config/types";

export function cosineSimilarity(a: number[], b: number[]): number {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i += 1) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) {
        return 0;
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function euclideanDistance(a: number[], b: number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i += 1) {
        const delta = a[i] - b[i];
        sum += delta * delta;
    }
    return Math.sqrt(sum);
}

function clampUnit(value: number): number {
    return Math.min(1, Math.max(0, value));
}

/** Cosine similarity in [-1, 1] mapped onto [0, 1]. */
export function similarityToScore(similarity: number): number {
    return clampUnit((1 + similarity) / 2);
}

/** pgvector `<=>` distance (1 - cosine similarity, in [0, 2]); same value as `similarityToScore`. */
export function cosineDistanceToScore(distance: number): number {
    return clampUnit(1 - distance / 2);
}

export function euclideanDistanceToScore(distance: number): number {
    return 1 / (1 + Math.max(0, distance));
}

/** pgvector reports NaN against a zero vector; that scores like a similarity of 0. */
export function distanceToScore(metric: DistanceMetric, distance: number): number {
    if (Number.isNaN(distance)) {
        return metric === "cosine" ? similarityToScore(0) : 0;
    }
    return metric === "cosine" ? cosineDistanceToScore(distance) : euclideanDistanceToScore(distance);
}

export function scoreVectors(metric: DistanceMetric, query: number[], candidate: number[]): number {
    return metric === "cosine"
        ? similarityToScore(cosineSimilarity(query, candidate))
        : euclideanDistanceToScore(euclideanDistance(query, candidate));
}

/** Higher score first, earlier insertion first on ties. */
export function compareRanked(a: { score: number; seq: number }, b: { score: number; seq: number }): number {
    return b.score - a.score || a.seq - b.seq;
}
