export type RagErrorCode =
    | "INVALID_CONFIGURATION"
    | "INVALID_QUESTION"
    | "UNSUPPORTED_FORMAT"
    | "CORRUPT_DOCUMENT"
    | "EMBEDDING_UNAVAILABLE"
    | "GENERATION_UNAVAILABLE"
    | "INVALID_CREDENTIAL"
    | "SCHEMA_CONFLICT"
    | "INDEX_UNAVAILABLE";

export class RagError extends Error {
    constructor(
        public readonly code: RagErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Bad chunk sizes, missing settings, dimension mismatch between embedder output and its declared size. */
export class InvalidConfigurationError extends RagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("INVALID_CONFIGURATION", message, options);
    }
}

export class InvalidQuestionError extends RagError {
    constructor(message: string) {
        super("INVALID_QUESTION", message);
    }
}

export class UnsupportedFormatError extends RagError {
    constructor(public readonly format: string, message?: string) {
        super("UNSUPPORTED_FORMAT", message ?? `Unsupported document format "${format}".`);
    }
}

export class CorruptDocumentError extends RagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("CORRUPT_DOCUMENT", message, options);
    }
}

export class EmbeddingUnavailableError extends RagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("EMBEDDING_UNAVAILABLE", message, options);
    }
}

export class GenerationUnavailableError extends RagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("GENERATION_UNAVAILABLE", message, options);
    }
}

export class InvalidCredentialError extends RagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("INVALID_CREDENTIAL", message, options);
    }
}

/**
 * The index was created with a different dimension or metric than the caller expects.
 * Needs an operator to clear or recreate the collection.
 */
export class SchemaConflictError extends RagError {
    constructor(message: string) {
        super("SCHEMA_CONFLICT", message);
    }
}

export class IndexUnavailableError extends RagError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("INDEX_UNAVAILABLE", message, options);
    }
}

export function isRetryableError(error: unknown): boolean {
    return error instanceof EmbeddingUnavailableError
        || error instanceof GenerationUnavailableError
        || error instanceof IndexUnavailableError;
}

/** Errors that no other document or retry can get past; a run stops on the first one. */
export function isFatalError(error: unknown): boolean {
    return error instanceof InvalidConfigurationError
        || error instanceof SchemaConflictError
        || error instanceof InvalidCredentialError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
