import { describe, expect, it } from "vitest";
import {
    CorruptDocumentError,
    EmbeddingUnavailableError,
    GenerationUnavailableError,
    IndexUnavailableError,
    InvalidConfigurationError,
    InvalidCredentialError,
    SchemaConflictError,
    UnsupportedFormatError,
    describeError,
    isFatalError,
    isRetryableError,
} from "./errors";

describe("error taxonomy", () => {
    it("treats backend outages as retryable", () => {
        expect(isRetryableError(new EmbeddingUnavailableError("rate limited"))).toBe(true);
        expect(isRetryableError(new GenerationUnavailableError("overloaded"))).toBe(true);
        expect(isRetryableError(new IndexUnavailableError("busy"))).toBe(true);
    });

    it("never retries configuration, credential, schema or document failures", () => {
        expect(isRetryableError(new InvalidConfigurationError("bad target"))).toBe(false);
        expect(isRetryableError(new InvalidCredentialError("401"))).toBe(false);
        expect(isRetryableError(new SchemaConflictError("1536 vs 384"))).toBe(false);
        expect(isRetryableError(new CorruptDocumentError("bad pdf"))).toBe(false);
        expect(isRetryableError(new Error("socket hang up"))).toBe(false);
    });

    it("stops a run only on fatal errors", () => {
        expect(isFatalError(new SchemaConflictError("1536 vs 384"))).toBe(true);
        expect(isFatalError(new InvalidCredentialError("401"))).toBe(true);
        expect(isFatalError(new UnsupportedFormatError("png"))).toBe(false);
        expect(isFatalError(new IndexUnavailableError("busy"))).toBe(false);
    });

    it("carries a code and the subclass name", () => {
        const error = new UnsupportedFormatError("png");

        expect(error.code).toBe("UNSUPPORTED_FORMAT");
        expect(error.name).toBe("UnsupportedFormatError");
        expect(error.message).toBe('Unsupported document format "png".');
        expect(describeError("plain")).toBe("plain");
    });
});
