import { describe, expect, it } from "vitest";
import { InvalidConfigurationError } from "../errors";
import { chatConfig, embeddingConfig } from "../test/fakes";
import { createChatProvider, createEmbeddingProvider, createLLMClient } from "./factory";
import { AnthropicChatProvider } from "./providers/anthropic";
import { GoogleEmbeddingProvider } from "./providers/google";
import { OllamaChatProvider, OllamaEmbeddingProvider } from "./providers/ollama";
import { OpenAIChatProvider, OpenAIEmbeddingProvider } from "./providers/openai";

describe("provider factory", () => {
    it("builds the configured embedding provider with its declared dimension", () => {
        const provider = createEmbeddingProvider(embeddingConfig(1536));

        expect(provider).toBeInstanceOf(OpenAIEmbeddingProvider);
        expect(provider.dimension).toBe(1536);
        expect(createEmbeddingProvider({ ...embeddingConfig(768), provider: "google" })).toBeInstanceOf(GoogleEmbeddingProvider);
    });

    it("builds chat providers", () => {
        expect(createChatProvider(chatConfig())).toBeInstanceOf(OpenAIChatProvider);
        expect(createChatProvider({ ...chatConfig(), provider: "anthropic" })).toBeInstanceOf(AnthropicChatProvider);
    });

    it("needs no API key for a local Ollama server", () => {
        const client = createLLMClient({
            embedding: { provider: "ollama", model: "nomic-embed-text", dimensions: 768 },
            chat: { provider: "ollama", model: "llama3.1", temperature: 0 },
        });

        expect(client.embedding).toBeInstanceOf(OllamaEmbeddingProvider);
        expect(client.chat).toBeInstanceOf(OllamaChatProvider);
    });

    it("requires an API key for hosted providers", () => {
        expect(() => createEmbeddingProvider({ ...embeddingConfig(1536), apiKey: undefined })).toThrow(InvalidConfigurationError);
        expect(() => createChatProvider({ ...chatConfig(), provider: "anthropic", apiKey: undefined })).toThrow(InvalidConfigurationError);
    });
});
