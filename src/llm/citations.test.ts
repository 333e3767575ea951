import { describe, expect, it } from "vitest";
import { extractCitations } from "./citations";
import { EMPTY_CONTEXT_NOTICE, DEFAULT_SYSTEM_PROMPT, buildPromptMessages, formatCitation, formatContext } from "./prompt";
import type { ContextSource } from "./types";

const context: ContextSource[] = [
    { sourceId: "policies/returns.md", title: "Returns Policy", text: "Items can be returned within 30 days." },
    { sourceId: "faq.txt", title: "faq.txt", text: "  Shipping takes three days.\n" },
];

describe("extractCitations", () => {
    it("keeps citations to context sources in order of first mention", () => {
        const answer =
            "Returns are accepted for 30 days [Returns Policy](policies/returns.md). " +
            "Shipping takes three days [FAQ](faq.txt), as noted [again](policies/returns.md).";

        expect(extractCitations(answer, context)).toEqual({
            citations: [
                { sourceId: "policies/returns.md", title: "Returns Policy" },
                { sourceId: "faq.txt", title: "faq.txt" },
            ],
            rejected: [],
        });
    });

    it("rejects targets that were not in the context", () => {
        const answer = "See [Blog](https://example.com/post) and [Old](archive/old.md) and [Blog](https://example.com/post).";

        expect(extractCitations(answer, context)).toEqual({
            citations: [],
            rejected: ["https://example.com/post", "archive/old.md"],
        });
    });

    it("accepts angle-bracketed and padded targets", () => {
        const answer = "Per [policy](<policies/returns.md>) and [faq]( faq.txt ).";

        expect(extractCitations(answer, context).citations.map((citation) => citation.sourceId)).toEqual([
            "policies/returns.md",
            "faq.txt",
        ]);
    });

    it("matches source ids containing spaces and parentheses", () => {
        const source = { sourceId: "policies/Return Policy (2024).md", title: "Return Policy", text: "Refunds within 14 days." };
        const answer =
            `Refunds take 14 days ${formatCitation(source)}. ` +
            "See also [Return Policy](policies/Return Policy (2024).md).";

        expect(formatCitation(source)).toBe("[Return Policy](<policies/Return Policy (2024).md>)");
        expect(extractCitations(answer, [source])).toEqual({
            citations: [{ sourceId: "policies/Return Policy (2024).md", title: "Return Policy" }],
            rejected: [],
        });
    });

    it("finds nothing in an answer without links", () => {
        expect(extractCitations("No relevant information was found.", context)).toEqual({ citations: [], rejected: [] });
    });
});

describe("prompt formatting", () => {
    it("renders numbered context blocks with their citation link", () => {
        expect(formatContext(context)).toBe(
            "Source 1: [Returns Policy](policies/returns.md)\nItems can be returned within 30 days.\n\n" +
            "Source 2: [faq.txt](faq.txt)\nShipping takes three days."
        );
    });

    it("strips brackets from titles so links stay well formed", () => {
        expect(formatCitation({ sourceId: "a.md", title: "[Draft] Notes" })).toBe("[Draft Notes](a.md)");
    });

    it("tells the model when there is no context", () => {
        const messages = buildPromptMessages({ prompt: "  What is the refund window? ", context: [] });

        expect(messages.system).toBe(DEFAULT_SYSTEM_PROMPT);
        expect(messages.user).toBe(`Context:\n${EMPTY_CONTEXT_NOTICE}\n\nQuestion: What is the refund window?`);
    });

    it("uses a caller-supplied system prompt", () => {
        const messages = buildPromptMessages({ prompt: "q", context, systemPrompt: "Answer tersely." });
        expect(messages.system).toBe("Answer tersely.");
    });
});
