import type { ContextSource } from "./types";

export interface Citation {
    sourceId: string;
    title: string;
}

export interface CitationReport {
    /** Distinct cited sources that were in the context, in order of first mention. */
    citations: Citation[];
    /** Link targets the answer used that were not in the context. */
    rejected: string[];
}

// Target is either `<...>` or bare text with at most one level of balanced parentheses.
const MARKDOWN_LINK = /\[([^\]\n]+)\]\((?:<([^>\n]+)>|((?:[^()\n]|\([^()\n]*\))+))\)/g;

function normaliseTarget(target: string): string {
    const trimmed = target.trim();
    return trimmed.startsWith("<") && trimmed.endsWith(">") ? trimmed.slice(1, -1).trim() : trimmed;
}

/**
 * Cross-checks `[label](target)` links in an answer against the sources it was given.
 * Titles always come from the context, never from the model's label.
 */
export function extractCitations(answer: string, context: ContextSource[]): CitationReport {
    const known = new Map<string, string>();
    for (const source of context) {
        if (!known.has(source.sourceId)) {
            known.set(source.sourceId, source.title);
        }
    }

    const citations: Citation[] = [];
    const cited = new Set<string>();
    const rejected: string[] = [];

    for (const match of answer.matchAll(MARKDOWN_LINK)) {
        const target = normaliseTarget(match[2] ?? match[3] ?? "");
        const title = known.get(target);

        if (title === undefined) {
            if (!rejected.includes(target)) {
                rejected.push(target);
            }
            continue;
        }

        if (!cited.has(target)) {
            cited.add(target);
            citations.push({ sourceId: target, title });
        }
    }

    return { citations, rejected };
}
