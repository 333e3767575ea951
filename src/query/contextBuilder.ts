import { formatContext } from "../llm/prompt";
import type { ContextSource } from "../llm/types";
import type { Tokenizer } from "../utils/tokenEncoder";
import type { RetrievedChunk } from "../vectorIndex/types";

export interface AssembledContext {
    /** Chunks that made it into the context, best first. */
    chunks: RetrievedChunk[];
    sources: ContextSource[];
    /** Rendered context exactly as the generator receives it. */
    text: string;
    tokenCount: number;
    droppedChunks: number;
}

function toContextSource(chunk: RetrievedChunk): ContextSource {
    return { sourceId: chunk.sourceId, title: chunk.title, text: chunk.text };
}

/**
 * Keeps the longest run of top-ranked chunks whose rendered context fits `tokenBudget`;
 * everything ranked below the first chunk that does not fit is dropped.
 */
export function assembleContext(chunks: RetrievedChunk[], tokenizer: Tokenizer, tokenBudget: number): AssembledContext {
    const kept: RetrievedChunk[] = [];
    let text = "";
    let tokenCount = 0;

    for (const chunk of chunks) {
        const candidate = formatContext([...kept, chunk].map(toContextSource));
        const candidateTokens = tokenizer.count(candidate);
        if (candidateTokens > tokenBudget) {
            break;
        }
        kept.push(chunk);
        text = candidate;
        tokenCount = candidateTokens;
    }

    return {
        chunks: kept,
        sources: kept.map(toContextSource),
        text,
        tokenCount,
        droppedChunks: chunks.length - kept.length,
    };
}
