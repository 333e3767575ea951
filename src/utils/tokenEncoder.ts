import { get_encoding, encoding_for_model, Tiktoken, type TiktokenEncoding, type TiktokenModel } from "tiktoken";

const TOKENIZER_FALLBACK: TiktokenEncoding = "cl100k_base";
const ENCODING_NAMES: readonly TiktokenEncoding[] = ["gpt2", "r50k_base", "p50k_base", "p50k_edit", "cl100k_base", "o200k_base"];
const encoderCache = new Map<string, Tiktoken>();

/**
 * Special tokens tiktoken refuses to encode when they appear literally in input text.
 */
const SPECIAL_TOKENS = [
    "<|endoftext|>",
    "<|endofprompt|>",
    "<|fim_prefix|>",
    "<|fim_middle|>",
    "<|fim_suffix|>",
    "<|start_header_id|>",
    "<|end_header_id|>",
    "<|eot_id|>",
] as const;

/**
 * Measures text in tokens. Chunking, indexing and context budgeting must share one instance
 * so that a chunk measured as fitting a budget fits it everywhere.
 */
export interface Tokenizer {
    readonly name: string;
    count(text: string): number;
}

function sanitizeSpecialTokens(text: string): string {
    let sanitized = text;
    for (const token of SPECIAL_TOKENS) {
        const placeholder = token
            .replace(/</g, "&lt;")
            .replace(/>/g, "&gt;")
            .replace(/\|/g, "&#124;");
        sanitized = sanitized.split(token).join(placeholder);
    }
    return sanitized;
}

function isEncodingName(name: string): name is TiktokenEncoding {
    return ENCODING_NAMES.some((encoding) => encoding === name);
}

export function getEncoder(model?: string): Tiktoken {
    const key = (model ?? TOKENIZER_FALLBACK).toLocaleLowerCase();
    const cached = encoderCache.get(key);
    if (cached) {
        return cached;
    }

    let encoder: Tiktoken;
    if (isEncodingName(key)) {
        encoder = get_encoding(key);
    } else {
        try {
            encoder = encoding_for_model(key as TiktokenModel);
        } catch {
            encoder = get_encoding(TOKENIZER_FALLBACK);
        }
    }

    encoderCache.set(key, encoder);
    return encoder;
}

export function countTokens(chunk: string, model?: string): number {
    if (!chunk) return 0;
    try {
        return getEncoder(model).encode(sanitizeSpecialTokens(chunk)).length;
    } catch {
        // ~4 characters per token keeps the estimate on the high side for English prose.
        return Math.ceil(chunk.length / 4);
    }
}

export function countTokensInBatch(chunks: string[], model?: string): number {
    return chunks.reduce((sum, current) => sum + countTokens(current, model), 0);
}

export function createTokenizer(model: string = TOKENIZER_FALLBACK): Tokenizer {
    return {
        name: model,
        count: (text) => countTokens(text, model),
    };
}
