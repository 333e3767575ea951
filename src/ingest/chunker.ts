import { InvalidConfigurationError } from "../errors";
import type { Tokenizer } from "../utils/tokenEncoder";

export interface ChunkingOptions {
    targetTokens: number;
    overlapTokens: number;
    tokenizer: Tokenizer;
}

export interface TextChunk {
    index: number;
    text: string;
    tokenCount: number;
    /** Offset of the first character of `text` in the source. */
    startOffset: number;
    /** Offset one past the last character of `text` in the source. */
    endOffset: number;
}

export interface DocumentChunk extends TextChunk {
    sourceId: string;
}

interface Span {
    start: number;
    end: number;
}

interface LadderSpan extends Span {
    level: number;
}

type FitCheck = (start: number, end: number) => boolean;

// Paragraph, line, sentence, word. Below the last rung text is split into code points.
const SEPARATOR_LADDER: readonly RegExp[] = [
    /\n[ \t]*\n\s*/g,
    /\n/g,
    /[.!?]+["')\]]*\s+/g,
    /\s+/g,
];

const WHITESPACE = /\s/;

export function assertChunkingOptions(targetTokens: number, overlapTokens: number): void {
    if (!Number.isInteger(targetTokens) || targetTokens <= 0) {
        throw new InvalidConfigurationError(`Chunk target must be a positive integer, got ${targetTokens}.`);
    }
    if (!Number.isInteger(overlapTokens) || overlapTokens <= 0) {
        throw new InvalidConfigurationError(`Chunk overlap must be a positive integer, got ${overlapTokens}.`);
    }
    if (overlapTokens >= targetTokens) {
        throw new InvalidConfigurationError(
            `Chunk overlap (${overlapTokens}) must be smaller than the chunk target (${targetTokens}).`
        );
    }
}

function isWhitespace(text: string, offset: number): boolean {
    return WHITESPACE.test(text.charAt(offset));
}

function codePointWidth(text: string, offset: number): number {
    const codePoint = text.codePointAt(offset) ?? 0;
    return codePoint > 0xffff ? 2 : 1;
}

function splitOnSeparator(text: string, span: Span, separator: RegExp): Span[] {
    const parts: Span[] = [];
    let cursor = span.start;

    for (const match of text.slice(span.start, span.end).matchAll(separator)) {
        const end = span.start + (match.index ?? 0) + match[0].length;
        if (end > cursor && end < span.end) {
            parts.push({ start: cursor, end });
            cursor = end;
        }
    }

    if (cursor < span.end) {
        parts.push({ start: cursor, end: span.end });
    }
    return parts;
}

function splitCodePoints(text: string, span: Span, into: LadderSpan[]): void {
    let offset = span.start;
    while (offset < span.end) {
        const end = Math.min(offset + codePointWidth(text, offset), span.end);
        into.push({ start: offset, end, level: SEPARATOR_LADDER.length });
        offset = end;
    }
}

/**
 * Breaks the text into contiguous pieces that each fit the target, descending the separator
 * ladder only for spans that are still too large. Uses an explicit stack so an unbroken run of
 * any length cannot exhaust the call stack.
 */
function splitIntoPieces(text: string, targetTokens: number, tokenizer: Tokenizer): LadderSpan[] {
    const pieces: LadderSpan[] = [];
    const pending: LadderSpan[] = [{ start: 0, end: text.length, level: 0 }];

    while (pending.length > 0) {
        const span = pending.pop();
        if (!span) break;

        if (tokenizer.count(text.slice(span.start, span.end)) <= targetTokens) {
            pieces.push(span);
            continue;
        }

        if (span.level >= SEPARATOR_LADDER.length) {
            splitCodePoints(text, span, pieces);
            continue;
        }

        const parts = splitOnSeparator(text, span, SEPARATOR_LADDER[span.level]);
        for (let i = parts.length - 1; i >= 0; i -= 1) {
            pending.push({ ...parts[i], level: span.level + 1 });
        }
    }

    return pieces;
}

/**
 * Splits a piece on the next separator that actually divides it. Words and code points are
 * returned as they are.
 */
function refinePiece(text: string, piece: LadderSpan): LadderSpan[] {
    for (let level = piece.level; level < SEPARATOR_LADDER.length; level += 1) {
        const parts = splitOnSeparator(text, piece, SEPARATOR_LADDER[level]);
        if (parts.length > 1) {
            return parts.map((part) => ({ ...part, level: level + 1 }));
        }
    }
    return [piece];
}

/**
 * Index of the last piece, starting at `from`, that can still close a chunk opened at `start`.
 * Gallops forward before bisecting so each check stays close to one chunk in size.
 */
function lastFittingPiece(pieces: Span[], from: number, start: number, fits: FitCheck): number {
    if (!fits(start, pieces[from].end)) {
        return from - 1;
    }

    let good = from;
    let bad = pieces.length;
    let step = 1;

    while (good + step < pieces.length) {
        const next = good + step;
        if (!fits(start, pieces[next].end)) {
            bad = next;
            break;
        }
        good = next;
        step *= 2;
    }

    let low = good + 1;
    let high = bad - 1;
    while (low <= high) {
        const mid = Math.floor((low + high) / 2);
        if (fits(start, pieces[mid].end)) {
            good = mid;
            low = mid + 1;
        } else {
            high = mid - 1;
        }
    }

    return good;
}

function wordStarts(text: string, start: number, end: number): number[] {
    const starts: number[] = [];
    for (let offset = start + 1; offset < end; offset += 1) {
        if (isWhitespace(text, offset - 1) && !isWhitespace(text, offset)) {
            starts.push(offset);
        }
    }
    return starts;
}

function codePointStarts(text: string, start: number, end: number): number[] {
    const starts: number[] = [];
    let offset = start + codePointWidth(text, start);
    while (offset < end) {
        starts.push(offset);
        offset += codePointWidth(text, offset);
    }
    return starts;
}

/**
 * Where the next chunk opens: the latest word start (code point inside unbroken runs) whose
 * tail to the end of `previous` holds at least `overlapTokens`. Always strictly after the
 * previous chunk's start.
 */
function overlapStart(text: string, previous: TextChunk, overlapTokens: number, tokenizer: Tokenizer): number {
    const { startOffset, endOffset } = previous;
    let candidates = wordStarts(text, startOffset, endOffset);
    if (candidates.length === 0) {
        candidates = codePointStarts(text, startOffset, endOffset);
    }
    if (candidates.length === 0) {
        return endOffset;
    }

    let best = -1;
    let low = 0;
    let high = candidates.length - 1;
    while (low <= high) {
        const mid = Math.floor((low + high) / 2);
        if (tokenizer.count(text.slice(candidates[mid], endOffset)) >= overlapTokens) {
            best = mid;
            low = mid + 1;
        } else {
            high = mid - 1;
        }
    }

    return candidates[best >= 0 ? best : 0];
}

/**
 * Moves a carried-over start forward, word by word, until the next piece fits behind it. Only
 * reached when that piece is a single word or code point.
 */
function shrinkToFit(text: string, start: number, piece: Span, fits: FitCheck): number {
    for (const candidate of wordStarts(text, start, piece.start)) {
        if (fits(candidate, piece.end)) {
            return candidate;
        }
    }
    return piece.start;
}

function toChunk(text: string, start: number, end: number, index: number, tokenizer: Tokenizer): TextChunk | null {
    let first = start;
    let last = end;
    while (first < last && isWhitespace(text, first)) first += 1;
    while (last > first && isWhitespace(text, last - 1)) last -= 1;

    if (first === last) {
        return null;
    }

    const chunkText = text.slice(first, last);
    return {
        index,
        text: chunkText,
        tokenCount: tokenizer.count(chunkText),
        startOffset: first,
        endOffset: last,
    };
}

/**
 * Splits text into ordered, overlapping chunks of at most `targetTokens` tokens each.
 *
 * Pieces come from the coarsest separator that keeps them within the target (paragraphs, then
 * lines, sentences, words and finally code points) and are packed greedily. Each chunk after the
 * first re-includes at least `overlapTokens` from the end of the one before it, or all but its
 * first word when that chunk is shorter. A piece that no longer fits behind the overlap is split
 * further rather than shortening the overlap.
 */
export function chunkText(text: string, options: ChunkingOptions): TextChunk[] {
    const { targetTokens, overlapTokens, tokenizer } = options;
    assertChunkingOptions(targetTokens, overlapTokens);

    if (text.trim().length === 0) {
        return [];
    }

    const fits: FitCheck = (start, end) => tokenizer.count(text.slice(start, end).trim()) <= targetTokens;
    const pieces = splitIntoPieces(text, targetTokens, tokenizer);
    const chunks: TextChunk[] = [];

    let cursor = 0;
    let start = pieces[0].start;

    while (cursor < pieces.length) {
        const piece = pieces[cursor];
        if (!fits(start, piece.end)) {
            // Keep the overlap whole and break the incoming piece down instead.
            const parts = refinePiece(text, piece);
            if (parts.length > 1) {
                pieces.splice(cursor, 1, ...parts);
                continue;
            }
            start = shrinkToFit(text, start, piece, fits);
        }

        // A lone code point heavier than the target still has to go somewhere.
        const last = Math.max(cursor, lastFittingPiece(pieces, cursor, start, fits));
        const end = pieces[last].end;
        cursor = last + 1;

        const chunk = toChunk(text, start, end, chunks.length, tokenizer);
        if (!chunk) {
            start = end;
            continue;
        }

        chunks.push(chunk);
        if (cursor < pieces.length) {
            start = overlapStart(text, chunk, overlapTokens, tokenizer);
        }
    }

    return chunks;
}

export function chunkDocument(
    document: { sourceId: string; text: string },
    options: ChunkingOptions
): DocumentChunk[] {
    return chunkText(document.text, options).map((chunk) => ({
        ...chunk,
        sourceId: document.sourceId,
    }));
}
