import { readFile } from "node:fs/promises";
import path from "node:path";
import mammoth from "mammoth";
import { getDocumentProxy } from "unpdf";
import { CorruptDocumentError, RagError, UnsupportedFormatError, describeError } from "../errors";
import { calculateChecksum } from "../utils/calculateChecksum";
import { extractMarkdownTitle } from "../utils/extractTitle";
import type { EntryMetadata } from "../vectorIndex/types";

export type DocumentFormat = "txt" | "md" | "pdf" | "docx";

const FORMAT_ALIASES: Record<string, DocumentFormat> = {
    txt: "txt",
    text: "txt",
    md: "md",
    markdown: "md",
    pdf: "pdf",
    docx: "docx",
};

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(FORMAT_ALIASES)
    .filter((alias) => alias !== "text")
    .map((alias) => `.${alias}`);

export interface DocumentInput {
    /** Stable identity; re-ingesting the same id replaces its chunks. */
    sourceId: string;
    content: Uint8Array | string;
    formatHint?: string;
    fileName?: string;
    title?: string;
}

export interface LoadedDocument {
    sourceId: string;
    title: string;
    format: DocumentFormat;
    text: string;
    metadata: EntryMetadata;
}

interface ExtractedText {
    text: string;
    pageCount?: number;
}

/**
 * Format from the hint (`md`, `.pdf`, `markdown`) or else the file extension.
 */
export function resolveFormat(formatHint?: string, fileName?: string): DocumentFormat {
    const candidate = formatHint ?? (fileName ? path.extname(fileName) : "");
    const key = candidate.trim().toLowerCase().replace(/^\./, "");
    const format = FORMAT_ALIASES[key];

    if (!format) {
        throw new UnsupportedFormatError(
            key || "unknown",
            `Unsupported document format "${key || "unknown"}"${fileName ? ` for ${fileName}` : ""}. Supported: ${SUPPORTED_EXTENSIONS.join(", ")}`
        );
    }
    return format;
}

export function normaliseText(text: string): string {
    return text
        .replace(/^\uFEFF/, "")
        .replace(/\r\n?/g, "\n")
        .replace(/\u0000/g, "");
}

function toBytes(content: Uint8Array | string): Uint8Array {
    return typeof content === "string" ? new TextEncoder().encode(content) : content;
}

function decodeUtf8(content: Uint8Array | string): string {
    if (typeof content === "string") {
        return content;
    }
    return new TextDecoder("utf-8", { fatal: true }).decode(content);
}

async function extractPdf(bytes: Uint8Array): Promise<ExtractedText> {
    // pdf.js may transfer the buffer it is given.
    const pdf = await getDocumentProxy(new Uint8Array(bytes));

    const pages: string[] = [];
    for (let i = 1; i <= pdf.numPages; i++) {
        const page = await pdf.getPage(i);
        const textContent = await page.getTextContent();
        const text = textContent.items
            .map((item) => ("str" in item ? item.str : ""))
            .join(" ");
        pages.push(text.trim());
    }

    return { text: pages.filter(Boolean).join("\n\n"), pageCount: pdf.numPages };
}

async function extractDocx(bytes: Uint8Array): Promise<ExtractedText> {
    const { value } = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
    return { text: value };
}

async function extractText(format: DocumentFormat, content: Uint8Array | string): Promise<ExtractedText> {
    switch (format) {
        case "pdf":
            return extractPdf(toBytes(content));
        case "docx":
            return extractDocx(toBytes(content));
        case "txt":
        case "md":
            return { text: decodeUtf8(content) };
    }
}

/**
 * Extracts normalised text and metadata from a document. The format is settled before any
 * parsing happens.
 */
export async function loadDocument(input: DocumentInput): Promise<LoadedDocument> {
    const format = resolveFormat(input.formatHint, input.fileName ?? input.sourceId);
    const fileName = input.fileName ?? path.posix.basename(input.sourceId);

    let extracted: ExtractedText;
    try {
        extracted = await extractText(format, input.content);
    } catch (error) {
        if (error instanceof RagError) {
            throw error;
        }
        throw new CorruptDocumentError(
            `Could not read ${format} document "${input.sourceId}": ${describeError(error)}`,
            { cause: error }
        );
    }

    const text = normaliseText(extracted.text);
    const title = input.title
        ?? (format === "md" ? extractMarkdownTitle(text) : undefined)
        ?? fileName;

    const metadata: EntryMetadata = {
        format,
        fileName,
        byteLength: toBytes(input.content).byteLength,
        checksum: calculateChecksum(input.content),
    };
    if (extracted.pageCount !== undefined) {
        metadata.pageCount = extracted.pageCount;
    }

    return { sourceId: input.sourceId, title, format, text, metadata };
}

/** Source id of a file: its path below `root`, with `/` separators. */
export function toSourceId(root: string, filePath: string): string {
    return path.relative(root, filePath).split(path.sep).join("/");
}

export async function readDocumentFile(root: string, filePath: string): Promise<DocumentInput> {
    const content = await readFile(filePath);
    return {
        sourceId: toSourceId(root, filePath),
        content: new Uint8Array(content),
        fileName: path.basename(filePath),
    };
}
