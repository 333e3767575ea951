import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { CorruptDocumentError, UnsupportedFormatError } from "../errors";
import { calculateChecksum } from "../utils/calculateChecksum";
import { SUPPORTED_EXTENSIONS, loadDocument, normaliseText, readDocumentFile, resolveFormat, toSourceId } from "./loader";

const INVALID_UTF8 = new Uint8Array([0x66, 0x6f, 0xc3, 0x28]);

describe("resolveFormat", () => {
    it.each([
        [undefined, "notes.MD", "md"],
        ["markdown", undefined, "md"],
        [".pdf", "ignored.txt", "pdf"],
        ["text", undefined, "txt"],
        [undefined, "contract.docx", "docx"],
    ])("resolves hint %s / file %s to %s", (hint, fileName, expected) => {
        expect(resolveFormat(hint, fileName)).toBe(expected);
    });

    it("rejects unknown formats", () => {
        expect(() => resolveFormat(undefined, "diagram.png")).toThrow(UnsupportedFormatError);
        expect(() => resolveFormat(undefined, "README")).toThrow('Unsupported document format "unknown" for README.');
    });

    it("lists the extensions it reads", () => {
        expect(SUPPORTED_EXTENSIONS).toEqual([".txt", ".md", ".markdown", ".pdf", ".docx"]);
    });
});

describe("normaliseText", () => {
    it("drops a byte order mark, unifies line endings and removes NUL characters", () => {
        expect(normaliseText("\uFEFFone\r\ntwo\rthree\u0000\n")).toBe("one\ntwo\nthree\n");
    });
});

describe("loadDocument", () => {
    it("loads markdown and takes its title from the first heading", async () => {
        const content = "\uFEFF# Returns Policy\r\n\r\nItems ship back free.\r\n";

        const document = await loadDocument({ sourceId: "policies/returns.md", content });

        expect(document).toEqual({
            sourceId: "policies/returns.md",
            title: "Returns Policy",
            format: "md",
            text: "# Returns Policy\n\nItems ship back free.\n",
            metadata: {
                format: "md",
                fileName: "returns.md",
                byteLength: Buffer.byteLength(content),
                checksum: calculateChecksum(content),
            },
        });
    });

    it("decodes text bytes and falls back to the file name for a title", async () => {
        const document = await loadDocument({
            sourceId: "kb/shipping",
            content: new TextEncoder().encode("Orders ship within two days."),
            fileName: "shipping.txt",
        });

        expect(document).toMatchObject({ title: "shipping.txt", format: "txt", text: "Orders ship within two days." });
    });

    it("prefers an explicit title and format hint", async () => {
        const document = await loadDocument({
            sourceId: "ticket-42",
            content: "# Heading\nbody",
            formatHint: "md",
            title: "Ticket 42",
        });

        expect(document).toMatchObject({ title: "Ticket 42", format: "md", metadata: { fileName: "ticket-42" } });
    });

    it("reports undecodable text as a corrupt document", async () => {
        await expect(loadDocument({ sourceId: "broken.txt", content: INVALID_UTF8 })).rejects.toBeInstanceOf(CorruptDocumentError);
    });

    it("reports unreadable pdf and docx files as corrupt documents", async () => {
        const garbage = new TextEncoder().encode("this is not a binary document");

        await expect(loadDocument({ sourceId: "scan.pdf", content: garbage })).rejects.toBeInstanceOf(CorruptDocumentError);
        await expect(loadDocument({ sourceId: "memo.docx", content: garbage })).rejects.toBeInstanceOf(CorruptDocumentError);
    });

    it("settles the format before reading the content", async () => {
        await expect(loadDocument({ sourceId: "photo.jpg", content: INVALID_UTF8 })).rejects.toBeInstanceOf(UnsupportedFormatError);
    });
});

describe("document files", () => {
    let root: string | undefined;

    afterEach(async () => {
        if (root) {
            await rm(root, { recursive: true, force: true });
            root = undefined;
        }
    });

    it("uses the path below the root as the source id", async () => {
        root = await mkdtemp(path.join(os.tmpdir(), "rag-loader-"));
        const filePath = path.join(root, "guides", "setup.md");
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, "# Setup\n");

        expect(toSourceId(root, filePath)).toBe("guides/setup.md");

        const input = await readDocumentFile(root, filePath);
        expect(input.sourceId).toBe("guides/setup.md");
        expect(input.fileName).toBe("setup.md");
        expect(input.content).toEqual(new Uint8Array(Buffer.from("# Setup\n")));
    });
});
