const HEADING = /^#{1,6}\s+(.+?)\s*#*\s*$/;
const FRONTMATTER_TITLE = /^title\s*:\s*(.+)$/;

export function stripWrappingQuotes(value: string): string {
    return value.replace(/^(["'])(.*)\1$/, "$2").trim();
}

/**
 * First Markdown heading of the document, or a `title:` key inside leading front matter.
 */
export function extractMarkdownTitle(content: string): string | undefined {
    const lines = content.split("\n");
    let inFrontmatter = lines[0]?.trim() === "---";

    for (let i = inFrontmatter ? 1 : 0; i < lines.length; i += 1) {
        const trimmed = lines[i].trim();

        if (inFrontmatter) {
            if (trimmed === "---") {
                inFrontmatter = false;
                continue;
            }
            const match = trimmed.match(FRONTMATTER_TITLE);
            if (match) {
                return stripWrappingQuotes(match[1]);
            }
            continue;
        }

        const heading = trimmed.match(HEADING);
        if (heading) {
            return heading[1];
        }
    }

    return undefined;
}
