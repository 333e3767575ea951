import type { ContextSource, GenerateAnswerOptions } from "./types";

export const DEFAULT_SYSTEM_PROMPT = [
    "You answer questions using only the numbered sources provided in the context.",
    "Cite every statement inline with the exact markdown link shown in the header of the source it comes from, for example [Title](source-id) or [Title](<source id.md>).",
    "Copy the link target character for character and do not cite anything that is not listed in the context.",
    "If the context is empty or does not contain the answer, say plainly that no relevant information was found instead of guessing.",
    "Do not add closing summaries or suggestions to consult further resources.",
].join(" ");

export const EMPTY_CONTEXT_NOTICE = "No relevant sources were found for this question.";

function formatCitationLabel(title: string): string {
    return title.replace(/[[\]]/g, "").trim();
}

// Ids with spaces or parentheses need the `<...>` form to stay a single link target.
function formatCitationTarget(sourceId: string): string {
    return /[\s()<>]/.test(sourceId) ? `<${sourceId}>` : sourceId;
}

export function formatCitation(source: Pick<ContextSource, "sourceId" | "title">): string {
    return `[${formatCitationLabel(source.title)}](${formatCitationTarget(source.sourceId)})`;
}

/** A single context block, `position` being 1-based rank. */
export function formatContextBlock(source: ContextSource, position: number): string {
    return `Source ${position}: ${formatCitation(source)}\n${source.text.trim()}`;
}

export function formatContext(sources: ContextSource[]): string {
    return sources.map((source, index) => formatContextBlock(source, index + 1)).join("\n\n");
}

export function buildPromptMessages(options: GenerateAnswerOptions): { system: string; user: string } {
    const context = options.context.length > 0 ? formatContext(options.context) : EMPTY_CONTEXT_NOTICE;

    return {
        system: options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
        user: [
            "Context:",
            context,
            "",
            `Question: ${options.prompt.trim()}`,
        ].join("\n"),
    };
}
