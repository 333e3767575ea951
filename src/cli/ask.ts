#!/usr/bin/env node
import { configureLogger, getLogger } from "../utils/logger";
import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import { askAi, type AskAiResult } from "../query/askAi";
import { createRagRuntime } from "../runtime";

interface CliOptions {
    configPath: string;
    question: string;
    topK?: number;
    json: boolean;
}

function printHelp(): void {
    const lines = [
        "Usage: rag-ask [--config <path-to-env>] [--top-k <n>] [--json] <question>",
        "",
        "Options:",
        "  -c, --config   Path to the .env configuration file (defaults to .env in package root).",
        "  -k, --top-k    Number of chunks to retrieve (defaults to RAG_RETRIEVAL_TOP_K).",
        "      --json     Print the full result as JSON.",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): CliOptions {
    let configPath: string | undefined;
    let topK: number | undefined;
    let json = false;
    const words: string[] = [];

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        if (arg === "-h" || arg === "--help") {
            printHelp();
            process.exit(0);
        }

        if (arg === "-c" || arg === "--config") {
            configPath = argv[i + 1];
            i += 1;
            continue;
        }

        if (arg === "-k" || arg === "--top-k") {
            topK = Number.parseInt(argv[i + 1] ?? "", 10);
            i += 1;
            continue;
        }

        if (arg === "--json") {
            json = true;
            continue;
        }

        words.push(arg);
    }

    return {
        configPath: resolveConfigPath(configPath),
        question: words.join(" "),
        topK: Number.isNaN(topK) ? undefined : topK,
        json,
    };
}

function printAnswer(result: AskAiResult): void {
    const lines = [result.answer.trim(), ""];

    if (result.citations.length > 0) {
        lines.push("Sources:");
        result.citations.forEach((citation, index) => {
            lines.push(`  ${index + 1}. ${citation.title} (${citation.sourceId})`);
        });
    } else {
        lines.push("Sources: none");
    }

    console.log(lines.join("\n"));
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    const config = await loadAppConfig(options.configPath);

    configureLogger(config.logging);
    const logger = getLogger();

    const runtime = createRagRuntime(config, logger);
    const result = await askAi(
        options.question,
        {
            index: runtime.index,
            embedding: runtime.llm.embedding,
            chat: runtime.llm.chat,
            tokenizer: runtime.tokenizer,
            logger,
        },
        { ...config.retrieval, topK: options.topK ?? config.retrieval.topK }
    );

    if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
    }

    printAnswer(result);
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Query failed.");
    process.exitCode = 1;
});
