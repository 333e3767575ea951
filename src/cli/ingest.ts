#!/usr/bin/env node
import path from "node:path";
import { configureLogger, getLogger } from "../utils/logger";
import { runIngestionPipeline, type IngestionPipelineStats } from "../ingest/pipeline";
import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import { createRagRuntime } from "../runtime";
import { SupabaseVectorIndex } from "../vectorIndex/supabaseIndex";

interface CliOptions {
    configPath: string;
    documentsDir?: string;
}

function printHelp(): void {
    const lines = [
        "Usage: rag-ingest [--config <path-to-env>] [--dir <documents-dir>]",
        "",
        "Options:",
        "  -c, --config   Path to the .env configuration file (defaults to .env in package root).",
        "  -d, --dir      Directory to ingest (defaults to RAG_INGEST_DOCUMENTS_DIR).",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): CliOptions {
    let configPath: string | undefined;
    let documentsDir: string | undefined;

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

        if (arg === "-d" || arg === "--dir") {
            documentsDir = argv[i + 1];
            i += 1;
            continue;
        }

        if (!configPath) {
            configPath = arg;
        }
    }

    return {
        configPath: resolveConfigPath(configPath),
        documentsDir: documentsDir ? path.resolve(process.cwd(), documentsDir) : undefined,
    };
}

function logStats(stats: IngestionPipelineStats): void {
    const logger = getLogger();
    logger.info(`Discovered documents: ${stats.discoveredDocuments}`);
    logger.info(`Processed documents: ${stats.processedDocuments}`);
    logger.info(`Failed documents: ${stats.failedDocuments.length}`);
    logger.info(`Chunks inserted: ${stats.insertedChunks}`);
    logger.info(`Chunks deleted: ${stats.deletedChunks}`);

    for (const failure of stats.failedDocuments) {
        logger.warn(`  ${failure.sourceId}: ${failure.code} ${failure.message}`);
    }
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    const config = await loadAppConfig(options.configPath);
    if (options.documentsDir) {
        config.ingest.documentsDir = options.documentsDir;
    }

    configureLogger(config.logging);
    const logger = getLogger();

    logger.info(`Loaded configuration from ${options.configPath}`);

    const runtime = createRagRuntime(config, logger);
    if (runtime.index instanceof SupabaseVectorIndex) {
        await runtime.index.verifyConnection();
    }

    logger.info("Starting ingestion pipeline.");

    const result = await runIngestionPipeline(config, {
        index: runtime.index,
        embedding: runtime.llm.embedding,
        tokenizer: runtime.tokenizer,
        logger,
    });

    logStats(result.stats);

    if (result.stats.failedDocuments.length > 0) {
        process.exitCode = 1;
    }

    logger.info("Ingestion pipeline completed.");
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Ingestion pipeline failed.");
    process.exitCode = 1;
});
