#!/usr/bin/env node
import { configureLogger, getLogger } from "../utils/logger";
import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import { createVectorIndex } from "../vectorIndex/factory";

interface CliOptions {
    configPath: string;
    sourceId?: string;
    drop: boolean;
}

function printHelp(): void {
    const lines = [
        "Usage: rag-reset [--config <path-to-env>] [--source <source-id> | --drop]",
        "",
        "Removes every entry from the configured collection.",
        "",
        "Options:",
        "  -c, --config   Path to the .env configuration file (defaults to .env in package root).",
        "  -s, --source   Only remove the entries of one source.",
        "      --drop     Also remove the collection's schema so it can be recreated with another dimension or metric.",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): CliOptions {
    let configPath: string | undefined;
    let sourceId: string | undefined;
    let drop = false;

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

        if (arg === "-s" || arg === "--source") {
            sourceId = argv[i + 1];
            i += 1;
            continue;
        }

        if (arg === "--drop") {
            drop = true;
            continue;
        }

        if (!configPath) {
            configPath = arg;
        }
    }

    return { configPath: resolveConfigPath(configPath), sourceId, drop };
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    const config = await loadAppConfig(options.configPath);

    configureLogger(config.logging);
    const logger = getLogger();
    const index = createVectorIndex(config.index, logger);

    if (options.sourceId) {
        const removed = await index.deleteBySource(options.sourceId);
        logger.info(`Removed ${removed} entr${removed === 1 ? "y" : "ies"} for ${options.sourceId}.`);
        return;
    }

    if (options.drop) {
        await index.drop();
        logger.info(`Dropped collection "${config.index.collection}".`);
        return;
    }

    await index.clear();
    logger.info(`Cleared collection "${config.index.collection}".`);
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Reset failed.");
    process.exitCode = 1;
});
