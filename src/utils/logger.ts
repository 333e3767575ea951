import pino, { type Logger, type TransportSingleOptions } from "pino";
import type { LoggingConfig } from "../config/types";

let loggerInstance: Logger | null = null;

export function configureLogger(config: LoggingConfig): Logger {
    let transport: TransportSingleOptions | undefined;

    if (config.pretty) {
        try {
            const prettyTarget = require.resolve("pino-pretty");
            transport = {
                target: prettyTarget,
                options: {
                    colorize: true,
                    translateTime: "SYS:standard",
                },
            };
        } catch {
            console.warn(
                '[cited-rag] "pino-pretty" is not installed. Falling back to JSON logs. Install it or set RAG_LOGGING_PRETTY=false.'
            );
        }
    }

    loggerInstance = pino({
        level: config.level,
        base: undefined,
        transport,
    });

    return loggerInstance;
}

export function getLogger(): Logger {
    if (!loggerInstance) {
        loggerInstance = pino({
            level: "info",
            base: undefined,
        });
    }
    return loggerInstance;
}

export function childLogger(logger: Logger | undefined, bindings: Record<string, string>): Logger {
    const base = logger ?? getLogger();
    return typeof base.child === "function" ? base.child(bindings) : base;
}
