import type { Logger } from "pino";
import type { AppConfig } from "./config/types";
import { createLLMClient } from "./llm/factory";
import type { LLMClientBundle } from "./llm/types";
import { getLogger } from "./utils/logger";
import { createTokenizer, type Tokenizer } from "./utils/tokenEncoder";
import { createVectorIndex } from "./vectorIndex/factory";
import type { VectorIndex } from "./vectorIndex/types";

export interface RagRuntime {
    config: AppConfig;
    index: VectorIndex;
    llm: LLMClientBundle;
    tokenizer: Tokenizer;
    logger: Logger;
}

/**
 * Wires the configured backend, providers and tokenizer. The backend is chosen here, once.
 */
export function createRagRuntime(config: AppConfig, logger: Logger = getLogger()): RagRuntime {
    return {
        config,
        index: createVectorIndex(config.index, logger),
        llm: createLLMClient(config.llm, logger),
        tokenizer: createTokenizer(config.chunking.tokenizer),
        logger,
    };
}
