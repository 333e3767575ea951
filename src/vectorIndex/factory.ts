import type { Logger } from "pino";
import type { IndexConfig } from "../config/types";
import { InvalidConfigurationError } from "../errors";
import { LocalVectorIndex } from "./localIndex";
import { SupabaseVectorIndex } from "./supabaseIndex";
import type { VectorIndex } from "./types";

export function createVectorIndex(config: IndexConfig, logger?: Logger): VectorIndex {
    switch (config.backend) {
        case "local":
            return new LocalVectorIndex(config.local, config.collection, logger);
        case "supabase":
            if (!config.supabase) {
                throw new InvalidConfigurationError("Supabase URL and service role key are required for the supabase backend.");
            }
            return new SupabaseVectorIndex(config.supabase, config.collection, logger);
        default:
            throw new InvalidConfigurationError(`Vector index backend "${String(config.backend)}" is not supported.`);
    }
}
