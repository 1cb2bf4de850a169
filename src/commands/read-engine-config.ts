import { readFile } from "node:fs/promises";
import type { EngineConfig } from "../entities/engine-config.js";
import {
    defaultEngineConfig,
    type EngineConfigParser,
} from "../use-cases/parse-engine-config.js";

export const DEFAULT_CONFIG_PATH = "sitewright.config.json";

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

// The default file is optional; a path given explicitly must exist
export async function readEngineConfig(
    parser: EngineConfigParser,
    configPath?: string | undefined,
): Promise<EngineConfig> {
    let content: string;
    try {
        content = await readFile(configPath ?? DEFAULT_CONFIG_PATH, "utf-8");
    } catch (error) {
        if (configPath === undefined && isMissingFile(error)) {
            return defaultEngineConfig();
        }
        throw error;
    }
    return parser.parse(content);
}
