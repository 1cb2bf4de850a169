import { ZodError } from "zod";
import type { EngineConfig } from "../entities/engine-config.js";
import { sanitizeJson } from "../entities/sanitize-json.js";
import { EngineConfigSchema } from "./engine-config.schema.js";

export interface EngineConfigParser {
    parse(jsonString: string): EngineConfig;
}

const KEY_MAP: Readonly<Record<string, string>> = {
    state_path: "statePath",
    max_attempts: "maxAttempts",
    base_delay_ms: "baseDelayMs",
    max_delay_ms: "maxDelayMs",
    bucket_address: "bucketAddress",
    distribution_address: "distributionAddress",
    delete_extraneous: "deleteExtraneous",
};

function transformSnakeToCamel(data: unknown): unknown {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
        return data;
    }

    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
        const camelKey = KEY_MAP[key] ?? key;
        result[camelKey] = transformSnakeToCamel(value);
    }
    return result;
}

export function createEngineConfigParser(): EngineConfigParser {
    return {
        parse(jsonString: string): EngineConfig {
            let rawData: unknown;
            try {
                rawData = JSON.parse(jsonString);
            } catch (error) {
                const message =
                    error instanceof Error ? error.message : String(error);
                throw new Error(
                    `Invalid JSON: configuration file is not valid JSON (${message})`,
                );
            }

            let sanitized: unknown;
            try {
                sanitized = sanitizeJson(rawData).value;
            } catch (error) {
                const message =
                    error instanceof Error ? error.message : String(error);
                throw new Error(
                    `Invalid JSON: configuration file could not be sanitized (${message})`,
                );
            }

            try {
                return EngineConfigSchema.parse(transformSnakeToCamel(sanitized));
            } catch (error) {
                if (error instanceof ZodError) {
                    const details = error.issues
                        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                        .join("; ");
                    throw new Error(`Invalid configuration: ${details}`);
                }
                throw error;
            }
        },
    };
}

export function defaultEngineConfig(): EngineConfig {
    return EngineConfigSchema.parse({});
}
