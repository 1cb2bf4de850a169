import type { ZodType, ZodTypeDef } from "zod";
import { ZodError } from "zod";
import { ConvergeError, ProviderError } from "../entities/errors.js";
import type { ResolvedAttributes } from "../entities/state-record.js";
import type { CreateRequest } from "../use-cases/resource-provider.port.js";
import { isTransientError } from "../use-cases/retry-with-backoff.js";

export interface KindHandler {
    create(
        attributes: ResolvedAttributes,
        request: CreateRequest,
    ): Promise<string>;
    read(id: string): Promise<ResolvedAttributes | undefined>;
    update(
        id: string,
        attributes: ResolvedAttributes,
        signal?: AbortSignal,
    ): Promise<void>;
    delete(id: string, signal?: AbortSignal): Promise<void>;
    checkCondition?(id: string): Promise<boolean>;
}

const NOT_FOUND_NAMES = new Set([
    "NotFound",
    "NoSuchBucket",
    "NoSuchBucketPolicy",
    "NoSuchWebsiteConfiguration",
    "NoSuchOriginAccessControl",
    "NoSuchDistribution",
    "NoSuchHostedZone",
    "ResourceNotFoundException",
]);

function metadataStatus(error: object): number | undefined {
    const metadata = "$metadata" in error ? error.$metadata : undefined;
    if (
        metadata !== null &&
        typeof metadata === "object" &&
        "httpStatusCode" in metadata &&
        typeof metadata.httpStatusCode === "number"
    ) {
        return metadata.httpStatusCode;
    }
    return undefined;
}

export function isNotFound(error: unknown): boolean {
    if (!(error instanceof Error)) {
        return false;
    }
    return NOT_FOUND_NAMES.has(error.name) || metadataStatus(error) === 404;
}

// Engine errors (cancellation, timeouts) pass through untouched
export function toProviderError(
    operation: string,
    error: unknown,
): ConvergeError {
    if (error instanceof ConvergeError) {
        return error;
    }
    if (!(error instanceof Error)) {
        return new ProviderError(`${operation} failed: ${String(error)}`, {
            transient: false,
            cause: error,
        });
    }
    return new ProviderError(`${operation} failed: ${error.message}`, {
        transient: isTransientError(error),
        providerCode: error.name,
        statusCode: metadataStatus(error),
        cause: error,
    });
}

export function parseAttributes<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    kind: string,
    attributes: ResolvedAttributes,
): T {
    try {
        return schema.parse(attributes);
    } catch (error) {
        if (error instanceof ZodError) {
            throw new ProviderError(
                `Resolved attributes for ${kind} are invalid: ${error.issues
                    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                    .join("; ")}`,
                { transient: false, cause: error },
            );
        }
        throw error;
    }
}

export function requireValue<T>(
    value: T | undefined | null,
    description: string,
): T {
    if (value === undefined || value === null) {
        throw new ProviderError(`AWS response is missing ${description}`, {
            transient: false,
        });
    }
    return value;
}
