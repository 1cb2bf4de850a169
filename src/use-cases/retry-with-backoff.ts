import type { RetrySettings } from "../entities/engine-config.js";
import { ApplyCancelledError, ProviderError } from "../entities/errors.js";
import type { Clock } from "./clock.port.js";

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
    maxAttempts: 5,
    baseDelayMs: 500,
    maxDelayMs: 20_000,
    jitter: 0.2,
};

const TRANSIENT_CODES = new Set([
    "ECONNRESET",
    "ECONNREFUSED",
    "ETIMEDOUT",
    "ENOTFOUND",
    "EPIPE",
    "EAI_AGAIN",
    "Throttling",
    "ThrottlingException",
    "TooManyRequestsException",
    "RequestLimitExceeded",
    "SlowDown",
    "PriorRequestNotComplete",
    "ServiceUnavailable",
    "InternalError",
]);

export interface RetryAttempt {
    readonly attempt: number;
    readonly delayMs: number;
    readonly error: unknown;
}

export interface RetryOptions {
    readonly label: string;
    readonly signal?: AbortSignal | undefined;
    readonly onRetry?: ((attempt: RetryAttempt) => void) | undefined;
}

export interface RetryRunner {
    run<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T>;
}

function readProperty(error: object, key: string): unknown {
    return key in error ? Reflect.get(error, key) : undefined;
}

export function isTransientError(error: unknown): boolean {
    if (error instanceof ProviderError) {
        return error.transient;
    }
    if (error === null || typeof error !== "object") {
        return false;
    }
    const code = readProperty(error, "code") ?? readProperty(error, "name");
    if (typeof code === "string" && TRANSIENT_CODES.has(code)) {
        return true;
    }
    const metadata = readProperty(error, "$metadata");
    const status =
        metadata !== null && typeof metadata === "object"
            ? readProperty(metadata, "httpStatusCode")
            : readProperty(error, "statusCode");
    return (
        typeof status === "number" &&
        (status === 429 || (status >= 500 && status < 600))
    );
}

export function backoffDelay(
    attempt: number,
    settings: RetrySettings,
    random: () => number = Math.random,
): number {
    const base = Math.min(
        settings.baseDelayMs * 2 ** (attempt - 1),
        settings.maxDelayMs,
    );
    const spread = base * settings.jitter * (random() * 2 - 1);
    return Math.round(Math.max(0, base + spread));
}

export function createRetryRunner(
    clock: Clock,
    settings: RetrySettings = DEFAULT_RETRY_SETTINGS,
    random: () => number = Math.random,
): RetryRunner {
    return {
        async run<T>(
            operation: () => Promise<T>,
            options: RetryOptions,
        ): Promise<T> {
            for (let attempt = 1; ; attempt++) {
                if (options.signal?.aborted) {
                    throw new ApplyCancelledError(
                        `Cancelled before ${options.label}`,
                    );
                }
                try {
                    return await operation();
                } catch (error) {
                    if (
                        attempt >= settings.maxAttempts ||
                        !isTransientError(error)
                    ) {
                        throw error;
                    }
                    const delayMs = backoffDelay(attempt, settings, random);
                    options.onRetry?.({ attempt, delayMs, error });
                    await clock.sleep(delayMs, options.signal);
                }
            }
        },
    };
}
