import { ApplyCancelledError, AsyncConditionTimeout } from "../entities/errors.js";
import type { Clock } from "./clock.port.js";
import type { ProgressLogger } from "./progress-logger.port.js";
import { isTransientError } from "./retry-with-backoff.js";

export interface AwaitOptions {
    readonly description: string;
    readonly pollIntervalMs: number;
    readonly timeoutMs: number;
    readonly signal?: AbortSignal | undefined;
}

export interface ConditionWaiter {
    await(
        predicate: () => Promise<boolean>,
        options: AwaitOptions,
    ): Promise<"ready">;
}

export interface ConditionWaiterDeps {
    readonly clock: Clock;
    readonly logger: ProgressLogger;
}

export function createConditionWaiter(
    deps: ConditionWaiterDeps,
): ConditionWaiter {
    return {
        async await(
            predicate: () => Promise<boolean>,
            options: AwaitOptions,
        ): Promise<"ready"> {
            const startedAt = deps.clock.now();
            let attempts = 0;

            for (;;) {
                if (options.signal?.aborted) {
                    throw new ApplyCancelledError(
                        `Cancelled while waiting for ${options.description}`,
                    );
                }

                attempts += 1;
                try {
                    if (await predicate()) {
                        return "ready";
                    }
                } catch (error) {
                    if (!isTransientError(error)) {
                        throw error;
                    }
                    deps.logger.warn(
                        `Poll ${attempts} for ${options.description} failed transiently, will retry`,
                    );
                }

                const elapsed = deps.clock.now() - startedAt;
                const left = options.timeoutMs - elapsed;
                if (left <= 0) {
                    throw new AsyncConditionTimeout(
                        options.description,
                        options.timeoutMs,
                        attempts,
                    );
                }
                deps.logger.debug(
                    `Still waiting for ${options.description} (${Math.round(elapsed / 1000)}s elapsed)`,
                );
                await deps.clock.sleep(
                    Math.min(options.pollIntervalMs, left),
                    options.signal,
                );
            }
        },
    };
}
