import { setTimeout as delay } from "node:timers/promises";
import { ApplyCancelledError } from "../entities/errors.js";
import type { Clock } from "../use-cases/clock.port.js";

export function createSystemClock(): Clock {
    return {
        now(): number {
            return Date.now();
        },
        async sleep(ms: number, signal?: AbortSignal): Promise<void> {
            if (signal?.aborted) {
                throw new ApplyCancelledError();
            }
            try {
                await delay(ms, undefined, { signal });
            } catch (error) {
                if (signal?.aborted) {
                    throw new ApplyCancelledError();
                }
                throw error;
            }
        },
    };
}
