import { setImmediate } from "node:timers";
import { ApplyCancelledError } from "../entities/errors.js";
import type { Clock } from "../use-cases/clock.port.js";

interface PendingTimer {
    readonly due: number;
    readonly sequence: number;
    readonly resolve: () => void;
}

export interface FakeClock extends Clock {
    readonly sleeps: readonly number[];
}

// Virtual time: each sleep fires once every runnable promise has settled,
// jumping the clock straight to the earliest due timer.
export function createFakeClock(start = 0): FakeClock {
    let now = start;
    let sequence = 0;
    let scheduled = false;
    const pending: PendingTimer[] = [];
    const sleeps: number[] = [];

    const fireNext = () => {
        scheduled = false;
        pending.sort((a, b) => a.due - b.due || a.sequence - b.sequence);
        const next = pending.shift();
        if (!next) {
            return;
        }
        now = Math.max(now, next.due);
        next.resolve();
        schedule();
    };

    const schedule = () => {
        if (scheduled || pending.length === 0) {
            return;
        }
        scheduled = true;
        setImmediate(fireNext);
    };

    return {
        sleeps,
        now(): number {
            return now;
        },
        sleep(ms: number, signal?: AbortSignal): Promise<void> {
            sleeps.push(ms);
            return new Promise<void>((resolve, reject) => {
                if (signal?.aborted) {
                    reject(new ApplyCancelledError());
                    return;
                }
                const timer: PendingTimer = {
                    due: now + ms,
                    sequence: sequence++,
                    resolve: () => {
                        signal?.removeEventListener("abort", onAbort);
                        resolve();
                    },
                };
                const onAbort = () => {
                    const index = pending.indexOf(timer);
                    if (index >= 0) {
                        pending.splice(index, 1);
                    }
                    reject(new ApplyCancelledError());
                };
                signal?.addEventListener("abort", onAbort, { once: true });
                pending.push(timer);
                schedule();
            });
        },
    };
}
