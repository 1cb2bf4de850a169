export interface Clock {
    now(): number;
    // Rejects with ApplyCancelledError when the signal aborts
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
