export interface RetrySettings {
    readonly maxAttempts: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
    readonly jitter: number;
}

export interface ContentSettings {
    readonly root: string;
    readonly bucketAddress: string;
    readonly distributionAddress: string | null;
    readonly deleteExtraneous: boolean;
}

export interface EngineConfig {
    readonly statePath: string;
    readonly region: string;
    readonly concurrency: number;
    readonly retry: RetrySettings;
    readonly content: ContentSettings | null;
}
