export interface ContentSyncReport {
    readonly uploaded: readonly string[];
    readonly deleted: readonly string[];
    readonly unchanged: number;
    readonly invalidationId?: string | undefined;
}

export type ContentSyncOutcome =
    | { readonly status: "synced"; readonly report: ContentSyncReport }
    | { readonly status: "skipped"; readonly reason: string }
    | { readonly status: "failed"; readonly error: Error };
