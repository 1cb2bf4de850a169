import type { ContentSyncReport } from "../entities/content-sync-outcome.js";

export interface ContentSyncRequest {
    readonly root: string;
    readonly bucket: string;
    // Cached copies are invalidated after the upload when set
    readonly distributionId?: string | undefined;
    readonly deleteExtraneous: boolean;
    readonly signal?: AbortSignal | undefined;
}

export interface ContentSync {
    sync(request: ContentSyncRequest): Promise<ContentSyncReport>;
}
