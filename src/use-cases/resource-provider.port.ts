import type { ResourceKind } from "../entities/resource-kind.js";
import type { ResolvedAttributes } from "../entities/state-record.js";

export interface CreateRequest {
    // Stays the same across retries of one create, so a repeated call
    // returns the object the first call made
    readonly idempotencyKey: string;
    readonly signal?: AbortSignal | undefined;
}

export interface ResourceProvider {
    create(
        kind: ResourceKind,
        attributes: ResolvedAttributes,
        request: CreateRequest,
    ): Promise<string>;
    // Resolves undefined when the object no longer exists
    read(
        kind: ResourceKind,
        providerAssignedId: string,
    ): Promise<ResolvedAttributes | undefined>;
    update(
        kind: ResourceKind,
        providerAssignedId: string,
        attributes: ResolvedAttributes,
        signal?: AbortSignal,
    ): Promise<void>;
    // Deleting an object that is already gone succeeds
    delete(
        kind: ResourceKind,
        providerAssignedId: string,
        signal?: AbortSignal,
    ): Promise<void>;
    checkCondition(
        kind: ResourceKind,
        providerAssignedId: string,
    ): Promise<boolean>;
}
