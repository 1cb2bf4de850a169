import type { AttributeMap } from "./resource-descriptor.js";
import type { ResourceKind } from "./resource-kind.js";

export type ResourceStatus =
    | "absent"
    | "creating"
    | "ready"
    | "tainted"
    | "destroying";

export type ResolvedAttributes = Readonly<Record<string, unknown>>;

export interface DeposedObject {
    readonly kind: ResourceKind;
    readonly providerAssignedId: string;
    readonly resolvedAttributes: ResolvedAttributes;
}

export interface StateRecord {
    readonly address: string;
    readonly kind: ResourceKind;
    readonly status: ResourceStatus;
    readonly providerAssignedId: string | null;
    readonly lastAppliedAttributes: AttributeMap;
    readonly resolvedAttributes: ResolvedAttributes;
    readonly outputs: ResolvedAttributes;
    readonly dependencies: readonly string[];
    readonly deposed?: DeposedObject | undefined;
    readonly updatedAt: string;
}

export type StateSnapshot = ReadonlyMap<string, StateRecord>;
