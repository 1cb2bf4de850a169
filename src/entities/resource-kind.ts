export type ResourceKind =
    | "storage_bucket"
    | "bucket_policy"
    | "origin_access_control"
    | "certificate"
    | "certificate_validation"
    | "dns_record"
    | "distribution";

export const RESOURCE_KINDS: readonly ResourceKind[] = [
    "storage_bucket",
    "bucket_policy",
    "origin_access_control",
    "certificate",
    "certificate_validation",
    "dns_record",
    "distribution",
];

export type AttributeType =
    | "string"
    | "number"
    | "boolean"
    | "string_list"
    | "object";

export interface AttributeSchema {
    readonly type: AttributeType;
    readonly required: boolean;
    // Changing the value means the provider must build a new object
    readonly forceNew: boolean;
    readonly default?: unknown;
}

export interface ReadinessSchema {
    readonly description: string;
    readonly onUpdate: boolean;
    readonly pollIntervalMs: number;
    readonly timeoutMs: number;
}

export interface ResourceKindSchema {
    readonly kind: ResourceKind;
    readonly attributes: Readonly<Record<string, AttributeSchema>>;
    readonly outputs: Readonly<Record<string, AttributeType>>;
    readonly updatable: boolean;
    // Attributes the provider names the object by; no two live objects share them
    readonly identityAttributes?: readonly string[];
    readonly readiness?: ReadinessSchema;
}

export function isResourceKind(value: string): value is ResourceKind {
    return RESOURCE_KINDS.some((kind) => kind === value);
}

export function matchesAttributeType(
    value: unknown,
    type: AttributeType,
): boolean {
    switch (type) {
        case "string":
            return typeof value === "string";
        case "number":
            return typeof value === "number" && Number.isFinite(value);
        case "boolean":
            return typeof value === "boolean";
        case "string_list":
            return (
                Array.isArray(value) &&
                value.every((item) => typeof item === "string")
            );
        case "object":
            return (
                value !== null &&
                typeof value === "object" &&
                !Array.isArray(value)
            );
    }
}
