import type { ResourceKind } from "./resource-kind.js";

export interface ReferenceMarker {
    readonly ref: string;
    readonly output: string;
}

export type AttributeValue =
    | string
    | number
    | boolean
    | null
    | ReferenceMarker
    | readonly AttributeValue[]
    | { readonly [key: string]: AttributeValue };

export type AttributeMap = Readonly<Record<string, AttributeValue>>;

export interface Lifecycle {
    readonly createBeforeDestroy: boolean;
}

export interface ResourceDescriptor {
    readonly address: string;
    readonly kind: ResourceKind;
    readonly attributes: AttributeMap;
    readonly dependsOn: readonly string[];
    readonly lifecycle: Lifecycle;
}

export interface Reference {
    readonly from: string;
    readonly to: string;
    readonly attribute: string;
    readonly output: string;
}

export function isReferenceMarker(value: unknown): value is ReferenceMarker {
    if (value === null || typeof value !== "object" || Array.isArray(value)) {
        return false;
    }
    const keys = Object.keys(value);
    return (
        keys.length === 2 &&
        "ref" in value &&
        "output" in value &&
        typeof value.ref === "string" &&
        typeof value.output === "string"
    );
}

// Undefined when the value is not plain JSON
export function toAttributeValue(value: unknown): AttributeValue | undefined {
    if (
        value === null ||
        typeof value === "string" ||
        typeof value === "boolean" ||
        (typeof value === "number" && Number.isFinite(value))
    ) {
        return value;
    }
    if (Array.isArray(value)) {
        const items: AttributeValue[] = [];
        for (const item of value) {
            const converted = toAttributeValue(item);
            if (converted === undefined) {
                return undefined;
            }
            items.push(converted);
        }
        return items;
    }
    if (typeof value === "object") {
        const result: Record<string, AttributeValue> = {};
        for (const [key, nested] of Object.entries(value)) {
            const converted = toAttributeValue(nested);
            if (converted === undefined) {
                return undefined;
            }
            result[key] = converted;
        }
        return result;
    }
    return undefined;
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === "object") {
        for (const nested of Object.values(value)) {
            deepFreeze(nested);
        }
        Object.freeze(value);
    }
    return value;
}

export function freezeDescriptor(
    descriptor: ResourceDescriptor,
): ResourceDescriptor {
    return deepFreeze(descriptor);
}

export function attributeValuesEqual(a: unknown, b: unknown): boolean {
    if (a === b) {
        return true;
    }
    if (Array.isArray(a) || Array.isArray(b)) {
        if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
            return false;
        }
        return a.every((item, index) => attributeValuesEqual(item, b[index]));
    }
    if (
        a === null ||
        b === null ||
        typeof a !== "object" ||
        typeof b !== "object"
    ) {
        return false;
    }
    const aEntries = Object.entries(a).filter(([, v]) => v !== undefined);
    const bRecord = Object.fromEntries(
        Object.entries(b).filter(([, v]) => v !== undefined),
    );
    if (aEntries.length !== Object.keys(bRecord).length) {
        return false;
    }
    return aEntries.every(
        ([key, value]) =>
            Object.hasOwn(bRecord, key) &&
            attributeValuesEqual(value, bRecord[key]),
    );
}
