import type {
    AttributeMap,
    AttributeValue,
    Reference,
    ResourceDescriptor,
} from "../entities/resource-descriptor.js";
import { isReferenceMarker } from "../entities/resource-descriptor.js";
import type { ResolvedAttributes } from "../entities/state-record.js";

export type OutputLookup = (address: string, output: string) => unknown;

export class UnresolvedReferenceError extends Error {
    constructor(readonly reference: Reference) {
        super(
            `Output "${reference.output}" of ${reference.to} is not available for ${reference.from}.${reference.attribute}`,
        );
        this.name = "UnresolvedReferenceError";
    }
}

function collectFromValue(
    value: AttributeValue,
    from: string,
    attribute: string,
    found: Reference[],
): void {
    if (isReferenceMarker(value)) {
        found.push({ from, to: value.ref, attribute, output: value.output });
        return;
    }
    if (Array.isArray(value)) {
        for (const item of value) {
            collectFromValue(item, from, attribute, found);
        }
        return;
    }
    if (value !== null && typeof value === "object") {
        for (const nested of Object.values(value)) {
            collectFromValue(nested, from, attribute, found);
        }
    }
}

export function collectAttributeReferences(
    address: string,
    attributes: AttributeMap,
): Reference[] {
    const found: Reference[] = [];
    for (const [attribute, value] of Object.entries(attributes)) {
        collectFromValue(value, address, attribute, found);
    }
    return found;
}

export function collectReferences(descriptor: ResourceDescriptor): Reference[] {
    return collectAttributeReferences(descriptor.address, descriptor.attributes);
}

function resolveValue(
    value: AttributeValue,
    from: string,
    attribute: string,
    lookup: OutputLookup,
): unknown {
    if (isReferenceMarker(value)) {
        const resolved = lookup(value.ref, value.output);
        if (resolved === undefined) {
            throw new UnresolvedReferenceError({
                from,
                to: value.ref,
                attribute,
                output: value.output,
            });
        }
        return resolved;
    }
    if (Array.isArray(value)) {
        return value.map((item) => resolveValue(item, from, attribute, lookup));
    }
    if (value !== null && typeof value === "object") {
        return Object.fromEntries(
            Object.entries(value).map(([key, nested]) => [
                key,
                resolveValue(nested, from, attribute, lookup),
            ]),
        );
    }
    return value;
}

export function resolveAttributes(
    address: string,
    attributes: AttributeMap,
    lookup: OutputLookup,
): ResolvedAttributes {
    return Object.fromEntries(
        Object.entries(attributes).map(([attribute, value]) => [
            attribute,
            resolveValue(value, address, attribute, lookup),
        ]),
    );
}
