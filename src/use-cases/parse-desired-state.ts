import { ZodError } from "zod";
import { ParseError, type ParseIssue } from "../entities/errors.js";
import type {
    AttributeMap,
    AttributeValue,
    Reference,
    ResourceDescriptor,
} from "../entities/resource-descriptor.js";
import {
    freezeDescriptor,
    isReferenceMarker,
    toAttributeValue,
} from "../entities/resource-descriptor.js";
import type {
    AttributeType,
    ResourceKindSchema,
} from "../entities/resource-kind.js";
import { matchesAttributeType } from "../entities/resource-kind.js";
import { sanitizeJson } from "../entities/sanitize-json.js";
import {
    type DesiredResource,
    type DesiredStateDocument,
    DesiredStateDocumentSchema,
} from "./desired-state.schema.js";
import { collectAttributeReferences } from "./resolve-references.js";
import type { ResourceKindCatalog } from "./resource-kind-catalog.port.js";

export interface DesiredStateParseResult {
    readonly descriptors: readonly ResourceDescriptor[];
    readonly strippedKeys: readonly string[];
}

export interface DesiredStateParser {
    parse(jsonString: string): DesiredStateParseResult;
}

function invalidDocument(message: string): ParseError {
    return new ParseError([{ code: "InvalidDocument", message }]);
}

function parseJson(jsonString: string): unknown {
    try {
        return JSON.parse(jsonString);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw invalidDocument(`not valid JSON (${message})`);
    }
}

function validateShape(data: unknown): DesiredStateDocument {
    try {
        return DesiredStateDocumentSchema.parse(data);
    } catch (error) {
        if (error instanceof ZodError) {
            throw new ParseError(
                error.issues.map(
                    (issue): ParseIssue => ({
                        code: "InvalidDocument",
                        message: `${issue.path.join(".")}: ${issue.message}`,
                    }),
                ),
            );
        }
        throw error;
    }
}

// References stand in for any value; their output types are checked separately
function conformsTo(value: AttributeValue, type: AttributeType): boolean {
    if (isReferenceMarker(value)) {
        return true;
    }
    if (type === "string_list" && Array.isArray(value)) {
        return value.every(
            (item: AttributeValue) =>
                typeof item === "string" || isReferenceMarker(item),
        );
    }
    return matchesAttributeType(value, type);
}

function checkAttributes(
    resource: DesiredResource,
    schema: ResourceKindSchema,
    issues: ParseIssue[],
): AttributeMap {
    const attributes: Record<string, AttributeValue> = {};

    for (const [name, raw] of Object.entries(resource.attributes)) {
        const attributeSchema = schema.attributes[name];
        if (!attributeSchema) {
            issues.push({
                code: "SchemaViolation",
                address: resource.address,
                message: `unknown attribute "${name}" for kind ${schema.kind}`,
            });
            continue;
        }
        const value = toAttributeValue(raw);
        if (value === undefined || value === null) {
            issues.push({
                code: "SchemaViolation",
                address: resource.address,
                message: `attribute "${name}" must not be null`,
            });
            continue;
        }
        if (!conformsTo(value, attributeSchema.type)) {
            issues.push({
                code: "SchemaViolation",
                address: resource.address,
                message: `attribute "${name}" must be of type ${attributeSchema.type}`,
            });
            continue;
        }
        attributes[name] = value;
    }

    for (const [name, attributeSchema] of Object.entries(schema.attributes)) {
        if (Object.hasOwn(attributes, name)) {
            continue;
        }
        if (attributeSchema.required) {
            if (!Object.hasOwn(resource.attributes, name)) {
                issues.push({
                    code: "SchemaViolation",
                    address: resource.address,
                    message: `missing required attribute "${name}"`,
                });
            }
            continue;
        }
        const fallback =
            attributeSchema.default === undefined
                ? undefined
                : toAttributeValue(attributeSchema.default);
        if (fallback !== undefined) {
            attributes[name] = fallback;
        }
    }

    return attributes;
}

function checkReferences(
    resource: DesiredResource,
    schema: ResourceKindSchema,
    references: readonly Reference[],
    kindsByAddress: ReadonlyMap<string, ResourceKindSchema>,
    issues: ParseIssue[],
): void {
    for (const reference of references) {
        const target = kindsByAddress.get(reference.to);
        if (!target) {
            issues.push({
                code: "UnknownReference",
                address: resource.address,
                message: `attribute "${reference.attribute}" references unknown resource ${reference.to}`,
            });
            continue;
        }
        const outputType = target.outputs[reference.output];
        if (!outputType) {
            issues.push({
                code: "SchemaViolation",
                address: resource.address,
                message: `${reference.to} (${target.kind}) has no output "${reference.output}"`,
            });
            continue;
        }
        const attributeType = schema.attributes[reference.attribute]?.type;
        if (attributeType === undefined) {
            continue;
        }
        // Whole-value references must match the attribute; list items must be strings
        let expected: AttributeType | undefined;
        if (isReferenceMarker(resource.attributes[reference.attribute])) {
            expected = attributeType;
        } else if (attributeType === "string_list") {
            expected = "string";
        }
        if (expected !== undefined && outputType !== expected) {
            issues.push({
                code: "SchemaViolation",
                address: resource.address,
                message: `attribute "${reference.attribute}" expects ${expected} but ${reference.to}.${reference.output} is ${outputType}`,
            });
        }
    }

    for (const dependency of resource.depends_on) {
        if (!kindsByAddress.has(dependency)) {
            issues.push({
                code: "UnknownReference",
                address: resource.address,
                message: `depends_on names unknown resource ${dependency}`,
            });
        }
    }
}

export function createDesiredStateParser(
    catalog: ResourceKindCatalog,
): DesiredStateParser {
    return {
        parse(jsonString: string): DesiredStateParseResult {
            const raw = parseJson(jsonString);
            let sanitized: ReturnType<typeof sanitizeJson>;
            try {
                sanitized = sanitizeJson(raw);
            } catch (error) {
                const message =
                    error instanceof Error ? error.message : String(error);
                throw invalidDocument(message);
            }
            const document = validateShape(sanitized.value);

            const issues: ParseIssue[] = [];
            const kindsByAddress = new Map<string, ResourceKindSchema>();
            const accepted: {
                resource: DesiredResource;
                schema: ResourceKindSchema;
            }[] = [];

            for (const resource of document.resources) {
                if (kindsByAddress.has(resource.address)) {
                    issues.push({
                        code: "DuplicateAddress",
                        address: resource.address,
                        message: "address is declared more than once",
                    });
                    continue;
                }
                const schema = catalog.lookup(resource.kind);
                if (!schema) {
                    issues.push({
                        code: "SchemaViolation",
                        address: resource.address,
                        message: `unknown kind "${resource.kind}"`,
                    });
                    continue;
                }
                kindsByAddress.set(resource.address, schema);
                accepted.push({ resource, schema });
            }

            const descriptors: ResourceDescriptor[] = [];
            for (const { resource, schema } of accepted) {
                const attributes = checkAttributes(resource, schema, issues);
                const references = collectAttributeReferences(
                    resource.address,
                    attributes,
                );
                checkReferences(
                    resource,
                    schema,
                    references,
                    kindsByAddress,
                    issues,
                );
                descriptors.push(
                    freezeDescriptor({
                        address: resource.address,
                        kind: schema.kind,
                        attributes,
                        dependsOn: [...new Set(resource.depends_on)],
                        lifecycle: {
                            createBeforeDestroy:
                                resource.lifecycle.create_before_destroy,
                        },
                    }),
                );
            }

            if (issues.length > 0) {
                throw new ParseError(issues);
            }

            return {
                descriptors,
                strippedKeys: sanitized.strippedPaths,
            };
        },
    };
}
