import type {
    AttributeSchema,
    AttributeType,
    ResourceKind,
    ResourceKindSchema,
} from "../entities/resource-kind.js";
import { isResourceKind } from "../entities/resource-kind.js";
import type { ResourceKindCatalog } from "../use-cases/resource-kind-catalog.port.js";

const SECOND = 1000;
const MINUTE = 60 * SECOND;

function attr(
    type: AttributeType,
    options: {
        readonly required?: boolean;
        readonly forceNew?: boolean;
        readonly default?: unknown;
    } = {},
): AttributeSchema {
    return {
        type,
        required: options.required ?? false,
        forceNew: options.forceNew ?? false,
        ...(options.default === undefined ? {} : { default: options.default }),
    };
}

const STATIC_SITE_KINDS: readonly ResourceKindSchema[] = [
    {
        kind: "storage_bucket",
        attributes: {
            bucket: attr("string", { required: true, forceNew: true }),
            index_document: attr("string", { default: "index.html" }),
            error_document: attr("string"),
            block_public_access: attr("boolean", { default: true }),
        },
        outputs: {
            id: "string",
            arn: "string",
            regional_domain_name: "string",
        },
        updatable: true,
        identityAttributes: ["bucket"],
    },
    {
        kind: "bucket_policy",
        attributes: {
            bucket: attr("string", { required: true, forceNew: true }),
            policy: attr("object", { required: true }),
        },
        outputs: { id: "string" },
        updatable: true,
        identityAttributes: ["bucket"],
    },
    {
        kind: "origin_access_control",
        attributes: {
            name: attr("string", { required: true, forceNew: true }),
            description: attr("string", { default: "" }),
        },
        outputs: { id: "string" },
        updatable: true,
        identityAttributes: ["name"],
    },
    {
        kind: "certificate",
        attributes: {
            domain_name: attr("string", { required: true, forceNew: true }),
            subject_alternative_names: attr("string_list", {
                forceNew: true,
                default: [],
            }),
        },
        outputs: {
            arn: "string",
            validation_record_name: "string",
            validation_record_type: "string",
            validation_record_value: "string",
        },
        updatable: false,
        readiness: {
            description: "the DNS validation record to be published",
            onUpdate: false,
            pollIntervalMs: 5 * SECOND,
            timeoutMs: 2 * MINUTE,
        },
    },
    {
        kind: "certificate_validation",
        attributes: {
            certificate_arn: attr("string", { required: true, forceNew: true }),
            validation_record_fqdns: attr("string_list", { default: [] }),
        },
        outputs: { certificate_arn: "string" },
        updatable: true,
        readiness: {
            description: "the certificate to be issued",
            onUpdate: false,
            pollIntervalMs: 15 * SECOND,
            timeoutMs: 45 * MINUTE,
        },
    },
    {
        kind: "dns_record",
        attributes: {
            zone_id: attr("string", { required: true, forceNew: true }),
            name: attr("string", { required: true, forceNew: true }),
            type: attr("string", { required: true, forceNew: true }),
            ttl: attr("number", { default: 300 }),
            values: attr("string_list", { default: [] }),
            alias_target: attr("object"),
        },
        outputs: { fqdn: "string" },
        updatable: true,
        identityAttributes: ["zone_id", "name", "type"],
    },
    {
        kind: "distribution",
        attributes: {
            origin_domain_name: attr("string", { required: true }),
            origin_access_control_id: attr("string"),
            aliases: attr("string_list", { default: [] }),
            certificate_arn: attr("string"),
            default_root_object: attr("string", { default: "index.html" }),
            price_class: attr("string", { default: "PriceClass_100" }),
            // Opaque allow/deny list handed to the CDN as-is
            geo_restriction: attr("object"),
            comment: attr("string", { default: "" }),
            enabled: attr("boolean", { default: true }),
        },
        outputs: {
            id: "string",
            arn: "string",
            domain_name: "string",
            hosted_zone_id: "string",
        },
        updatable: true,
        readiness: {
            description: "the distribution to finish deploying",
            onUpdate: true,
            pollIntervalMs: 30 * SECOND,
            timeoutMs: 40 * MINUTE,
        },
    },
];

export function createResourceKindCatalog(
    kinds: readonly ResourceKindSchema[] = STATIC_SITE_KINDS,
): ResourceKindCatalog {
    const byKind = new Map(kinds.map((schema) => [schema.kind, schema]));

    return {
        lookup(kind: string): ResourceKindSchema | undefined {
            return isResourceKind(kind) ? byKind.get(kind) : undefined;
        },
        require(kind: ResourceKind): ResourceKindSchema {
            const schema = byKind.get(kind);
            if (!schema) {
                throw new Error(`No schema registered for kind "${kind}"`);
            }
            return schema;
        },
    };
}
