import type { ReferenceMarker } from "../entities/resource-descriptor.js";

interface ResourceInput {
    readonly address: string;
    readonly kind: string;
    readonly attributes?: Record<string, unknown>;
    readonly dependsOn?: readonly string[];
    readonly createBeforeDestroy?: boolean;
}

export function ref(address: string, output: string): ReferenceMarker {
    return { ref: address, output };
}

export function buildDocumentJson(resources: readonly ResourceInput[]): string {
    // Desired-state documents use snake_case keys
    return JSON.stringify({
        version: 1,
        resources: resources.map((resource) => ({
            address: resource.address,
            kind: resource.kind,
            attributes: resource.attributes ?? {},
            ...(resource.dependsOn && { depends_on: resource.dependsOn }),
            ...(resource.createBeforeDestroy !== undefined && {
                lifecycle: {
                    create_before_destroy: resource.createBeforeDestroy,
                },
            }),
        })),
    });
}

// A small static site: bucket, certificate with DNS validation, distribution
export function buildStaticSiteDocument(
    options: { readonly domain?: string; readonly bucket?: string } = {},
): string {
    const domain = options.domain ?? "www.example.test";
    const bucket = options.bucket ?? "example-site-bucket";
    return buildDocumentJson([
        {
            address: "storage_bucket.site",
            kind: "storage_bucket",
            attributes: { bucket },
        },
        {
            address: "certificate.site",
            kind: "certificate",
            attributes: { domain_name: domain },
        },
        {
            address: "dns_record.validation",
            kind: "dns_record",
            attributes: {
                zone_id: "ZTESTZONE",
                name: ref("certificate.site", "validation_record_name"),
                type: "CNAME",
                values: [ref("certificate.site", "validation_record_value")],
            },
        },
        {
            address: "certificate_validation.site",
            kind: "certificate_validation",
            attributes: {
                certificate_arn: ref("certificate.site", "arn"),
                validation_record_fqdns: [ref("dns_record.validation", "fqdn")],
            },
        },
        {
            address: "distribution.site",
            kind: "distribution",
            attributes: {
                origin_domain_name: ref(
                    "storage_bucket.site",
                    "regional_domain_name",
                ),
                aliases: [domain],
                certificate_arn: ref(
                    "certificate_validation.site",
                    "certificate_arn",
                ),
            },
        },
    ]);
}
