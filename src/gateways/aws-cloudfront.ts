import {
    type CloudFrontClient,
    CreateDistributionCommand,
    CreateOriginAccessControlCommand,
    DeleteDistributionCommand,
    DeleteOriginAccessControlCommand,
    type DistributionConfig,
    GetDistributionCommand,
    GetDistributionConfigCommand,
    GetOriginAccessControlCommand,
    ListOriginAccessControlsCommand,
    type OriginAccessControlConfig,
    UpdateDistributionCommand,
    UpdateOriginAccessControlCommand,
} from "@aws-sdk/client-cloudfront";
import { z } from "zod";
import type { ResolvedAttributes } from "../entities/state-record.js";
import type { ConditionWaiter } from "../use-cases/await-condition.js";
import {
    isNotFound,
    type KindHandler,
    parseAttributes,
    requireValue,
} from "./aws-kind-handler.js";

// Hosted zone shared by every CloudFront distribution, used for alias records
export const CLOUDFRONT_HOSTED_ZONE_ID = "Z2FDTNDATAQYW2";
// Managed "CachingOptimized" policy
const CACHING_OPTIMIZED_POLICY_ID = "658327ea-f89d-4fab-a63d-7e88639e58f6";
const ORIGIN_ID = "site-origin";

const OriginAccessControlAttributesSchema = z.object({
    name: z.string().min(1),
    description: z.string().default(""),
});

type OriginAccessControlAttributes = z.infer<
    typeof OriginAccessControlAttributesSchema
>;

const GeoRestrictionSchema = z.object({
    restriction_type: z.enum(["none", "whitelist", "blacklist"]),
    locations: z.array(z.string().length(2)).default([]),
});

const DistributionAttributesSchema = z.object({
    origin_domain_name: z.string().min(1),
    origin_access_control_id: z.string().optional(),
    aliases: z.array(z.string()).default([]),
    certificate_arn: z.string().optional(),
    default_root_object: z.string().default("index.html"),
    price_class: z
        .enum(["PriceClass_100", "PriceClass_200", "PriceClass_All"])
        .default("PriceClass_100"),
    geo_restriction: GeoRestrictionSchema.optional(),
    comment: z.string().default(""),
    enabled: z.boolean().default(true),
});

type DistributionAttributes = z.infer<typeof DistributionAttributesSchema>;

export function createOriginAccessControlHandler(
    client: CloudFrontClient,
): KindHandler {
    const parse = (attributes: ResolvedAttributes) =>
        parseAttributes(
            OriginAccessControlAttributesSchema,
            "origin_access_control",
            attributes,
        );

    const configOf = (
        parsed: OriginAccessControlAttributes,
    ): OriginAccessControlConfig => {
        return {
            Name: parsed.name,
            Description: parsed.description,
            SigningProtocol: "sigv4",
            SigningBehavior: "always",
            OriginAccessControlOriginType: "s3",
        };
    };

    const findByName = async (name: string): Promise<string | undefined> => {
        let marker: string | undefined;
        do {
            const response = await client.send(
                new ListOriginAccessControlsCommand({ Marker: marker }),
            );
            const list = response.OriginAccessControlList;
            const match = (list?.Items ?? []).find(
                (summary) => summary.Name === name,
            );
            if (match?.Id) {
                return match.Id;
            }
            marker = list?.IsTruncated ? list.NextMarker : undefined;
        } while (marker);
        return undefined;
    };

    const currentETag = async (id: string): Promise<string | undefined> => {
        try {
            const response = await client.send(
                new GetOriginAccessControlCommand({ Id: id }),
            );
            return response.ETag;
        } catch (error) {
            if (isNotFound(error)) {
                return undefined;
            }
            throw error;
        }
    };

    return {
        async create(attributes, { signal }) {
            const parsed = parse(attributes);
            try {
                const response = await client.send(
                    new CreateOriginAccessControlCommand({
                        OriginAccessControlConfig: configOf(parsed),
                    }),
                    { abortSignal: signal },
                );
                return requireValue(
                    response.OriginAccessControl?.Id,
                    "the origin access control id",
                );
            } catch (error) {
                // Names are unique, so a retried create finds its first attempt
                if (
                    !(error instanceof Error) ||
                    error.name !== "OriginAccessControlAlreadyExists"
                ) {
                    throw error;
                }
                return requireValue(
                    await findByName(parsed.name),
                    `the origin access control named ${parsed.name}`,
                );
            }
        },

        async read(id) {
            const eTag = await currentETag(id);
            return eTag === undefined ? undefined : { id };
        },

        async update(id, attributes, signal) {
            const eTag = requireValue(
                await currentETag(id),
                `origin access control ${id}`,
            );
            await client.send(
                new UpdateOriginAccessControlCommand({
                    Id: id,
                    IfMatch: eTag,
                    OriginAccessControlConfig: configOf(parse(attributes)),
                }),
                { abortSignal: signal },
            );
        },

        async delete(id, signal) {
            const eTag = await currentETag(id);
            if (eTag === undefined) {
                return;
            }
            try {
                await client.send(
                    new DeleteOriginAccessControlCommand({
                        Id: id,
                        IfMatch: eTag,
                    }),
                    { abortSignal: signal },
                );
            } catch (error) {
                if (!isNotFound(error)) {
                    throw error;
                }
            }
        },
    };
}

export function buildDistributionConfig(
    attributes: DistributionAttributes,
    callerReference: string,
): DistributionConfig {
    const methods = { Quantity: 2, Items: ["GET" as const, "HEAD" as const] };
    const geo = attributes.geo_restriction;
    return {
        CallerReference: callerReference,
        Comment: attributes.comment,
        Enabled: attributes.enabled,
        PriceClass: attributes.price_class,
        DefaultRootObject: attributes.default_root_object,
        HttpVersion: "http2",
        Aliases: {
            Quantity: attributes.aliases.length,
            Items: attributes.aliases,
        },
        Origins: {
            Quantity: 1,
            Items: [
                {
                    Id: ORIGIN_ID,
                    DomainName: attributes.origin_domain_name,
                    OriginAccessControlId:
                        attributes.origin_access_control_id ?? "",
                    S3OriginConfig: { OriginAccessIdentity: "" },
                },
            ],
        },
        DefaultCacheBehavior: {
            TargetOriginId: ORIGIN_ID,
            ViewerProtocolPolicy: "redirect-to-https",
            CachePolicyId: CACHING_OPTIMIZED_POLICY_ID,
            Compress: true,
            AllowedMethods: { ...methods, CachedMethods: methods },
        },
        ViewerCertificate: attributes.certificate_arn
            ? {
                  ACMCertificateArn: attributes.certificate_arn,
                  SSLSupportMethod: "sni-only",
                  MinimumProtocolVersion: "TLSv1.2_2021",
              }
            : { CloudFrontDefaultCertificate: true },
        Restrictions: {
            GeoRestriction: geo
                ? {
                      RestrictionType: geo.restriction_type,
                      Quantity: geo.locations.length,
                      Items: geo.locations,
                  }
                : { RestrictionType: "none", Quantity: 0 },
        },
    };
}

export interface DistributionHandlerOptions {
    readonly waiter: ConditionWaiter;
    readonly pollIntervalMs: number;
    readonly disableTimeoutMs: number;
}

export function createDistributionHandler(
    client: CloudFrontClient,
    options: DistributionHandlerOptions,
): KindHandler {
    const parse = (attributes: ResolvedAttributes) =>
        parseAttributes(DistributionAttributesSchema, "distribution", attributes);

    const fetchConfig = async (id: string) => {
        try {
            const response = await client.send(
                new GetDistributionConfigCommand({ Id: id }),
            );
            return {
                eTag: requireValue(response.ETag, `the ETag of ${id}`),
                config: requireValue(
                    response.DistributionConfig,
                    `the configuration of ${id}`,
                ),
            };
        } catch (error) {
            if (isNotFound(error)) {
                return undefined;
            }
            throw error;
        }
    };

    const isDeployed = async (id: string): Promise<boolean> => {
        const response = await client.send(new GetDistributionCommand({ Id: id }));
        return response.Distribution?.Status === "Deployed";
    };

    return {
        async create(attributes, { idempotencyKey, signal }) {
            // A repeated caller reference with the same configuration
            // returns the distribution the first request created
            const response = await client.send(
                new CreateDistributionCommand({
                    DistributionConfig: buildDistributionConfig(
                        parse(attributes),
                        idempotencyKey,
                    ),
                }),
                { abortSignal: signal },
            );
            return requireValue(response.Distribution?.Id, "the distribution id");
        },

        async read(id) {
            try {
                const response = await client.send(
                    new GetDistributionCommand({ Id: id }),
                );
                const distribution = response.Distribution;
                if (!distribution) {
                    return undefined;
                }
                return {
                    id,
                    arn: distribution.ARN,
                    domain_name: distribution.DomainName,
                    hosted_zone_id: CLOUDFRONT_HOSTED_ZONE_ID,
                };
            } catch (error) {
                if (isNotFound(error)) {
                    return undefined;
                }
                throw error;
            }
        },

        async update(id, attributes, signal) {
            const current = requireValue(
                await fetchConfig(id),
                `distribution ${id}`,
            );
            await client.send(
                new UpdateDistributionCommand({
                    Id: id,
                    IfMatch: current.eTag,
                    DistributionConfig: buildDistributionConfig(
                        parse(attributes),
                        requireValue(
                            current.config.CallerReference,
                            `the caller reference of ${id}`,
                        ),
                    ),
                }),
                { abortSignal: signal },
            );
        },

        checkCondition: isDeployed,

        async delete(id, signal) {
            let current = await fetchConfig(id);
            if (!current) {
                return;
            }
            // CloudFront only deletes disabled, deployed distributions
            if (current.config.Enabled) {
                await client.send(
                    new UpdateDistributionCommand({
                        Id: id,
                        IfMatch: current.eTag,
                        DistributionConfig: { ...current.config, Enabled: false },
                    }),
                    { abortSignal: signal },
                );
            }
            await options.waiter.await(() => isDeployed(id), {
                description: `distribution ${id} to finish disabling`,
                pollIntervalMs: options.pollIntervalMs,
                timeoutMs: options.disableTimeoutMs,
                signal,
            });
            current = await fetchConfig(id);
            if (!current) {
                return;
            }
            try {
                await client.send(
                    new DeleteDistributionCommand({
                        Id: id,
                        IfMatch: current.eTag,
                    }),
                    { abortSignal: signal },
                );
            } catch (error) {
                if (!isNotFound(error)) {
                    throw error;
                }
            }
        },
    };
}
