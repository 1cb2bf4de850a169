import {
    BucketLocationConstraint,
    CreateBucketCommand,
    DeleteBucketCommand,
    DeleteBucketPolicyCommand,
    DeleteObjectsCommand,
    GetBucketPolicyCommand,
    HeadBucketCommand,
    ListObjectsV2Command,
    PutBucketPolicyCommand,
    PutBucketWebsiteCommand,
    PutPublicAccessBlockCommand,
    type S3Client,
} from "@aws-sdk/client-s3";
import { z } from "zod";
import { ProviderError } from "../entities/errors.js";
import type { ResolvedAttributes } from "../entities/state-record.js";
import { isNotFound, type KindHandler, parseAttributes } from "./aws-kind-handler.js";

const StorageBucketAttributesSchema = z.object({
    bucket: z.string().min(3),
    index_document: z.string().default("index.html"),
    error_document: z.string().optional(),
    block_public_access: z.boolean().default(true),
});

const BucketPolicyAttributesSchema = z.object({
    bucket: z.string().min(3),
    policy: z.record(z.unknown()),
});

type StorageBucketAttributes = z.infer<typeof StorageBucketAttributesSchema>;

function locationConstraintOf(region: string): BucketLocationConstraint {
    const constraint = Object.values(BucketLocationConstraint).find(
        (value) => value === region,
    );
    if (!constraint) {
        throw new ProviderError(`S3 does not accept buckets in ${region}`, {
            transient: false,
        });
    }
    return constraint;
}

function isOwnedAlready(error: unknown): boolean {
    return error instanceof Error && error.name === "BucketAlreadyOwnedByYou";
}

export function createStorageBucketHandler(
    client: S3Client,
    region: string,
): KindHandler {
    const parse = (attributes: ResolvedAttributes) =>
        parseAttributes(
            StorageBucketAttributesSchema,
            "storage_bucket",
            attributes,
        );

    const configure = async (
        attributes: StorageBucketAttributes,
        signal: AbortSignal | undefined,
    ): Promise<void> => {
        await client.send(
            new PutPublicAccessBlockCommand({
                Bucket: attributes.bucket,
                PublicAccessBlockConfiguration: {
                    BlockPublicAcls: attributes.block_public_access,
                    IgnorePublicAcls: attributes.block_public_access,
                    BlockPublicPolicy: attributes.block_public_access,
                    RestrictPublicBuckets: attributes.block_public_access,
                },
            }),
            { abortSignal: signal },
        );
        await client.send(
            new PutBucketWebsiteCommand({
                Bucket: attributes.bucket,
                WebsiteConfiguration: {
                    IndexDocument: { Suffix: attributes.index_document },
                    ...(attributes.error_document
                        ? { ErrorDocument: { Key: attributes.error_document } }
                        : {}),
                },
            }),
            { abortSignal: signal },
        );
    };

    const emptyBucket = async (
        bucket: string,
        signal: AbortSignal | undefined,
    ): Promise<void> => {
        let continuationToken: string | undefined;
        do {
            const listing = await client.send(
                new ListObjectsV2Command({
                    Bucket: bucket,
                    ContinuationToken: continuationToken,
                }),
                { abortSignal: signal },
            );
            const keys = (listing.Contents ?? []).flatMap((object) =>
                object.Key ? [{ Key: object.Key }] : [],
            );
            if (keys.length > 0) {
                await client.send(
                    new DeleteObjectsCommand({
                        Bucket: bucket,
                        Delete: { Objects: keys, Quiet: true },
                    }),
                    { abortSignal: signal },
                );
            }
            continuationToken = listing.IsTruncated
                ? listing.NextContinuationToken
                : undefined;
        } while (continuationToken);
    };

    return {
        async create(attributes, { signal }) {
            const parsed = parse(attributes);
            try {
                await client.send(
                    new CreateBucketCommand({
                        Bucket: parsed.bucket,
                        ...(region !== "us-east-1" && {
                            CreateBucketConfiguration: {
                                LocationConstraint: locationConstraintOf(region),
                            },
                        }),
                    }),
                    { abortSignal: signal },
                );
            } catch (error) {
                // A retried create finds the bucket its first attempt made
                if (!isOwnedAlready(error)) {
                    throw error;
                }
            }
            await configure(parsed, signal);
            return parsed.bucket;
        },

        async read(id) {
            try {
                await client.send(new HeadBucketCommand({ Bucket: id }));
            } catch (error) {
                if (isNotFound(error)) {
                    return undefined;
                }
                throw error;
            }
            return {
                id,
                arn: `arn:aws:s3:::${id}`,
                regional_domain_name: `${id}.s3.${region}.amazonaws.com`,
            };
        },

        async update(_id, attributes, signal) {
            await configure(parse(attributes), signal);
        },

        async delete(id, signal) {
            try {
                await emptyBucket(id, signal);
                await client.send(new DeleteBucketCommand({ Bucket: id }), {
                    abortSignal: signal,
                });
            } catch (error) {
                if (!isNotFound(error)) {
                    throw error;
                }
            }
        },
    };
}

export function createBucketPolicyHandler(client: S3Client): KindHandler {
    const put = async (
        attributes: ResolvedAttributes,
        signal: AbortSignal | undefined,
    ): Promise<string> => {
        const parsed = parseAttributes(
            BucketPolicyAttributesSchema,
            "bucket_policy",
            attributes,
        );
        await client.send(
            new PutBucketPolicyCommand({
                Bucket: parsed.bucket,
                Policy: JSON.stringify(parsed.policy),
            }),
            { abortSignal: signal },
        );
        return parsed.bucket;
    };

    return {
        create: (attributes, { signal }) => put(attributes, signal),

        async read(id) {
            try {
                const response = await client.send(
                    new GetBucketPolicyCommand({ Bucket: id }),
                );
                return response.Policy === undefined ? undefined : { id };
            } catch (error) {
                if (isNotFound(error)) {
                    return undefined;
                }
                throw error;
            }
        },

        async update(_id, attributes, signal) {
            await put(attributes, signal);
        },

        async delete(id, signal) {
            try {
                await client.send(new DeleteBucketPolicyCommand({ Bucket: id }), {
                    abortSignal: signal,
                });
            } catch (error) {
                if (!isNotFound(error)) {
                    throw error;
                }
            }
        },
    };
}
