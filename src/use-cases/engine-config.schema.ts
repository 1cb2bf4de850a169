import { z } from "zod";

const AWS_REGION_REGEX = /^[a-z]{2}(-[a-z]+)+-\d+$/;
const ADDRESS_REGEX = /^[A-Za-z][A-Za-z0-9_-]*\.[A-Za-z0-9_-]+$/;

const RetrySettingsSchema = z.object({
    maxAttempts: z.number().int().min(1).max(20).default(5),
    baseDelayMs: z.number().int().min(0).default(500),
    maxDelayMs: z.number().int().min(0).default(20_000),
    jitter: z.number().min(0).max(1).default(0.2),
});

const ContentSettingsSchema = z.object({
    root: z.string().min(1, "content.root is required"),
    bucketAddress: z
        .string()
        .regex(ADDRESS_REGEX, "content.bucket_address must be a resource address"),
    distributionAddress: z
        .string()
        .regex(
            ADDRESS_REGEX,
            "content.distribution_address must be a resource address",
        )
        .nullable()
        .default(null),
    deleteExtraneous: z.boolean().default(true),
});

export const EngineConfigSchema = z.object({
    statePath: z.string().min(1).default(".sitewright/state.json"),
    region: z
        .string()
        .regex(
            AWS_REGION_REGEX,
            "region must be a valid AWS region identifier (e.g. us-east-1)",
        )
        .default("us-east-1"),
    concurrency: z.number().int().min(1).max(32).default(4),
    retry: RetrySettingsSchema.default({}),
    content: ContentSettingsSchema.nullable().default(null),
});
