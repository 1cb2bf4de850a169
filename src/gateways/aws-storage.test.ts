import { S3Client } from "@aws-sdk/client-s3";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ProviderError } from "../entities/errors.js";
import { createFakeClock } from "../lib/fake-clock.js";
import { createRetryRunner } from "../use-cases/retry-with-backoff.js";
import {
    createBucketPolicyHandler,
    createStorageBucketHandler,
} from "./aws-storage.js";

interface SentCommand {
    readonly _type: string;
    readonly input: Record<string, unknown>;
}

const { mockSend, command } = vi.hoisted(() => ({
    mockSend: vi.fn<(command: SentCommand) => Promise<unknown>>(),
    command: (type: string) =>
        vi.fn(function (input: Record<string, unknown>) {
            return { input, _type: type };
        }),
}));

vi.mock("@aws-sdk/client-s3", () => ({
    S3Client: vi.fn(function () {
        return { send: mockSend };
    }),
    BucketLocationConstraint: {
        "eu-west-1": "eu-west-1",
        "us-west-2": "us-west-2",
    },
    CreateBucketCommand: command("CreateBucketCommand"),
    DeleteBucketCommand: command("DeleteBucketCommand"),
    DeleteBucketPolicyCommand: command("DeleteBucketPolicyCommand"),
    DeleteObjectsCommand: command("DeleteObjectsCommand"),
    GetBucketPolicyCommand: command("GetBucketPolicyCommand"),
    HeadBucketCommand: command("HeadBucketCommand"),
    ListObjectsV2Command: command("ListObjectsV2Command"),
    PutBucketPolicyCommand: command("PutBucketPolicyCommand"),
    PutBucketWebsiteCommand: command("PutBucketWebsiteCommand"),
    PutPublicAccessBlockCommand: command("PutPublicAccessBlockCommand"),
}));

const CREATE = { idempotencyKey: "0123456789abcdef0123456789abcdef" };

function notFound(name: string): Error {
    const error = new Error(`${name} raised`);
    error.name = name;
    return error;
}

function sentTypes(): string[] {
    return mockSend.mock.calls.map(([sent]) => sent._type);
}

function sentInput(type: string): Record<string, unknown> | undefined {
    return mockSend.mock.calls.find(([sent]) => sent._type === type)?.[0]
        .input;
}

function bucketHandler(region: string) {
    return createStorageBucketHandler(new S3Client({}), region);
}

describe("StorageBucketHandler", () => {
    beforeEach(() => {
        mockSend.mockReset();
        mockSend.mockResolvedValue({});
    });

    describe("create", () => {
        it("should create the bucket with a location outside us-east-1 and configure it", async () => {
            // Arrange
            const handler = bucketHandler("eu-west-1");

            // Act
            const id = await handler.create({ bucket: "example-site-bucket" }, CREATE);

            // Assert
            expect(id).toBe("example-site-bucket");
            expect(sentTypes()).toEqual([
                "CreateBucketCommand",
                "PutPublicAccessBlockCommand",
                "PutBucketWebsiteCommand",
            ]);
            expect(sentInput("CreateBucketCommand")).toEqual({
                Bucket: "example-site-bucket",
                CreateBucketConfiguration: { LocationConstraint: "eu-west-1" },
            });
            expect(sentInput("PutBucketWebsiteCommand")).toEqual({
                Bucket: "example-site-bucket",
                WebsiteConfiguration: {
                    IndexDocument: { Suffix: "index.html" },
                },
            });
        });

        it("should omit the location in us-east-1", async () => {
            // Arrange
            const handler = bucketHandler("us-east-1");

            // Act
            await handler.create(
                {
                    bucket: "example-site-bucket",
                    error_document: "404.html",
                    block_public_access: false,
                },
                CREATE,
            );

            // Assert
            expect(sentInput("CreateBucketCommand")).toEqual({
                Bucket: "example-site-bucket",
            });
            expect(sentInput("PutPublicAccessBlockCommand")).toEqual({
                Bucket: "example-site-bucket",
                PublicAccessBlockConfiguration: {
                    BlockPublicAcls: false,
                    IgnorePublicAcls: false,
                    BlockPublicPolicy: false,
                    RestrictPublicBuckets: false,
                },
            });
            expect(sentInput("PutBucketWebsiteCommand")).toEqual({
                Bucket: "example-site-bucket",
                WebsiteConfiguration: {
                    IndexDocument: { Suffix: "index.html" },
                    ErrorDocument: { Key: "404.html" },
                },
            });
        });

        it("should finish configuring when a retry finds the bucket it already created", async () => {
            // Arrange
            const throttled = new Error("Please reduce your request rate");
            throttled.name = "SlowDown";
            const owned = new Error("Your previous request already created it");
            owned.name = "BucketAlreadyOwnedByYou";
            mockSend
                .mockResolvedValueOnce({})
                .mockRejectedValueOnce(throttled)
                .mockRejectedValueOnce(owned);
            const handler = bucketHandler("eu-west-1");
            const retry = createRetryRunner(createFakeClock(), {
                maxAttempts: 3,
                baseDelayMs: 10,
                maxDelayMs: 100,
                jitter: 0,
            });

            // Act
            const id = await retry.run(
                () => handler.create({ bucket: "example-site-bucket" }, CREATE),
                { label: "create storage_bucket.site" },
            );

            // Assert
            expect(id).toBe("example-site-bucket");
            expect(sentTypes()).toEqual([
                "CreateBucketCommand",
                "PutPublicAccessBlockCommand",
                "CreateBucketCommand",
                "PutPublicAccessBlockCommand",
                "PutBucketWebsiteCommand",
            ]);
        });

        it("should reject invalid attributes without calling AWS", async () => {
            // Arrange
            const handler = bucketHandler("us-east-1");

            // Act
            const attempt = handler.create({ index_document: "index.html" }, CREATE);

            // Assert
            await expect(attempt).rejects.toThrow(
                "Resolved attributes for storage_bucket are invalid: bucket: Required",
            );
            await expect(attempt).rejects.toBeInstanceOf(ProviderError);
            expect(mockSend).not.toHaveBeenCalled();
        });
    });

    describe("read", () => {
        it("should describe an existing bucket", async () => {
            // Arrange
            const handler = bucketHandler("eu-west-1");

            // Act
            const outputs = await handler.read("example-site-bucket");

            // Assert
            expect(outputs).toEqual({
                id: "example-site-bucket",
                arn: "arn:aws:s3:::example-site-bucket",
                regional_domain_name:
                    "example-site-bucket.s3.eu-west-1.amazonaws.com",
            });
        });

        it("should return undefined for a missing bucket", async () => {
            // Arrange
            mockSend.mockRejectedValue(notFound("NotFound"));
            const handler = bucketHandler("eu-west-1");

            // Act & Assert
            expect(await handler.read("gone-bucket")).toBeUndefined();
        });
    });

    describe("delete", () => {
        it("should empty the bucket before deleting it", async () => {
            // Arrange
            mockSend.mockImplementation(async (sent) =>
                sent._type === "ListObjectsV2Command"
                    ? {
                          Contents: [{ Key: "index.html" }, { Key: "app.js" }],
                          IsTruncated: false,
                      }
                    : {},
            );
            const handler = bucketHandler("eu-west-1");

            // Act
            await handler.delete("example-site-bucket");

            // Assert
            expect(sentTypes()).toEqual([
                "ListObjectsV2Command",
                "DeleteObjectsCommand",
                "DeleteBucketCommand",
            ]);
            expect(sentInput("DeleteObjectsCommand")).toEqual({
                Bucket: "example-site-bucket",
                Delete: {
                    Objects: [{ Key: "index.html" }, { Key: "app.js" }],
                    Quiet: true,
                },
            });
        });

        it("should treat a missing bucket as deleted", async () => {
            // Arrange
            mockSend.mockRejectedValue(notFound("NoSuchBucket"));
            const handler = bucketHandler("eu-west-1");

            // Act & Assert
            await expect(handler.delete("gone-bucket")).resolves.toBeUndefined();
        });
    });
});

describe("BucketPolicyHandler", () => {
    beforeEach(() => {
        mockSend.mockReset();
        mockSend.mockResolvedValue({});
    });

    it("should put the policy as a JSON string", async () => {
        // Arrange
        const handler = createBucketPolicyHandler(new S3Client({}));
        const policy = { Version: "2012-10-17", Statement: [] };

        // Act
        const id = await handler.create(
            {
                bucket: "example-site-bucket",
                policy,
            },
            CREATE,
        );

        // Assert
        expect(id).toBe("example-site-bucket");
        expect(sentInput("PutBucketPolicyCommand")).toEqual({
            Bucket: "example-site-bucket",
            Policy: JSON.stringify(policy),
        });
    });

    it("should report a bucket without a policy as missing", async () => {
        // Arrange
        mockSend.mockRejectedValue(notFound("NoSuchBucketPolicy"));
        const handler = createBucketPolicyHandler(new S3Client({}));

        // Act & Assert
        expect(await handler.read("example-site-bucket")).toBeUndefined();
    });
});
