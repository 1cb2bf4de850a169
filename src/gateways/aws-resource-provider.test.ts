import { beforeEach, describe, expect, it, vi } from "vitest";
import { ApplyCancelledError, ProviderError } from "../entities/errors.js";
import { createFakeClock } from "../lib/fake-clock.js";
import { createConditionWaiter } from "../use-cases/await-condition.js";
import { createAwsResourceProvider } from "./aws-resource-provider.js";

interface SentCommand {
    readonly _type: string;
    readonly input: Record<string, unknown>;
}

const { mockSend, client, command } = vi.hoisted(() => {
    const send = vi.fn<(command: SentCommand) => Promise<unknown>>();
    return {
        mockSend: send,
        client: () =>
            vi.fn(function () {
                return { send };
            }),
        command: (type: string) =>
            vi.fn(function (input: Record<string, unknown>) {
                return { input, _type: type };
            }),
    };
});

vi.mock("@aws-sdk/client-s3", () => ({
    S3Client: client(),
    HeadBucketCommand: command("HeadBucketCommand"),
    CreateBucketCommand: command("CreateBucketCommand"),
}));

vi.mock("@aws-sdk/client-cloudfront", () => ({
    CloudFrontClient: client(),
    GetDistributionCommand: command("GetDistributionCommand"),
}));

vi.mock("@aws-sdk/client-acm", () => ({
    ACMClient: client(),
}));

vi.mock("@aws-sdk/client-route-53", () => ({
    Route53Client: client(),
}));

const CREATE = { idempotencyKey: "0123456789abcdef0123456789abcdef" };

function provider() {
    const clock = createFakeClock();
    const logger = { info: vi.fn(), warn: vi.fn(), debug: vi.fn() };
    return createAwsResourceProvider({
        region: "us-east-1",
        waiter: createConditionWaiter({ clock, logger }),
    });
}

function awsError(name: string, status: number): Error {
    return Object.assign(new Error(`${name} raised`), {
        name,
        $metadata: { httpStatusCode: status },
    });
}

describe("AwsResourceProvider", () => {
    beforeEach(() => {
        mockSend.mockReset();
    });

    it("should route each kind to its handler", async () => {
        // Arrange
        mockSend.mockResolvedValue({
            Distribution: { Status: "Deployed" },
        });

        // Act
        const ready = await provider().checkCondition(
            "distribution",
            "E2TEST",
        );

        // Assert
        expect(ready).toBe(true);
        expect(mockSend.mock.calls[0]?.[0]._type).toBe(
            "GetDistributionCommand",
        );
    });

    it("should treat kinds without a readiness check as ready", async () => {
        // Act
        const ready = await provider().checkCondition(
            "storage_bucket",
            "example-site-bucket",
        );

        // Assert
        expect(ready).toBe(true);
        expect(mockSend).not.toHaveBeenCalled();
    });

    it("should wrap throttling as a transient ProviderError", async () => {
        // Arrange
        mockSend.mockRejectedValue(awsError("SlowDown", 503));

        // Act
        const error = await provider()
            .create("storage_bucket", { bucket: "example-site-bucket" }, CREATE)
            .catch((caught: unknown) => caught);

        // Assert
        expect(error).toBeInstanceOf(ProviderError);
        expect(error).toMatchObject({
            message: "create storage_bucket failed: SlowDown raised",
            transient: true,
            providerCode: "SlowDown",
            statusCode: 503,
        });
    });

    it("should wrap access errors as permanent", async () => {
        // Arrange
        mockSend.mockRejectedValue(awsError("AccessDenied", 403));

        // Act
        const error = await provider()
            .create("storage_bucket", { bucket: "example-site-bucket" }, CREATE)
            .catch((caught: unknown) => caught);

        // Assert
        expect(error).toMatchObject({ transient: false, statusCode: 403 });
    });

    it("should pass cancellation through unchanged", async () => {
        // Arrange
        const cancelled = new ApplyCancelledError();
        mockSend.mockRejectedValue(cancelled);

        // Act
        const attempt = provider().create(
            "storage_bucket",
            { bucket: "example-site-bucket" },
            CREATE,
        );

        // Assert
        await expect(attempt).rejects.toBe(cancelled);
    });

    it("should report a missing object as undefined", async () => {
        // Arrange
        mockSend.mockRejectedValue(awsError("NotFound", 404));

        // Act & Assert
        expect(
            await provider().read("storage_bucket", "gone-bucket"),
        ).toBeUndefined();
    });
});
