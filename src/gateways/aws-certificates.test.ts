import { ACMClient } from "@aws-sdk/client-acm";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ProviderError } from "../entities/errors.js";
import { createFakeClock } from "../lib/fake-clock.js";
import { createRetryRunner } from "../use-cases/retry-with-backoff.js";
import {
    createCertificateHandler,
    createCertificateValidationHandler,
} from "./aws-certificates.js";

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

vi.mock("@aws-sdk/client-acm", () => ({
    ACMClient: vi.fn(function () {
        return { send: mockSend };
    }),
    DeleteCertificateCommand: command("DeleteCertificateCommand"),
    DescribeCertificateCommand: command("DescribeCertificateCommand"),
    RequestCertificateCommand: command("RequestCertificateCommand"),
}));

const CREATE = { idempotencyKey: "0123456789abcdef0123456789abcdef" };

const ARN = "arn:aws:acm:us-east-1:000000000000:certificate/test";

function describedAs(status: string, withRecord = true) {
    return {
        Certificate: {
            CertificateArn: ARN,
            Status: status,
            DomainValidationOptions: withRecord
                ? [
                      {
                          DomainName: "www.example.test",
                          ResourceRecord: {
                              Name: "_abc.www.example.test.",
                              Type: "CNAME",
                              Value: "_xyz.acm-validations.aws.",
                          },
                      },
                  ]
                : [],
        },
    };
}

describe("CertificateHandler", () => {
    const handler = () => createCertificateHandler(new ACMClient({}));

    beforeEach(() => {
        mockSend.mockReset();
    });

    it("should request a DNS-validated certificate", async () => {
        // Arrange
        mockSend.mockResolvedValue({ CertificateArn: ARN });

        // Act
        const id = await handler().create(
            {
                domain_name: "www.example.test",
                subject_alternative_names: ["example.test"],
            },
            CREATE,
        );

        // Assert
        expect(id).toBe(ARN);
        expect(mockSend.mock.calls[0]?.[0].input).toEqual({
            DomainName: "www.example.test",
            ValidationMethod: "DNS",
            IdempotencyToken: CREATE.idempotencyKey,
            SubjectAlternativeNames: ["example.test"],
        });
    });

    it("should send the same idempotency token when a lost request is retried", async () => {
        // Arrange
        mockSend
            .mockRejectedValueOnce(
                Object.assign(new Error("socket hang up"), {
                    code: "ECONNRESET",
                }),
            )
            .mockResolvedValueOnce({ CertificateArn: ARN });
        const certificates = handler();
        const retry = createRetryRunner(createFakeClock(), {
            maxAttempts: 3,
            baseDelayMs: 10,
            maxDelayMs: 100,
            jitter: 0,
        });

        // Act
        const id = await retry.run(
            () =>
                certificates.create({ domain_name: "www.example.test" }, CREATE),
            { label: "create certificate.site" },
        );

        // Assert
        expect(id).toBe(ARN);
        expect(
            mockSend.mock.calls.map(([sent]) => sent.input["IdempotencyToken"]),
        ).toEqual([CREATE.idempotencyKey, CREATE.idempotencyKey]);
    });

    it("should expose the validation record once ACM publishes it", async () => {
        // Arrange
        mockSend.mockResolvedValue(describedAs("PENDING_VALIDATION"));

        // Act
        const outputs = await handler().read(ARN);

        // Assert
        expect(outputs).toEqual({
            arn: ARN,
            validation_record_name: "_abc.www.example.test.",
            validation_record_type: "CNAME",
            validation_record_value: "_xyz.acm-validations.aws.",
        });
    });

    it("should not be ready until the validation record exists", async () => {
        // Arrange
        mockSend
            .mockResolvedValueOnce(describedAs("PENDING_VALIDATION", false))
            .mockResolvedValueOnce(describedAs("PENDING_VALIDATION"));

        // Act
        const first = await handler().checkCondition?.(ARN);
        const second = await handler().checkCondition?.(ARN);

        // Assert
        expect([first, second]).toEqual([false, true]);
    });

    it("should refuse in-place updates", async () => {
        await expect(handler().update(ARN, {})).rejects.toBeInstanceOf(
            ProviderError,
        );
    });
});

describe("CertificateValidationHandler", () => {
    const handler = () => createCertificateValidationHandler(new ACMClient({}));

    beforeEach(() => {
        mockSend.mockReset();
    });

    it("should adopt the certificate ARN as its id", async () => {
        // Arrange
        mockSend.mockResolvedValue(describedAs("PENDING_VALIDATION"));

        // Act
        const id = await handler().create({ certificate_arn: ARN }, CREATE);

        // Assert
        expect(id).toBe(ARN);
    });

    it("should be ready once the certificate is issued", async () => {
        // Arrange
        mockSend
            .mockResolvedValueOnce(describedAs("PENDING_VALIDATION"))
            .mockResolvedValueOnce(describedAs("ISSUED"));

        // Act
        const pending = await handler().checkCondition?.(ARN);
        const issued = await handler().checkCondition?.(ARN);

        // Assert
        expect([pending, issued]).toEqual([false, true]);
    });

    it("should fail permanently when validation timed out", async () => {
        // Arrange
        mockSend.mockResolvedValue(describedAs("VALIDATION_TIMED_OUT"));

        // Act
        const error = await handler()
            .checkCondition?.(ARN)
            .catch((caught: unknown) => caught);

        // Assert
        expect(error).toBeInstanceOf(ProviderError);
        expect(error).toMatchObject({
            transient: false,
            providerCode: "VALIDATION_TIMED_OUT",
        });
    });
});
