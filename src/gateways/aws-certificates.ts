import {
    type ACMClient,
    type CertificateDetail,
    DeleteCertificateCommand,
    DescribeCertificateCommand,
    RequestCertificateCommand,
} from "@aws-sdk/client-acm";
import { z } from "zod";
import { ProviderError } from "../entities/errors.js";
import {
    isNotFound,
    type KindHandler,
    parseAttributes,
    requireValue,
} from "./aws-kind-handler.js";

const CertificateAttributesSchema = z.object({
    domain_name: z.string().min(1),
    subject_alternative_names: z.array(z.string()).default([]),
});

const CertificateValidationAttributesSchema = z.object({
    certificate_arn: z.string().min(1),
    validation_record_fqdns: z.array(z.string()).default([]),
});

const FAILED_STATUSES = new Set([
    "FAILED",
    "VALIDATION_TIMED_OUT",
    "REVOKED",
    "EXPIRED",
]);

async function describe(
    client: ACMClient,
    arn: string,
): Promise<CertificateDetail | undefined> {
    try {
        const response = await client.send(
            new DescribeCertificateCommand({ CertificateArn: arn }),
        );
        return response.Certificate;
    } catch (error) {
        if (isNotFound(error)) {
            return undefined;
        }
        throw error;
    }
}

function validationRecordOf(certificate: CertificateDetail) {
    return certificate.DomainValidationOptions?.[0]?.ResourceRecord;
}

export function createCertificateHandler(client: ACMClient): KindHandler {
    return {
        async create(attributes, { idempotencyKey, signal }) {
            const parsed = parseAttributes(
                CertificateAttributesSchema,
                "certificate",
                attributes,
            );
            // ACM answers a repeated token within an hour with the same ARN
            const response = await client.send(
                new RequestCertificateCommand({
                    DomainName: parsed.domain_name,
                    ValidationMethod: "DNS",
                    IdempotencyToken: idempotencyKey,
                    ...(parsed.subject_alternative_names.length > 0 && {
                        SubjectAlternativeNames:
                            parsed.subject_alternative_names,
                    }),
                }),
                { abortSignal: signal },
            );
            return requireValue(response.CertificateArn, "the certificate ARN");
        },

        async read(id) {
            const certificate = await describe(client, id);
            if (!certificate) {
                return undefined;
            }
            const record = validationRecordOf(certificate);
            return {
                arn: certificate.CertificateArn ?? id,
                validation_record_name: record?.Name,
                validation_record_type: record?.Type,
                validation_record_value: record?.Value,
            };
        },

        async update() {
            throw new ProviderError(
                "Certificates cannot be changed in place",
                { transient: false },
            );
        },

        async delete(id, signal) {
            try {
                await client.send(
                    new DeleteCertificateCommand({ CertificateArn: id }),
                    { abortSignal: signal },
                );
            } catch (error) {
                if (!isNotFound(error)) {
                    throw error;
                }
            }
        },

        // ACM fills in the DNS challenge a few seconds after the request
        async checkCondition(id) {
            const certificate = await describe(client, id);
            return (
                certificate !== undefined &&
                validationRecordOf(certificate) !== undefined
            );
        },
    };
}

export function createCertificateValidationHandler(
    client: ACMClient,
): KindHandler {
    const requireCertificate = async (arn: string) =>
        requireValue(await describe(client, arn), `certificate ${arn}`);

    return {
        async create(attributes) {
            const parsed = parseAttributes(
                CertificateValidationAttributesSchema,
                "certificate_validation",
                attributes,
            );
            await requireCertificate(parsed.certificate_arn);
            return parsed.certificate_arn;
        },

        async read(id) {
            const certificate = await describe(client, id);
            return certificate ? { certificate_arn: id } : undefined;
        },

        // Validation has no object of its own; waiting happens in checkCondition
        async update() {},

        async delete() {},

        async checkCondition(id) {
            const certificate = await requireCertificate(id);
            const status = certificate.Status ?? "PENDING_VALIDATION";
            if (FAILED_STATUSES.has(status)) {
                throw new ProviderError(
                    `Certificate ${id} will not be issued (status ${status})`,
                    { transient: false, providerCode: status },
                );
            }
            return status === "ISSUED";
        },
    };
}
