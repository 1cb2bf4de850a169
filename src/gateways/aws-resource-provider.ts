import { ACMClient } from "@aws-sdk/client-acm";
import { CloudFrontClient } from "@aws-sdk/client-cloudfront";
import { Route53Client } from "@aws-sdk/client-route-53";
import { S3Client } from "@aws-sdk/client-s3";
import type { ResourceKind } from "../entities/resource-kind.js";
import type { ResolvedAttributes } from "../entities/state-record.js";
import type { ConditionWaiter } from "../use-cases/await-condition.js";
import type {
    CreateRequest,
    ResourceProvider,
} from "../use-cases/resource-provider.port.js";
import {
    createCertificateHandler,
    createCertificateValidationHandler,
} from "./aws-certificates.js";
import {
    createDistributionHandler,
    createOriginAccessControlHandler,
} from "./aws-cloudfront.js";
import { createDnsRecordHandler } from "./aws-dns.js";
import { type KindHandler, toProviderError } from "./aws-kind-handler.js";
import {
    createBucketPolicyHandler,
    createStorageBucketHandler,
} from "./aws-storage.js";

// CloudFront, its certificates and Route 53 are global and live in us-east-1
const GLOBAL_REGION = "us-east-1";

export interface AwsResourceProviderOptions {
    readonly region: string;
    readonly waiter: ConditionWaiter;
    readonly distributionPollIntervalMs?: number | undefined;
    readonly distributionDisableTimeoutMs?: number | undefined;
}

export function createAwsResourceProvider(
    options: AwsResourceProviderOptions,
): ResourceProvider {
    const s3 = new S3Client({ region: options.region });
    const cloudFront = new CloudFrontClient({ region: GLOBAL_REGION });
    const acm = new ACMClient({ region: GLOBAL_REGION });
    const route53 = new Route53Client({ region: GLOBAL_REGION });

    const handlers: Record<ResourceKind, KindHandler> = {
        storage_bucket: createStorageBucketHandler(s3, options.region),
        bucket_policy: createBucketPolicyHandler(s3),
        origin_access_control: createOriginAccessControlHandler(cloudFront),
        certificate: createCertificateHandler(acm),
        certificate_validation: createCertificateValidationHandler(acm),
        dns_record: createDnsRecordHandler(route53),
        distribution: createDistributionHandler(cloudFront, {
            waiter: options.waiter,
            pollIntervalMs: options.distributionPollIntervalMs ?? 30_000,
            disableTimeoutMs:
                options.distributionDisableTimeoutMs ?? 40 * 60_000,
        }),
    };

    const call = async <T>(
        kind: ResourceKind,
        operation: string,
        work: (handler: KindHandler) => Promise<T>,
    ): Promise<T> => {
        try {
            return await work(handlers[kind]);
        } catch (error) {
            throw toProviderError(`${operation} ${kind}`, error);
        }
    };

    return {
        create(
            kind: ResourceKind,
            attributes: ResolvedAttributes,
            request: CreateRequest,
        ) {
            return call(kind, "create", (handler) =>
                handler.create(attributes, request),
            );
        },
        read(kind: ResourceKind, providerAssignedId: string) {
            return call(kind, "read", (handler) =>
                handler.read(providerAssignedId),
            );
        },
        update(
            kind: ResourceKind,
            providerAssignedId: string,
            attributes: ResolvedAttributes,
            signal?: AbortSignal,
        ) {
            return call(kind, "update", (handler) =>
                handler.update(providerAssignedId, attributes, signal),
            );
        },
        delete(kind: ResourceKind, providerAssignedId: string, signal?: AbortSignal) {
            return call(kind, "delete", (handler) =>
                handler.delete(providerAssignedId, signal),
            );
        },
        checkCondition(kind: ResourceKind, providerAssignedId: string) {
            return call(kind, "check readiness of", async (handler) =>
                handler.checkCondition
                    ? handler.checkCondition(providerAssignedId)
                    : true,
            );
        },
    };
}
