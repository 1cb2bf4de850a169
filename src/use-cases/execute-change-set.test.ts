import { describe, expect, it, vi } from "vitest";
import type { ApplyResult } from "../entities/apply-result.js";
import {
    AsyncConditionTimeout,
    ProviderError,
} from "../entities/errors.js";
import type {
    ResolvedAttributes,
    StateRecord,
} from "../entities/state-record.js";
import { createInMemoryStateStore } from "../gateways/in-memory-state-store.js";
import { createResourceKindCatalog } from "../gateways/resource-kind-catalog.js";
import { createFakeClock } from "../lib/fake-clock.js";
import type {
    FakeProviderOptions,
    ScriptedFailure,
} from "../lib/fake-resource-provider.js";
import { createFakeResourceProvider } from "../lib/fake-resource-provider.js";
import {
    buildDocumentJson,
    buildStaticSiteDocument,
    ref,
} from "../lib/test-document-builder.js";
import { createConditionWaiter } from "./await-condition.js";
import { createDependencyGraphBuilder } from "./build-dependency-graph.js";
import { createChangeSetExecutor } from "./execute-change-set.js";
import { createDesiredStateParser } from "./parse-desired-state.js";
import { createChangePlanner, type PlanOptions } from "./plan-changes.js";
import { createRetryRunner } from "./retry-with-backoff.js";

const catalog = createResourceKindCatalog();
const parser = createDesiredStateParser(catalog);
const graphBuilder = createDependencyGraphBuilder();
const planner = createChangePlanner(catalog);

interface SetupOptions {
    readonly readiness?: FakeProviderOptions["readiness"];
    readonly failures?: readonly ScriptedFailure[];
    readonly concurrency?: number;
    readonly latencyMs?: number;
    readonly identityOf?: FakeProviderOptions["identityOf"];
}

function setup(options: SetupOptions = {}) {
    const clock = createFakeClock();
    const logger = {
        info: vi.fn<(message: string) => void>(),
        warn: vi.fn<(message: string) => void>(),
        debug: vi.fn<(message: string) => void>(),
    };
    const provider = createFakeResourceProvider({
        catalog,
        clock,
        readiness: options.readiness,
        failures: options.failures,
        latencyMs: options.latencyMs,
        identityOf: options.identityOf,
    });
    const store = createInMemoryStateStore();
    const executor = createChangeSetExecutor({
        provider,
        catalog,
        waiter: createConditionWaiter({ clock, logger }),
        retry: createRetryRunner(
            clock,
            { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitter: 0 },
            () => 0.5,
        ),
        clock,
        logger,
        concurrency: options.concurrency ?? 4,
    });

    const apply = async (
        json: string,
        signal?: AbortSignal,
        planOptions?: PlanOptions,
    ): Promise<ApplyResult> => {
        const { descriptors } = parser.parse(json);
        const graph = graphBuilder.build(descriptors);
        const changeSet = planner.plan(
            descriptors,
            graph,
            store.snapshot(),
            planOptions,
        );
        const transaction = await store.beginTransaction();
        try {
            return await executor.apply(changeSet, transaction, { signal });
        } finally {
            await transaction.release();
        }
    };

    const recordOf = (address: string): StateRecord => {
        const record = store.snapshot().get(address);
        if (!record) {
            throw new Error(`no record for ${address}`);
        }
        return record;
    };

    return { clock, logger, provider, store, apply, recordOf };
}

const bucketAndDistribution = (
    bucket: string,
    createBeforeDestroy = false,
): string =>
    buildDocumentJson([
        {
            address: "storage_bucket.site",
            kind: "storage_bucket",
            attributes: { bucket },
            createBeforeDestroy,
        },
        {
            address: "distribution.site",
            kind: "distribution",
            attributes: {
                origin_domain_name: ref(
                    "storage_bucket.site",
                    "regional_domain_name",
                ),
            },
        },
    ]);

const POLICY_DOCUMENT = buildDocumentJson([
    {
        address: "bucket_policy.site",
        kind: "bucket_policy",
        attributes: {
            bucket: "example-site-bucket",
            policy: { Version: "2012-10-17", Statement: [] },
        },
        createBeforeDestroy: true,
    },
]);

// S3 names a bucket policy after its bucket
const namedByBucket = {
    bucket_policy: (attributes: ResolvedAttributes) =>
        String(attributes["bucket"]),
};

describe("ChangeSetExecutor", () => {
    describe("given a static site and an empty state", () => {
        it("should create every resource and wire outputs into dependents", async () => {
            // Arrange
            const { apply, recordOf } = setup();

            // Act
            const result = await apply(buildStaticSiteDocument());

            // Assert
            expect(result.failed).toEqual([]);
            expect([...result.succeeded].sort()).toEqual([
                "certificate.site",
                "certificate_validation.site",
                "distribution.site",
                "dns_record.validation",
                "storage_bucket.site",
            ]);
            const bucketId = recordOf("storage_bucket.site").providerAssignedId;
            const certificateId = recordOf("certificate.site").providerAssignedId;
            const distribution = recordOf("distribution.site");
            expect(distribution.status).toBe("ready");
            expect(distribution.resolvedAttributes["origin_domain_name"]).toBe(
                `regional_domain_name.${bucketId}`,
            );
            expect(distribution.resolvedAttributes["certificate_arn"]).toBe(
                `arn:fake:certificate:${certificateId}`,
            );
            expect(recordOf("dns_record.validation").outputs["fqdn"]).toBe(
                `validation_record_name.${certificateId}`,
            );
        });

        it("should leave nothing to do on the next plan", async () => {
            // Arrange
            const { apply, store } = setup();
            const json = buildStaticSiteDocument();
            await apply(json);
            const { descriptors } = parser.parse(json);

            // Act
            const changeSet = planner.plan(
                descriptors,
                graphBuilder.build(descriptors),
                store.snapshot(),
            );

            // Assert
            expect(changeSet.map((entry) => entry.action)).toEqual([
                "noop",
                "noop",
                "noop",
                "noop",
                "noop",
            ]);
        });
    });

    describe("given a resource that takes a few polls to become ready", () => {
        it("should poll at the kind's interval until it is ready", async () => {
            // Arrange
            const { apply, provider, clock, recordOf } = setup({
                readiness: { distribution: 2 },
            });

            // Act
            const result = await apply(bucketAndDistribution("site-bucket"));

            // Assert
            expect(result.failed).toEqual([]);
            expect(
                provider
                    .callsOf("checkCondition")
                    .filter((call) => call.kind === "distribution"),
            ).toHaveLength(3);
            expect(clock.sleeps).toEqual([30_000, 30_000]);
            expect(recordOf("distribution.site").status).toBe("ready");
        });
    });

    describe("given a resource that never becomes ready", () => {
        it("should fail it, block its dependents and finish independent work", async () => {
            // Arrange
            const { apply, recordOf } = setup({
                readiness: { certificate: "never" },
            });

            // Act
            const result = await apply(buildStaticSiteDocument());

            // Assert
            expect(result.failed.map((node) => node.address)).toEqual([
                "certificate.site",
            ]);
            expect(result.failed[0]?.error).toBeInstanceOf(
                AsyncConditionTimeout,
            );
            expect(result.blocked).toEqual([
                "dns_record.validation",
                "certificate_validation.site",
                "distribution.site",
            ]);
            expect(result.succeeded).toEqual(["storage_bucket.site"]);
            expect(
                result.reports.find(
                    (report) => report.id === "distribution.site",
                )?.blockedBy,
            ).toBe("certificate.site");
            expect(recordOf("certificate.site").status).toBe("creating");
        });
    });

    describe("given a provider that rejects one resource", () => {
        it("should isolate the failure to that resource and its dependents", async () => {
            // Arrange
            const { apply, store } = setup({
                failures: [
                    {
                        method: "create",
                        kind: "storage_bucket",
                        error: new ProviderError("access denied", {
                            transient: false,
                        }),
                    },
                ],
            });

            // Act
            const result = await apply(buildStaticSiteDocument());

            // Assert
            expect(result.failed.map((node) => node.error.message)).toEqual([
                "access denied",
            ]);
            expect(result.blocked).toEqual(["distribution.site"]);
            expect(result.succeeded).toEqual([
                "certificate.site",
                "dns_record.validation",
                "certificate_validation.site",
            ]);
            expect(store.snapshot().has("storage_bucket.site")).toBe(false);
        });
    });

    describe("given a transient provider error", () => {
        it("should retry with backoff and then succeed", async () => {
            // Arrange
            const { apply, provider, clock, logger } = setup({
                failures: [
                    {
                        method: "create",
                        kind: "storage_bucket",
                        error: new ProviderError("throttled", {
                            transient: true,
                        }),
                        times: 2,
                    },
                ],
            });

            // Act
            const result = await apply(
                buildDocumentJson([
                    {
                        address: "storage_bucket.site",
                        kind: "storage_bucket",
                        attributes: { bucket: "site-bucket" },
                    },
                ]),
            );

            // Assert
            expect(result.succeeded).toEqual(["storage_bucket.site"]);
            expect(provider.callsOf("create")).toHaveLength(3);
            const keys = provider
                .callsOf("create")
                .map((call) => call.idempotencyKey);
            expect(new Set(keys).size).toBe(1);
            expect(keys[0]).toMatch(/^[0-9a-f]{32}$/);
            expect(clock.sleeps).toEqual([100, 200]);
            expect(logger.warn).toHaveBeenCalledWith(
                "storage_bucket.site: create failed on attempt 1 (throttled), retrying in 100ms",
            );
        });
    });

    describe("given more independent work than the concurrency limit", () => {
        it("should never run more mutations at once than the limit", async () => {
            // Arrange
            const { apply, provider } = setup({
                concurrency: 2,
                latencyMs: 1000,
            });
            const buckets = ["a", "b", "c", "d", "e", "f"].map((name) => ({
                address: `storage_bucket.${name}`,
                kind: "storage_bucket",
                attributes: { bucket: `bucket-${name}` },
            }));

            // Act
            const result = await apply(buildDocumentJson(buckets));

            // Assert
            expect(result.succeeded).toHaveLength(6);
            expect(provider.peakInFlight()).toBe(2);
        });
    });

    describe("given a cancellation", () => {
        it("should start nothing when already cancelled", async () => {
            // Arrange
            const { apply, provider } = setup();
            const controller = new AbortController();
            controller.abort();

            // Act
            const result = await apply(
                bucketAndDistribution("site-bucket"),
                controller.signal,
            );

            // Assert
            expect(result.cancelled).toEqual([
                "storage_bucket.site",
                "distribution.site",
            ]);
            expect(provider.calls).toEqual([]);
        });

        it("should stop while waiting and keep the finished work", async () => {
            // Arrange
            const { apply, logger, recordOf } = setup();
            const controller = new AbortController();
            logger.info.mockImplementation((message) => {
                if (message.startsWith("distribution.site: waiting for")) {
                    controller.abort();
                }
            });

            // Act
            const result = await apply(
                bucketAndDistribution("site-bucket"),
                controller.signal,
            );

            // Assert
            expect(result.succeeded).toEqual(["storage_bucket.site"]);
            expect(result.cancelled).toEqual(["distribution.site"]);
            expect(recordOf("distribution.site").status).toBe("creating");
        });
    });

    describe("given a create_before_destroy replacement", () => {
        it("should create the new object, update dependents, then delete the old one", async () => {
            // Arrange
            const { apply, provider, store, recordOf } = setup();
            await apply(bucketAndDistribution("old-bucket", true));
            const oldId = recordOf("storage_bucket.site").providerAssignedId;
            const callsBefore = provider.calls.length;

            // Act
            const result = await apply(bucketAndDistribution("new-bucket", true));

            // Assert
            expect(result.failed).toEqual([]);
            const mutations = provider.calls
                .slice(callsBefore)
                .filter((call) =>
                    ["create", "update", "delete"].includes(call.method),
                )
                .map((call) => `${call.method} ${call.kind}`);
            expect(mutations).toEqual([
                "create storage_bucket",
                "update distribution",
                "delete storage_bucket",
            ]);
            expect(provider.callsOf("delete")[0]?.id).toBe(oldId);
            expect(
                store.writes.some(
                    (write) =>
                        typeof write !== "string" &&
                        write.deposed?.providerAssignedId === oldId,
                ),
            ).toBe(true);
            const bucket = recordOf("storage_bucket.site");
            expect(bucket.providerAssignedId).not.toBe(oldId);
            expect(bucket.deposed).toBeUndefined();
            expect(
                recordOf("distribution.site").resolvedAttributes[
                    "origin_domain_name"
                ],
            ).toBe(`regional_domain_name.${bucket.providerAssignedId}`);
        });
    });

    describe("given a forced replacement of a create_before_destroy object named by its attributes", () => {
        it("should destroy the old object first and keep the new one", async () => {
            // Arrange
            const { apply, provider, recordOf } = setup({
                identityOf: namedByBucket,
            });
            await apply(POLICY_DOCUMENT);
            const callsBefore = provider.calls.length;

            // Act
            const result = await apply(POLICY_DOCUMENT, undefined, {
                replace: ["bucket_policy.site"],
            });

            // Assert
            expect(result.failed).toEqual([]);
            const mutations = provider.calls
                .slice(callsBefore)
                .filter((call) =>
                    ["create", "update", "delete"].includes(call.method),
                )
                .map((call) => `${call.method} ${call.id ?? call.kind}`);
            expect(mutations).toEqual([
                "delete example-site-bucket",
                "create bucket_policy",
            ]);
            expect(provider.objects.has("example-site-bucket")).toBe(true);
            const record = recordOf("bucket_policy.site");
            expect(record.status).toBe("ready");
            expect(record.providerAssignedId).toBe("example-site-bucket");
            expect(record.deposed).toBeUndefined();
        });
    });

    describe("given a deposed object that is also the current object", () => {
        it("should clear the deposed entry without deleting the object", async () => {
            // Arrange
            const { apply, provider, store, recordOf, logger } = setup({
                identityOf: namedByBucket,
            });
            await apply(POLICY_DOCUMENT);
            const current = recordOf("bucket_policy.site");
            const transaction = await store.beginTransaction();
            await transaction.commit({
                ...current,
                deposed: {
                    kind: "bucket_policy",
                    providerAssignedId: "example-site-bucket",
                    resolvedAttributes: current.resolvedAttributes,
                },
            });
            await transaction.release();

            // Act
            const result = await apply(POLICY_DOCUMENT);

            // Assert
            expect(result.failed).toEqual([]);
            expect(provider.callsOf("delete")).toEqual([]);
            expect(provider.objects.has("example-site-bucket")).toBe(true);
            expect(recordOf("bucket_policy.site").deposed).toBeUndefined();
            expect(logger.info).toHaveBeenCalledWith(
                "bucket_policy.site: deposed example-site-bucket is the current object, keeping it",
            );
        });
    });

    describe("given a destroy-first replacement", () => {
        it("should delete the old object before creating the new one", async () => {
            // Arrange
            const { apply, provider, store } = setup();
            await apply(bucketAndDistribution("old-bucket"));
            const callsBefore = provider.calls.length;

            // Act
            await apply(bucketAndDistribution("new-bucket"));

            // Assert
            const mutations = provider.calls
                .slice(callsBefore)
                .filter((call) =>
                    ["create", "update", "delete"].includes(call.method),
                )
                .map((call) => `${call.method} ${call.kind}`);
            expect(mutations).toEqual([
                "delete storage_bucket",
                "create storage_bucket",
                "update distribution",
            ]);
            expect(store.writes).toContain("storage_bucket.site");
        });
    });

    describe("given a record stuck in creating", () => {
        it("should resume the existing object instead of creating another", async () => {
            // Arrange
            const { apply, provider, recordOf } = setup({
                failures: [
                    {
                        method: "read",
                        kind: "storage_bucket",
                        error: new ProviderError("read refused", {
                            transient: false,
                        }),
                        times: 1,
                    },
                ],
            });
            const json = buildDocumentJson([
                {
                    address: "storage_bucket.site",
                    kind: "storage_bucket",
                    attributes: { bucket: "site-bucket" },
                },
            ]);
            await apply(json);
            const createdId = recordOf("storage_bucket.site").providerAssignedId;

            // Act
            const result = await apply(json);

            // Assert
            expect(result.succeeded).toEqual(["storage_bucket.site"]);
            expect(provider.callsOf("create")).toHaveLength(1);
            expect(recordOf("storage_bucket.site")).toMatchObject({
                status: "ready",
                providerAssignedId: createdId,
            });
        });
    });

    describe("given removed resources", () => {
        it("should delete dependents before what they depend on", async () => {
            // Arrange
            const { apply, provider, store } = setup();
            await apply(bucketAndDistribution("site-bucket"));

            // Act
            const result = await apply(buildDocumentJson([]));

            // Assert
            expect(result.succeeded).toEqual([
                "distribution.site",
                "storage_bucket.site",
            ]);
            expect(provider.callsOf("delete").map((call) => call.kind)).toEqual(
                ["distribution", "storage_bucket"],
            );
            expect(store.snapshot().size).toBe(0);
        });
    });
});
