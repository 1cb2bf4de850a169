import { createHash } from "node:crypto";
import type {
    ApplyResult,
    FailedNode,
    NodeOutcome,
    NodeReport,
} from "../entities/apply-result.js";
import type { ChangeSet, ChangeSetEntry } from "../entities/change-set.js";
import {
    ApplyCancelledError,
    describeError,
    ProviderError,
} from "../entities/errors.js";
import type { ResourceDescriptor } from "../entities/resource-descriptor.js";
import { attributeValuesEqual } from "../entities/resource-descriptor.js";
import type { ResourceKind } from "../entities/resource-kind.js";
import type {
    DeposedObject,
    ResolvedAttributes,
} from "../entities/state-record.js";
import type { ConditionWaiter } from "./await-condition.js";
import type { Clock } from "./clock.port.js";
import type { ProgressLogger } from "./progress-logger.port.js";
import { resolveAttributes } from "./resolve-references.js";
import type { ResourceKindCatalog } from "./resource-kind-catalog.port.js";
import type { ResourceProvider } from "./resource-provider.port.js";
import type { RetryRunner } from "./retry-with-backoff.js";
import type { StateTransaction } from "./state-store.port.js";

export interface ExecuteOptions {
    readonly signal?: AbortSignal | undefined;
}

export interface ChangeSetExecutor {
    apply(
        changeSet: ChangeSet,
        transaction: StateTransaction,
        options?: ExecuteOptions,
    ): Promise<ApplyResult>;
}

export interface ChangeSetExecutorDeps {
    readonly provider: ResourceProvider;
    readonly catalog: ResourceKindCatalog;
    readonly waiter: ConditionWaiter;
    readonly retry: RetryRunner;
    readonly clock: Clock;
    readonly logger: ProgressLogger;
    readonly concurrency: number;
}

const SUCCESS_OUTCOME: Record<ChangeSetEntry["action"], NodeOutcome> = {
    create: "created",
    update: "updated",
    replace: "replaced",
    destroy: "destroyed",
    noop: "noop",
};

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

// 32 hex characters: accepted as an ACM token and a CloudFront caller reference
export function idempotencyKeyOf(
    address: string,
    resolved: ResolvedAttributes,
    startedAt: number,
): string {
    return createHash("sha256")
        .update(`${address}\n${startedAt}\n${JSON.stringify(resolved)}`)
        .digest("hex")
        .slice(0, 32);
}

function requireDescriptor(entry: ChangeSetEntry): ResourceDescriptor {
    if (!entry.descriptor) {
        throw new Error(`${entry.id} has no desired attributes to apply`);
    }
    return entry.descriptor;
}

function summarize(
    changeSet: ChangeSet,
    reports: ReadonlyMap<string, NodeReport>,
): ApplyResult {
    const ordered = changeSet.flatMap((entry) => {
        const report = reports.get(entry.id);
        return report ? [report] : [];
    });
    const unique = (outcome: NodeOutcome) => [
        ...new Set(
            ordered
                .filter((report) => report.outcome === outcome)
                .map((report) => report.address),
        ),
    ];
    const failed: FailedNode[] = ordered.flatMap((report) =>
        report.outcome === "failed" && report.error
            ? [{ address: report.address, error: report.error }]
            : [],
    );
    const blocked = unique("blocked");
    const cancelled = unique("cancelled");
    const unsuccessful = new Set([
        ...failed.map((node) => node.address),
        ...blocked,
        ...cancelled,
    ]);
    const succeeded = [
        ...new Set(
            ordered
                .map((report) => report.address)
                .filter((address) => !unsuccessful.has(address)),
        ),
    ];
    return { succeeded, failed, blocked, cancelled, reports: ordered };
}

export function createChangeSetExecutor(
    deps: ChangeSetExecutorDeps,
): ChangeSetExecutor {
    const limit = Math.max(1, Math.floor(deps.concurrency));
    const timestamp = () => new Date(deps.clock.now()).toISOString();

    const runEntry = async (
        entry: ChangeSetEntry,
        transaction: StateTransaction,
        signal: AbortSignal | undefined,
    ): Promise<void> => {
        const withRetry = <T>(label: string, operation: () => Promise<T>) =>
            deps.retry.run(operation, {
                label: `${label} ${entry.address}`,
                signal,
                onRetry: ({ attempt, delayMs, error }) =>
                    deps.logger.warn(
                        `${entry.address}: ${label} failed on attempt ${attempt} (${describeError(error)}), retrying in ${delayMs}ms`,
                    ),
            });

        const resolve = (descriptor: ResourceDescriptor): ResolvedAttributes =>
            resolveAttributes(
                descriptor.address,
                descriptor.attributes,
                (address, output) => {
                    const record = transaction.get(address);
                    return record?.status === "ready"
                        ? record.outputs[output]
                        : undefined;
                },
            );

        const awaitReadiness = async (
            kind: ResourceKind,
            providerAssignedId: string,
            afterUpdate: boolean,
        ): Promise<void> => {
            const readiness = deps.catalog.require(kind).readiness;
            if (!readiness || (afterUpdate && !readiness.onUpdate)) {
                return;
            }
            deps.logger.info(
                `${entry.address}: waiting for ${readiness.description}`,
            );
            await deps.waiter.await(
                () => deps.provider.checkCondition(kind, providerAssignedId),
                {
                    description: `${entry.address} ${readiness.description}`,
                    pollIntervalMs: readiness.pollIntervalMs,
                    timeoutMs: readiness.timeoutMs,
                    signal,
                },
            );
        };

        const readOutputs = async (
            kind: ResourceKind,
            providerAssignedId: string,
        ): Promise<ResolvedAttributes> => {
            const outputs = await withRetry("read", () =>
                deps.provider.read(kind, providerAssignedId),
            );
            if (!outputs) {
                throw new ProviderError(
                    `${entry.address} (${providerAssignedId}) disappeared before its outputs could be read`,
                    { transient: false },
                );
            }
            return outputs;
        };

        const deleteObject = async (
            kind: ResourceKind,
            providerAssignedId: string,
        ): Promise<void> => {
            await withRetry("delete", () =>
                deps.provider.delete(kind, providerAssignedId, signal),
            );
        };

        const commitReady = async (
            descriptor: ResourceDescriptor,
            providerAssignedId: string,
            resolved: ResolvedAttributes,
            deposed: DeposedObject | undefined,
        ): Promise<void> => {
            const outputs = await readOutputs(
                descriptor.kind,
                providerAssignedId,
            );
            await transaction.commit({
                address: descriptor.address,
                kind: descriptor.kind,
                status: "ready",
                providerAssignedId,
                lastAppliedAttributes: descriptor.attributes,
                resolvedAttributes: resolved,
                outputs,
                dependencies: entry.dependencies,
                deposed,
                updatedAt: timestamp(),
            });
        };

        const create = async (): Promise<void> => {
            const descriptor = requireDescriptor(entry);
            const resolved = resolve(descriptor);
            const existing = transaction.get(entry.address);

            let deposed = existing?.deposed;
            let providerAssignedId: string | undefined;

            if (existing?.status === "creating" && existing.providerAssignedId) {
                const found = await withRetry("read", () =>
                    deps.provider.read(
                        existing.kind,
                        existing.providerAssignedId ?? "",
                    ),
                );
                const sameKind = existing.kind === descriptor.kind;
                if (
                    found &&
                    sameKind &&
                    attributeValuesEqual(existing.resolvedAttributes, resolved)
                ) {
                    deps.logger.info(
                        `${entry.address}: resuming ${existing.providerAssignedId}`,
                    );
                    providerAssignedId = existing.providerAssignedId;
                } else if (found) {
                    deps.logger.info(
                        `${entry.address}: discarding half-created ${existing.providerAssignedId}`,
                    );
                    await deleteObject(
                        existing.kind,
                        existing.providerAssignedId,
                    );
                }
            } else if (
                entry.action === "replace" &&
                existing?.providerAssignedId &&
                existing.status !== "absent"
            ) {
                // Park the current object until its dependents have moved over
                deposed = {
                    kind: existing.kind,
                    providerAssignedId: existing.providerAssignedId,
                    resolvedAttributes: existing.resolvedAttributes,
                };
            }

            if (!providerAssignedId) {
                deps.logger.info(`${entry.address}: creating`);
                const idempotencyKey = idempotencyKeyOf(
                    entry.address,
                    resolved,
                    deps.clock.now(),
                );
                providerAssignedId = await withRetry("create", () =>
                    deps.provider.create(descriptor.kind, resolved, {
                        idempotencyKey,
                        signal,
                    }),
                );
                await transaction.commit({
                    address: descriptor.address,
                    kind: descriptor.kind,
                    status: "creating",
                    providerAssignedId,
                    lastAppliedAttributes: descriptor.attributes,
                    resolvedAttributes: resolved,
                    outputs: {},
                    dependencies: entry.dependencies,
                    deposed,
                    updatedAt: timestamp(),
                });
            }

            await awaitReadiness(descriptor.kind, providerAssignedId, false);
            await commitReady(descriptor, providerAssignedId, resolved, deposed);
            deps.logger.info(
                `${entry.address}: ready (${providerAssignedId})`,
            );
        };

        const update = async (): Promise<void> => {
            const descriptor = requireDescriptor(entry);
            const existing = transaction.get(entry.address);
            if (!existing?.providerAssignedId) {
                throw new Error(
                    `${entry.address} has no provisioned object to update`,
                );
            }
            const providerAssignedId = existing.providerAssignedId;
            const resolved = resolve(descriptor);

            deps.logger.info(
                `${entry.address}: updating ${entry.changedAttributes.join(", ")}`,
            );
            await withRetry("update", () =>
                deps.provider.update(
                    descriptor.kind,
                    providerAssignedId,
                    resolved,
                    signal,
                ),
            );
            await awaitReadiness(descriptor.kind, providerAssignedId, true);
            await commitReady(
                descriptor,
                providerAssignedId,
                resolved,
                existing.deposed,
            );
        };

        const destroyCurrent = async (): Promise<void> => {
            const existing = transaction.get(entry.address);
            if (!existing) {
                return;
            }
            if (existing.providerAssignedId) {
                const providerAssignedId = existing.providerAssignedId;
                await transaction.commit({
                    ...existing,
                    status: "destroying",
                    updatedAt: timestamp(),
                });
                deps.logger.info(
                    `${entry.address}: destroying ${providerAssignedId}`,
                );
                await deleteObject(existing.kind, providerAssignedId);
            }
            if (existing.deposed) {
                // A deposed teardown entry still owns the parked object
                await transaction.commit({
                    ...existing,
                    status: "absent",
                    providerAssignedId: null,
                    outputs: {},
                    updatedAt: timestamp(),
                });
                return;
            }
            await transaction.remove(entry.address);
        };

        const destroyDeposed = async (): Promise<void> => {
            const existing = transaction.get(entry.address);
            const deposed = existing?.deposed;
            if (!existing || !deposed) {
                return;
            }
            if (
                existing.kind === deposed.kind &&
                existing.providerAssignedId === deposed.providerAssignedId
            ) {
                // The replacement reused the parked object's identity
                deps.logger.info(
                    `${entry.address}: deposed ${deposed.providerAssignedId} is the current object, keeping it`,
                );
            } else {
                deps.logger.info(
                    `${entry.address}: destroying deposed ${deposed.providerAssignedId}`,
                );
                await deleteObject(deposed.kind, deposed.providerAssignedId);
            }
            const latest = transaction.get(entry.address) ?? existing;
            if (latest.status === "absent") {
                await transaction.remove(entry.address);
                return;
            }
            await transaction.commit({
                ...latest,
                deposed: undefined,
                updatedAt: timestamp(),
            });
        };

        switch (entry.action) {
            case "noop":
                return;
            case "create":
                return create();
            case "update":
                return update();
            case "destroy":
                return entry.deposed ? destroyDeposed() : destroyCurrent();
            case "replace":
                if (entry.phase === "destroy") {
                    return entry.deposed ? destroyDeposed() : destroyCurrent();
                }
                return create();
        }
    };

    return {
        apply(
            changeSet: ChangeSet,
            transaction: StateTransaction,
            options: ExecuteOptions = {},
        ): Promise<ApplyResult> {
            const { signal } = options;
            const byId = new Map(changeSet.map((entry) => [entry.id, entry]));
            const remaining = new Map<string, number>();
            const dependents = new Map<string, string[]>();
            const reports = new Map<string, NodeReport>();
            const queue: ChangeSetEntry[] = [];

            for (const entry of changeSet) {
                const after = entry.after.filter((id) => byId.has(id));
                remaining.set(entry.id, after.length);
                for (const id of after) {
                    dependents.set(id, [...(dependents.get(id) ?? []), entry.id]);
                }
                if (after.length === 0) {
                    queue.push(entry);
                }
            }

            const report = (
                entry: ChangeSetEntry,
                outcome: NodeOutcome,
                extra: Pick<NodeReport, "error" | "blockedBy"> = {},
            ) => {
                reports.set(entry.id, {
                    id: entry.id,
                    address: entry.address,
                    action: entry.action,
                    outcome,
                    ...extra,
                });
            };

            const block = (id: string, cause: string) => {
                for (const dependentId of dependents.get(id) ?? []) {
                    const dependent = byId.get(dependentId);
                    if (!dependent || reports.has(dependentId)) {
                        continue;
                    }
                    report(dependent, "blocked", { blockedBy: cause });
                    deps.logger.warn(
                        `${dependent.address}: skipped, ${cause} did not succeed`,
                    );
                    block(dependentId, cause);
                }
            };

            const release = (id: string) => {
                for (const dependentId of dependents.get(id) ?? []) {
                    const count = (remaining.get(dependentId) ?? 1) - 1;
                    remaining.set(dependentId, count);
                    const dependent = byId.get(dependentId);
                    if (count === 0 && dependent && !reports.has(dependentId)) {
                        queue.push(dependent);
                    }
                }
            };

            return new Promise<ApplyResult>((resolveResult) => {
                let running = 0;

                const pump = (): void => {
                    while (
                        running < limit &&
                        queue.length > 0 &&
                        !signal?.aborted
                    ) {
                        const entry = queue.shift();
                        if (!entry) {
                            break;
                        }
                        running += 1;
                        runEntry(entry, transaction, signal).then(
                            () => finish(entry, undefined),
                            (error: unknown) => finish(entry, error ?? null),
                        );
                    }
                    if (running > 0) {
                        return;
                    }
                    for (const entry of changeSet) {
                        if (!reports.has(entry.id)) {
                            report(entry, "cancelled");
                        }
                    }
                    resolveResult(summarize(changeSet, reports));
                };

                const finish = (entry: ChangeSetEntry, error: unknown) => {
                    running -= 1;
                    if (error === undefined) {
                        report(entry, SUCCESS_OUTCOME[entry.action]);
                        release(entry.id);
                    } else if (
                        error instanceof ApplyCancelledError ||
                        signal?.aborted
                    ) {
                        report(entry, "cancelled");
                        deps.logger.warn(`${entry.address}: cancelled`);
                    } else {
                        const failure = toError(error);
                        report(entry, "failed", { error: failure });
                        deps.logger.warn(
                            `${entry.address}: failed: ${failure.message}`,
                        );
                        block(entry.id, entry.address);
                    }
                    pump();
                };

                pump();
            });
        },
    };
}
