import type {
    ChangeAction,
    ChangeSet,
    ChangeSetEntry,
    ReplacePhase,
} from "../entities/change-set.js";
import { entryId } from "../entities/change-set.js";
import type { DependencyGraph } from "../entities/dependency-graph.js";
import { CycleError } from "../entities/errors.js";
import type { ResourceDescriptor } from "../entities/resource-descriptor.js";
import { attributeValuesEqual } from "../entities/resource-descriptor.js";
import type { StateRecord, StateSnapshot } from "../entities/state-record.js";
import type { ResourceKindCatalog } from "./resource-kind-catalog.port.js";

export interface PlanOptions {
    readonly destroyAll?: boolean;
    readonly replace?: readonly string[];
}

export interface ChangePlanner {
    plan(
        descriptors: readonly ResourceDescriptor[],
        graph: DependencyGraph,
        state: StateSnapshot,
        options?: PlanOptions,
    ): ChangeSet;
}

interface Decision {
    readonly action: Exclude<ChangeAction, "destroy">;
    readonly reason: string;
    readonly changedAttributes: readonly string[];
}

type TeardownMode = "full" | "destroy-first";

function changedAttributeNames(
    descriptor: ResourceDescriptor,
    record: StateRecord,
): string[] {
    const names = new Set([
        ...Object.keys(descriptor.attributes),
        ...Object.keys(record.lastAppliedAttributes),
    ]);
    return [...names]
        .filter(
            (name) =>
                !attributeValuesEqual(
                    descriptor.attributes[name],
                    record.lastAppliedAttributes[name],
                ),
        )
        .sort();
}

function actionRank(entry: ChangeSetEntry): number {
    return entry.action === "destroy" || entry.phase === "destroy" ? 1 : 0;
}

function orderEntries(entries: readonly ChangeSetEntry[]): ChangeSetEntry[] {
    const byId = new Map(entries.map((entry) => [entry.id, entry]));
    const remaining = new Map<string, number>();
    const waiting = new Map<string, string[]>();

    for (const entry of entries) {
        const after = entry.after.filter((id) => byId.has(id));
        remaining.set(entry.id, after.length);
        for (const id of after) {
            waiting.set(id, [...(waiting.get(id) ?? []), entry.id]);
        }
    }

    const byIdThenRank = (a: ChangeSetEntry, b: ChangeSetEntry) =>
        actionRank(a) - actionRank(b) ||
        (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
    const ready = entries.filter((entry) => remaining.get(entry.id) === 0);
    ready.sort(byIdThenRank);

    const ordered: ChangeSetEntry[] = [];
    while (ready.length > 0) {
        const current = ready.shift();
        if (!current) {
            break;
        }
        ordered.push(current);
        for (const id of waiting.get(current.id) ?? []) {
            const count = (remaining.get(id) ?? 1) - 1;
            remaining.set(id, count);
            const entry = byId.get(id);
            if (count === 0 && entry) {
                ready.push(entry);
                ready.sort(byIdThenRank);
            }
        }
    }

    if (ordered.length !== entries.length) {
        const stuck = entries
            .filter((entry) => !ordered.includes(entry))
            .map((entry) => entry.id);
        throw new CycleError(stuck);
    }
    return ordered;
}

export function createChangePlanner(
    catalog: ResourceKindCatalog,
): ChangePlanner {
    const decide = (
        descriptor: ResourceDescriptor,
        record: StateRecord | undefined,
        forceReplace: boolean,
    ): Decision => {
        if (!record || record.status === "absent") {
            return {
                action: "create",
                reason: "not yet provisioned",
                changedAttributes: [],
            };
        }
        if (record.kind !== descriptor.kind) {
            return {
                action: "replace",
                reason: `kind changed from ${record.kind} to ${descriptor.kind}`,
                changedAttributes: [],
            };
        }
        if (forceReplace) {
            return {
                action: "replace",
                reason: "replacement requested",
                changedAttributes: [],
            };
        }
        if (record.status === "tainted") {
            return {
                action: "replace",
                reason: "resource is tainted",
                changedAttributes: [],
            };
        }
        if (record.status === "destroying") {
            return {
                action: "replace",
                reason: "a previous destroy did not complete",
                changedAttributes: [],
            };
        }

        const changed = changedAttributeNames(descriptor, record);

        if (record.status === "creating") {
            return {
                action: "create",
                reason: "resuming a creation that never became ready",
                changedAttributes: changed,
            };
        }
        if (changed.length === 0) {
            return { action: "noop", reason: "up to date", changedAttributes: [] };
        }

        const schema = catalog.require(descriptor.kind);
        const forcing = changed.filter(
            (name) => schema.attributes[name]?.forceNew ?? false,
        );
        if (!schema.updatable || forcing.length > 0) {
            return {
                action: "replace",
                reason: `changes to ${(forcing.length > 0 ? forcing : changed).join(", ")} force replacement`,
                changedAttributes: changed,
            };
        }
        return {
            action: "update",
            reason: `changed ${changed.join(", ")}`,
            changedAttributes: changed,
        };
    };

    return {
        plan(
            descriptors: readonly ResourceDescriptor[],
            graph: DependencyGraph,
            state: StateSnapshot,
            options: PlanOptions = {},
        ): ChangeSet {
            const desired = new Map(
                options.destroyAll
                    ? []
                    : descriptors.map((descriptor) => [
                          descriptor.address,
                          descriptor,
                      ]),
            );
            const forced = new Set(options.replace ?? []);
            const decisions = new Map<string, Decision>();

            for (const address of graph.topologicalOrder()) {
                const descriptor = desired.get(address);
                if (!descriptor) {
                    continue;
                }
                let decision = decide(
                    descriptor,
                    state.get(address),
                    forced.has(address),
                );

                // Re-point dependents of anything being replaced
                if (decision.action === "noop" || decision.action === "update") {
                    const schema = catalog.require(descriptor.kind);
                    for (const reference of graph.referencesFrom(address)) {
                        if (decisions.get(reference.to)?.action !== "replace") {
                            continue;
                        }
                        const changedAttributes = [
                            ...new Set([
                                ...decision.changedAttributes,
                                reference.attribute,
                            ]),
                        ].sort();
                        const forceNew =
                            schema.attributes[reference.attribute]?.forceNew ??
                            false;
                        decision = {
                            action:
                                forceNew || !schema.updatable
                                    ? "replace"
                                    : "update",
                            reason: `dependency ${reference.to} replaced`,
                            changedAttributes,
                        };
                        if (decision.action === "replace") {
                            break;
                        }
                    }
                }
                decisions.set(address, decision);
            }

            const removed = [...state.values()]
                .filter((record) => !desired.has(record.address))
                .map((record) => record.address)
                .sort();
            const removedSet = new Set(removed);

            const isReplaced = (address: string) =>
                decisions.get(address)?.action === "replace";
            // Two live objects cannot share an identity, so a replacement that
            // keeps it has to destroy the old object first
            const keepsIdentity = (address: string): boolean => {
                const descriptor = desired.get(address);
                const record = state.get(address);
                if (!descriptor || !record || record.kind !== descriptor.kind) {
                    return false;
                }
                const identity =
                    catalog.require(descriptor.kind).identityAttributes ?? [];
                return (
                    identity.length > 0 &&
                    identity.every((name) =>
                        attributeValuesEqual(
                            descriptor.attributes[name],
                            record.lastAppliedAttributes[name],
                        ),
                    )
                );
            };
            const isCreateBeforeDestroy = (address: string) =>
                (desired.get(address)?.lifecycle.createBeforeDestroy ?? false) &&
                !keepsIdentity(address);
            const hasDeposed = (address: string) =>
                state.get(address)?.deposed !== undefined;

            const stateDependents = (address: string): string[] =>
                [...state.values()]
                    .filter(
                        (record) =>
                            record.address !== address &&
                            record.dependencies.includes(address),
                    )
                    .map((record) => record.address);

            const allDependents = (address: string): string[] => {
                const fromGraph = desired.has(address)
                    ? graph.dependentsOf(address)
                    : [];
                return [
                    ...new Set([...fromGraph, ...stateDependents(address)]),
                ].sort();
            };

            const teardownOf = (
                address: string,
                mode: TeardownMode,
            ): string[] => {
                const ids: string[] = [];
                if (removedSet.has(address)) {
                    ids.push(entryId(address));
                } else {
                    if (mode === "full") {
                        ids.push(entryId(address));
                    }
                    if (
                        isReplaced(address) &&
                        (mode === "full" || !isCreateBeforeDestroy(address))
                    ) {
                        ids.push(entryId(address, "replaced"));
                    }
                }
                if (hasDeposed(address)) {
                    ids.push(entryId(address, "deposed"));
                }
                return ids;
            };

            const dependentTeardown = (
                address: string,
                mode: TeardownMode,
            ): string[] => [
                ...new Set(
                    allDependents(address).flatMap((dependent) =>
                        teardownOf(dependent, mode),
                    ),
                ),
            ];

            const entries: ChangeSetEntry[] = [];
            const push = (
                entry: Omit<
                    ChangeSetEntry,
                    | "createBeforeDestroy"
                    | "deposed"
                    | "changedAttributes"
                    | "dependencies"
                > &
                    Partial<ChangeSetEntry>,
            ) => {
                entries.push({
                    createBeforeDestroy: false,
                    deposed: false,
                    changedAttributes: [],
                    dependencies: [],
                    ...entry,
                    after: [...new Set(entry.after)].filter(
                        (id) => id !== entry.id,
                    ),
                });
            };

            for (const [address, decision] of decisions) {
                const descriptor = desired.get(address);
                if (!descriptor) {
                    continue;
                }
                const primaryAfter = graph
                    .dependenciesOf(address)
                    .map((dependency) => entryId(dependency));
                const createBeforeDestroy =
                    decision.action === "replace"
                        ? isCreateBeforeDestroy(address)
                        : descriptor.lifecycle.createBeforeDestroy;
                const fellBack =
                    descriptor.lifecycle.createBeforeDestroy &&
                    !createBeforeDestroy;
                const common = {
                    address,
                    kind: descriptor.kind,
                    descriptor,
                    dependencies: graph.dependenciesOf(address),
                    reason: fellBack
                        ? `${decision.reason}; the new object keeps the same identity, so the old one is destroyed first`
                        : decision.reason,
                    changedAttributes: decision.changedAttributes,
                    createBeforeDestroy,
                };

                if (decision.action !== "replace") {
                    push({
                        ...common,
                        id: entryId(address),
                        action: decision.action,
                        after: primaryAfter,
                    });
                    continue;
                }

                const phase = (value: ReplacePhase) => ({
                    ...common,
                    action: "replace" as const,
                    phase: value,
                });
                if (createBeforeDestroy) {
                    push({
                        ...phase("create"),
                        id: entryId(address),
                        after: [
                            ...primaryAfter,
                            ...(hasDeposed(address)
                                ? [entryId(address, "deposed")]
                                : []),
                        ],
                    });
                    push({
                        ...phase("destroy"),
                        id: entryId(address, "replaced"),
                        deposed: true,
                        after: [
                            entryId(address),
                            ...dependentTeardown(address, "full"),
                        ],
                    });
                } else {
                    push({
                        ...phase("destroy"),
                        id: entryId(address, "replaced"),
                        after: dependentTeardown(address, "destroy-first"),
                    });
                    push({
                        ...phase("create"),
                        id: entryId(address),
                        after: [...primaryAfter, entryId(address, "replaced")],
                    });
                }
            }

            for (const address of removed) {
                const record = state.get(address);
                if (!record) {
                    continue;
                }
                push({
                    id: entryId(address),
                    address,
                    kind: record.kind,
                    action: "destroy",
                    reason: options.destroyAll
                        ? "destroy requested"
                        : "no longer declared",
                    after: dependentTeardown(address, "full"),
                });
            }

            for (const record of state.values()) {
                if (!record.deposed) {
                    continue;
                }
                push({
                    id: entryId(record.address, "deposed"),
                    address: record.address,
                    kind: record.kind,
                    action: "destroy",
                    reason: "object left behind by an interrupted replacement",
                    deposed: true,
                    after: dependentTeardown(record.address, "destroy-first"),
                });
            }

            return orderEntries(entries);
        },
    };
}
