import type { ApplyResult } from "../entities/apply-result.js";
import { isFullSuccess } from "../entities/apply-result.js";
import type { ChangeSet } from "../entities/change-set.js";
import type { ContentSyncOutcome } from "../entities/content-sync-outcome.js";
import type { ContentSettings } from "../entities/engine-config.js";
import { describeError, PartialApplyError } from "../entities/errors.js";
import type { ResourceDescriptor } from "../entities/resource-descriptor.js";
import type { StateSnapshot } from "../entities/state-record.js";
import type { DependencyGraphBuilder } from "./build-dependency-graph.js";
import type { ContentSync } from "./content-sync.port.js";
import type { ChangeSetExecutor } from "./execute-change-set.js";
import type { DesiredStateParser } from "./parse-desired-state.js";
import type { ChangePlanner, PlanOptions } from "./plan-changes.js";
import type { ProgressLogger } from "./progress-logger.port.js";
import type { StateStore } from "./state-store.port.js";

export interface ConvergeRequest extends PlanOptions {
    readonly documentJson: string;
}

export interface ApplyRequest extends ConvergeRequest {
    readonly content?: ContentSettings | null | undefined;
    readonly signal?: AbortSignal | undefined;
}

export interface PlanOutcome {
    readonly descriptors: readonly ResourceDescriptor[];
    readonly changeSet: ChangeSet;
    readonly strippedKeys: readonly string[];
}

export interface ApplyOutcome extends PlanOutcome {
    readonly result: ApplyResult;
    readonly content: ContentSyncOutcome | undefined;
}

export interface Convergence {
    plan(request: ConvergeRequest): Promise<PlanOutcome>;
    // Throws PartialApplyError when any entry did not succeed
    apply(request: ApplyRequest): Promise<ApplyOutcome>;
}

export interface ConvergenceDeps {
    readonly parser: DesiredStateParser;
    readonly graphBuilder: DependencyGraphBuilder;
    readonly planner: ChangePlanner;
    readonly executor: ChangeSetExecutor;
    readonly stateStore: StateStore;
    readonly contentSync?: ContentSync | undefined;
    readonly logger: ProgressLogger;
}

function stringOf(value: unknown): string | undefined {
    return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function createConvergence(deps: ConvergenceDeps): Convergence {
    const validate = (request: ConvergeRequest) => {
        const parsed = deps.parser.parse(request.documentJson);
        for (const key of parsed.strippedKeys) {
            deps.logger.warn(`Ignoring unsafe key ${key} in the document`);
        }
        const graph = deps.graphBuilder.build(parsed.descriptors);
        for (const address of request.replace ?? []) {
            if (!graph.nodes.has(address)) {
                deps.logger.warn(
                    `Replacement requested for ${address}, which is not declared`,
                );
            }
        }
        return { parsed, graph };
    };

    const syncContent = async (
        settings: ContentSettings,
        state: StateSnapshot,
        signal: AbortSignal | undefined,
    ): Promise<ContentSyncOutcome> => {
        if (!deps.contentSync) {
            return { status: "skipped", reason: "no content sync configured" };
        }
        if (signal?.aborted) {
            return { status: "skipped", reason: "apply was cancelled" };
        }
        const bucketRecord = state.get(settings.bucketAddress);
        const bucket = stringOf(bucketRecord?.resolvedAttributes["bucket"]);
        if (bucketRecord?.status !== "ready" || !bucket) {
            return {
                status: "skipped",
                reason: `${settings.bucketAddress} is not ready`,
            };
        }

        let distributionId: string | undefined;
        if (settings.distributionAddress) {
            const distribution = state.get(settings.distributionAddress);
            if (distribution?.status !== "ready") {
                return {
                    status: "skipped",
                    reason: `${settings.distributionAddress} is not ready`,
                };
            }
            distributionId = stringOf(distribution.outputs["id"]);
        }

        deps.logger.info(`Syncing ${settings.root} to ${bucket}`);
        try {
            const report = await deps.contentSync.sync({
                root: settings.root,
                bucket,
                distributionId,
                deleteExtraneous: settings.deleteExtraneous,
                signal,
            });
            deps.logger.info(
                `Uploaded ${report.uploaded.length}, deleted ${report.deleted.length}, ${report.unchanged} unchanged`,
            );
            return { status: "synced", report };
        } catch (error) {
            const failure =
                error instanceof Error ? error : new Error(String(error));
            deps.logger.warn(`Content sync failed: ${describeError(failure)}`);
            return { status: "failed", error: failure };
        }
    };

    return {
        async plan(request: ConvergeRequest): Promise<PlanOutcome> {
            const { parsed, graph } = validate(request);
            const state = await deps.stateStore.load();
            const changeSet = deps.planner.plan(
                parsed.descriptors,
                graph,
                state,
                request,
            );
            return {
                descriptors: parsed.descriptors,
                changeSet,
                strippedKeys: parsed.strippedKeys,
            };
        },

        async apply(request: ApplyRequest): Promise<ApplyOutcome> {
            const { parsed, graph } = validate(request);
            const transaction = await deps.stateStore.beginTransaction();

            let changeSet: ChangeSet;
            let result: ApplyResult;
            try {
                changeSet = deps.planner.plan(
                    parsed.descriptors,
                    graph,
                    transaction.records,
                    request,
                );
                result = await deps.executor.apply(changeSet, transaction, {
                    signal: request.signal,
                });
            } finally {
                await transaction.release();
            }

            const finalState = await deps.stateStore.load();
            const content =
                request.content && !request.destroyAll
                    ? await syncContent(
                          request.content,
                          finalState,
                          request.signal,
                      )
                    : undefined;

            if (!isFullSuccess(result)) {
                throw new PartialApplyError(result, content);
            }
            return {
                descriptors: parsed.descriptors,
                changeSet,
                strippedKeys: parsed.strippedKeys,
                result,
                content,
            };
        },
    };
}
