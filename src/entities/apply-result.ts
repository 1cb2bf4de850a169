import type { ChangeAction } from "./change-set.js";

export type NodeOutcome =
    | "created"
    | "updated"
    | "replaced"
    | "destroyed"
    | "noop"
    | "failed"
    | "blocked"
    | "cancelled";

export interface NodeReport {
    readonly id: string;
    readonly address: string;
    readonly action: ChangeAction;
    readonly outcome: NodeOutcome;
    readonly error?: Error | undefined;
    readonly blockedBy?: string | undefined;
}

export interface FailedNode {
    readonly address: string;
    readonly error: Error;
}

export interface ApplyResult {
    readonly succeeded: readonly string[];
    readonly failed: readonly FailedNode[];
    readonly blocked: readonly string[];
    readonly cancelled: readonly string[];
    readonly reports: readonly NodeReport[];
}

export function isFullSuccess(result: ApplyResult): boolean {
    return (
        result.failed.length === 0 &&
        result.blocked.length === 0 &&
        result.cancelled.length === 0
    );
}

export function outcomeOf(
    result: ApplyResult,
    address: string,
): NodeOutcome | undefined {
    const reports = result.reports.filter(
        (report) => report.address === address,
    );
    return reports.at(-1)?.outcome;
}
