import type { ApplyResult } from "./apply-result.js";
import type { ContentSyncOutcome } from "./content-sync-outcome.js";

export type ConvergeErrorCode =
    | "PARSE_ERROR"
    | "CYCLE_ERROR"
    | "PROVIDER_ERROR"
    | "ASYNC_CONDITION_TIMEOUT"
    | "PARTIAL_APPLY"
    | "APPLY_CANCELLED"
    | "STATE_LOCKED"
    | "STATE_CORRUPTED";

export abstract class ConvergeError extends Error {
    abstract readonly code: ConvergeErrorCode;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type ParseIssueCode =
    | "InvalidDocument"
    | "DuplicateAddress"
    | "UnknownReference"
    | "SchemaViolation";

export interface ParseIssue {
    readonly code: ParseIssueCode;
    readonly message: string;
    readonly address?: string | undefined;
}

export class ParseError extends ConvergeError {
    readonly code = "PARSE_ERROR";

    constructor(readonly issues: readonly ParseIssue[]) {
        super(
            `Invalid desired-state document: ${issues
                .map((issue) =>
                    issue.address
                        ? `${issue.address}: ${issue.message}`
                        : issue.message,
                )
                .join("; ")}`,
        );
    }

    hasIssue(code: ParseIssueCode): boolean {
        return this.issues.some((issue) => issue.code === code);
    }
}

export class CycleError extends ConvergeError {
    readonly code = "CYCLE_ERROR";

    constructor(readonly involvedAddresses: readonly string[]) {
        super(
            `Dependency cycle detected: ${[...involvedAddresses, involvedAddresses[0]].join(" -> ")}`,
        );
    }
}

export interface ProviderErrorDetails {
    readonly transient: boolean;
    readonly providerCode?: string | undefined;
    readonly statusCode?: number | undefined;
    readonly cause?: unknown;
}

export class ProviderError extends ConvergeError {
    readonly code = "PROVIDER_ERROR";
    readonly transient: boolean;
    readonly providerCode: string | undefined;
    readonly statusCode: number | undefined;

    constructor(message: string, details: ProviderErrorDetails) {
        super(message, { cause: details.cause });
        this.transient = details.transient;
        this.providerCode = details.providerCode;
        this.statusCode = details.statusCode;
    }
}

export class AsyncConditionTimeout extends ConvergeError {
    readonly code = "ASYNC_CONDITION_TIMEOUT";

    constructor(
        readonly description: string,
        readonly timeoutMs: number,
        readonly attempts: number,
    ) {
        super(
            `Timed out after ${timeoutMs}ms (${attempts} polls) waiting for ${description}`,
        );
    }
}

export class ApplyCancelledError extends ConvergeError {
    readonly code = "APPLY_CANCELLED";

    constructor(message = "Apply was cancelled") {
        super(message);
    }
}

export class PartialApplyError extends ConvergeError {
    readonly code = "PARTIAL_APPLY";

    constructor(
        readonly result: ApplyResult,
        readonly content?: ContentSyncOutcome | undefined,
    ) {
        super(
            `Apply finished with ${result.failed.length} failed, ${result.blocked.length} blocked and ${result.cancelled.length} cancelled resource(s)`,
        );
    }
}

export interface LockHolder {
    readonly id: string;
    readonly pid: number;
    readonly hostname: string;
    readonly createdAt: string;
}

export class StateLockedError extends ConvergeError {
    readonly code = "STATE_LOCKED";

    constructor(
        readonly lockPath: string,
        readonly holder: LockHolder | undefined,
    ) {
        super(
            holder
                ? `State is locked by ${holder.hostname} (pid ${holder.pid}) since ${holder.createdAt}; run force-unlock if that process is gone`
                : `State is locked (${lockPath})`,
        );
    }
}

export class StateCorruptedError extends ConvergeError {
    readonly code = "STATE_CORRUPTED";

    constructor(
        readonly statePath: string,
        details: string,
    ) {
        super(`State file ${statePath} is unreadable: ${details}`);
    }
}

export function isValidationError(
    error: unknown,
): error is ParseError | CycleError {
    return error instanceof ParseError || error instanceof CycleError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
