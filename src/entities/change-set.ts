import type { ResourceDescriptor } from "./resource-descriptor.js";
import type { ResourceKind } from "./resource-kind.js";

export type ChangeAction = "create" | "update" | "replace" | "destroy" | "noop";

export type ReplacePhase = "create" | "destroy";

export interface ChangeSetEntry {
    readonly id: string;
    readonly address: string;
    readonly kind: ResourceKind;
    readonly action: ChangeAction;
    readonly reason: string;
    readonly phase?: ReplacePhase | undefined;
    readonly createBeforeDestroy: boolean;
    // Acts on the object parked by an earlier create-before-destroy replacement
    readonly deposed: boolean;
    readonly changedAttributes: readonly string[];
    readonly after: readonly string[];
    // Absent on entries that only tear objects down
    readonly descriptor?: ResourceDescriptor | undefined;
    readonly dependencies: readonly string[];
}

export type ChangeSet = readonly ChangeSetEntry[];

export type EntrySlot = "primary" | "replaced" | "deposed";

export function entryId(address: string, slot: EntrySlot = "primary"): string {
    return slot === "primary" ? address : `${address}#${slot}`;
}

export function summarizeChangeSet(
    changeSet: ChangeSet,
): Readonly<Record<ChangeAction, number>> {
    const summary: Record<ChangeAction, number> = {
        create: 0,
        update: 0,
        replace: 0,
        destroy: 0,
        noop: 0,
    };
    for (const entry of changeSet) {
        if (entry.action === "replace" && entry.phase === "destroy") {
            continue;
        }
        summary[entry.action] += 1;
    }
    return summary;
}

export function hasChanges(changeSet: ChangeSet): boolean {
    return changeSet.some((entry) => entry.action !== "noop");
}
