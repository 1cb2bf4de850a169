import type { ChangeSet, ChangeSetEntry } from "../entities/change-set.js";
import { hasChanges, summarizeChangeSet } from "../entities/change-set.js";

export interface ChangeSetRenderer {
    renderText(changeSet: ChangeSet): string;
    renderJson(changeSet: ChangeSet): string;
}

function symbolOf(entry: ChangeSetEntry): string {
    switch (entry.action) {
        case "create":
            return "  +";
        case "update":
            return "  ~";
        case "replace":
            return entry.createBeforeDestroy ? "+/-" : "-/+";
        case "destroy":
            return "  -";
        case "noop":
            return "   ";
    }
}

function describeEntry(entry: ChangeSetEntry): string {
    const label = entry.deposed ? `${entry.address} (deposed)` : entry.address;
    return `${symbolOf(entry)} ${label} [${entry.kind}]: ${entry.action}, ${entry.reason}`;
}

// The destroy half of a replacement is folded into its create half
function isShown(entry: ChangeSetEntry): boolean {
    return (
        entry.action !== "noop" &&
        !(entry.action === "replace" && entry.phase === "destroy")
    );
}

export function createChangeSetRenderer(): ChangeSetRenderer {
    return {
        renderText(changeSet: ChangeSet): string {
            if (!hasChanges(changeSet)) {
                return "No changes. Infrastructure matches the desired state.";
            }
            const summary = summarizeChangeSet(changeSet);
            const lines = changeSet.filter(isShown).map(describeEntry);
            lines.push(
                "",
                `Plan: ${summary.create} to create, ${summary.update} to update, ${summary.replace} to replace, ${summary.destroy} to destroy, ${summary.noop} unchanged.`,
            );
            return lines.join("\n");
        },

        renderJson(changeSet: ChangeSet): string {
            const output = {
                summary: summarizeChangeSet(changeSet),
                entries: changeSet.map((entry) => ({
                    id: entry.id,
                    address: entry.address,
                    kind: entry.kind,
                    action: entry.action,
                    phase: entry.phase ?? null,
                    reason: entry.reason,
                    deposed: entry.deposed,
                    create_before_destroy: entry.createBeforeDestroy,
                    changed_attributes: entry.changedAttributes,
                    after: entry.after,
                })),
            };
            return JSON.stringify(output, null, 2);
        },
    };
}
