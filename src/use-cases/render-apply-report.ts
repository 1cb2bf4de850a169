import type { ApplyResult, NodeReport } from "../entities/apply-result.js";
import type { ContentSyncOutcome } from "../entities/content-sync-outcome.js";

export interface ApplyReportRenderer {
    render(
        result: ApplyResult,
        content?: ContentSyncOutcome | undefined,
    ): string;
}

function describeReport(report: NodeReport): string {
    if (report.outcome === "failed") {
        return `${report.id}: failed (${report.error?.message ?? "unknown error"})`;
    }
    if (report.outcome === "blocked") {
        return `${report.id}: blocked by ${report.blockedBy ?? "a failed dependency"}`;
    }
    return `${report.id}: ${report.outcome}`;
}

function describeContent(content: ContentSyncOutcome): string {
    switch (content.status) {
        case "synced": {
            const { report } = content;
            const invalidation = report.invalidationId
                ? `, invalidation ${report.invalidationId}`
                : "";
            return `Content: ${report.uploaded.length} uploaded, ${report.deleted.length} deleted, ${report.unchanged} unchanged${invalidation}`;
        }
        case "skipped":
            return `Content: skipped (${content.reason})`;
        case "failed":
            return `Content: failed (${content.error.message})`;
    }
}

export function createApplyReportRenderer(): ApplyReportRenderer {
    return {
        render(
            result: ApplyResult,
            content?: ContentSyncOutcome | undefined,
        ): string {
            const lines = result.reports.map(describeReport);
            lines.push(
                "",
                `Apply finished: ${result.succeeded.length} succeeded, ${result.failed.length} failed, ${result.blocked.length} blocked, ${result.cancelled.length} cancelled.`,
            );
            if (content) {
                lines.push(describeContent(content));
            }
            return lines.join("\n");
        },
    };
}
