/**
 * @fileoverview Run summaries
 *
 * Counts a RunSummary's outcomes the way the commands report them.
 *
 * @module cli/summary
 */

import type { RunSummary } from "@filekit/engine";

export interface RenameCounts {
    readonly processed: number;
    readonly renamed: number;
    /** Skips keyed by reason, in the order they were first seen */
    readonly skipped: Readonly<Record<string, number>>;
    readonly duplicates: number;
    readonly errors: number;
    readonly dryRun: boolean;
}

export interface ExtractCounts {
    readonly found: number;
    readonly processed: number;
    readonly failed: number;
}

/**
 * Count the outcomes of a rename run.
 *
 * An outcome with no proposal counts as skipped `no-match`. A proposal no
 * action ran for (the binding's confidence was not met) counts as skipped
 * `low-confidence`.
 */
export function summarizeRenameRun(run: RunSummary, dryRun: boolean): RenameCounts {
    let renamed = 0;
    let duplicates = 0;
    let errors = 0;
    const skipped: Record<string, number> = {};

    const skip = (reason: string): void => {
        skipped[reason] = (skipped[reason] ?? 0) + 1;
    };

    for (const outcome of run.outcomes) {
        if (outcome.error !== undefined) {
            errors++;
            continue;
        }

        if (outcome.proposal === null) {
            skip("no-match");
            continue;
        }

        if (outcome.proposal.operation === "skip") {
            skip(outcome.proposal.reason ?? "unspecified");
            continue;
        }

        if (outcome.results.length === 0) {
            skip("low-confidence");
            continue;
        }

        for (const result of outcome.results) {
            switch (result.status) {
                case "renamed":
                case "would-rename":
                    renamed++;
                    break;
                case "skipped-exists":
                    duplicates++;
                    break;
                case "unchanged":
                    skip("unchanged");
                    break;
                default:
                    if (!result.success) {
                        errors++;
                    }
            }
        }
    }

    return {
        processed: run.scanned,
        renamed,
        skipped,
        duplicates,
        errors,
        dryRun,
    };
}

/**
 * Summary lines for a rename run.
 *
 * @example
 * ```typescript
 * formatRenameSummary(counts);
 * // ["--- Summary ---", "Processed: 4", "Would rename: 2", "Skipped (no-match): 1", "Duplicates (target exists): 1", "Errors: 0"]
 * ```
 */
export function formatRenameSummary(counts: RenameCounts): string[] {
    return [
        "--- Summary ---",
        `Processed: ${counts.processed}`,
        `${counts.dryRun ? "Would rename" : "Renamed"}: ${counts.renamed}`,
        ...Object.entries(counts.skipped).map(([reason, count]) => `Skipped (${reason}): ${count}`),
        `Duplicates (target exists): ${counts.duplicates}`,
        `Errors: ${counts.errors}`,
    ];
}

/**
 * Count the archives an extract run handed to the extract action.
 */
export function summarizeExtractRun(run: RunSummary, actionId: string = "extract-archive"): ExtractCounts {
    let found = 0;
    let processed = 0;
    let failed = 0;

    for (const outcome of run.outcomes) {
        for (const result of outcome.results) {
            if (result.actionId !== actionId) {
                continue;
            }

            found++;
            if (result.success) {
                processed++;
            }
            else {
                failed++;
            }
        }
    }

    return { found, processed, failed };
}

export function formatExtractSummary(counts: ExtractCounts): string[] {
    if (counts.found === 0) {
        return ["No supported archive files (.zip, .rar) found in the directory."];
    }

    return [
        "--- Summary ---",
        `Archives processed successfully: ${counts.processed}`,
        `Archives failed: ${counts.failed}`,
    ];
}
