/**
 * @fileoverview Rename Action Plugin
 *
 * Implements the ActionPlugin contract to rename a file to the
 * proposal's target name, in the same directory.
 *
 * @module domain/actions/RenameAction
 */

import { existsSync, renameSync, statSync } from "fs";
import { join, sep } from "path";
import type {
    ActionPlugin,
    ActionResult,
    ActionContext,
    ActionBindings,
} from "@filekit/engine";
import { isFileEntry } from "../entities/FileEntry.js";

/**
 * Configuration for RenameAction
 */
export interface RenameActionConfig {
    /**
     * Bindings that map operations to minimum confidence thresholds.
     * Example: { "rename": { minConfidence: 0.6 } }
     */
    readonly bindings?: ActionBindings;

    /**
     * If true, report what would happen without renaming anything.
     * Defaults to false.
     */
    readonly dryRun?: boolean;
}

const DEFAULT_BINDINGS: ActionBindings = {
    rename: {},
};

/**
 * Whether two existing paths are the same file (a case-only rename on
 * a case-insensitive file system, for example).
 */
function isSameFile(a: string, b: string): boolean {
    try {
        const first = statSync(a);
        const second = statSync(b);
        return first.dev === second.dev && first.ino === second.ino;
    }
    catch {
        return false;
    }
}

/**
 * Rename Action Plugin
 *
 * Results carry a status the command summary counts:
 * - `renamed` / `would-rename`
 * - `unchanged` when the target is the current name
 * - `skipped-exists` when another file already has the target name
 *
 * @example
 * ```typescript
 * const action = new RenameAction({
 *     bindings: { rename: { minConfidence: 0.6 } },
 *     dryRun: true,
 * });
 * ```
 */
export class RenameAction implements ActionPlugin {
    readonly id          = "rename-file";
    readonly name        = "Rename File";
    readonly description = "Renames a file to the proposed name";
    readonly bindings: ActionBindings;

    private readonly dryRun: boolean;

    constructor(config: RenameActionConfig = {}) {
        this.bindings = config.bindings ?? DEFAULT_BINDINGS;
        this.dryRun   = config.dryRun ?? false;
    }

    async handle(context: ActionContext): Promise<ActionResult> {
        const { entity, proposal, logger } = context;

        if (!isFileEntry(entity)) {
            return this.failed("Entity is not a file entry");
        }

        const current = entity.content;
        const target = proposal.target;

        if (!target) {
            logger.warn("Cannot rename: no target in proposal", { file: current });
            return this.failed("No target name in proposal");
        }
        if (target.includes("/") || target.includes(sep) || target === "." || target === "..") {
            logger.warn("Cannot rename: target is not a plain file name", { file: current, target });
            return this.failed(`Invalid target name: ${target}`);
        }
        if (target === current) {
            return this.done("unchanged");
        }

        const from = entity.metadata.path;
        const to = join(entity.metadata.directory, target);

        if (existsSync(to) && !isSameFile(from, to)) {
            logger.warn(`Target file '${target}' already exists. Skipping rename.`, { file: current });
            return this.done("skipped-exists", { from, to });
        }

        if (this.dryRun) {
            logger.info(`DRY RUN: Would rename '${current}' to '${target}'`);
            return this.done("would-rename", { from, to, dryRun: true });
        }

        try {
            renameSync(from, to);
        }
        catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error("Could not rename file", { file: current, target, error: message });
            return this.failed(message);
        }

        logger.info(`Renamed '${current}' to '${target}'`);
        return this.done("renamed", { from, to });
    }

    private done(status: string, data?: Record<string, unknown>): ActionResult {
        return { actionId: this.id, success: true, status, ...(data && { data }) };
    }

    private failed(error: string): ActionResult {
        return { actionId: this.id, success: false, status: "error", error };
    }
}
