/**
 * @fileoverview Plus-to-Space Planner
 *
 * Proposes replacing runs of "+" in a file name with a single space.
 *
 * @module domain/planners/PlusToSpacePlanner
 */

import type { Entity, PlannerPlugin, Proposal } from "@filekit/engine";
import { createProposal } from "@filekit/engine";
import { isFileEntry } from "../entities/FileEntry.js";
import { replacePluses } from "../utils/filename.js";

export class PlusToSpacePlanner implements PlannerPlugin {
    readonly id          = "plus-to-space";
    readonly name        = "Plus to Space";
    readonly description = "Replaces runs of '+' in file names with a single space";

    plan(entity: Entity<object>): Proposal | null {
        if (!isFileEntry(entity) || !entity.content.includes("+")) {
            return null;
        }

        const target = replacePluses(entity.content);
        if (target === null) {
            return createProposal("skip", { reason: "empty-name" });
        }

        return target === entity.content
            ? null
            : createProposal("rename", { target });
    }
}
