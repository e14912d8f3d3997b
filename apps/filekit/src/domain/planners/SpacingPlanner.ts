/**
 * @fileoverview Spacing Planner
 *
 * Proposes trimming a file name, collapsing whitespace runs and removing
 * spaces before the extension.
 *
 * @module domain/planners/SpacingPlanner
 */

import type { Entity, PlannerPlugin, Proposal } from "@filekit/engine";
import { createProposal } from "@filekit/engine";
import { isFileEntry } from "../entities/FileEntry.js";
import { fixMisplacedSpaces } from "../utils/filename.js";

export class SpacingPlanner implements PlannerPlugin {
    readonly id          = "fix-spaces";
    readonly name        = "Fix Spaces";
    readonly description = "Fixes leading, repeated and misplaced spaces in file names";

    plan(entity: Entity<object>): Proposal | null {
        if (!isFileEntry(entity)) {
            return null;
        }

        const target = fixMisplacedSpaces(entity.content);

        return target && target !== entity.content
            ? createProposal("rename", { target })
            : null;
    }
}
