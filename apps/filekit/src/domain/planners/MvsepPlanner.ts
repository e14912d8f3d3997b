/**
 * @fileoverview mvsep Planner
 *
 * Proposes readable names for MP3 files from the mvsep.com separation
 * service, using fixed patterns only.
 *
 * @module domain/planners/MvsepPlanner
 */

import type { Entity, PlannerPlugin, Proposal } from "@filekit/engine";
import { createProposal } from "@filekit/engine";
import { isFileEntry } from "../entities/FileEntry.js";
import { cleanMvsepFilename, sanitizeWindowsChars, splitExt } from "../utils/filename.js";

export class MvsepPlanner implements PlannerPlugin {
    readonly id          = "mvsep";
    readonly name        = "mvsep Renamer";
    readonly description = "Cleans mvsep.com file names with fixed patterns";

    plan(entity: Entity<object>): Proposal | null {
        if (!isFileEntry(entity) || splitExt(entity.content)[1].toLowerCase() !== ".mp3") {
            return null;
        }

        const target = sanitizeWindowsChars(cleanMvsepFilename(entity.content));

        return target !== entity.content
            ? createProposal("rename", { target, tags: ["mvsep"] })
            : null;
    }
}
