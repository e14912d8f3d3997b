/**
 * @fileoverview Archive Planner
 *
 * Proposes extracting ZIP and RAR archives.
 *
 * @module domain/planners/ArchivePlanner
 */

import type { Entity, PlannerPlugin, Proposal } from "@filekit/engine";
import { createProposal } from "@filekit/engine";
import { isFileEntry } from "../entities/FileEntry.js";
import { isSupportedArchive } from "../../adapters/archive/index.js";

export class ArchivePlanner implements PlannerPlugin {
    readonly id          = "archive";
    readonly name        = "Archive Finder";
    readonly description = "Proposes extraction for .zip and .rar files";

    plan(entity: Entity<object>): Proposal | null {
        if (!isFileEntry(entity) || !isSupportedArchive(entity.content)) {
            return null;
        }

        return createProposal("extract", { target: entity.metadata.path });
    }
}
