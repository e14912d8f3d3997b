/**
 * @fileoverview Affix Planner
 *
 * Proposes removing a fixed prefix or suffix from file names.
 *
 * @module domain/planners/AffixPlanner
 */

import type { Entity, PlannerPlugin, Proposal } from "@filekit/engine";
import { createProposal } from "@filekit/engine";
import { isFileEntry } from "../entities/FileEntry.js";
import { stripPrefix, stripSuffix, type AffixMode } from "../utils/filename.js";

/**
 * Configuration for AffixPlanner
 */
export interface AffixPlannerConfig {
    /** Remove from the start of the name or from the end of the stem */
    readonly mode: AffixMode;

    /** The string to remove; already normalised with normalizeAffixInput */
    readonly value: string;

    /** Compare case-sensitively (default: false) */
    readonly caseSensitive?: boolean;
}

/**
 * Affix Planner
 *
 * @example
 * ```typescript
 * const planner = new AffixPlanner({ mode: "suffix", value: "- Copy" });
 * // "report - Copy.docx" -> rename to "report.docx"
 * ```
 */
export class AffixPlanner implements PlannerPlugin {
    readonly id = "strip-affix";
    readonly name: string;
    readonly description = "Removes a prefix or suffix from file names";

    private readonly config: Required<AffixPlannerConfig>;

    constructor(config: AffixPlannerConfig) {
        if (config.value.length === 0) {
            throw new Error(`Empty ${config.mode} given`);
        }

        this.config = {
            mode         : config.mode,
            value        : config.value,
            caseSensitive: config.caseSensitive ?? false,
        };
        this.name = config.mode === "prefix" ? "Strip Prefix" : "Strip Suffix";
    }

    plan(entity: Entity<object>): Proposal | null {
        if (!isFileEntry(entity)) {
            return null;
        }

        const { mode, value, caseSensitive } = this.config;
        const target = mode === "prefix"
            ? stripPrefix(entity.content, value, caseSensitive)
            : stripSuffix(entity.content, value, caseSensitive);

        return target !== null && target !== entity.content
            ? createProposal("rename", { target })
            : null;
    }
}
