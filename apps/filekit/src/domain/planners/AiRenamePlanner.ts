/**
 * @fileoverview AI Rename Planner
 *
 * Proposes "Artist - Title (Stem)" names for audio files using a
 * NameSuggester (normally the OpenAI namer).
 *
 * This planner:
 * - Pre-processes the name to strip separation-service noise
 * - Skips generic names without calling the model
 * - Post-processes the suggestion and drops renames that change nothing
 *
 * @module domain/planners/AiRenamePlanner
 */

import type {
    Entity,
    PlannerPlugin,
    PlanningContext,
    Proposal,
} from "@filekit/engine";
import { createProposal } from "@filekit/engine";
import type { NameSuggester } from "../../namers/openai-namer.js";
import { isFileEntry } from "../entities/FileEntry.js";
import {
    postProcessSuggestion,
    preprocessMvsepFilename,
    splitExt,
} from "../utils/filename.js";

/**
 * Configuration options for AiRenamePlanner.
 */
export interface AiRenamePlannerConfig {
    /** Source of name suggestions */
    readonly suggester: NameSuggester;

    /** Lower-case extensions with a leading dot */
    readonly audioExtensions: readonly string[];

    /** Lower-case core names too generic to send to the model */
    readonly genericNames: readonly string[];
}

/**
 * AI Rename Planner
 *
 * @example
 * ```typescript
 * const planner = new AiRenamePlanner({
 *     suggester: new OpenAINamer(),
 *     audioExtensions: [".mp3", ".flac"],
 *     genericNames: ["track", "audio"],
 * });
 * ```
 */
export class AiRenamePlanner implements PlannerPlugin {
    readonly id          = "ai-rename";
    readonly name        = "AI Renamer";
    readonly description = "Suggests 'Artist - Title (Stem)' names with a language model";

    private readonly suggester: NameSuggester;
    private readonly audioExtensions: Set<string>;
    private readonly genericNames: Set<string>;

    constructor(config: AiRenamePlannerConfig) {
        this.suggester       = config.suggester;
        this.audioExtensions = new Set(config.audioExtensions);
        this.genericNames    = new Set(config.genericNames);
    }

    async plan(entity: Entity<object>, context: PlanningContext): Promise<Proposal | null> {
        if (!isFileEntry(entity)) {
            return null;
        }

        const fileName = entity.content;
        const [currentStem, extension] = splitExt(fileName);
        if (!this.audioExtensions.has(extension.toLowerCase())) {
            return null;
        }

        const { core, stem, isRaw } = preprocessMvsepFilename(fileName);

        context.logger.debug("Pre-processed", { fileName, core, stem, isRaw });

        if (!core || this.genericNames.has(core.toLowerCase())) {
            return createProposal("skip", { reason: "generic" });
        }

        const suggestion = await this.suggester.suggest({ core, stem, isRaw, fileName });

        if (suggestion.explanation) {
            context.logger.warn(suggestion.explanation, { fileName });
        }

        if (suggestion.status === "no_change") {
            return createProposal("skip", { reason: "no-change" });
        }

        if (suggestion.status !== "rename" || !suggestion.name) {
            return createProposal("skip", { reason: "no-suggestion" });
        }

        const base = postProcessSuggestion(suggestion.name);
        if (!base) {
            return createProposal("skip", { reason: "no-suggestion" });
        }

        const target = base + extension;

        if (!isRaw) {
            const lowerStem = currentStem.toLowerCase();
            const sameName = target.toLowerCase() === fileName.toLowerCase();
            const onlyAddsFullMix = !currentStem.includes("(")
                && base.toLowerCase() === `${lowerStem} (full mix)`;

            if (sameName || onlyAddsFullMix) {
                return createProposal("skip", { reason: "no-change" });
            }
        }

        if (target === fileName) {
            return createProposal("skip", { reason: "no-change" });
        }

        return createProposal("rename", {
            target,
            confidence: suggestion.confidence,
            tags      : ["ai"],
        });
    }
}
