/**
 * @fileoverview YAML rename rules
 *
 * A rule is a regex replacement over a file name:
 *
 * ```yaml
 * - name: plus-to-space
 *   match:
 *     regex: "\\+"
 *   replace: " "
 * ```
 *
 * By default the pattern sees only the stem; the extension is put back
 * after the replacement. `scope: name` matches the whole name instead.
 *
 * @module @filekit/engine/plugins/renameRules
 */

import { parse as parseYaml } from "yaml";
import type { PlannerPlugin } from "../contracts/PlannerPlugin.js";
import { createProposal } from "../contracts/Proposal.js";

export interface YamlRenameRule {
    /** Planner id becomes `yaml:<name>` */
    name: string;
    description?: string;

    match: {
        regex: string;

        /** Default "g" */
        flags?: string;

        /** Default "stem" */
        scope?: "stem" | "name";
    };

    /** $1-style groups allowed. Default "" */
    replace?: string;

    /** Default 1.0 */
    confidence?: number;

    tags?: string[];
}

export interface ParsedRules {
    rules: YamlRenameRule[];

    /** Entries that were not rules */
    invalid: number;
}

export function isYamlRenameRule(value: unknown): value is YamlRenameRule {
    if (typeof value !== "object" || value === null || !("name" in value) || typeof value.name !== "string") {
        return false;
    }
    if (!("match" in value) || typeof value.match !== "object" || value.match === null) {
        return false;
    }

    const match = value.match;
    if (!("regex" in match) || typeof match.regex !== "string") {
        return false;
    }

    return !("scope" in match) || match.scope === "stem" || match.scope === "name";
}

/**
 * Parse a YAML document holding one rule or a list of them.
 */
export function parseRenameRules(text: string): ParsedRules {
    const parsed: unknown = parseYaml(text);
    if (parsed === null || parsed === undefined) {
        return { rules: [], invalid: 0 };
    }

    const entries: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
    const rules = entries.filter(isYamlRenameRule);

    return { rules, invalid: entries.length - rules.length };
}

/**
 * Split at the last dot. Matches `splitExt` in the app; the engine does
 * not depend on the app, so it keeps its own copy.
 *
 * @example
 * ```typescript
 * splitExtension("a.b.txt");  // ["a.b", ".txt"]
 * splitExtension(".hidden");  // [".hidden", ""]
 * splitExtension("a.b.");     // ["a.b", "."]
 * ```
 */
function splitExtension(name: string): [string, string] {
    const dot = name.lastIndexOf(".");
    if (dot <= 0 || !/[^.]/.test(name.slice(0, dot))) {
        return [name, ""];
    }
    return [name.slice(0, dot), name.slice(dot)];
}

/**
 * Turn a rule into a planner. It proposes a rename only when the
 * replacement changes the name and leaves something behind.
 *
 * @throws SyntaxError for an invalid pattern or flags
 */
export function createPlannerFromYaml(rule: YamlRenameRule): PlannerPlugin {
    const { regex, flags = "g", scope = "stem" } = rule.match;
    // Compile once up front so a bad pattern fails at load time
    const source = new RegExp(regex, flags);

    return {
        id         : `yaml:${rule.name}`,
        name       : rule.name,
        description: rule.description,

        plan(entity) {
            const [stem, extension] = scope === "stem" ? splitExtension(entity.content) : [entity.content, ""];
            const renamed = stem.replace(new RegExp(source), rule.replace ?? "");

            if (renamed === stem || renamed === "") {
                return null;
            }

            return createProposal("rename", {
                target    : renamed + extension,
                confidence: rule.confidence ?? 1.0,
                tags      : rule.tags,
            });
        },
    };
}
