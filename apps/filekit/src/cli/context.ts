/**
 * @fileoverview Command context
 *
 * What every command gets from the entry point. Tests pass their own.
 *
 * @module cli/context
 */

import type { FilekitConfig } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import type { NameSuggester } from "../namers/index.js";
import type { Prompter } from "./prompt.js";

export interface CommandContext {
    readonly config: FilekitConfig;
    readonly logger: Logger;

    /** Writes one line of command output */
    readonly print: (line: string) => void;

    /** Opens a prompter for interactive questions */
    readonly openPrompter: () => Prompter;

    /** Builds the suggester used by `mvsep-ai` */
    readonly createSuggester: (config: FilekitConfig) => NameSuggester;

    /** Rules directory used when `--rules-dir` is not given */
    readonly defaultRulesDir: string;
}
