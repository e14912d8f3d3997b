/**
 * @fileoverview CLI barrel exports
 *
 * @module cli
 */

export {
    parseCommand,
    UsageError,
    kUSAGE,
    type Command,
    type RenameOptions,
} from "./args.js";
export { runCommand } from "./run.js";
export { createPrompter, confirm, type Prompter } from "./prompt.js";
export type { CommandContext } from "./context.js";
export {
    summarizeRenameRun,
    formatRenameSummary,
    summarizeExtractRun,
    formatExtractSummary,
    type RenameCounts,
    type ExtractCounts,
} from "./summary.js";
