/**
 * @fileoverview Command dispatch
 *
 * @module cli/run
 */

import type { Command } from "./args.js";
import { kUSAGE } from "./args.js";
import type { CommandContext } from "./context.js";
import {
    runAiRename,
    runAlbumArt,
    runBlocklist,
    runExtract,
    runRules,
    runSimpleRename,
    runStrip,
} from "./commands/index.js";

/**
 * Run a parsed command.
 *
 * @returns The process exit code
 */
export async function runCommand(command: Command, context: CommandContext): Promise<number> {
    switch (command.name) {
        case "help":
            context.print(kUSAGE);
            return 0;
        case "plus-to-space":
        case "fix-spaces":
        case "mvsep":
            return runSimpleRename(command, context);
        case "strip":
            return runStrip(command, context);
        case "mvsep-ai":
            return runAiRename(command, context);
        case "rules":
            return runRules(command, context);
        case "extract":
            return runExtract(command, context);
        case "blocklist":
            return runBlocklist(command, context);
        case "album-art":
            return runAlbumArt(command, context);
    }
}
