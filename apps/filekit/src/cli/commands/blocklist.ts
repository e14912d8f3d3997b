/**
 * @fileoverview Blocklist command
 *
 * @module cli/commands/blocklist
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import { convertBlocklist, defaultOutputPath } from "../../domain/index.js";
import type { BlocklistCommand } from "../args.js";
import type { CommandContext } from "../context.js";

export async function runBlocklist(command: BlocklistCommand, context: CommandContext): Promise<number> {
    if (!existsSync(command.input)) {
        throw new Error(`Input file not found: ${command.input}`);
    }

    const result = convertBlocklist(readFileSync(command.input, "utf-8"), {
        from   : command.from,
        to     : command.to,
        dedupe : command.dedupe,
        address: command.address ?? context.config.blocklist.address,
    });

    if (command.from === undefined) {
        context.print(`Detected input format: ${result.from}`);
    }

    const output = command.output ?? defaultOutputPath(command.input, command.to);
    writeFileSync(output, result.output, "utf-8");

    context.logger.debug("Blocklist written", { output, bytes: result.output.length });
    context.print(`Converted ${result.domains.length} domains from ${result.from} to ${result.to}`);
    context.print(`Saved to: ${output}`);

    return 0;
}
