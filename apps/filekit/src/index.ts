/**
 * @fileoverview filekit - Main Entry Point
 *
 * Parses the command line, loads the configuration and hands the
 * command to its runner. Each command builds its own BatchEngine domain
 * (provider, planners, actions) and runs it once.
 *
 * Exit codes: 0 on success, 1 when a command reports failures or throws,
 * 2 for usage errors.
 *
 * @module filekit
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { loadConfigWithFallback } from "./config/index.js";
import { createConsoleLogger } from "./logging/index.js";
import { OpenAINamer } from "./namers/index.js";
import {
    createPrompter,
    kUSAGE,
    parseCommand,
    runCommand,
    UsageError,
    type Command,
    type CommandContext,
} from "./cli/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const kDEFAULT_CONFIG_PATH = join(__dirname, "..", "config", "filekit.yml");
const kDEFAULT_RULES_DIR = join(__dirname, "..", "user", "rules");

/**
 * Parse argv, printing usage for a bad command line.
 *
 * @returns null after a usage error
 */
function parseOrReport(argv: string[]): Command | null {
    try {
        return parseCommand(argv);
    }
    catch (error) {
        if (error instanceof UsageError) {
            console.error(`Error: ${error.message}\n`);
            console.error(kUSAGE);
            return null;
        }
        throw error;
    }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const command = parseOrReport(process.argv.slice(2));
    if (!command) {
        process.exitCode = 2;
        return;
    }

    const verbose = command.name !== "help" && command.verbose;
    const configPath = (command.name !== "help" ? command.configPath : undefined)
        ?? process.env.FILEKIT_CONFIG
        ?? kDEFAULT_CONFIG_PATH;

    const context: CommandContext = {
        config         : loadConfigWithFallback(configPath),
        logger         : createConsoleLogger({ verbose }),
        print          : line => console.log(line),
        openPrompter   : () => createPrompter(),
        createSuggester: config => new OpenAINamer({
            model       : config.ai.model,
            temperature : config.ai.temperature,
            maxTokens   : config.ai.maxTokens,
            languageHint: config.ai.languageHint,
        }),
        defaultRulesDir: kDEFAULT_RULES_DIR,
    };

    process.exitCode = await runCommand(command, context);
}

main().catch((error: unknown) => {
    console.error("[FATAL]", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});
