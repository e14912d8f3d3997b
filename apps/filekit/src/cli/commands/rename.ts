/**
 * @fileoverview Rename commands
 *
 * Wires the rename planners onto a BatchEngine domain over one directory.
 * Every rename command shares the same provider, actions and summary; only
 * the planners differ.
 *
 * @module cli/commands/rename
 */

import { resolve } from "path";
import {
    BatchEngine,
    PluginLoader,
    type ActionPlugin,
    type PlannerPlugin,
    type RunSummary,
} from "@filekit/engine";
import {
    AffixPlanner,
    AiRenamePlanner,
    DirectoryEntryProvider,
    MvsepPlanner,
    PlusToSpacePlanner,
    RenameAction,
    SkipAction,
    SpacingPlanner,
    normalizeAffixInput,
    type AffixMode,
} from "../../domain/index.js";
import type {
    AiRenameCommand,
    RenameOptions,
    RulesCommand,
    SimpleRenameCommand,
    StripCommand,
} from "../args.js";
import type { CommandContext } from "../context.js";
import { confirm, type Prompter } from "../prompt.js";
import { formatRenameSummary, summarizeRenameRun, type RenameCounts } from "../summary.js";

export interface RenamePass {
    readonly domainId: string;
    readonly name: string;
    readonly planners: PlannerPlugin[];

    /** Added after the rename and skip actions */
    readonly extraActions?: ActionPlugin[];

    /** Minimum confidence for the rename action (default: 0) */
    readonly minConfidence?: number;

    /** Only list files with these extensions */
    readonly extensions?: readonly string[];
}

/**
 * Run one rename pass and print its summary.
 *
 * @returns The counts that were printed
 */
export async function runRenamePass(
    options: RenameOptions,
    pass: RenamePass,
    context: CommandContext
): Promise<RenameCounts> {
    const dryRun = !options.live;

    const provider = new DirectoryEntryProvider({
        directory : options.directory,
        recursive : options.recursive,
        exclude   : options.exclude,
        extensions: pass.extensions ? [...pass.extensions] : undefined,
    });

    const engine = new BatchEngine({ logger: context.logger });
    engine.registerDomain({
        id      : pass.domainId,
        name    : pass.name,
        provider,
        planners: pass.planners,
        actions : [
            new RenameAction({
                bindings: { rename: { minConfidence: pass.minConfidence ?? 0 } },
                dryRun,
            }),
            new SkipAction(),
            ...(pass.extraActions ?? []),
        ],
    });

    context.print(`Scanning ${resolve(options.directory)}${options.recursive ? " (recursive)" : ""}`);
    if (dryRun) {
        context.print("DRY RUN: no files will be renamed. Use --live to rename.");
    }

    const run: RunSummary = await engine.run(pass.domainId);
    const summarized = summarizeRenameRun(run, dryRun);

    // Directories and other non-files never reach the engine
    const counts: RenameCounts = provider.skipped > 0
        ? { ...summarized, skipped: { ...summarized.skipped, "not-a-file": provider.skipped } }
        : summarized;

    if (provider.excluded > 0) {
        context.logger.debug(`Left out ${provider.excluded} excluded entries`);
    }

    context.print("");
    formatRenameSummary(counts).forEach(line => context.print(line));

    return counts;
}

function exitCodeOf(counts: RenameCounts): number {
    return counts.errors > 0 ? 1 : 0;
}

/**
 * `plus-to-space`, `fix-spaces` and `mvsep`.
 */
export async function runSimpleRename(command: SimpleRenameCommand, context: CommandContext): Promise<number> {
    const passes: Record<SimpleRenameCommand["name"], RenamePass> = {
        "plus-to-space": {
            domainId: "plus-to-space",
            name    : "Replace '+' with spaces",
            planners: [new PlusToSpacePlanner()],
        },
        "fix-spaces": {
            domainId: "fix-spaces",
            name    : "Fix misplaced spaces",
            planners: [new SpacingPlanner()],
        },
        "mvsep": {
            domainId  : "mvsep",
            name      : "Clean mvsep.com names",
            planners  : [new MvsepPlanner()],
            extensions: [".mp3"],
        },
    };

    return exitCodeOf(await runRenamePass(command, passes[command.name], context));
}

interface StripSettings {
    readonly mode: AffixMode;
    readonly value: string;
    readonly caseSensitive: boolean;
    readonly live: boolean;
}

/**
 * Ask for everything `strip` needs when no prefix or suffix was given.
 *
 * @returns null when the answers cannot be used
 */
export async function askStripSettings(prompter: Prompter, print: (line: string) => void): Promise<StripSettings | null> {
    print("Choose what to remove:");
    print("1. Prefix (from start of filename)");
    print("2. Suffix (after filename)");

    const choice = (await prompter.ask("Enter 1 or 2: ")).trim();
    if (choice !== "1" && choice !== "2") {
        print("Invalid choice.");
        return null;
    }

    const mode: AffixMode = choice === "1" ? "prefix" : "suffix";
    const value = normalizeAffixInput(mode, await prompter.ask(`Enter the ${mode} to remove: `));
    if (value.length === 0) {
        print(`No ${mode} given.`);
        return null;
    }

    const caseSensitive = await confirm(prompter, "Should the removal be case-sensitive?");
    const dryRun = await confirm(prompter, "Do you want to do a dry-run first?");

    return { mode, value, caseSensitive, live: !dryRun };
}

/**
 * `strip`: remove a prefix or suffix, asking for it when none was given.
 */
export async function runStrip(command: StripCommand, context: CommandContext): Promise<number> {
    let prompter: Prompter | null = null;

    try {
        let settings: StripSettings;

        if (command.prefix !== undefined || command.suffix !== undefined) {
            const mode: AffixMode = command.prefix !== undefined ? "prefix" : "suffix";
            settings = {
                mode,
                value        : normalizeAffixInput(mode, command.prefix ?? command.suffix ?? ""),
                caseSensitive: command.caseSensitive,
                live         : command.live,
            };
        }
        else {
            prompter = context.openPrompter();
            const asked = await askStripSettings(prompter, context.print);
            if (!asked) {
                return 1;
            }
            settings = asked;
        }

        if (settings.value.length === 0) {
            context.print(`No ${settings.mode} given.`);
            return 1;
        }

        if (settings.live && !command.yes) {
            context.print(`About to remove ${settings.mode} '${settings.value}' from file names in ${resolve(command.directory)}.`);
            prompter = prompter ?? context.openPrompter();
            if (!(await confirm(prompter, "Are you sure you want to proceed?"))) {
                context.print("Operation cancelled.");
                return 0;
            }
        }

        const planner = new AffixPlanner({
            mode         : settings.mode,
            value        : settings.value,
            caseSensitive: settings.caseSensitive,
        });

        const counts = await runRenamePass(
            { ...command, live: settings.live },
            { domainId: "strip", name: planner.name, planners: [planner] },
            context
        );
        return exitCodeOf(counts);
    }
    finally {
        prompter?.close();
    }
}

/**
 * `mvsep-ai`: model-suggested names for audio files.
 */
export async function runAiRename(command: AiRenameCommand, context: CommandContext): Promise<number> {
    const { config } = context;

    const planner = new AiRenamePlanner({
        suggester      : context.createSuggester(config),
        audioExtensions: config.audioExtensions,
        genericNames   : config.genericNames,
    });

    const counts = await runRenamePass(command, {
        domainId     : "mvsep-ai",
        name         : "AI rename",
        planners     : [planner],
        minConfidence: command.minConfidence ?? config.ai.minConfidence,
        extensions   : config.audioExtensions,
    }, context);

    return exitCodeOf(counts);
}

/**
 * `rules`: YAML rename rules and code plugins from one or more directories.
 */
export async function runRules(command: RulesCommand, context: CommandContext): Promise<number> {
    const directories = command.rulesDirs.length > 0 ? command.rulesDirs : [context.defaultRulesDir];

    const loader = new PluginLoader({ logger: context.logger });
    const plugins = await loader.loadFromDirectories(directories.map(dir => resolve(dir)));

    if (plugins.planners.length === 0) {
        context.print(`No rules found in: ${directories.join(", ")}`);
        return 1;
    }

    context.print(`Loaded ${plugins.planners.length} rule(s)`);

    const counts = await runRenamePass(command, {
        domainId    : "rules",
        name        : "User rules",
        planners    : plugins.planners,
        extraActions: plugins.actions,
    }, context);

    return exitCodeOf(counts);
}
