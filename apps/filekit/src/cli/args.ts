/**
 * @fileoverview Command-line parsing
 *
 * Turns argv into a typed command. Parsing uses `util.parseArgs`, one
 * option table per command.
 *
 * @module cli/args
 */

import { parseArgs, type ParseArgsConfig } from "util";
import { isCollisionStrategy, type CollisionStrategy } from "../config/loadConfig.js";
import { isBlocklistFormat, type BlocklistFormat } from "../domain/blocklist/blocklist.js";

/**
 * Thrown for bad command lines; the entry point prints usage and exits with 2.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

export type RenameCommandName = "plus-to-space" | "fix-spaces" | "mvsep" | "mvsep-ai" | "strip" | "rules";

/**
 * Options shared by every command that renames files.
 */
export interface RenameOptions {
    readonly directory: string;
    readonly live: boolean;
    readonly recursive: boolean;
    readonly verbose: boolean;
    readonly exclude: string[];
    readonly configPath?: string;
}

export interface SimpleRenameCommand extends RenameOptions {
    readonly name: "plus-to-space" | "fix-spaces" | "mvsep";
}

export interface StripCommand extends RenameOptions {
    readonly name: "strip";
    readonly prefix?: string;
    readonly suffix?: string;
    readonly caseSensitive: boolean;
    readonly yes: boolean;
}

export interface AiRenameCommand extends RenameOptions {
    readonly name: "mvsep-ai";
    readonly minConfidence?: number;
}

export interface RulesCommand extends RenameOptions {
    readonly name: "rules";
    readonly rulesDirs: string[];
}

export interface ExtractCommand {
    readonly name: "extract";
    readonly directory: string;
    readonly passwords: string[];
    readonly keep: boolean;
    readonly collision?: CollisionStrategy;
    readonly verbose: boolean;
    readonly configPath?: string;
}

export interface BlocklistCommand {
    readonly name: "blocklist";
    readonly input: string;
    readonly from?: BlocklistFormat;
    readonly to: BlocklistFormat;
    readonly output?: string;
    readonly address?: string;
    readonly dedupe: boolean;
    readonly verbose: boolean;
    readonly configPath?: string;
}

export interface AlbumArtCommand {
    readonly name: "album-art";
    readonly audio: string;
    readonly image: string;
    readonly maxDimension?: number;
    readonly verbose: boolean;
    readonly configPath?: string;
}

export interface HelpCommand {
    readonly name: "help";
}

export type Command =
    | SimpleRenameCommand
    | StripCommand
    | AiRenameCommand
    | RulesCommand
    | ExtractCommand
    | BlocklistCommand
    | AlbumArtCommand
    | HelpCommand;

export const kUSAGE = `Usage: filekit <command> [options]

Rename commands (dry run unless --live):
  plus-to-space [dir]     Replace runs of '+' in file names with a space
  fix-spaces [dir]        Trim and collapse spaces, remove spaces before the extension
  strip [dir]             Remove a prefix or suffix (asks when neither is given)
      --prefix <text>       Prefix to remove
      --suffix <text>       Suffix to remove (before the extension)
      --case-sensitive      Match case exactly
      -y, --yes             Do not ask for confirmation before a live run
  mvsep [dir]             Clean mvsep.com MP3 names with fixed patterns
  mvsep-ai [dir]          Suggest 'Artist - Title (Stem)' names with OpenAI
      --min-confidence <n>  Minimum confidence to rename (default from config)
  rules [dir]             Apply YAML rename rules and code plugins
      --rules-dir <dir>     Rules directory (repeatable)

  Common rename options:
      --live                Rename files (default is a dry run)
      -r, --recursive       Descend into subdirectories
      --exclude <glob>      Leave out matching paths (repeatable)

Other commands:
  extract [dir]           Extract every .zip and .rar into a folder named after it
      -p, --password <pw>   Password to try (repeatable)
      --keep                Keep archives after extraction
      --collision <mode>    skip | overwrite | rename
  blocklist <file>        Convert a domain blocklist
      --to <format>         domains | adguard | hosts (required)
      --from <format>       Input format (detected when omitted)
      -o, --output <file>   Output file (default: <base>_<format>.txt)
      --ip <address>        Address for hosts entries (default 127.0.0.1)
      --dedupe              Drop repeated domains
  album-art <audio> <image>
                          Embed an image as the cover of an MP3 or FLAC file
      --max-dimension <px>  Longest side of the embedded image (default 2500)

Global options:
  -v, --verbose           Print debug output
  --config <file>         Configuration file (default: config/filekit.yml or $FILEKIT_CONFIG)
  -h, --help              Show this help
`;

const kRENAME_COMMANDS: readonly RenameCommandName[] = [
    "plus-to-space",
    "fix-spaces",
    "mvsep",
    "mvsep-ai",
    "strip",
    "rules",
];

function isRenameCommand(value: string): value is RenameCommandName {
    return kRENAME_COMMANDS.some(name => name === value);
}

const kGLOBAL_OPTIONS = {
    verbose: { type: "boolean", short: "v" },
    config : { type: "string" },
    help   : { type: "boolean", short: "h" },
} as const;

const kRENAME_OPTIONS = {
    ...kGLOBAL_OPTIONS,
    live     : { type: "boolean" },
    recursive: { type: "boolean", short: "r" },
    exclude  : { type: "string", multiple: true },
} as const;

function errorText(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Run parseArgs, turning its errors into usage errors.
 */
function parse<T extends ParseArgsConfig>(config: T): ReturnType<typeof parseArgs<T>> {
    try {
        return parseArgs(config);
    }
    catch (error) {
        throw new UsageError(errorText(error));
    }
}

function directoryFrom(positionals: string[], command: string): string {
    if (positionals.length > 1) {
        throw new UsageError(`${command} takes at most one directory`);
    }
    return positionals[0] ?? ".";
}

function numberOption(raw: string | undefined, flag: string, min: number, max: number, integer = false): number | undefined {
    if (raw === undefined) {
        return undefined;
    }

    const value = Number(raw);
    if (!Number.isFinite(value) || value < min || value > max || (integer && !Number.isInteger(value))) {
        throw new UsageError(`${flag} must be ${integer ? "an integer" : "a number"} between ${min} and ${max}`);
    }
    return value;
}

function formatOption(raw: string | undefined, flag: string): BlocklistFormat | undefined {
    if (raw === undefined) {
        return undefined;
    }
    if (!isBlocklistFormat(raw)) {
        throw new UsageError(`${flag} must be domains, adguard or hosts`);
    }
    return raw;
}

function parseRenameCommand(name: RenameCommandName, args: string[]): Command {
    const { values, positionals } = parse({
        args,
        allowPositionals: true,
        strict          : true,
        options         : {
            ...kRENAME_OPTIONS,
            "prefix"        : { type: "string" },
            "suffix"        : { type: "string" },
            "case-sensitive": { type: "boolean" },
            "yes"           : { type: "boolean", short: "y" },
            "min-confidence": { type: "string" },
            "rules-dir"     : { type: "string", multiple: true },
        },
    });

    if (values.help) {
        return { name: "help" };
    }

    const base: RenameOptions = {
        directory : directoryFrom(positionals, name),
        live      : values.live ?? false,
        recursive : values.recursive ?? false,
        verbose   : values.verbose ?? false,
        exclude   : values.exclude ?? [],
        configPath: values.config,
    };

    const stripOnly = values.prefix !== undefined || values.suffix !== undefined
        || values["case-sensitive"] !== undefined || values.yes !== undefined;
    if (stripOnly && name !== "strip") {
        throw new UsageError("--prefix, --suffix, --case-sensitive and --yes only apply to strip");
    }
    if (values["min-confidence"] !== undefined && name !== "mvsep-ai") {
        throw new UsageError("--min-confidence only applies to mvsep-ai");
    }
    if (values["rules-dir"] !== undefined && name !== "rules") {
        throw new UsageError("--rules-dir only applies to rules");
    }

    switch (name) {
        case "strip":
            if (values.prefix !== undefined && values.suffix !== undefined) {
                throw new UsageError("Give either --prefix or --suffix, not both");
            }
            return {
                ...base,
                name,
                prefix       : values.prefix,
                suffix       : values.suffix,
                caseSensitive: values["case-sensitive"] ?? false,
                yes          : values.yes ?? false,
            };
        case "mvsep-ai":
            return {
                ...base,
                name,
                minConfidence: numberOption(values["min-confidence"], "--min-confidence", 0, 1),
            };
        case "rules":
            return { ...base, name, rulesDirs: values["rules-dir"] ?? [] };
        default:
            return { ...base, name };
    }
}

function parseExtractCommand(args: string[]): Command {
    const { values, positionals } = parse({
        args,
        allowPositionals: true,
        strict          : true,
        options         : {
            ...kGLOBAL_OPTIONS,
            password : { type: "string", short: "p", multiple: true },
            keep     : { type: "boolean" },
            collision: { type: "string" },
        },
    });

    if (values.help) {
        return { name: "help" };
    }

    if (values.collision !== undefined && !isCollisionStrategy(values.collision)) {
        throw new UsageError("--collision must be skip, overwrite or rename");
    }

    return {
        name      : "extract",
        directory : directoryFrom(positionals, "extract"),
        passwords : values.password ?? [],
        keep      : values.keep ?? false,
        collision : isCollisionStrategy(values.collision) ? values.collision : undefined,
        verbose   : values.verbose ?? false,
        configPath: values.config,
    };
}

function parseBlocklistCommand(args: string[]): Command {
    const { values, positionals } = parse({
        args,
        allowPositionals: true,
        strict          : true,
        options         : {
            ...kGLOBAL_OPTIONS,
            from  : { type: "string" },
            to    : { type: "string" },
            output: { type: "string", short: "o" },
            ip    : { type: "string" },
            dedupe: { type: "boolean" },
        },
    });

    if (values.help) {
        return { name: "help" };
    }

    const input = positionals[0];
    if (input === undefined || positionals.length > 1) {
        throw new UsageError("blocklist takes exactly one input file");
    }

    const to = formatOption(values.to, "--to");
    if (to === undefined) {
        throw new UsageError("blocklist needs --to");
    }

    return {
        name      : "blocklist",
        input,
        from      : formatOption(values.from, "--from"),
        to,
        output    : values.output,
        address   : values.ip,
        dedupe    : values.dedupe ?? false,
        verbose   : values.verbose ?? false,
        configPath: values.config,
    };
}

function parseAlbumArtCommand(args: string[]): Command {
    const { values, positionals } = parse({
        args,
        allowPositionals: true,
        strict          : true,
        options         : {
            ...kGLOBAL_OPTIONS,
            "max-dimension": { type: "string" },
        },
    });

    if (values.help) {
        return { name: "help" };
    }

    const [audio, image] = positionals;
    if (audio === undefined || image === undefined || positionals.length > 2) {
        throw new UsageError("album-art takes an audio file and an image file");
    }

    return {
        name        : "album-art",
        audio,
        image,
        maxDimension: numberOption(values["max-dimension"], "--max-dimension", 1, 65535, true),
        verbose     : values.verbose ?? false,
        configPath  : values.config,
    };
}

/**
 * Parse the arguments after the program name.
 *
 * @throws UsageError for unknown commands, unknown options and bad values
 *
 * @example
 * ```typescript
 * parseCommand(["strip", "./music", "--suffix", "- Copy", "--live"]);
 * // { name: "strip", directory: "./music", suffix: "- Copy", live: true, ... }
 * ```
 */
export function parseCommand(argv: string[]): Command {
    const [name, ...rest] = argv;

    if (name === undefined || name === "help" || name === "--help" || name === "-h") {
        return { name: "help" };
    }

    if (isRenameCommand(name)) {
        return parseRenameCommand(name, rest);
    }

    switch (name) {
        case "extract":
            return parseExtractCommand(rest);
        case "blocklist":
            return parseBlocklistCommand(rest);
        case "album-art":
            return parseAlbumArtCommand(rest);
        default:
            throw new UsageError(`Unknown command: ${name}`);
    }
}
