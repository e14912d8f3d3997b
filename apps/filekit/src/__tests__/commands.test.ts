/**
 * @fileoverview Integration tests for the CLI commands
 *
 * Tests cover:
 * - Dry-run and live rename passes over a temporary directory
 * - strip with flags and with interactive answers
 * - mvsep-ai confidence threshold with a fake suggester
 * - rules loaded from a YAML directory
 * - extract, blocklist and help output
 *
 * @module cli/__tests__/commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import AdmZip from "adm-zip";
import { getDefaultConfig, type FilekitConfig } from "../config/index.js";
import type { CommandContext } from "../cli/context.js";
import { kUSAGE } from "../cli/args.js";
import { runCommand } from "../cli/run.js";
import {
    runAiRename,
    runBlocklist,
    runExtract,
    runRules,
    runSimpleRename,
    runStrip,
} from "../cli/commands/index.js";
import type { NameSuggestion } from "../namers/index.js";

function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

function createFakePrompter(answers: string[]) {
    const queue = [...answers];
    return {
        ask  : vi.fn(async (_question: string) => queue.shift() ?? ""),
        close: vi.fn(),
    };
}

const kRAW_NAME = "20240101123456-abcdef0123-sa-teet-sen_htdemucs_ft_vocals_[mvsep.com].mp3";

describe("commands", () => {
    let directory: string;
    let lines: string[];

    function createTestContext(overrides: Partial<CommandContext> = {}): CommandContext {
        return {
            config         : getDefaultConfig(),
            logger         : createMockLogger(),
            print          : line => {
                lines.push(line);
            },
            openPrompter   : () => createFakePrompter([]),
            createSuggester: () => ({
                suggest: async (): Promise<NameSuggestion> => ({ status: "unknown", confidence: 0 }),
            }),
            defaultRulesDir: join(directory, "no-rules"),
            ...overrides,
        };
    }

    function touch(...names: string[]): void {
        for (const name of names) {
            writeFileSync(join(directory, name), name);
        }
    }

    function listNames(): string[] {
        return readdirSync(directory).sort();
    }

    const renameOptions = () => ({
        directory,
        live     : false,
        recursive: false,
        verbose  : false,
        exclude  : [],
    });

    beforeEach(() => {
        vi.clearAllMocks();
        directory = mkdtempSync(join(tmpdir(), "filekit-commands-"));
        lines = [];
    });

    afterEach(() => {
        rmSync(directory, { recursive: true, force: true });
    });

    describe("plus-to-space", () => {
        // Scenario: Dry run
        it("should report what would change and leave the files alone", async () => {
            touch("a+b.mp3", "c++d.txt", "plain.mp3");

            const code = await runSimpleRename({ ...renameOptions(), name: "plus-to-space" }, createTestContext());

            expect(code).toBe(0);
            expect(lines).toEqual([
                `Scanning ${directory}`,
                "DRY RUN: no files will be renamed. Use --live to rename.",
                "",
                "--- Summary ---",
                "Processed: 3",
                "Would rename: 2",
                "Skipped (no-match): 1",
                "Duplicates (target exists): 0",
                "Errors: 0",
            ]);
            expect(listNames()).toEqual(["a+b.mp3", "c++d.txt", "plain.mp3"]);
        });

        // Scenario: Directories in a non-recursive scan
        it("should count directories as skipped non-files in the summary", async () => {
            touch("a+b.mp3", "plain.mp3");
            mkdirSync(join(directory, "album+one"));

            await runSimpleRename({ ...renameOptions(), name: "plus-to-space" }, createTestContext());

            expect(lines.slice(3)).toEqual([
                "--- Summary ---",
                "Processed: 2",
                "Would rename: 1",
                "Skipped (no-match): 1",
                "Skipped (not-a-file): 1",
                "Duplicates (target exists): 0",
                "Errors: 0",
            ]);
            expect(listNames()).toEqual(["a+b.mp3", "album+one", "plain.mp3"]);
        });

        // Scenario: Live run with a taken target
        it("should rename live and count existing targets as duplicates", async () => {
            touch("a+b.mp3", "c++d.txt", "c d.txt");

            await runSimpleRename({ ...renameOptions(), name: "plus-to-space", live: true }, createTestContext());

            expect(listNames()).toEqual(["a b.mp3", "c d.txt", "c++d.txt"]);
            expect(lines).toContain("Renamed: 1");
            expect(lines).toContain("Duplicates (target exists): 1");
            expect(lines).not.toContain("DRY RUN: no files will be renamed. Use --live to rename.");
        });
    });

    // Scenario: Recursive fix-spaces with an exclude
    it("should fix spaces recursively outside excluded paths", async () => {
        mkdirSync(join(directory, "keep"));
        mkdirSync(join(directory, "skip"));
        writeFileSync(join(directory, "keep", "song .mp3"), "x");
        writeFileSync(join(directory, "skip", "other .mp3"), "x");

        await runSimpleRename({
            ...renameOptions(),
            name     : "fix-spaces",
            live     : true,
            recursive: true,
            exclude  : ["skip"],
        }, createTestContext());

        expect(lines[0]).toBe(`Scanning ${directory} (recursive)`);
        expect(readdirSync(join(directory, "keep"))).toEqual(["song.mp3"]);
        expect(readdirSync(join(directory, "skip"))).toEqual(["other .mp3"]);
    });

    describe("strip", () => {
        // Scenario: Suffix from the command line
        it("should strip a suffix without asking when --yes is given", async () => {
            touch("song - Copy.mp3", "other.mp3");
            const openPrompter = vi.fn(() => createFakePrompter([]));

            const code = await runStrip({
                ...renameOptions(),
                name         : "strip",
                suffix       : " - Copy",
                caseSensitive: false,
                yes          : true,
                live         : true,
            }, createTestContext({ openPrompter }));

            expect(code).toBe(0);
            expect(listNames()).toEqual(["other.mp3", "song.mp3"]);
            expect(openPrompter).not.toHaveBeenCalled();
        });

        // Scenario: Live run declined
        it("should cancel a live run when the user declines", async () => {
            touch("song - Copy.mp3");
            const prompter = createFakePrompter(["n"]);

            const code = await runStrip({
                ...renameOptions(),
                name         : "strip",
                suffix       : " - Copy",
                caseSensitive: false,
                yes          : false,
                live         : true,
            }, createTestContext({ openPrompter: () => prompter }));

            expect(code).toBe(0);
            expect(prompter.ask).toHaveBeenCalledWith("Are you sure you want to proceed? (y/n): ");
            expect(lines).toEqual([
                `About to remove suffix '- Copy' from file names in ${directory}.`,
                "Operation cancelled.",
            ]);
            expect(listNames()).toEqual(["song - Copy.mp3"]);
            expect(prompter.close).toHaveBeenCalledTimes(1);
        });

        // Scenario: Interactive answers
        it("should ask for the mode, text and options when none were given", async () => {
            touch("Track01 intro.mp3", "Track01 outro.mp3", "other.mp3");
            const prompter = createFakePrompter(["1", "track01", "n", "y"]);

            await runStrip({
                ...renameOptions(),
                name         : "strip",
                caseSensitive: false,
                yes          : false,
                live         : true,
            }, createTestContext({ openPrompter: () => prompter }));

            expect(prompter.ask.mock.calls.map(([question]) => question)).toEqual([
                "Enter 1 or 2: ",
                "Enter the prefix to remove: ",
                "Should the removal be case-sensitive? (y/n): ",
                "Do you want to do a dry-run first? (y/n): ",
            ]);
            expect(lines).toContain("DRY RUN: no files will be renamed. Use --live to rename.");
            expect(lines).toContain("Would rename: 2");
            expect(listNames()).toEqual(["Track01 intro.mp3", "Track01 outro.mp3", "other.mp3"]);
            expect(prompter.close).toHaveBeenCalledTimes(1);
        });

        // Scenario: Bad menu choice
        it("should stop on an invalid choice", async () => {
            const prompter = createFakePrompter(["3"]);

            const code = await runStrip({
                ...renameOptions(),
                name         : "strip",
                caseSensitive: false,
                yes          : false,
            }, createTestContext({ openPrompter: () => prompter }));

            expect(code).toBe(1);
            expect(lines).toEqual([
                "Choose what to remove:",
                "1. Prefix (from start of filename)",
                "2. Suffix (after filename)",
                "Invalid choice.",
            ]);
        });
    });

    describe("mvsep-ai", () => {
        const suggestion: NameSuggestion = {
            status    : "rename",
            name      : "Unknown Artist - Sä Teet Sen (Vocals)",
            confidence: 0.5,
        };

        // Scenario: Suggestion below the configured threshold
        it("should not rename below the configured confidence", async () => {
            touch(kRAW_NAME, "notes.txt");
            const createSuggester = vi.fn((_config: FilekitConfig) => ({ suggest: async () => suggestion }));
            const context = createTestContext({ createSuggester });

            await runAiRename({ ...renameOptions(), name: "mvsep-ai", live: true }, context);

            expect(createSuggester).toHaveBeenCalledWith(context.config);
            expect(lines).toContain("Processed: 1");
            expect(lines).toContain("Skipped (low-confidence): 1");
            expect(listNames()).toEqual([kRAW_NAME, "notes.txt"]);
        });

        // Scenario: Threshold lowered on the command line
        it("should rename when the command lowers the threshold", async () => {
            touch(kRAW_NAME);

            await runAiRename(
                { ...renameOptions(), name: "mvsep-ai", live: true, minConfidence: 0.4 },
                createTestContext({ createSuggester: () => ({ suggest: async () => suggestion }) })
            );

            expect(listNames()).toEqual(["Sä Teet Sen (Vocals).mp3"]);
        });
    });

    describe("rules", () => {
        // Scenario: YAML rule directory
        it("should apply rules from the given directory", async () => {
            const rulesDir = mkdtempSync(join(tmpdir(), "filekit-rules-"));
            writeFileSync(join(rulesDir, "rules.yml"), "- name: underscores\n  match:\n    regex: \"_+\"\n  replace: \" \"\n");
            touch("my__song.mp3", "plain.mp3");

            try {
                const code = await runRules(
                    { ...renameOptions(), name: "rules", live: true, rulesDirs: [rulesDir] },
                    createTestContext()
                );

                expect(code).toBe(0);
                expect(lines[0]).toBe("Loaded 1 rule(s)");
                expect(listNames()).toEqual(["my song.mp3", "plain.mp3"]);
            }
            finally {
                rmSync(rulesDir, { recursive: true, force: true });
            }
        });

        // Scenario: Nothing to load
        it("should fail when no rules are found", async () => {
            const context = createTestContext();

            const code = await runRules({ ...renameOptions(), name: "rules", rulesDirs: [] }, context);

            expect(code).toBe(1);
            expect(lines).toEqual([`No rules found in: ${context.defaultRulesDir}`]);
        });
    });

    describe("extract", () => {
        // Scenario: One archive among other files
        it("should extract archives and print a summary", async () => {
            const zip = new AdmZip();
            zip.addFile("a.txt", Buffer.from("hello"));
            zip.writeZip(join(directory, "photos.zip"));
            touch("notes.txt");

            const code = await runExtract({
                name     : "extract",
                directory,
                passwords: [],
                keep     : false,
                verbose  : false,
            }, createTestContext());

            expect(code).toBe(0);
            expect(lines).toEqual([
                `Extracted: ${join(directory, "photos.zip")}`,
                "",
                "--- Summary ---",
                "Archives processed successfully: 1",
                "Archives failed: 0",
                `Log file: ${join(directory, "archive_extraction.log")}`,
            ]);
            expect(readFileSync(join(directory, "photos", "a.txt"), "utf-8")).toBe("hello");
            expect(existsSync(join(directory, "photos.zip"))).toBe(false);
            expect(readFileSync(join(directory, "archive_extraction.log"), "utf-8")).toContain(" - INFO - Starting extraction in ");
        });

        // Scenario: No archives
        it("should say when there is nothing to extract", async () => {
            touch("notes.txt");

            const code = await runExtract({
                name     : "extract",
                directory,
                passwords: [],
                keep     : false,
                verbose  : false,
            }, createTestContext());

            expect(code).toBe(0);
            expect(lines).toEqual(["", "No supported archive files (.zip, .rar) found in the directory."]);
        });

        // Scenario: Missing directory
        it("should throw for a missing directory", async () => {
            const missing = join(directory, "missing");

            await expect(runExtract({
                name     : "extract",
                directory: missing,
                passwords: [],
                keep     : false,
                verbose  : false,
            }, createTestContext())).rejects.toThrow(`Directory not found: ${missing}`);
        });
    });

    describe("blocklist", () => {
        // Scenario: Detected format and default output
        it("should convert next to the input with the configured address", async () => {
            const input = join(directory, "ads.txt");
            writeFileSync(input, "||a.example^\n||b.example^\n");
            const config = getDefaultConfig();
            const context = createTestContext({ config: { ...config, blocklist: { address: "0.0.0.0" } } });

            const code = await runBlocklist({
                name   : "blocklist",
                input,
                to     : "hosts",
                dedupe : false,
                verbose: false,
            }, context);

            const output = join(directory, "ads_hosts.txt");
            expect(code).toBe(0);
            expect(readFileSync(output, "utf-8")).toBe("0.0.0.0 a.example\n0.0.0.0 b.example\n");
            expect(lines).toEqual([
                "Detected input format: adguard",
                "Converted 2 domains from adguard to hosts",
                `Saved to: ${output}`,
            ]);
        });

        // Scenario: Missing input
        it("should throw for a missing input file", async () => {
            const input = join(directory, "missing.txt");

            await expect(runBlocklist({ name: "blocklist", input, to: "domains", dedupe: false, verbose: false }, createTestContext()))
                .rejects.toThrow(`Input file not found: ${input}`);
        });
    });

    // Scenario: help
    it("should print the usage for help", async () => {
        const code = await runCommand({ name: "help" }, createTestContext());

        expect(code).toBe(0);
        expect(lines).toEqual([kUSAGE]);
    });
});
