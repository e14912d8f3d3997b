/**
 * @fileoverview Extract command
 *
 * Extracts every ZIP and RAR archive directly inside a directory. Log
 * lines also go to a log file in that directory.
 *
 * @module cli/commands/extract
 */

import { existsSync, statSync } from "fs";
import { join, resolve } from "path";
import { BatchEngine } from "@filekit/engine";
import { ArchiveExtractor, kARCHIVE_EXTENSIONS, type ExtractionProgress } from "../../adapters/archive/index.js";
import { ArchivePlanner, DirectoryEntryProvider, ExtractAction } from "../../domain/index.js";
import { combineLoggers, createFileLogger } from "../../logging/index.js";
import type { ExtractCommand } from "../args.js";
import type { CommandContext } from "../context.js";
import { formatExtractSummary, summarizeExtractRun } from "../summary.js";

/**
 * Print progress in 10% steps per archive.
 */
function progressPrinter(print: (line: string) => void): (progress: ExtractionProgress) => void {
    const reported = new Map<string, number>();

    return progress => {
        const percent = progress.bytesTotal > 0
            ? Math.floor((progress.bytesDone / progress.bytesTotal) * 100)
            : 100;
        const step = Math.floor(percent / 10) * 10;

        if ((reported.get(progress.archive) ?? -1) < step) {
            reported.set(progress.archive, step);
            print(`  ${progress.archive}: ${step}%`);
        }
    };
}

export async function runExtract(command: ExtractCommand, context: CommandContext): Promise<number> {
    const directory = resolve(command.directory);
    if (!existsSync(directory) || !statSync(directory).isDirectory()) {
        throw new Error(`Directory not found: ${directory}`);
    }

    const settings = context.config.archives;
    const logFile = join(directory, settings.logFile);
    const logger = combineLoggers(context.logger, createFileLogger(logFile));

    const extractor = new ArchiveExtractor({
        passwords          : [...command.passwords, ...settings.passwords],
        keepOriginal       : command.keep,
        collision          : command.collision ?? settings.collision,
        retryCount         : settings.retryCount,
        retryDelayMs       : settings.retryDelayMs,
        diskSpaceBuffer    : settings.diskSpaceBuffer,
        progressThresholdMb: settings.progressThresholdMb,
        logger,
        onProgress         : progressPrinter(context.print),
    });

    const engine = new BatchEngine({ logger });
    engine.registerDomain({
        id      : "extract",
        name    : "Extract archives",
        provider: new DirectoryEntryProvider({
            directory,
            extensions: [...kARCHIVE_EXTENSIONS],
        }),
        planners: [new ArchivePlanner()],
        actions : [new ExtractAction({ extractor })],
    });

    engine.eventBus.subscribe("entity:actionExecuted", ({ data }) => {
        if (data.target !== undefined) {
            context.print(`${data.success ? "Extracted" : "Failed"}: ${data.target}`);
        }
    });

    logger.info(`Starting extraction in ${directory}`);

    const counts = summarizeExtractRun(await engine.run("extract"));

    context.print("");
    formatExtractSummary(counts).forEach(line => context.print(line));
    if (counts.found > 0) {
        context.print(`Log file: ${logFile}`);
    }

    return counts.failed > 0 ? 1 : 0;
}
