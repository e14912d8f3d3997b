/**
 * @fileoverview Archive Extractor
 *
 * Extracts one archive into a folder named after it, next to it.
 *
 * Each archive goes through:
 * 1. A quick check (listing) to find corrupt or password-protected archives
 * 2. Password trials, when one is needed
 * 3. Up to `retryCount` attempts, each extracting into a temporary
 *    directory, moving the files into place with the collision strategy,
 *    and verifying what ended up on disk
 * 4. Removal of the original archive, unless it is kept
 *
 * @module adapters/archive/ArchiveExtractor
 */

import {
    cpSync,
    existsSync,
    mkdirSync,
    mkdtempSync,
    readdirSync,
    renameSync,
    rmSync,
    statSync,
    statfsSync,
    unlinkSync,
} from "fs";
import { tmpdir } from "os";
import { basename, dirname, join, resolve } from "path";
import { setTimeout as delay } from "timers/promises";
import type { CollisionStrategy } from "../../config/loadConfig.js";
import { splitExt } from "../../domain/utils/filename.js";
import { silentLogger, type Logger } from "../../logging/logger.js";
import { ArchiveError, isArchiveError } from "./ArchiveError.js";
import type { ArchiveEntry, ArchiveReader } from "./ArchiveReader.js";
import { openArchive } from "./openArchive.js";

/**
 * Largest N tried for `name_N.ext` under the rename strategy.
 */
const kMAX_RENAME_COUNTER = 999;

const kBYTES_PER_MB = 1024 * 1024;

/**
 * Progress of one archive's extraction
 */
export interface ExtractionProgress {
    readonly archive: string;
    readonly entry: string;
    readonly bytesDone: number;
    readonly bytesTotal: number;
}

/**
 * A file moved out of the temporary directory
 */
export interface PlacedFile {
    /** Path inside the archive, "/"-separated */
    readonly entryPath: string;

    /** Where the file ended up, or the existing file that was kept */
    readonly finalPath: string;

    readonly size: number;

    readonly status: "placed" | "skipped";
}

/**
 * Outcome of processArchive()
 */
export interface ExtractionResult {
    readonly archive: string;
    readonly destination: string;
    readonly success: boolean;
    readonly error?: string;

    /** Extraction attempts made (0 when the archive failed its checks) */
    readonly attempts: number;

    /** Files moved into the destination */
    readonly placed: number;

    /** Files left out because the destination already had them */
    readonly skipped: number;

    readonly deletedOriginal: boolean;
}

export interface ArchiveExtractorOptions {
    /** Passwords to try, in order */
    passwords?: string[];

    /** Keep the archive after a successful extraction (default: false) */
    keepOriginal?: boolean;

    /** What to do when a file already exists (default: skip) */
    collision?: CollisionStrategy;

    /** Extraction attempts per archive (default: 3) */
    retryCount?: number;

    /** Wait between attempts (default: 2000) */
    retryDelayMs?: number;

    /** Free space needed, as a multiple of the uncompressed size (default: 1.1) */
    diskSpaceBuffer?: number;

    /** Report progress only for archives larger than this (default: 10) */
    progressThresholdMb?: number;

    logger?: Logger;

    onProgress?: (progress: ExtractionProgress) => void;

    /** Overrides for tests */
    sleep?: (ms: number) => Promise<void>;
    freeBytes?: (directory: string) => number;
    open?: (path: string) => ArchiveReader | null;
}

function errorText(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function errnoCode(error: unknown): string | undefined {
    return error instanceof Error && "code" in error && typeof error.code === "string"
        ? error.code
        : undefined;
}

/**
 * Archive errors and permission errors may go away on a second try;
 * anything else will not.
 */
function isRetryable(error: unknown): boolean {
    const code = errnoCode(error);
    return error instanceof ArchiveError || code === "EACCES" || code === "EPERM";
}

function defaultFreeBytes(directory: string): number {
    const stats = statfsSync(directory);
    return stats.bavail * stats.bsize;
}

function byName(a: { name: string }, b: { name: string }): number {
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Rename, falling back to copy-and-delete across file systems.
 */
function moveFile(from: string, to: string): void {
    try {
        renameSync(from, to);
    }
    catch (error) {
        if (errnoCode(error) !== "EXDEV") {
            throw error;
        }
        cpSync(from, to, { recursive: true });
        rmSync(from, { recursive: true, force: true });
    }
}

/**
 * First free `name_N.ext` in the directory, or null after 999 tries.
 */
function uniqueName(directory: string, name: string): string | null {
    const [base, extension] = splitExt(name);

    for (let counter = 1; counter <= kMAX_RENAME_COUNTER; counter++) {
        const candidate = join(directory, `${base}_${counter}${extension}`);
        if (!existsSync(candidate)) {
            return candidate;
        }
    }

    return null;
}

/**
 * Every file below a directory, with its archive path.
 */
function listFiles(directory: string, relativeDir: string): Array<{ entryPath: string; size: number }> {
    const files: Array<{ entryPath: string; size: number }> = [];

    for (const dirent of readdirSync(directory, { withFileTypes: true }).sort(byName)) {
        const entryPath = relativeDir ? `${relativeDir}/${dirent.name}` : dirent.name;
        const path = join(directory, dirent.name);

        if (dirent.isDirectory()) {
            files.push(...listFiles(path, entryPath));
        }
        else {
            files.push({ entryPath, size: statSync(path).size });
        }
    }

    return files;
}

/**
 * Move the contents of `source` into `destination`, merging directories.
 *
 * Collisions are handled per file: `skip` keeps the existing file,
 * `overwrite` replaces it, and `rename` places the new one as
 * `name_N.ext`. A file that cannot be placed is logged and left out;
 * verification reports it.
 */
export function moveTree(
    source: string,
    destination: string,
    collision: CollisionStrategy,
    logger: Logger = silentLogger,
    relativeDir = ""
): PlacedFile[] {
    const placed: PlacedFile[] = [];
    mkdirSync(destination, { recursive: true });

    for (const dirent of readdirSync(source, { withFileTypes: true }).sort(byName)) {
        const from = join(source, dirent.name);
        const entryPath = relativeDir ? `${relativeDir}/${dirent.name}` : dirent.name;
        const to = join(destination, dirent.name);
        const existing = existsSync(to) ? statSync(to) : null;

        if (dirent.isDirectory()) {
            if (!existing || existing.isDirectory()) {
                placed.push(...moveTree(from, to, collision, logger, entryPath));
                continue;
            }

            // A file stands where the directory goes
            if (collision === "skip") {
                logger.warn(`Collision: '${entryPath}' already exists in destination. Skipping.`);
                for (const file of listFiles(from, entryPath)) {
                    placed.push({ ...file, finalPath: to, status: "skipped" });
                }
            }
            else if (collision === "overwrite") {
                logger.warn(`Collision: '${entryPath}' already exists. Overwriting.`);
                rmSync(to, { recursive: true, force: true });
                placed.push(...moveTree(from, to, collision, logger, entryPath));
            }
            else {
                const renamed = uniqueName(destination, dirent.name);
                if (renamed === null) {
                    logger.error(`Could not find unique name for '${entryPath}' after ${kMAX_RENAME_COUNTER} attempts. Skipping.`);
                    continue;
                }
                logger.warn(`Collision: '${entryPath}' already exists. Renaming to '${basename(renamed)}'.`);
                placed.push(...moveTree(from, renamed, collision, logger, entryPath));
            }
            continue;
        }

        const size = statSync(from).size;

        if (!existing) {
            moveFile(from, to);
            placed.push({ entryPath, finalPath: to, size, status: "placed" });
            continue;
        }

        if (collision === "skip") {
            logger.warn(`Collision: '${entryPath}' already exists in destination. Skipping.`);
            placed.push({ entryPath, finalPath: to, size, status: "skipped" });
        }
        else if (collision === "overwrite") {
            logger.warn(`Collision: '${entryPath}' already exists. Overwriting.`);
            rmSync(to, { recursive: true, force: true });
            moveFile(from, to);
            placed.push({ entryPath, finalPath: to, size, status: "placed" });
        }
        else {
            const renamed = uniqueName(destination, dirent.name);
            if (renamed === null) {
                logger.error(`Could not find unique name for '${entryPath}' after ${kMAX_RENAME_COUNTER} attempts. Skipping.`);
                continue;
            }
            logger.warn(`Collision: '${entryPath}' already exists. Renaming to '${basename(renamed)}'.`);
            moveFile(from, renamed);
            placed.push({ entryPath, finalPath: renamed, size, status: "placed" });
        }
    }

    return placed;
}

/**
 * Compare the archive listing with what is on disk.
 *
 * @returns One line per problem; empty when everything checks out
 */
export function verifyPlacement(entries: readonly ArchiveEntry[], placed: readonly PlacedFile[]): string[] {
    const byPath = new Map(placed.map(file => [file.entryPath, file]));
    const problems: string[] = [];

    for (const entry of entries) {
        if (entry.isDirectory) {
            continue;
        }

        const file = byPath.get(entry.path);
        if (!file) {
            problems.push(`${entry.path}: not placed`);
        }
        else if (!existsSync(file.finalPath)) {
            problems.push(`${entry.path}: missing at ${file.finalPath}`);
        }
        else {
            // A skipped file counts only when what already sits there matches
            const stats = statSync(file.finalPath);
            if (!stats.isFile()) {
                problems.push(`${entry.path}: not a file at ${file.finalPath}`);
            }
            else if (stats.size !== entry.size) {
                problems.push(`${entry.path}: size ${stats.size}, expected ${entry.size}`);
            }
        }
    }

    return problems;
}

/**
 * Archive Extractor
 *
 * @example
 * ```typescript
 * const extractor = new ArchiveExtractor({
 *     passwords: ["test-secret"],
 *     collision: "rename",
 *     logger,
 * });
 *
 * const result = await extractor.processArchive("./downloads/photos.zip");
 * // ./downloads/photos/ now holds the files
 * ```
 */
export class ArchiveExtractor {
    private readonly passwords: string[];
    private readonly keepOriginal: boolean;
    private readonly collision: CollisionStrategy;
    private readonly retryCount: number;
    private readonly retryDelayMs: number;
    private readonly diskSpaceBuffer: number;
    private readonly progressThresholdBytes: number;
    private readonly logger: Logger;
    private readonly onProgress?: (progress: ExtractionProgress) => void;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly freeBytes: (directory: string) => number;
    private readonly open: (path: string) => ArchiveReader | null;

    constructor(options: ArchiveExtractorOptions = {}) {
        this.passwords              = options.passwords ?? [];
        this.keepOriginal           = options.keepOriginal ?? false;
        this.collision              = options.collision ?? "skip";
        this.retryCount             = Math.max(1, options.retryCount ?? 3);
        this.retryDelayMs           = options.retryDelayMs ?? 2000;
        this.diskSpaceBuffer        = options.diskSpaceBuffer ?? 1.1;
        this.progressThresholdBytes = (options.progressThresholdMb ?? 10) * kBYTES_PER_MB;
        this.logger                 = options.logger ?? silentLogger;
        this.onProgress             = options.onProgress;
        this.sleep                  = options.sleep ?? (ms => delay(ms));
        this.freeBytes              = options.freeBytes ?? defaultFreeBytes;
        this.open                   = options.open ?? openArchive;
    }

    /**
     * Extract one archive into `<dir>/<stem>`. Never throws; the outcome
     * is in the result.
     */
    async processArchive(archivePath: string): Promise<ExtractionResult> {
        const archive = resolve(archivePath);
        const name = basename(archive);
        const [stem] = splitExt(name);
        const destination = join(dirname(archive), stem);

        const failed = (error: string): ExtractionResult => {
            this.logger.error(error, { archive: name });
            return {
                archive,
                destination,
                success        : false,
                error,
                attempts       : 0,
                placed         : 0,
                skipped        : 0,
                deletedOriginal: false,
            };
        };

        const reader = this.open(archive);
        if (!reader) {
            return failed(`Skipping unsupported file: ${name}`);
        }

        this.logger.info(`Processing archive: ${name}`);

        try {
            mkdirSync(destination, { recursive: true });
        }
        catch (error) {
            return failed(`Cannot create ${destination}: ${errorText(error)}`);
        }

        let needsPassword = false;
        try {
            const entries = await reader.list();
            needsPassword = entries.some(entry => entry.encrypted);
        }
        catch (error) {
            if (isArchiveError(error, "PASSWORD_REQUIRED")) {
                needsPassword = true;
            }
            else if (error instanceof ArchiveError) {
                return failed(`Archive ${name} appears corrupt: ${error.message}`);
            }
            else {
                this.logger.warn(`Could not perform quick check on ${name}: ${errorText(error)}`);
            }
        }

        let password: string | undefined;
        if (needsPassword) {
            this.logger.info(`Archive ${name} requires a password.`);

            if (this.passwords.length === 0) {
                return failed(`Archive ${name} requires a password, but none were provided.`);
            }

            password = await this.findPassword(reader);
            if (password === undefined) {
                return failed(`No working password found for ${name}.`);
            }
        }

        let attempts = 0;
        let lastError = "";
        let placed: PlacedFile[] | null = null;

        for (let attempt = 1; attempt <= this.retryCount; attempt++) {
            attempts = attempt;

            try {
                placed = await this.extractOnce(reader, password, stem, destination);
                break;
            }
            catch (error) {
                lastError = errorText(error);

                if (!isRetryable(error)) {
                    this.logger.error(`Unexpected error on attempt ${attempt} for ${name}: ${lastError}`);
                    break;
                }

                this.logger.warn(`Extraction attempt ${attempt} failed for ${name}: ${lastError}`);

                if (attempt < this.retryCount) {
                    this.logger.info(`Retrying in ${this.retryDelayMs} ms...`);
                    await this.sleep(this.retryDelayMs);
                }
                else {
                    this.logger.error(`Failed to process ${name} after ${this.retryCount} attempts.`);
                }
            }
        }

        if (placed === null) {
            return {
                archive,
                destination,
                success        : false,
                error          : lastError,
                attempts,
                placed         : 0,
                skipped        : 0,
                deletedOriginal: false,
            };
        }

        this.logger.info(`Successfully extracted, moved, and verified: ${name} -> ${destination}`);

        let deletedOriginal = false;
        if (!this.keepOriginal) {
            try {
                unlinkSync(archive);
                deletedOriginal = true;
                this.logger.info(`Deleted original archive: ${name}`);
            }
            catch (error) {
                this.logger.error(`Failed to delete original archive ${name}: ${errorText(error)}`);
            }
        }

        return {
            archive,
            destination,
            success : true,
            attempts,
            placed  : placed.filter(file => file.status === "placed").length,
            skipped : placed.filter(file => file.status === "skipped").length,
            deletedOriginal,
        };
    }

    /**
     * First password that opens the archive, or undefined.
     */
    private async findPassword(reader: ArchiveReader): Promise<string | undefined> {
        for (const [index, candidate] of this.passwords.entries()) {
            try {
                if (await reader.test(candidate)) {
                    this.logger.info(`Password ${index + 1} of ${this.passwords.length} works.`);
                    return candidate;
                }
            }
            catch (error) {
                this.logger.warn(`Error while trying password ${index + 1}: ${errorText(error)}`);
            }
        }

        return undefined;
    }

    private async extractOnce(
        reader: ArchiveReader,
        password: string | undefined,
        stem: string,
        destination: string
    ): Promise<PlacedFile[]> {
        const name = basename(reader.path);
        const entries = await reader.list(password);
        const total = entries
            .filter(entry => !entry.isDirectory)
            .reduce((sum, entry) => sum + entry.size, 0);

        this.checkDiskSpace(total, destination);

        const tempDir = mkdtempSync(join(tmpdir(), `${stem}_`));
        this.logger.info(`Created temporary directory: ${tempDir}`);

        try {
            const onProgress = this.onProgress;
            let done = 0;

            const onEntry = onProgress && total > this.progressThresholdBytes
                ? (entry: string, size: number) => {
                    done += size;
                    onProgress({ archive: name, entry, bytesDone: done, bytesTotal: total });
                }
                : undefined;

            await reader.extractAll(tempDir, password, onEntry);
            this.logger.info(`Successfully extracted ${name} to temporary directory.`);

            this.logger.info(`Moving extracted files from ${tempDir} to ${destination}...`);
            const placed = moveTree(tempDir, destination, this.collision, this.logger);

            const problems = verifyPlacement(entries, placed);
            if (problems.length > 0) {
                for (const problem of problems) {
                    this.logger.error(`Verification: ${problem}`);
                }
                throw new ArchiveError(
                    "VERIFICATION_FAILED",
                    `Post-extraction verification failed for ${name} (${problems.length} problem(s))`
                );
            }

            return placed;
        }
        finally {
            rmSync(tempDir, { recursive: true, force: true });
        }
    }

    private checkDiskSpace(total: number, destination: string): void {
        const required = Math.floor(total * this.diskSpaceBuffer);

        let free: number;
        try {
            free = this.freeBytes(destination);
        }
        catch (error) {
            this.logger.warn(`Could not verify disk space: ${errorText(error)}. Proceeding anyway.`);
            return;
        }

        if (required > free) {
            throw new ArchiveError(
                "INSUFFICIENT_SPACE",
                `Insufficient disk space. Required: ${required} (with buffer), available: ${free}`
            );
        }
    }
}
