/**
 * @fileoverview RAR reader
 *
 * ArchiveReader over node-unrar-js, the unrar library compiled to
 * WebAssembly. No unrar binary has to be installed.
 *
 * @module adapters/archive/RarArchiveReader
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { createExtractorFromData, createExtractorFromFile } from "node-unrar-js";
import { ArchiveError } from "./ArchiveError.js";
import {
    normalizeEntryPath,
    resolveEntryPath,
    type ArchiveEntry,
    type ArchiveReader,
    type EntryCallback,
} from "./ArchiveReader.js";

function errorText(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Map an unrar failure to an ArchiveError. UnrarError carries a `reason`
 * such as "ERAR_MISSING_PASSWORD".
 */
function toArchiveError(error: unknown, context: string): ArchiveError {
    if (error instanceof ArchiveError) {
        return error;
    }

    const reason = typeof error === "object" && error !== null && "reason" in error && typeof error.reason === "string"
        ? error.reason
        : undefined;

    switch (reason) {
        case "ERAR_MISSING_PASSWORD":
            return new ArchiveError("PASSWORD_REQUIRED", `Password required: ${context}`, { cause: error });
        case "ERAR_BAD_PASSWORD":
            return new ArchiveError("BAD_PASSWORD", `Wrong password: ${context}`, { cause: error });
        default:
            return new ArchiveError("CORRUPT", `${context}: ${errorText(error)}`, { cause: error });
    }
}

export class RarArchiveReader implements ArchiveReader {
    readonly format = "rar";
    readonly path: string;

    constructor(path: string) {
        this.path = resolve(path);
    }

    async list(password?: string): Promise<ArchiveEntry[]> {
        try {
            const extractor = await createExtractorFromFile({ filepath: this.path, password });
            const { fileHeaders } = extractor.getFileList();

            return [...fileHeaders]
                .filter(header => normalizeEntryPath(header.name) !== "")
                .map(header => ({
                    path       : normalizeEntryPath(header.name),
                    size       : header.unpSize,
                    isDirectory: header.flags.directory,
                    encrypted  : header.flags.encrypted,
                }));
        }
        catch (error) {
            throw toArchiveError(error, `Cannot list ${this.path}`);
        }
    }

    /**
     * Decode the first file in memory. Enough to tell a right password
     * from a wrong one without writing anything.
     */
    async test(password?: string): Promise<boolean> {
        let first: ArchiveEntry | undefined;

        try {
            first = (await this.list(password)).find(entry => !entry.isDirectory);
            if (!first) {
                return true;
            }

            const bytes = readFileSync(this.path);
            const data = new ArrayBuffer(bytes.length);
            new Uint8Array(data).set(bytes);

            const extractor = await createExtractorFromData({ data, password });
            const name = first.path;
            const files = extractor.extract({ files: header => normalizeEntryPath(header.name) === name }).files;

            // The generator decodes lazily
            for (const file of files) {
                if (file.extraction === undefined && !file.fileHeader.flags.directory) {
                    throw new ArchiveError("CORRUPT", `No data for ${file.fileHeader.name}`);
                }
            }

            return true;
        }
        catch (error) {
            const mapped = toArchiveError(error, `Cannot test ${this.path}`);

            if (mapped.code === "BAD_PASSWORD" || mapped.code === "PASSWORD_REQUIRED") {
                return false;
            }

            // Old RAR formats report a wrong password as a CRC failure
            if (mapped.code === "CORRUPT" && password !== undefined && first?.encrypted) {
                return false;
            }

            throw mapped;
        }
    }

    async extractAll(destination: string, password?: string, onEntry?: EntryCallback): Promise<void> {
        const entries = await this.list(password);

        // Refuse the whole archive before writing anything
        for (const entry of entries) {
            resolveEntryPath(destination, entry.path);
        }

        try {
            const extractor = await createExtractorFromFile({
                filepath  : this.path,
                targetPath: resolve(destination),
                password,
            });

            for (const file of extractor.extract().files) {
                if (!file.fileHeader.flags.directory) {
                    onEntry?.(normalizeEntryPath(file.fileHeader.name), file.fileHeader.unpSize);
                }
            }
        }
        catch (error) {
            throw toArchiveError(error, `Cannot extract ${this.path}`);
        }
    }
}
