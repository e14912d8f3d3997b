/**
 * @fileoverview Archive Reader Contract
 *
 * A uniform view over ZIP and RAR archives. Every method throws
 * ArchiveError on failure.
 *
 * @module adapters/archive/ArchiveReader
 */

import { isAbsolute, relative, resolve, sep } from "path";
import { ArchiveError } from "./ArchiveError.js";

export type ArchiveFormat = "zip" | "rar";

/**
 * One entry of an archive listing
 */
export interface ArchiveEntry {
    /** Path inside the archive, "/"-separated */
    readonly path: string;

    /** Uncompressed size in bytes */
    readonly size: number;

    readonly isDirectory: boolean;

    readonly encrypted: boolean;
}

/**
 * Called after each entry is written during extraction
 */
export type EntryCallback = (entryPath: string, size: number) => void;

export interface ArchiveReader {
    readonly format: ArchiveFormat;

    /** Absolute path of the archive file */
    readonly path: string;

    /**
     * List the entries.
     *
     * @throws ArchiveError PASSWORD_REQUIRED when the listing itself is encrypted
     */
    list(password?: string): Promise<ArchiveEntry[]>;

    /**
     * Check that every file entry can be read with the given password.
     *
     * @returns false when a password is missing or wrong
     * @throws ArchiveError CORRUPT for damaged archives
     */
    test(password?: string): Promise<boolean>;

    /**
     * Extract every entry below the destination directory.
     */
    extractAll(destination: string, password?: string, onEntry?: EntryCallback): Promise<void>;
}

/**
 * Normalise an entry name to "/" separators without a leading "./".
 */
export function normalizeEntryPath(entryPath: string): string {
    return entryPath.replace(/\\/g, "/").replace(/^(\.\/)+/, "");
}

/**
 * Resolve an entry below the destination.
 *
 * @throws ArchiveError UNSUPPORTED when the entry would land outside it
 */
export function resolveEntryPath(destination: string, entryPath: string): string {
    const root = resolve(destination);
    const target = resolve(root, normalizeEntryPath(entryPath));
    const rel = relative(root, target);

    if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
        throw new ArchiveError("UNSUPPORTED", `Entry escapes the destination: ${entryPath}`);
    }

    return target;
}
