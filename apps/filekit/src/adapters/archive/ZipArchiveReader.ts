/**
 * @fileoverview ZIP reader
 *
 * ArchiveReader over adm-zip. Encrypted entries use ZipCrypto, which
 * adm-zip decrypts when readFile() is given the password.
 *
 * @module adapters/archive/ZipArchiveReader
 */

import { mkdirSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import AdmZip from "adm-zip";
import { ArchiveError } from "./ArchiveError.js";
import {
    normalizeEntryPath,
    resolveEntryPath,
    type ArchiveEntry,
    type ArchiveReader,
    type EntryCallback,
} from "./ArchiveReader.js";

/**
 * General-purpose bit 0 marks an encrypted entry.
 */
const kENCRYPTED_FLAG = 0x1;

function errorText(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class ZipArchiveReader implements ArchiveReader {
    readonly format = "zip";
    readonly path: string;

    constructor(path: string) {
        this.path = resolve(path);
    }

    async list(): Promise<ArchiveEntry[]> {
        return this.open().getEntries()
            .filter(entry => normalizeEntryPath(entry.entryName) !== "")
            .map(entry => ({
                path       : normalizeEntryPath(entry.entryName),
                size       : entry.header.size,
                isDirectory: entry.isDirectory,
                encrypted  : isEncrypted(entry),
            }));
    }

    async test(password?: string): Promise<boolean> {
        const zip = this.open();
        try {
            for (const entry of zip.getEntries()) {
                if (!entry.isDirectory) {
                    this.read(zip, entry, password);
                }
            }
            return true;
        }
        catch (error) {
            if (error instanceof ArchiveError && (error.code === "BAD_PASSWORD" || error.code === "PASSWORD_REQUIRED")) {
                return false;
            }
            throw error;
        }
    }

    async extractAll(destination: string, password?: string, onEntry?: EntryCallback): Promise<void> {
        const zip = this.open();
        const entries = zip.getEntries().filter(entry => normalizeEntryPath(entry.entryName) !== "");

        // Refuse the whole archive before writing anything
        const targets = entries.map(entry => resolveEntryPath(destination, entry.entryName));

        entries.forEach((entry, index) => {
            const target = targets[index];
            if (target === undefined) {
                return;
            }

            if (entry.isDirectory) {
                mkdirSync(target, { recursive: true });
                return;
            }

            const data = this.read(zip, entry, password);
            mkdirSync(dirname(target), { recursive: true });
            writeFileSync(target, data);
            onEntry?.(normalizeEntryPath(entry.entryName), data.length);
        });
    }

    private open(): AdmZip {
        try {
            return new AdmZip(this.path);
        }
        catch (error) {
            throw new ArchiveError("CORRUPT", `Cannot read ZIP ${this.path}: ${errorText(error)}`, { cause: error });
        }
    }

    private read(zip: AdmZip, entry: AdmZip.IZipEntry, password?: string): Buffer {
        let data: Buffer | null;
        try {
            data = isEncrypted(entry) && password !== undefined
                ? zip.readFile(entry, password)
                : zip.readFile(entry);
        }
        catch (error) {
            const message = errorText(error);

            if (message.toLowerCase().includes("password")) {
                throw password === undefined
                    ? new ArchiveError("PASSWORD_REQUIRED", `Password required for ${entry.entryName}`, { cause: error })
                    : new ArchiveError("BAD_PASSWORD", `Wrong password for ${entry.entryName}`, { cause: error });
            }

            throw new ArchiveError("CORRUPT", `Cannot read ${entry.entryName}: ${message}`, { cause: error });
        }

        if (data === null) {
            throw new ArchiveError("CORRUPT", `Cannot read ${entry.entryName}`);
        }
        return data;
    }
}

function isEncrypted(entry: AdmZip.IZipEntry): boolean {
    return (entry.header.flags & kENCRYPTED_FLAG) === kENCRYPTED_FLAG;
}
