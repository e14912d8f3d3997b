/**
 * @fileoverview Archive reader selection
 *
 * @module adapters/archive/openArchive
 */

import { basename } from "path";
import { splitExt } from "../../domain/utils/filename.js";
import type { ArchiveReader } from "./ArchiveReader.js";
import { RarArchiveReader } from "./RarArchiveReader.js";
import { ZipArchiveReader } from "./ZipArchiveReader.js";

export const kARCHIVE_EXTENSIONS: readonly string[] = [".zip", ".rar"];

export function isSupportedArchive(fileName: string): boolean {
    return kARCHIVE_EXTENSIONS.includes(splitExt(basename(fileName))[1].toLowerCase());
}

/**
 * Pick a reader by extension.
 *
 * @returns The reader, or null for anything but .zip and .rar
 */
export function openArchive(path: string): ArchiveReader | null {
    switch (splitExt(basename(path))[1].toLowerCase()) {
        case ".zip":
            return new ZipArchiveReader(path);
        case ".rar":
            return new RarArchiveReader(path);
        default:
            return null;
    }
}
