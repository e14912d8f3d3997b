/**
 * @fileoverview File Entry Entity
 *
 * Domain-specific entity that extends the base Entity contract
 * with file-system metadata.
 *
 * @module domain/entities/FileEntry
 */

import type { Entity } from "@filekit/engine";

/**
 * File-system metadata for a directory listing entry
 */
export interface FileEntryMetadata {
    /** Absolute directory containing the file */
    readonly directory: string;

    /** Absolute path of the file */
    readonly path: string;

    /** Size in bytes at listing time */
    readonly size: number;

    /** Path relative to the scanned root, with "/" separators */
    readonly relativePath: string;
}

/**
 * File Entry Entity
 *
 * One regular file found by a directory provider. The entity content
 * is the bare file name, which is what the rename planners work on.
 */
export interface FileEntry extends Entity<FileEntryMetadata> {
    readonly type: "file-entry";
}

/**
 * Input data for creating a FileEntry (without type discriminator)
 */
export interface FileEntryInput {
    readonly id: string;
    readonly content: string;
    readonly metadata: FileEntryMetadata;
}

/**
 * Factory function to create a FileEntry entity.
 *
 * @example
 * ```typescript
 * const entry = createFileEntry({
 *     id: "/music/a+b.mp3",
 *     content: "a+b.mp3",
 *     metadata: {
 *         directory: "/music",
 *         path: "/music/a+b.mp3",
 *         size: 1024,
 *         relativePath: "a+b.mp3",
 *     },
 * });
 * ```
 */
export function createFileEntry(data: FileEntryInput): FileEntry {
    return {
        ...data,
        type: "file-entry",
    };
}

/**
 * Type guard to check if an entity is a FileEntry
 */
export function isFileEntry(entity: Entity<object>): entity is FileEntry {
    return entity.type === "file-entry";
}
