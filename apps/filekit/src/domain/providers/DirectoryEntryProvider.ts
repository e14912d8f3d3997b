/**
 * @fileoverview Directory Entry Provider
 *
 * Implements the EntityProvider contract for files in a directory.
 * The listing is taken once at initialize(), so files created while
 * a run is in progress (renamed files, extracted folders) are not
 * picked up again.
 *
 * @module domain/providers/DirectoryEntryProvider
 */

import { existsSync, readdirSync, statSync } from "fs";
import { join, resolve } from "path";
import { minimatch } from "minimatch";
import type {
    EntityProvider,
    FetchOptions,
    FetchResult,
} from "@filekit/engine";
import { createFileEntry, type FileEntry } from "../entities/FileEntry.js";
import { splitExt } from "../utils/filename.js";

/**
 * Configuration for the directory entry provider
 */
export interface DirectoryProviderConfig {
    /** Directory to list */
    directory: string;

    /** Descend into subdirectories (default: false) */
    recursive?: boolean;

    /** Only include these extensions, compared case-insensitively (".mp3" or "mp3") */
    extensions?: string[];

    /** Glob patterns (minimatch) matched against the relative path; matches are left out */
    exclude?: string[];

    /** Default page size when the caller gives no limit */
    defaultLimit?: number;
}

/**
 * Directory Entry Provider
 *
 * Lists regular files in sorted order. Directories (when not recursing)
 * and other non-file entries are counted as skipped.
 *
 * @example
 * ```typescript
 * const provider = new DirectoryEntryProvider({
 *     directory: "./downloads",
 *     extensions: [".mp3"],
 *     exclude: ["*.part"],
 * });
 *
 * await provider.initialize();
 * const { entities } = await provider.getEntities({ limit: 50 });
 * ```
 */
export class DirectoryEntryProvider implements EntityProvider<FileEntry> {
    readonly id = "directory-provider";
    readonly name = "Directory Provider";
    readonly description = "Provides the regular files of a directory";

    private readonly config: {
        directory: string;
        recursive: boolean;
        extensions: Set<string> | null;
        exclude: string[];
        defaultLimit: number;
    };

    private entries: FileEntry[] = [];
    private skippedCount = 0;
    private excludedCount = 0;
    private initialized = false;

    constructor(config: DirectoryProviderConfig) {
        this.config = {
            directory   : resolve(config.directory),
            recursive   : config.recursive ?? false,
            extensions  : config.extensions
                ? new Set(config.extensions.map(normalizeExtension))
                : null,
            exclude     : config.exclude ?? [],
            defaultLimit: config.defaultLimit ?? 100,
        };
    }

    /**
     * Take the directory listing.
     *
     * @throws Error if the directory does not exist or is not a directory
     */
    async initialize(): Promise<void> {
        if (this.initialized) {
            return;
        }

        const { directory } = this.config;
        if (!existsSync(directory) || !statSync(directory).isDirectory()) {
            throw new Error(`Directory not found: ${directory}`);
        }

        this.entries = [];
        this.skippedCount = 0;
        this.excludedCount = 0;
        this.scan(directory, "");
        this.initialized = true;
    }

    /**
     * Return the next page of the listing. The cursor is the offset of the next entry.
     */
    async getEntities(options: FetchOptions = {}): Promise<FetchResult<FileEntry>> {
        if (!this.initialized) {
            throw new Error("Provider not initialized. Call initialize() first.");
        }

        const limit = options.limit ?? this.config.defaultLimit;
        const start = options.cursor ? parseInt(options.cursor, 10) : 0;
        const end = Math.min(start + limit, this.entries.length);

        return {
            entities: this.entries.slice(start, end),
            cursor  : String(end),
            hasMore : end < this.entries.length,
        };
    }

    async shutdown(): Promise<void> {
        this.initialized = false;
    }

    /** Non-file entries seen while listing */
    get skipped(): number {
        return this.skippedCount;
    }

    /** Entries left out by an exclude pattern */
    get excluded(): number {
        return this.excludedCount;
    }

    private scan(directory: string, relativeDir: string): void {
        const names = readdirSync(directory, { withFileTypes: true })
            .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        for (const dirent of names) {
            const path = join(directory, dirent.name);
            const relativePath = relativeDir ? `${relativeDir}/${dirent.name}` : dirent.name;

            if (this.isExcluded(relativePath)) {
                this.excludedCount++;
                continue;
            }

            if (dirent.isDirectory()) {
                if (this.config.recursive) {
                    this.scan(path, relativePath);
                }
                else {
                    this.skippedCount++;
                }
                continue;
            }

            // Follows symlinks, so a link to a file counts as a file
            let stats;
            try {
                stats = statSync(path);
            }
            catch {
                this.skippedCount++;
                continue;
            }

            if (!stats.isFile()) {
                this.skippedCount++;
                continue;
            }

            if (this.config.extensions && !this.config.extensions.has(splitExt(dirent.name)[1].toLowerCase())) {
                continue;
            }

            this.entries.push(createFileEntry({
                id      : path,
                content : dirent.name,
                metadata: {
                    directory,
                    path,
                    size: stats.size,
                    relativePath,
                },
            }));
        }
    }

    private isExcluded(relativePath: string): boolean {
        return this.config.exclude.some(pattern =>
            minimatch(relativePath, pattern, { dot: true, matchBase: true })
        );
    }
}

function normalizeExtension(extension: string): string {
    const lowered = extension.toLowerCase();
    return lowered.startsWith(".") ? lowered : `.${lowered}`;
}
