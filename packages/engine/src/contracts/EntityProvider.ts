/**
 * EntityProvider Contract
 *
 * A provider is a finite, pull-based source. During a run the engine
 * calls getEntities() with the cursor from the previous page until a page
 * says `hasMore: false`; initialize() and shutdown() bracket every run,
 * failed ones included.
 *
 * @module @filekit/engine/contracts/EntityProvider
 */

import type { Entity } from "./Entity.js";

export interface FetchOptions {
    /** Page size */
    readonly limit?: number;

    /** Opaque position returned by the previous page */
    readonly cursor?: string;
}

export interface FetchResult<T extends Entity<object> = Entity> {
    readonly entities: readonly T[];

    /** Pass back to get the next page */
    readonly cursor?: string;

    readonly hasMore: boolean;
}

/**
 * @example
 * ```typescript
 * class LineProvider implements EntityProvider<Entity<{ line: number }>> {
 *     readonly id = "lines";
 *     readonly name = "Lines";
 *
 *     constructor(private readonly lines: string[]) {}
 *
 *     async getEntities(options: FetchOptions = {}) {
 *         const start = Number(options.cursor ?? 0);
 *         const end = Math.min(start + (options.limit ?? 50), this.lines.length);
 *         const entities = this.lines.slice(start, end).map((content, i) => ({
 *             id: String(start + i), content, metadata: { line: start + i + 1 },
 *         }));
 *         return { entities, cursor: String(end), hasMore: end < this.lines.length };
 *     }
 * }
 * ```
 */
export interface EntityProvider<T extends Entity<object> = Entity> {
    readonly id: string;
    readonly name: string;
    readonly description?: string;

    /**
     * Take a fresh snapshot of the source.
     */
    initialize?(): Promise<void>;

    getEntities(options?: FetchOptions): Promise<FetchResult<T>>;

    /**
     * Release whatever initialize() took.
     */
    shutdown?(): Promise<void>;
}
