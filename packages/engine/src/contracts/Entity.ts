/**
 * Entity Contract
 *
 * Whatever a provider hands the engine: a file entry, a list line.
 * Planners judge `content`; actions find what they need in `metadata`.
 * Nothing in the pipeline mutates an entity.
 *
 * @module @filekit/engine/contracts/Entity
 */

/**
 * @example
 * ```typescript
 * const entry: Entity<{ path: string }> = {
 *     id      : "/music/a+b.mp3",
 *     content : "a+b.mp3",
 *     metadata: { path: "/music/a+b.mp3" },
 * };
 * ```
 */
export interface Entity<TMetadata extends object = Record<string, unknown>> {
    /** Unique within one run */
    readonly id: string;

    /** The string planners look at */
    readonly content: string;

    readonly metadata: TMetadata;

    /** Entity kind, for entities that carry one */
    readonly type?: string;
}
