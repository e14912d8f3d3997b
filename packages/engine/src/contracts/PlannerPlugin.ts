/**
 * Planner Plugin Contract
 *
 * A planner looks at one entity and either proposes an operation or
 * returns null. Every planner of a domain sees every entity; they do not
 * see each other's answers. Planners may read the file system but never
 * change it.
 *
 * @module @filekit/engine/contracts/PlannerPlugin
 */

import type { Entity } from "./Entity.js";
import type { Proposal } from "./Proposal.js";

export interface PluginLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

export interface PlanningContext {
    /** The domain's config, shared by all of its plugins */
    readonly config: Readonly<Record<string, unknown>>;

    /** Lines come out prefixed `[domain:planner]` */
    readonly logger: PluginLogger;

    readonly traceId: string;
}

/**
 * @example
 * ```typescript
 * const lowercaseExtension: PlannerPlugin = {
 *     id: "lowercase-extension",
 *     plan(entity) {
 *         const lowered = entity.content.replace(/\.[^.]+$/, (ext) => ext.toLowerCase());
 *         return lowered === entity.content ? null : { operation: "rename", target: lowered };
 *     },
 * };
 * ```
 */
export interface PlannerPlugin {
    readonly id: string;
    readonly name?: string;
    readonly description?: string;

    /**
     * A thrown error counts as no opinion; the engine logs it and moves on.
     */
    plan(entity: Entity<object>, context: PlanningContext): Promise<Proposal | null> | Proposal | null;
}

export function isPlannerPlugin(obj: unknown): obj is PlannerPlugin {
    return typeof obj === "object" && obj !== null
        && "id" in obj && typeof obj.id === "string"
        && "plan" in obj && typeof obj.plan === "function";
}
