/**
 * Action Plugin Contract
 *
 * An action performs the side effect of a winning proposal: the rename,
 * the extraction. It never plans. Which proposals reach it is decided by
 * its bindings, keyed by operation, each with an optional confidence
 * floor. A failed action reports through its result; the engine turns a
 * thrown error into a failed result of its own.
 *
 * @module @filekit/engine/contracts/ActionPlugin
 */

import type { Entity } from "./Entity.js";
import type { Proposal, OperationType } from "./Proposal.js";
import type { PluginLogger } from "./PlannerPlugin.js";

export interface ActionBinding {
    /** Proposals below this confidence are not handed to the action. Defaults to 0. */
    readonly minConfidence?: number;
}

export type ActionBindings = Readonly<Record<OperationType, ActionBinding>>;

export interface ActionContext {
    readonly entity: Entity<object>;
    readonly proposal: Proposal;
    readonly config: Readonly<Record<string, unknown>>;
    readonly logger: PluginLogger;

    /** Same id the entity's events carry */
    readonly traceId: string;
}

export interface ActionResult {
    readonly actionId: string;
    readonly success: boolean;

    /** e.g. "renamed", "would-rename", "skipped-exists" */
    readonly status?: string;

    readonly error?: string;
    readonly data?: Record<string, unknown>;
}

/**
 * @example
 * ```typescript
 * const logRenames: ActionPlugin = {
 *     id      : "log-renames",
 *     bindings: { rename: {} },
 *     async handle({ entity, proposal, logger }) {
 *         logger.info(`${entity.content} -> ${proposal.target}`);
 *         return { actionId: "log-renames", success: true };
 *     },
 * };
 * ```
 */
export interface ActionPlugin {
    readonly id: string;
    readonly name?: string;
    readonly description?: string;
    readonly bindings: ActionBindings;

    handle(context: ActionContext): Promise<ActionResult>;
}

export function isActionPlugin(obj: unknown): obj is ActionPlugin {
    if (typeof obj !== "object" || obj === null) {
        return false;
    }

    return "id" in obj && typeof obj.id === "string"
        && "bindings" in obj && typeof obj.bindings === "object" && obj.bindings !== null
        && "handle" in obj && typeof obj.handle === "function";
}

/**
 * The action's own binding for an operation. Inherited keys such as
 * "toString" never count as bindings.
 */
export function bindingFor(action: ActionPlugin, operation: OperationType): ActionBinding | undefined {
    return Object.hasOwn(action.bindings, operation) ? action.bindings[operation] : undefined;
}

/**
 * True when the action binds the proposal's operation and the proposal
 * (confidence 1 when unset) clears the binding's floor.
 */
export function shouldActionExecute(action: ActionPlugin, proposal: Proposal): boolean {
    const binding = bindingFor(action, proposal.operation);
    if (binding === undefined) {
        return false;
    }

    return (proposal.confidence ?? 1) >= (binding.minConfidence ?? 0);
}
