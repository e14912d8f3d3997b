/**
 * @fileoverview Contract barrel exports
 *
 * All domain-agnostic interfaces and types that define
 * the batch engine contract.
 *
 * @module @filekit/engine/contracts
 */

// Entity contract
export type { Entity } from "./Entity.js";

// Proposal
export type {
    Proposal,
    OperationType,
} from "./Proposal.js";
export {
    createProposal,
    getEffectiveConfidence,
} from "./Proposal.js";

// Planner plugin contract
export type {
    PlannerPlugin,
    PlanningContext,
    PluginLogger,
} from "./PlannerPlugin.js";
export { isPlannerPlugin } from "./PlannerPlugin.js";

// Action plugin contract
export type {
    ActionPlugin,
    ActionBinding,
    ActionBindings,
    ActionContext,
    ActionResult,
} from "./ActionPlugin.js";
export {
    bindingFor,
    isActionPlugin,
    shouldActionExecute,
} from "./ActionPlugin.js";

// EntityProvider contract
export type {
    EntityProvider,
    FetchOptions,
    FetchResult,
} from "./EntityProvider.js";

// EventBus contract
export type {
    EngineEventMap,
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
