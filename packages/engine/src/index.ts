/**
 * @fileoverview filekit engine
 *
 * Domain-agnostic batch pipeline for one-pass file operations.
 *
 * The engine provides:
 * - Batched entity pulls from providers
 * - All planners run, highest confidence wins
 * - Action execution based on declarative bindings
 * - Run summaries and lifecycle events
 *
 * @module @filekit/engine
 */

// ============================================================================
// Contract exports
// ============================================================================

// Entity
export type { Entity } from "./contracts/index.js";

// Proposal
export type {
    Proposal,
    OperationType,
} from "./contracts/index.js";
export {
    createProposal,
    getEffectiveConfidence,
} from "./contracts/index.js";

// Planner Plugin
export type {
    PlannerPlugin,
    PlanningContext,
    PluginLogger,
} from "./contracts/index.js";
export { isPlannerPlugin } from "./contracts/index.js";

// Action Plugin
export type {
    ActionPlugin,
    ActionBinding,
    ActionBindings,
    ActionContext,
    ActionResult,
} from "./contracts/index.js";
export {
    bindingFor,
    isActionPlugin,
    shouldActionExecute,
} from "./contracts/index.js";

// EntityProvider
export type {
    EntityProvider,
    FetchOptions,
    FetchResult,
} from "./contracts/index.js";

// EventBus
export type {
    EngineEventMap,
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./contracts/index.js";
export { createEvent } from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export { InMemoryEventBus } from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    BatchEngine,
    type DomainRegistration,
    type EngineConfig,
    type EngineLogger,
    type EntityOutcome,
    type RunSummary,
} from "./engine/index.js";

// ============================================================================
// Plugin loading
// ============================================================================

export {
    PluginLoader,
    createPlannerFromYaml,
    isYamlRenameRule,
    parseRenameRules,
    type ParsedRules,
    type YamlRenameRule,
    type LoadedPlugins,
    type PluginLoaderConfig,
    type PluginLoaderLogger,
} from "./plugins/index.js";
