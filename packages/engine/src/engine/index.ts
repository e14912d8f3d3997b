/**
 * @fileoverview Engine barrel exports
 *
 * @module @filekit/engine/engine
 */

export {
    BatchEngine,
    type DomainRegistration,
    type EngineConfig,
    type EngineLogger,
    type EntityOutcome,
    type RunSummary,
} from "./BatchEngine.js";
