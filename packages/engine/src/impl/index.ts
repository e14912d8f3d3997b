/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @filekit/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
