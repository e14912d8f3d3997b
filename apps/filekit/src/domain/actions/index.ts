/**
 * @fileoverview Action barrel exports
 *
 * @module domain/actions
 */

export { RenameAction, type RenameActionConfig } from "./RenameAction.js";
export { SkipAction } from "./SkipAction.js";
export { ExtractAction, type ExtractActionConfig } from "./ExtractAction.js";
