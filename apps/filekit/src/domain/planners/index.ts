/**
 * @fileoverview Planners barrel exports
 *
 * @module domain/planners
 */

export { PlusToSpacePlanner } from "./PlusToSpacePlanner.js";
export { SpacingPlanner } from "./SpacingPlanner.js";
export { AffixPlanner, type AffixPlannerConfig } from "./AffixPlanner.js";
export { MvsepPlanner } from "./MvsepPlanner.js";
export { AiRenamePlanner, type AiRenamePlannerConfig } from "./AiRenamePlanner.js";
export { ArchivePlanner } from "./ArchivePlanner.js";
