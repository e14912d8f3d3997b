/**
 * Proposal
 *
 * The result of a planner evaluating an entity.
 * This is the contract boundary between planning and action.
 *
 * Design principles:
 * - Simple: OperationType is just a string
 * - Immutable: Treat as read-only after creation
 * - Minimal: target and reason are the only payload, tags are metadata
 */

/**
 * OperationType is a simple string identifier.
 * Examples: "rename", "extract", "skip"
 */
export type OperationType = string;

/**
 * Output from a PlannerPlugin.
 *
 * @example
 * ```typescript
 * // Deterministic rename rule
 * { operation: "rename", target: "My Song.mp3" }
 *
 * // AI suggestion with probabilistic confidence
 * { operation: "rename", target: "Artist - Title (Vocals).mp3", confidence: 0.8 }
 *
 * // Deliberate skip, carried to the summary
 * { operation: "skip", reason: "empty-name" }
 * ```
 */
export interface Proposal {
    /**
     * The operation to perform (routing key).
     * Actions bind to operation types.
     */
    readonly operation: OperationType;

    /**
     * Target of the operation, e.g. the new file name for a rename.
     */
    readonly target?: string;

    /**
     * Confidence score between 0.0 and 1.0.
     * Default is 1.0 if omitted.
     *
     * Used to resolve conflicts when multiple planners match:
     * - 1.0 = hard rule (pattern match)
     * - 0.5-0.9 = probabilistic (AI suggestion)
     */
    readonly confidence?: number;

    /**
     * Short machine-readable reason, mostly for skips.
     */
    readonly reason?: string;

    /**
     * Optional metadata tags.
     * Informational only - NOT used for routing.
     */
    readonly tags?: readonly string[];
}

/**
 * Factory function to create a Proposal.
 * Ensures the object is frozen (immutable).
 *
 * @param operation - The operation type (required)
 * @param options - Optional target, confidence, reason and tags
 * @returns Frozen Proposal object
 */
export function createProposal(
    operation: OperationType,
    options?: { target?: string; confidence?: number; reason?: string; tags?: string[] }
): Proposal {
    const proposal: Proposal = {
        operation,
        ...(options?.target !== undefined && { target: options.target }),
        ...(options?.confidence !== undefined && { confidence: options.confidence }),
        ...(options?.reason !== undefined && { reason: options.reason }),
        ...(options?.tags && { tags: Object.freeze([...options.tags]) }),
    };

    return Object.freeze(proposal);
}

/**
 * Get the effective confidence of a proposal.
 * Returns 1.0 if confidence is not specified.
 */
export function getEffectiveConfidence(proposal: Proposal): number {
    return proposal.confidence ?? 1.0;
}
