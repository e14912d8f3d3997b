/**
 * @fileoverview Archive errors
 *
 * @module adapters/archive/ArchiveError
 */

export type ArchiveErrorCode =
    | "PASSWORD_REQUIRED"
    | "BAD_PASSWORD"
    | "CORRUPT"
    | "UNSUPPORTED"
    | "INSUFFICIENT_SPACE"
    | "VERIFICATION_FAILED";

/**
 * Error thrown by archive readers and the extractor.
 *
 * @example
 * ```typescript
 * try {
 *     await reader.list();
 * }
 * catch (error) {
 *     if (error instanceof ArchiveError && error.code === "PASSWORD_REQUIRED") {
 *         // try the configured passwords
 *     }
 * }
 * ```
 */
export class ArchiveError extends Error {
    readonly code: ArchiveErrorCode;

    constructor(code: ArchiveErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ArchiveError";
        this.code = code;
    }
}

export function isArchiveError(error: unknown, code?: ArchiveErrorCode): error is ArchiveError {
    return error instanceof ArchiveError && (code === undefined || error.code === code);
}
