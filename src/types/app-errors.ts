/**
 * @fileoverview Canonical error taxonomy and base error shapes.
 * @module types/app-errors
 * @version 1.0.0
 */

/**
 * Unified error codes for consistent error handling across modules.
 */
export enum AppErrorCode {
    // Media Acquisition Errors (1xx) - absorbed into the failed phase, never thrown
    LOAD_FAILED = 'LOAD_FAILED',
    LOAD_ABORTED = 'LOAD_ABORTED',
    NETWORK_ERROR = 'NETWORK_ERROR',
    DECODE_ERROR = 'DECODE_ERROR',
    FORMAT_UNSUPPORTED = 'FORMAT_UNSUPPORTED',
    SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
    CUSTOM_VIEW_FAILED = 'CUSTOM_VIEW_FAILED',

    // Boundary Errors (2xx) - rejected before any state change
    INVALID_INDEX = 'INVALID_INDEX',
    EMPTY_SEQUENCE = 'EMPTY_SEQUENCE',
    INVALID_STORY_ITEM = 'INVALID_STORY_ITEM',
    INVALID_DURATION = 'INVALID_DURATION',

    // Contract Violations (3xx) - programmer errors
    DOUBLE_RELEASE = 'DOUBLE_RELEASE',
    ADAPTER_RELEASED = 'ADAPTER_RELEASED',
    INVALID_TRANSITION = 'INVALID_TRANSITION',

    // Generic
    UNKNOWN = 'UNKNOWN',
}

/**
 * Base application error structure.
 */
export interface AppError {
    /** Error code from canonical taxonomy */
    code: AppErrorCode;
    /** Technical error message */
    message: string;
    /** Whether recovery might succeed */
    recoverable: boolean;
    /** Additional context for debugging */
    context?: Record<string, unknown>;
}

/**
 * Thrown error carrying an AppErrorCode.
 * Used for boundary rejections and contract violations.
 */
export class StoryError extends Error {
    public readonly code: AppErrorCode;
    public readonly recoverable: boolean;

    constructor(code: AppErrorCode, message: string, recoverable = false) {
        super(message);
        this.name = 'StoryError';
        this.code = code;
        this.recoverable = recoverable;
    }
}

/**
 * Codes that signal a broken invariant rather than bad input or bad media.
 */
export const CONTRACT_VIOLATION_CODES: ReadonlySet<AppErrorCode> = new Set([
    AppErrorCode.DOUBLE_RELEASE,
    AppErrorCode.ADAPTER_RELEASED,
    AppErrorCode.INVALID_TRANSITION,
]);

export function isStoryError(error: unknown): error is StoryError {
    return error instanceof StoryError;
}
