/**
 * @fileoverview Type definitions for the Lifecycle module.
 * @module modules/lifecycle/types
 * @version 1.0.0
 */

/**
 * Minimal document surface the coordinator reads.
 */
export interface VisibilityDocument {
    readonly hidden: boolean;
    addEventListener(type: 'visibilitychange', listener: () => void): void;
    removeEventListener(type: 'visibilitychange', listener: () => void): void;
}

export interface VisibilityCoordinatorOptions {
    /** Defaults to the global document */
    document?: VisibilityDocument;
}
