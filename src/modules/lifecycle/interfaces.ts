/**
 * @fileoverview Interface definitions for the Lifecycle module.
 * @module modules/lifecycle/interfaces
 * @version 1.0.0
 */

/**
 * Pauses playback while the page is hidden and resumes it on return.
 */
export interface IVisibilityCoordinator {
    /** Start listening for visibility changes. Idempotent. */
    attach(): void;
    /** Stop listening. Idempotent. */
    detach(): void;
    isAttached(): boolean;
}
