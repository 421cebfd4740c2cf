/**
 * @fileoverview Promise helpers for callbacks that must not block the control loop.
 * @module utils/async
 * @version 1.0.0
 */

/**
 * Run a promise without awaiting it, logging a rejection instead of leaving it unhandled.
 * @param promise - Work already started
 * @param label - Context included in the warning
 * @param scope - Log prefix of the calling module
 */
export function fireAndForget(promise: Promise<unknown>, label: string, scope: string): void {
    promise.catch((error: unknown) => {
        console.warn(`[${scope}] ${label} failed:`, error);
    });
}
