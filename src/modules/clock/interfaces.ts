/**
 * @fileoverview Interface definitions for the Progress Clock module.
 * @module modules/clock/interfaces
 * @version 1.0.0
 */

import type { IDisposable } from '../../utils/interfaces';
import type { ClockStartOptions, ClockState } from './types';

/**
 * Cancellable countdown mapping elapsed time to a normalized progress value.
 */
export interface IProgressClock {
    /**
     * Begin a new cycle of `durationMs`. Cancels any pending expiry of the previous cycle.
     * A zero duration expires on the next timer turn, never synchronously.
     * @throws StoryError(INVALID_DURATION) for negative or non-finite durations
     */
    start(durationMs: number, options?: ClockStartOptions): void;

    /** Freeze progress, keeping the elapsed fraction. No-op unless running. */
    pause(): void;

    /** Continue from the frozen fraction with deadline = now + remaining. No-op unless paused. */
    resume(): void;

    /** Return to 0 and cancel any pending expiry. */
    reset(): void;

    /** Cancel timers and drop every listener. The clock cannot be restarted. */
    destroy(): void;

    onExpire(callback: () => void): IDisposable;
    onTick(callback: (progress: number) => void): IDisposable;

    getProgress(): number;
    getState(): ClockState;
    getDurationMs(): number;
    getRemainingMs(): number;
}
