/**
 * @fileoverview Constants for the Progress Clock module.
 * @module modules/clock/constants
 * @version 1.0.0
 */

/**
 * Tick cadence while a clock is running, in milliseconds.
 */
export const CLOCK_TICK_INTERVAL_MS = 50;

export const CLOCK_ERROR_MESSAGES = {
    INVALID_DURATION: 'Clock duration must be a finite, non-negative number of milliseconds',
    DESTROYED: 'Clock has been destroyed',
} as const;
