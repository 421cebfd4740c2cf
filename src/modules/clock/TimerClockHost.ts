/**
 * @fileoverview Default ClockHost backed by the global timers.
 * @module modules/clock/TimerClockHost
 * @version 1.0.0
 */

import type { ClockHost } from './types';

/**
 * Resolves the global timer functions at call time, so fake timers installed
 * after import are honoured.
 */
export const TIMER_CLOCK_HOST: ClockHost = {
    now: () => Date.now(),
    setTimeout: (callback, delayMs) => setTimeout(callback, delayMs),
    clearTimeout: (handle) => clearTimeout(handle),
    setInterval: (callback, intervalMs) => setInterval(callback, intervalMs),
    clearInterval: (handle) => clearInterval(handle),
};
