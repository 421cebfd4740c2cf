/**
 * @fileoverview Type definitions for the Progress Clock module.
 * @module modules/clock/types
 * @version 1.0.0
 */

/**
 * Opaque timer handle returned by a ClockHost.
 */
export type TimerHandle = ReturnType<typeof setTimeout>;

/**
 * Time source and scheduler a clock runs on.
 * The default host uses the global timers; a render loop or a virtual clock can stand in.
 */
export interface ClockHost {
    now(): number;
    setTimeout(callback: () => void, delayMs: number): TimerHandle;
    clearTimeout(handle: TimerHandle): void;
    setInterval(callback: () => void, intervalMs: number): TimerHandle;
    clearInterval(handle: TimerHandle): void;
}

/**
 * Clock lifecycle states.
 */
export type ClockState = 'idle' | 'running' | 'paused' | 'expired' | 'destroyed';

export interface ClockStartOptions {
    /** Start frozen at 0; resume() begins the countdown */
    paused?: boolean;
}

export interface ProgressClockOptions {
    /** Time source; defaults to the global timers */
    host?: ClockHost;
    /** Tick cadence while running */
    tickIntervalMs?: number;
}

/**
 * Typed event map for clock events.
 */
export interface ProgressClockEventMap {
    /** Normalized progress in [0, 1] */
    tick: number;
    /** Countdown reached its deadline */
    expire: undefined;
    [key: string]: unknown;
}
