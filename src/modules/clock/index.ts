/**
 * @fileoverview Public exports for the Progress Clock module.
 * @module modules/clock
 * @version 1.0.0
 */

export { ProgressClock } from './ProgressClock';
export { TIMER_CLOCK_HOST } from './TimerClockHost';
export { CLOCK_TICK_INTERVAL_MS } from './constants';
export type { IProgressClock } from './interfaces';
export type {
    ClockHost,
    ClockState,
    ClockStartOptions,
    ProgressClockOptions,
    TimerHandle,
} from './types';
