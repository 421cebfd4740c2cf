/**
 * @fileoverview Progress Clock implementation.
 * Maps wall-clock time to normalized progress and signals expiry once per cycle.
 * @module modules/clock/ProgressClock
 * @version 1.0.0
 */

import { EventEmitter } from '../../utils/EventEmitter';
import { propagateContractViolations } from '../../utils/contracts';
import type { IDisposable } from '../../utils/interfaces';
import { AppErrorCode, StoryError } from '../../types/app-errors';
import type { IProgressClock } from './interfaces';
import type {
    ClockHost,
    ClockStartOptions,
    ClockState,
    ProgressClockEventMap,
    ProgressClockOptions,
    TimerHandle,
} from './types';
import { TIMER_CLOCK_HOST } from './TimerClockHost';
import { CLOCK_ERROR_MESSAGES, CLOCK_TICK_INTERVAL_MS } from './constants';

/**
 * Countdown with pause/resume that preserves the elapsed fraction.
 *
 * Each start()/reset() opens a new cycle. Timer callbacks carry the cycle they
 * were armed for and are ignored once it is stale, so expiry fires at most once
 * per cycle regardless of pause/resume churn.
 *
 * @example
 * ```typescript
 * const clock = new ProgressClock();
 * clock.onTick((p) => bar.style.width = `${p * 100}%`);
 * clock.onExpire(() => commands.next());
 * clock.start(5000);
 * ```
 */
export class ProgressClock implements IProgressClock {
    private readonly _emitter = new EventEmitter<ProgressClockEventMap>(
        'ProgressClock',
        propagateContractViolations('ProgressClock')
    );
    private readonly _host: ClockHost;
    private readonly _tickIntervalMs: number;

    private _state: ClockState = 'idle';
    private _durationMs = 0;
    /** Elapsed time banked before the current running segment */
    private _elapsedMs = 0;
    /** Host time at which the current running segment began */
    private _segmentStartedAt = 0;
    private _cycle = 0;
    private _expiryTimer: TimerHandle | null = null;
    private _tickTimer: TimerHandle | null = null;

    constructor(options: ProgressClockOptions = {}) {
        this._host = options.host ?? TIMER_CLOCK_HOST;
        this._tickIntervalMs = options.tickIntervalMs ?? CLOCK_TICK_INTERVAL_MS;
    }

    public start(durationMs: number, options: ClockStartOptions = {}): void {
        if (this._state === 'destroyed') {
            console.warn(`[ProgressClock] ${CLOCK_ERROR_MESSAGES.DESTROYED}; start() ignored`);
            return;
        }
        if (!Number.isFinite(durationMs) || durationMs < 0) {
            throw new StoryError(AppErrorCode.INVALID_DURATION, CLOCK_ERROR_MESSAGES.INVALID_DURATION);
        }

        this._clearTimers();
        this._cycle += 1;
        this._durationMs = durationMs;
        this._elapsedMs = 0;

        if (options.paused === true) {
            this._state = 'paused';
        } else {
            this._runSegment();
        }
        this._emitter.emit('tick', 0);
    }

    public pause(): void {
        if (this._state !== 'running') {
            return;
        }
        this._elapsedMs = this._currentElapsedMs();
        this._clearTimers();
        this._state = 'paused';
        this._emitter.emit('tick', this.getProgress());
    }

    public resume(): void {
        if (this._state !== 'paused') {
            return;
        }
        this._runSegment();
    }

    public reset(): void {
        if (this._state === 'destroyed') {
            return;
        }
        this._clearTimers();
        this._cycle += 1;
        this._elapsedMs = 0;
        this._state = 'idle';
        this._emitter.emit('tick', 0);
    }

    public destroy(): void {
        if (this._state === 'destroyed') {
            return;
        }
        this._clearTimers();
        this._cycle += 1;
        this._state = 'destroyed';
        this._emitter.removeAllListeners();
    }

    public onExpire(callback: () => void): IDisposable {
        return this._emitter.on('expire', () => callback());
    }

    public onTick(callback: (progress: number) => void): IDisposable {
        return this._emitter.on('tick', callback);
    }

    public getProgress(): number {
        if (this._state === 'expired') {
            return 1;
        }
        if (this._durationMs === 0) {
            return 0;
        }
        return Math.min(1, this._currentElapsedMs() / this._durationMs);
    }

    public getState(): ClockState {
        return this._state;
    }

    public getDurationMs(): number {
        return this._durationMs;
    }

    public getRemainingMs(): number {
        if (this._state === 'expired') {
            return 0;
        }
        return Math.max(0, this._durationMs - this._currentElapsedMs());
    }

    // ========================================
    // Internals
    // ========================================

    private _currentElapsedMs(): number {
        if (this._state !== 'running') {
            return this._elapsedMs;
        }
        const elapsed = this._elapsedMs + (this._host.now() - this._segmentStartedAt);
        return Math.min(this._durationMs, Math.max(this._elapsedMs, elapsed));
    }

    private _runSegment(): void {
        this._state = 'running';
        this._segmentStartedAt = this._host.now();

        const cycle = this._cycle;
        const remainingMs = Math.max(0, this._durationMs - this._elapsedMs);
        this._expiryTimer = this._host.setTimeout(() => this._expire(cycle), remainingMs);
        if (remainingMs > 0) {
            this._tickTimer = this._host.setInterval(() => this._tick(cycle), this._tickIntervalMs);
        }
    }

    private _tick(cycle: number): void {
        if (cycle !== this._cycle || this._state !== 'running') {
            return;
        }
        this._emitter.emit('tick', this.getProgress());
    }

    private _expire(cycle: number): void {
        this._expiryTimer = null;
        if (cycle !== this._cycle || this._state !== 'running') {
            return;
        }
        this._clearTimers();
        this._elapsedMs = this._durationMs;
        this._state = 'expired';
        this._emitter.emit('tick', 1);
        this._emitter.emit('expire', undefined);
    }

    private _clearTimers(): void {
        if (this._expiryTimer !== null) {
            this._host.clearTimeout(this._expiryTimer);
            this._expiryTimer = null;
        }
        if (this._tickTimer !== null) {
            this._host.clearInterval(this._tickTimer);
            this._tickTimer = null;
        }
    }
}
