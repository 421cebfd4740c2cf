/**
 * @fileoverview Shared lifecycle for media adapters.
 * @module modules/media/BaseMediaAdapter
 * @version 1.0.0
 */

import { EventEmitter } from '../../utils/EventEmitter';
import type { IDisposable } from '../../utils/interfaces';
import {
    isContractViolation,
    propagateContractViolations,
    raiseContractViolation,
} from '../../utils/contracts';
import { redactSensitiveTokens } from '../../utils/redact';
import { AppErrorCode } from '../../types/app-errors';
import type { PlaybackStatus } from '../commands/types';
import type { IMediaAdapter } from './interfaces';
import type {
    AdapterPhase,
    LoadError,
    MediaAdapterContext,
    MediaAdapterEventMap,
    StoryItem,
} from './types';
import { BackgroundTrack } from './BackgroundTrack';
import { mapMediaErrorCodeToLoadError, toLoadError } from './ErrorHandler';
import { audioTrackOf, resolveSourceUrl } from './storyItem';

/**
 * Phase bookkeeping, event gating and release semantics common to every kind.
 *
 * Subclasses implement `acquire()` to start loading and call `markReady()` or
 * `fail()` exactly once. DOM listeners registered through `listen()` and
 * resources registered through `track()` are disposed on release, so nothing
 * a subclass wires up can fire after release.
 *
 * Items with an `audioTrack` get a BackgroundTrack: readiness then waits for
 * both the visual and the track's metadata, the ready duration is the track's,
 * and the track's end and buffering become the item's.
 */
export abstract class BaseMediaAdapter<TItem extends StoryItem = StoryItem> implements IMediaAdapter {
    public readonly item: TItem;
    protected readonly context: MediaAdapterContext;

    private readonly _emitter = new EventEmitter<MediaAdapterEventMap>(
        'MediaAdapter',
        propagateContractViolations('MediaAdapter')
    );
    private readonly _resources: IDisposable[] = [];
    private _phase: AdapterPhase = 'idle';
    private _activated = false;
    private _ended = false;
    private _buffering = false;
    private _muted = false;
    private _playback: PlaybackStatus = 'paused';
    private _backgroundTrack: BackgroundTrack | null = null;
    private _trackLoaded = false;
    /** Set once the visual has loaded; holds its reported duration */
    private _visualReady: { durationMs: number | null } | null = null;

    constructor(item: TItem, context: MediaAdapterContext) {
        this.item = item;
        this.context = context;
    }

    public get kind(): TItem['kind'] {
        return this.item.kind;
    }

    // ========================================
    // Lifecycle
    // ========================================

    public activate(): void {
        if (this._phase === 'released') {
            raiseContractViolation(
                AppErrorCode.ADAPTER_RELEASED,
                `activate() called on a released ${this.kind} adapter`,
                this.context.assertContracts,
                'MediaAdapter'
            );
            return;
        }
        if (this._activated) {
            console.warn(`[MediaAdapter] ${this.kind} adapter already activated; ignoring`);
            return;
        }

        this._activated = true;
        this._phase = 'loading';
        try {
            this._loadBackgroundTrack();
            this.acquire();
        } catch (error) {
            if (isContractViolation(error)) {
                throw error;
            }
            this.fail(toLoadError(error, this.kind, this.acquisitionErrorCode()));
        }
    }

    public release(): void {
        if (this._phase === 'released') {
            raiseContractViolation(
                AppErrorCode.DOUBLE_RELEASE,
                `${this.kind} adapter released twice`,
                this.context.assertContracts,
                'MediaAdapter'
            );
            return;
        }

        this._phase = 'released';
        this._emitter.removeAllListeners();
        for (const resource of this._resources.splice(0)) {
            resource.dispose();
        }
        try {
            this.teardown();
        } catch (error) {
            console.warn(`[MediaAdapter] ${this.kind} teardown failed:`, error);
        }
    }

    public getPhase(): AdapterPhase {
        return this._phase;
    }

    public isLive(): boolean {
        return this._activated && this._phase !== 'released';
    }

    // ========================================
    // Media
    // ========================================

    public intrinsicDurationMs(): number | null {
        return this._backgroundTrack?.durationMs() ?? null;
    }

    public setMuted(muted: boolean): void {
        if (this._muted === muted) {
            return;
        }
        this._muted = muted;
        if (this._phase === 'ready') {
            this._applyMuted(muted);
        }
    }

    public setPlaybackState(state: PlaybackStatus): void {
        if (this._playback === state) {
            return;
        }
        this._playback = state;
        if (this._phase === 'ready') {
            this._applyPlayback(state);
        }
    }

    public abstract getElement(): HTMLElement | null;

    public isBuffering(): boolean {
        return this._buffering;
    }

    /** Soundtrack element of a visual item, if it has one */
    public getAudioTrackElement(): HTMLAudioElement | null {
        return this._backgroundTrack?.getElement() ?? null;
    }

    // ========================================
    // Events
    // ========================================

    public onReady(handler: (payload: { durationMs: number | null }) => void): IDisposable {
        return this._emitter.on('ready', handler);
    }

    public onFailed(handler: (error: LoadError) => void): IDisposable {
        return this._emitter.on('failed', handler);
    }

    public onEnded(handler: () => void): IDisposable {
        return this._emitter.on('ended', () => handler());
    }

    public onBufferingChange(handler: (payload: { isBuffering: boolean }) => void): IDisposable {
        return this._emitter.on('bufferingChange', handler);
    }

    // ========================================
    // Subclass hooks
    // ========================================

    /** Start acquiring the item's source. May throw; the throw becomes a load failure. */
    protected abstract acquire(): void;

    /** Free resources. Listeners are already gone when this runs. */
    protected teardown(): void {
        // nothing by default
    }

    protected applyMuted(_muted: boolean): void {
        // no AV channel
    }

    protected applyPlayback(_state: PlaybackStatus): void {
        // no AV channel
    }

    /** Code used when acquire() throws */
    protected acquisitionErrorCode(): AppErrorCode {
        return AppErrorCode.LOAD_FAILED;
    }

    protected get desiredMuted(): boolean {
        return this._muted;
    }

    protected get desiredPlayback(): PlaybackStatus {
        return this._playback;
    }

    protected resolveSource(): string {
        return resolveSourceUrl(this.item, this.context.assetBaseUrl);
    }

    /**
     * Signal readiness. Applies the remembered mute and playback state first,
     * so listeners observe an element in its requested state.
     */
    protected markReady(durationMs: number | null): void {
        if (this._phase !== 'loading' || this._visualReady) {
            return;
        }
        this._visualReady = { durationMs };
        this._completeReady();
    }

    protected fail(error: LoadError): void {
        if (this._phase === 'ready') {
            console.warn(
                `[MediaAdapter] ${this.kind} error after ready ignored (${error.code}) for`,
                redactSensitiveTokens(this.item.sourceLocator ?? '')
            );
            return;
        }
        if (this._phase !== 'loading') {
            return;
        }
        this._phase = 'failed';
        this._emitter.emit('failed', error);
    }

    protected markEnded(): void {
        if (this._phase !== 'ready' || this._ended) {
            return;
        }
        this._ended = true;
        this._emitter.emit('ended', undefined);
    }

    protected setBuffering(isBuffering: boolean): void {
        if (this._phase === 'released' || this._buffering === isBuffering) {
            return;
        }
        this._buffering = isBuffering;
        this._emitter.emit('bufferingChange', { isBuffering });
    }

    /**
     * Register a resource disposed on release.
     */
    protected track(resource: IDisposable): void {
        if (this._phase === 'released') {
            resource.dispose();
            return;
        }
        this._resources.push(resource);
    }

    // ========================================
    // Background track
    // ========================================

    private _loadBackgroundTrack(): void {
        const config = audioTrackOf(this.item);
        if (!config) {
            return;
        }
        const track = new BackgroundTrack(config, this.context);
        this._backgroundTrack = track;
        this.track(track);
        track.load(
            {
                ready: () => {
                    this._trackLoaded = true;
                    this._completeReady();
                },
                error: (code, cause) => this.fail(mapMediaErrorCodeToLoadError(code, this.kind, cause)),
                ended: () => this.markEnded(),
                buffering: (isBuffering) => this.setBuffering(isBuffering),
            },
            this._muted
        );
    }

    private _completeReady(): void {
        const visual = this._visualReady;
        if (this._phase !== 'loading' || !visual) {
            return;
        }
        const track = this._backgroundTrack;
        if (track && !this._trackLoaded) {
            return;
        }
        this._phase = 'ready';
        this._applyMuted(this._muted);
        this._applyPlayback(this._playback);
        this._emitter.emit('ready', { durationMs: track?.durationMs() ?? visual.durationMs });
    }

    private _applyMuted(muted: boolean): void {
        this.applyMuted(muted);
        this._backgroundTrack?.setMuted(muted);
    }

    private _applyPlayback(state: PlaybackStatus): void {
        this.applyPlayback(state);
        this._backgroundTrack?.setPlaybackState(state);
    }

    /**
     * Add a DOM listener removed on release.
     */
    protected listen<K extends keyof HTMLElementEventMap>(
        target: HTMLElement,
        type: K,
        handler: (event: HTMLElementEventMap[K]) => void
    ): void {
        target.addEventListener(type, handler);
        this.track({ dispose: () => target.removeEventListener(type, handler) });
    }
}
