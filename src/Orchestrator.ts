/**
 * @fileoverview Playback Orchestrator - owns the current item, its clock and every transition.
 * @module Orchestrator
 * @version 1.0.0
 *
 * Responsibilities:
 * - Exactly one live adapter and one live clock, replaced atomically
 * - Command handling (play/pause/next/previous/mute/unmute/jumpTo)
 * - Auto-advance on clock expiry or natural media end
 * - Failure absorption with an error fallback and a guaranteed countdown
 */

import { CommandChannel } from './modules/commands/CommandChannel';
import type { ICommandChannel } from './modules/commands/interfaces';
import type { CommandEvent, PlaybackStatus } from './modules/commands/types';
import { ProgressClock } from './modules/clock/ProgressClock';
import type { IProgressClock } from './modules/clock/interfaces';
import { createMediaAdapter } from './modules/media/MediaAdapterFactory';
import { createDomMediaEnvironment } from './modules/media/environment';
import type { IMediaAdapter, MediaAdapterFactory } from './modules/media/interfaces';
import { configuredDurationMs, effectiveMuted, validateStoryItem } from './modules/media/storyItem';
import type {
    LoadError,
    MediaAdapterContext,
    MediaEnvironment,
    StoryItem,
} from './modules/media/types';
import {
    DEFAULT_ORCHESTRATOR_CONFIG,
    VALID_PHASE_TRANSITIONS,
} from './core/session/constants';
import type {
    OrchestratorConfig,
    OrchestratorEventMap,
    SessionPhase,
    SessionSnapshot,
} from './core/session/types';
import { STORY_STORAGE_KEYS } from './config/storageKeys';
import { AppErrorCode, StoryError } from './types/app-errors';
import { EventEmitter } from './utils/EventEmitter';
import type { IDisposable } from './utils/interfaces';
import { propagateContractViolations, raiseContractViolation } from './utils/contracts';
import { redactSensitiveTokens } from './utils/redact';
import { isStoredTrue, safeLocalStorageGet } from './utils/storage';

/**
 * How a newly loaded item is announced.
 * - 'index': indexChanged
 * - 'returnedToStart': previous() at index 0
 * - 'restart': same index reloaded, no announcement
 */
type LoadAnnouncement = 'index' | 'returnedToStart' | 'restart';

/**
 * Handles sharing one item's display window.
 */
interface LiveRecord {
    generation: number;
    index: number;
    item: StoryItem;
    adapter: IMediaAdapter;
    clock: IProgressClock | null;
    subscriptions: IDisposable[];
}

/**
 * Drives a sequence of story items.
 *
 * Every adapter and clock callback carries the generation of the live record it
 * was wired for. A transition bumps the generation before anything else, so a
 * late callback from a replaced item is dropped even if a jump returns to the
 * same index.
 *
 * @example
 * ```typescript
 * const orchestrator = new PlaybackOrchestrator({ items });
 * orchestrator.on('activeAdapterChanged', ({ adapter }) => {
 *     const element = adapter.getElement();
 *     if (element) stage.replaceChildren(element);
 * });
 * orchestrator.on('completed', () => router.back());
 * orchestrator.start();
 * ```
 */
export class PlaybackOrchestrator {
    private readonly _items: readonly StoryItem[];
    private readonly _initialIndex: number;
    private readonly _commands: ICommandChannel;
    private readonly _adapterFactory: MediaAdapterFactory;
    private readonly _clockFactory: () => IProgressClock;
    private readonly _assetBaseUrl: string;
    private readonly _assertContracts: boolean;
    private readonly _debugMode: boolean;
    private readonly _emitter = new EventEmitter<OrchestratorEventMap>(
        'Orchestrator',
        propagateContractViolations('Orchestrator')
    );

    private _environment: MediaEnvironment | null;
    private _commandSubscription: IDisposable | null = null;

    // Session state
    private _phase: SessionPhase = 'idle';
    private _currentIndex: number;
    private _muteOverride: boolean | null;
    private _isBuffering = false;
    private _progress = 0;
    private _error: LoadError | null = null;
    private _fallback: HTMLElement | null = null;

    private _generation = 0;
    private _live: LiveRecord | null = null;

    /**
     * @throws StoryError(EMPTY_SEQUENCE) for an empty item list
     * @throws StoryError(INVALID_STORY_ITEM) for a malformed item
     * @throws StoryError(INVALID_INDEX) when initialIndex is outside the sequence
     */
    constructor(config: OrchestratorConfig) {
        if (config.items.length === 0) {
            throw new StoryError(AppErrorCode.EMPTY_SEQUENCE, 'A story sequence needs at least one item');
        }
        config.items.forEach((item, index) => validateStoryItem(item, index));

        const initialIndex = config.initialIndex ?? DEFAULT_ORCHESTRATOR_CONFIG.initialIndex;
        if (!Number.isInteger(initialIndex) || initialIndex < 0 || initialIndex >= config.items.length) {
            throw new StoryError(
                AppErrorCode.INVALID_INDEX,
                `initialIndex ${initialIndex} is outside [0, ${config.items.length})`
            );
        }

        this._items = [...config.items];
        this._initialIndex = initialIndex;
        this._currentIndex = initialIndex;
        this._muteOverride = config.initiallyMuted ?? DEFAULT_ORCHESTRATOR_CONFIG.initiallyMuted;
        this._adapterFactory = config.adapterFactory ?? createMediaAdapter;
        this._clockFactory = config.clockFactory ?? ((): IProgressClock => new ProgressClock());
        this._environment = config.environment ?? null;
        this._assetBaseUrl = config.assetBaseUrl ?? DEFAULT_ORCHESTRATOR_CONFIG.assetBaseUrl;
        this._assertContracts = config.assertContracts ?? DEFAULT_ORCHESTRATOR_CONFIG.assertContracts;
        this._debugMode = config.debugMode ?? DEFAULT_ORCHESTRATOR_CONFIG.debugMode;

        this._commands =
            config.commands ??
            new CommandChannel({
                initialStatus: config.initialStatus ?? DEFAULT_ORCHESTRATOR_CONFIG.initialStatus,
            });
        this._commands.setSequenceLength(this._items.length);
        this._commandSubscription = this._commands.subscribe((event) => this._handleCommand(event));
    }

    // ============================================
    // Lifecycle
    // ============================================

    /**
     * Load the initial item. Calling it again is a no-op.
     */
    public start(): void {
        if (this._phase !== 'idle') {
            console.warn(`[Orchestrator] start() ignored in phase '${this._phase}'`);
            return;
        }
        this._debug(`Starting at index ${this._initialIndex} of ${this._items.length}`);
        this._load(this._initialIndex, 'index', null);
    }

    /**
     * Release the live adapter and clock and stop listening to commands. Idempotent.
     */
    public destroy(): void {
        if (this._phase === 'destroyed') {
            return;
        }
        this._debug('Destroying session');
        this._commandSubscription?.dispose();
        this._commandSubscription = null;
        this._teardownLive();
        this._generation += 1;
        this._setPhase('destroyed');
        this._emitter.removeAllListeners();
    }

    // ============================================
    // Commands
    // ============================================

    public play(): boolean {
        return this._commands.play();
    }

    public pause(): boolean {
        return this._commands.pause();
    }

    public next(): boolean {
        return this._commands.next();
    }

    public previous(): boolean {
        return this._commands.previous();
    }

    public mute(): boolean {
        return this._commands.mute();
    }

    public unmute(): boolean {
        return this._commands.unmute();
    }

    public jumpTo(index: number): boolean {
        return this._commands.jumpTo(index);
    }

    // ============================================
    // State
    // ============================================

    public on<K extends keyof OrchestratorEventMap>(
        event: K,
        handler: (payload: OrchestratorEventMap[K]) => void
    ): IDisposable {
        return this._emitter.on(event, handler);
    }

    public getSnapshot(): SessionSnapshot {
        return {
            phase: this._phase,
            currentIndex: this._currentIndex,
            status: this._commands.currentStatus(),
            progress: this.getProgress(),
            isMuted: this._isMuted(),
            isBuffering: this._isBuffering,
            error: this._error,
            fallback: this._fallback,
        };
    }

    public getPhase(): SessionPhase {
        return this._phase;
    }

    public getCurrentIndex(): number {
        return this._currentIndex;
    }

    public getProgress(): number {
        const clock = this._live?.clock;
        return clock ? clock.getProgress() : this._progress;
    }

    public getActiveAdapter(): IMediaAdapter | null {
        return this._live?.adapter ?? null;
    }

    public getItems(): readonly StoryItem[] {
        return this._items;
    }

    public getCommandChannel(): ICommandChannel {
        return this._commands;
    }

    // ============================================
    // Command Handling
    // ============================================

    private _handleCommand({ command, status }: CommandEvent): void {
        if (this._phase === 'destroyed') {
            return;
        }
        this._debug(`Command '${command.type}' in phase '${this._phase}'`);

        switch (command.type) {
            case 'play':
            case 'pause':
                this._applyStatus(status);
                return;
            case 'mute':
            case 'unmute':
                this._applyMute(command.type === 'mute');
                return;
            case 'next':
                if (this._phase === 'idle' || this._phase === 'completed') {
                    return;
                }
                this._advance();
                return;
            case 'previous':
                if (this._phase === 'idle') {
                    return;
                }
                if (this._currentIndex === 0) {
                    this._transition(0, 'returnedToStart');
                } else {
                    this._transition(this._currentIndex - 1, 'index');
                }
                return;
            case 'jumpTo':
                if (this._phase === 'idle') {
                    return;
                }
                this._transition(
                    command.index,
                    command.index === this._currentIndex ? 'restart' : 'index'
                );
                return;
        }
    }

    private _applyStatus(status: PlaybackStatus): void {
        this._emitter.emit('statusChange', { status });
        const live = this._live;
        if (!live || this._phase === 'completed') {
            return;
        }
        live.adapter.setPlaybackState(status);
        this._syncClock();
    }

    private _applyMute(muted: boolean): void {
        this._muteOverride = muted;
        this._live?.adapter.setMuted(muted);
        this._emitter.emit('muteChange', { isMuted: this._isMuted() });
    }

    // ============================================
    // Transitions
    // ============================================

    /**
     * Move to the next item, or finish at the last one.
     */
    private _advance(): void {
        const nextIndex = this._currentIndex + 1;
        if (nextIndex < this._items.length) {
            this._transition(nextIndex, 'index');
        } else {
            this._complete();
        }
    }

    private _transition(index: number, announcement: LoadAnnouncement): void {
        const previousIndex = this._currentIndex;
        const generation = this._generation;
        if (!this._setPhase('transitioning') || generation !== this._generation) {
            return;
        }
        this._teardownLive();
        this._load(index, announcement, previousIndex);
    }

    /**
     * Create and activate the adapter for `index`. Any listener that triggers a
     * transition while we are still wiring this one bumps the generation, and
     * the remaining steps are skipped.
     */
    private _load(index: number, announcement: LoadAnnouncement, previousIndex: number | null): void {
        this._generation += 1;
        const generation = this._generation;

        if (!this._setPhase('loading') || generation !== this._generation) {
            return;
        }
        this._currentIndex = index;
        this._progress = 0;
        this._isBuffering = false;
        this._error = null;
        this._fallback = null;
        this._debug(`Loading index ${index} (${announcement})`);

        if (announcement === 'index') {
            this._emitter.emit('indexChanged', { index, previousIndex });
        } else if (announcement === 'returnedToStart') {
            this._emitter.emit('returnedToStart', { index });
        }
        this._emitter.emit('progress', { index, progress: 0 });
        if (generation !== this._generation) {
            return;
        }

        const item = this._items[index];
        const adapter = this._adapterFactory(item, this._adapterContext());
        const live: LiveRecord = {
            generation,
            index,
            item,
            adapter,
            clock: null,
            subscriptions: [],
        };
        this._live = live;

        live.subscriptions.push(
            adapter.onReady(({ durationMs }) => this._handleReady(generation, durationMs)),
            adapter.onFailed((error) => this._handleFailed(generation, error)),
            adapter.onEnded(() => this._handleEnded(generation)),
            adapter.onBufferingChange(({ isBuffering }) => this._handleBuffering(generation, isBuffering))
        );
        adapter.setMuted(this._isMuted());
        adapter.setPlaybackState(this._commands.currentStatus());

        this._emitter.emit('activeAdapterChanged', { index, kind: item.kind, adapter });
        if (generation !== this._generation) {
            return;
        }
        adapter.activate();
    }

    /**
     * Arrive at the end of the sequence. The last adapter stays mounted but paused.
     */
    private _complete(): void {
        const generation = this._generation;
        if (!this._setPhase('transitioning') || generation !== this._generation) {
            return;
        }
        this._generation += 1;
        const live = this._live;
        if (live) {
            live.clock?.destroy();
            live.clock = null;
            this._disposeSubscriptions(live);
            live.adapter.setPlaybackState('paused');
        }
        this._progress = 1;
        this._isBuffering = false;

        if (!this._setPhase('completed')) {
            return;
        }
        this._debug(`Completed at index ${this._currentIndex}`);
        this._emitter.emit('progress', { index: this._currentIndex, progress: 1 });
        this._emitter.emit('completed', { index: this._currentIndex });
    }

    /**
     * Destroy the clock, drop subscriptions, then release the adapter, in that order.
     */
    private _teardownLive(): void {
        const live = this._live;
        if (!live) {
            return;
        }
        this._live = null;
        this._generation += 1;

        live.clock?.destroy();
        live.clock = null;
        this._disposeSubscriptions(live);
        live.adapter.release();
    }

    private _disposeSubscriptions(live: LiveRecord): void {
        for (const subscription of live.subscriptions.splice(0)) {
            subscription.dispose();
        }
    }

    // ============================================
    // Adapter & Clock Callbacks
    // ============================================

    private _handleReady(generation: number, durationMs: number | null): void {
        const live = this._currentLive(generation);
        if (!live || this._phase !== 'loading') {
            return;
        }
        if (!this._setPhase('active') || generation !== this._generation) {
            return;
        }
        const duration = durationMs ?? configuredDurationMs(live.item);
        this._debug(`Index ${live.index} ready; display for ${duration}ms`);
        this._startClock(live, duration);
    }

    private _handleFailed(generation: number, error: LoadError): void {
        const live = this._currentLive(generation);
        if (!live || this._phase !== 'loading') {
            return;
        }
        console.warn(
            `[Orchestrator] Item ${live.index} (${live.item.kind}) failed to load: ${error.code} ${error.message}`,
            redactSensitiveTokens(live.item.sourceLocator ?? '')
        );

        this._error = error;
        this._fallback = this._buildFallback(live.item, error);
        if (!this._setPhase('failed') || generation !== this._generation) {
            return;
        }
        this._emitter.emit('itemFailed', { index: live.index, error, fallback: this._fallback });
        if (generation !== this._generation) {
            return;
        }
        this._startClock(live, configuredDurationMs(live.item));
    }

    private _handleEnded(generation: number): void {
        if (!this._currentLive(generation) || this._phase !== 'active') {
            return;
        }
        this._debug(`Index ${this._currentIndex} ended`);
        this._advance();
    }

    private _handleExpire(generation: number): void {
        if (!this._currentLive(generation) || (this._phase !== 'active' && this._phase !== 'failed')) {
            return;
        }
        this._debug(`Index ${this._currentIndex} expired`);
        this._advance();
    }

    private _handleBuffering(generation: number, isBuffering: boolean): void {
        if (!this._currentLive(generation) || this._isBuffering === isBuffering) {
            return;
        }
        this._isBuffering = isBuffering;
        this._emitter.emit('bufferingChange', { index: this._currentIndex, isBuffering });
        this._syncClock();
    }

    private _startClock(live: LiveRecord, durationMs: number): void {
        const clock = this._clockFactory();
        live.clock = clock;
        const generation = live.generation;
        live.subscriptions.push(
            clock.onTick((progress) => {
                if (this._currentLive(generation)) {
                    this._progress = progress;
                    this._emitter.emit('progress', { index: live.index, progress });
                }
            }),
            clock.onExpire(() => this._handleExpire(generation))
        );
        clock.start(durationMs, { paused: !this._shouldClockRun() });
    }

    /**
     * The clock runs iff playing and not buffering.
     */
    private _syncClock(): void {
        const clock = this._live?.clock;
        if (!clock) {
            return;
        }
        if (this._shouldClockRun()) {
            clock.resume();
        } else {
            clock.pause();
        }
    }

    // ============================================
    // Helpers
    // ============================================

    private _currentLive(generation: number): LiveRecord | null {
        const live = this._live;
        if (!live || live.generation !== generation || generation !== this._generation) {
            return null;
        }
        return live;
    }

    private _shouldClockRun(): boolean {
        return this._commands.currentStatus() === 'playing' && !this._isBuffering;
    }

    private _isMuted(): boolean {
        return effectiveMuted(this._items[this._currentIndex], this._muteOverride);
    }

    private _buildFallback(item: StoryItem, error: LoadError): HTMLElement | null {
        if (!item.errorFallback) {
            return null;
        }
        try {
            return item.errorFallback(error, item);
        } catch (fallbackError) {
            console.error('[Orchestrator] Error fallback renderer threw:', fallbackError);
            return null;
        }
    }

    private _adapterContext(): MediaAdapterContext {
        if (!this._environment) {
            this._environment = createDomMediaEnvironment();
        }
        return {
            environment: this._environment,
            commands: this._commands,
            assetBaseUrl: this._assetBaseUrl,
            assertContracts: this._assertContracts,
        };
    }

    /**
     * Validate and apply a phase change.
     * @returns false when the edge is not allowed
     */
    private _setPhase(to: SessionPhase): boolean {
        const from = this._phase;
        if (from === to) {
            return true;
        }
        if (to !== 'destroyed' && !VALID_PHASE_TRANSITIONS[from].includes(to)) {
            raiseContractViolation(
                AppErrorCode.INVALID_TRANSITION,
                `Invalid phase transition: ${from} -> ${to}`,
                this._assertContracts,
                'Orchestrator'
            );
            return false;
        }
        this._phase = to;
        this._debug(`Phase ${from} -> ${to}`);
        this._emitter.emit('phaseChange', { from, to });
        return true;
    }

    private _isDebugEnabled(): boolean {
        return this._debugMode || isStoredTrue(safeLocalStorageGet(STORY_STORAGE_KEYS.DEBUG_LOGGING));
    }

    private _debug(message: string): void {
        if (this._isDebugEnabled()) {
            console.debug(`[Orchestrator] ${message}`);
        }
    }
}
