/**
 * @fileoverview Interface definitions for the Media module.
 * @module modules/media/interfaces
 * @version 1.0.0
 */

import type { IDisposable } from '../../utils/interfaces';
import type { PlaybackStatus } from '../commands/types';
import type {
    AdapterPhase,
    LoadError,
    MediaAdapterContext,
    StoryItem,
    StoryItemKind,
} from './types';

/**
 * Uniform lifecycle over one item's type-specific load/playback primitive.
 * An adapter is bound to exactly one item for its whole lifetime.
 */
export interface IMediaAdapter {
    readonly kind: StoryItemKind;
    readonly item: StoryItem;

    // ========================================
    // Lifecycle
    // ========================================

    /**
     * Begin acquisition. Failures are reported through onFailed, never thrown.
     */
    activate(): void;

    /**
     * Unregister all listeners and free resources. No event fires afterwards.
     * Safe before activate(); calling it twice is a contract violation.
     */
    release(): void;

    getPhase(): AdapterPhase;

    /**
     * Activated and not yet released.
     */
    isLive(): boolean;

    // ========================================
    // Media
    // ========================================

    /**
     * Natural media length for video/audio once known; null otherwise.
     */
    intrinsicDurationMs(): number | null;

    /** Idempotent; remembered until the adapter is ready. */
    setMuted(muted: boolean): void;

    /** Idempotent; remembered until the adapter is ready. */
    setPlaybackState(state: PlaybackStatus): void;

    /**
     * Element for the presentation layer to mount, or null before acquisition.
     */
    getElement(): HTMLElement | null;

    // ========================================
    // Events
    // ========================================

    /** Fires at most once, never after onFailed. */
    onReady(handler: (payload: { durationMs: number | null }) => void): IDisposable;

    /** Fires at most once, never after onReady. */
    onFailed(handler: (error: LoadError) => void): IDisposable;

    /** Video/audio only; fires at most once. */
    onEnded(handler: () => void): IDisposable;

    /** Video/audio only. */
    onBufferingChange(handler: (payload: { isBuffering: boolean }) => void): IDisposable;
}

/**
 * Creates the adapter for an item.
 */
export type MediaAdapterFactory = (item: StoryItem, context: MediaAdapterContext) => IMediaAdapter;
