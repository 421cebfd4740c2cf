/**
 * @fileoverview Type definitions for the playback session.
 * @module core/session/types
 * @version 1.0.0
 */

import type { IProgressClock } from '../../modules/clock/interfaces';
import type { ICommandChannel } from '../../modules/commands/interfaces';
import type { PlaybackStatus } from '../../modules/commands/types';
import type { IMediaAdapter, MediaAdapterFactory } from '../../modules/media/interfaces';
import type { LoadError, MediaEnvironment, StoryItem, StoryItemKind } from '../../modules/media/types';

/**
 * Orchestrator phases.
 */
export type SessionPhase =
    | 'idle'
    | 'loading'
    | 'active'
    | 'failed'
    | 'transitioning'
    | 'completed'
    | 'destroyed';

/**
 * Orchestrator construction options.
 */
export interface OrchestratorConfig {
    /** Sequence to play; at least one item */
    items: readonly StoryItem[];
    /** Index shown first. Defaults to 0. */
    initialIndex?: number;
    /** Channel to share with gesture/lifecycle coordinators; created when omitted */
    commands?: ICommandChannel;
    /** Status of a channel created by the orchestrator. Defaults to 'playing'. */
    initialStatus?: PlaybackStatus;
    /** Session mute override; null defers to each item's muteByDefault */
    initiallyMuted?: boolean | null;
    adapterFactory?: MediaAdapterFactory;
    clockFactory?: () => IProgressClock;
    /** Element factory for adapters; built on the global document when omitted */
    environment?: MediaEnvironment;
    /** Base URL for sourceOrigin 'asset' */
    assetBaseUrl?: string;
    /** Throw on contract violations. Defaults to true. */
    assertContracts?: boolean;
    /** Trace transitions through console.debug */
    debugMode?: boolean;
}

/**
 * Read-only view of session state for a presentation layer.
 */
export interface SessionSnapshot {
    phase: SessionPhase;
    currentIndex: number;
    status: PlaybackStatus;
    /** Normalized progress of the current item */
    progress: number;
    isMuted: boolean;
    isBuffering: boolean;
    /** Load error of the current item while in 'failed' */
    error: LoadError | null;
    /** Fallback element built for the current failure */
    fallback: HTMLElement | null;
}

export interface IndexChangedEvent {
    index: number;
    previousIndex: number | null;
}

export interface ActiveAdapterChangedEvent {
    index: number;
    kind: StoryItemKind;
    adapter: IMediaAdapter;
}

export interface ItemFailedEvent {
    index: number;
    error: LoadError;
    fallback: HTMLElement | null;
}

/**
 * Typed event map for orchestrator events.
 */
export interface OrchestratorEventMap {
    indexChanged: IndexChangedEvent;
    /** Last item finished; carries the last index */
    completed: { index: number };
    /** previous() at index 0 restarted the first item */
    returnedToStart: { index: number };
    activeAdapterChanged: ActiveAdapterChangedEvent;
    phaseChange: { from: SessionPhase; to: SessionPhase };
    progress: { index: number; progress: number };
    itemFailed: ItemFailedEvent;
    statusChange: { status: PlaybackStatus };
    muteChange: { isMuted: boolean };
    bufferingChange: { index: number; isBuffering: boolean };
    [key: string]: unknown;
}
