/**
 * @fileoverview Type definitions for the Media module.
 * @module modules/media/types
 * @version 1.0.0
 */

import type { AppError } from '../../types/app-errors';
import type { ICommandChannel } from '../commands/interfaces';

// ============================================
// Story Items
// ============================================

/**
 * Media kinds. 'audio' plays a track with nothing to show; image, text and
 * custom items can carry a soundtrack through `audioTrack`.
 */
export type StoryItemKind = 'image' | 'video' | 'audio' | 'text' | 'web' | 'custom';

/**
 * Where a sourceLocator points.
 */
export type SourceOrigin = 'network' | 'file' | 'asset';

export type MediaFit = 'cover' | 'contain' | 'fill' | 'none';

export interface ImageItemConfig {
    fit?: MediaFit;
    width?: number;
    height?: number;
    /** CORS mode for cross-origin images */
    crossOrigin?: 'anonymous' | 'use-credentials';
    /** Accessible description */
    alt?: string;
}

export interface VideoItemConfig {
    fit?: MediaFit;
    width?: number;
    height?: number;
    /** Size the surface to the video's own aspect ratio instead of fitting it */
    useVideoAspectRatio?: boolean;
    /** Loop playback; the clock still bounds the display window */
    loop?: boolean;
    /** 'metadata' makes the item ready on metadata instead of the first frame */
    preload?: 'metadata' | 'auto';
    /** Poster frame shown until the first frame decodes */
    posterLocator?: string;
}

export interface AudioItemConfig {
    preload?: 'metadata' | 'auto';
    loop?: boolean;
}

/**
 * Soundtrack played under a visual item. The item waits for the track's
 * metadata, takes its duration from the track, advances when the track ends,
 * and counts as buffering while the track waits for data.
 */
export interface AudioTrackConfig {
    sourceLocator: string;
    /** Defaults to 'network' */
    sourceOrigin?: SourceOrigin;
    muteByDefault?: boolean;
}

export interface TextItemConfig {
    backgroundColor?: string;
    textColor?: string;
    textAlign?: 'left' | 'center' | 'right';
}

export interface WebItemConfig {
    /** Value for the frame's sandbox attribute */
    sandbox?: string;
    /** Value for the frame's allow attribute */
    allow?: string;
    /** Called with the frame when it loads (`true`) or fails to (`false`) */
    onLoaded?: (frame: HTMLIFrameElement, loaded: boolean) => void;
}

/**
 * Context passed to a custom view factory.
 */
export interface CustomViewContext {
    item: CustomStoryItem;
    /** Command channel of the session, so a custom view can drive playback */
    commands: ICommandChannel | null;
    /** Aborted when the adapter is released */
    signal: AbortSignal;
}

/**
 * What a custom view factory hands back.
 */
export interface CustomViewHandle {
    /** Element the presentation layer mounts */
    element?: HTMLElement | null;
    /** Resolve when interaction-ready; reject to fail the item. Omit for immediate readiness. */
    ready?: Promise<void>;
    /** Called once on release */
    dispose?: () => void;
}

export type CustomViewFactory = (context: CustomViewContext) => CustomViewHandle | void;

/**
 * Builds the element shown in place of an item that failed to load.
 */
export type ErrorFallbackRenderer = (error: LoadError, item: StoryItem) => HTMLElement | null;

interface StoryItemBase {
    /** Defaults to 'network' */
    sourceOrigin?: SourceOrigin;
    /** Display time when the adapter reports no intrinsic duration. Defaults to 3000. */
    durationMs?: number;
    /** Shown while the item is in the failed phase */
    errorFallback?: ErrorFallbackRenderer;
}

export interface ImageStoryItem extends StoryItemBase {
    kind: 'image';
    sourceLocator: string;
    audioTrack?: AudioTrackConfig;
    config?: ImageItemConfig;
}

export interface VideoStoryItem extends StoryItemBase {
    kind: 'video';
    sourceLocator: string;
    muteByDefault?: boolean;
    config?: VideoItemConfig;
}

export interface AudioStoryItem extends StoryItemBase {
    kind: 'audio';
    sourceLocator: string;
    muteByDefault?: boolean;
    config?: AudioItemConfig;
}

export interface TextStoryItem extends StoryItemBase {
    kind: 'text';
    /** The text to display */
    sourceLocator: string;
    audioTrack?: AudioTrackConfig;
    config?: TextItemConfig;
}

export interface WebStoryItem extends StoryItemBase {
    kind: 'web';
    sourceLocator: string;
    config?: WebItemConfig;
}

export interface CustomStoryItem extends StoryItemBase {
    kind: 'custom';
    sourceLocator?: string;
    customView: CustomViewFactory;
    audioTrack?: AudioTrackConfig;
    config?: Record<string, unknown>;
}

/**
 * Immutable descriptor of one item in a sequence.
 */
export type StoryItem =
    | ImageStoryItem
    | VideoStoryItem
    | AudioStoryItem
    | TextStoryItem
    | WebStoryItem
    | CustomStoryItem;

// ============================================
// Adapter State & Events
// ============================================

/**
 * Failure to acquire an item's source.
 */
export interface LoadError extends AppError {
    kind: StoryItemKind;
    /** Underlying error or event, if any */
    cause: unknown;
}

/**
 * Adapter lifecycle phases.
 */
export type AdapterPhase = 'idle' | 'loading' | 'ready' | 'failed' | 'released';

/**
 * Typed event map for adapter events.
 */
export interface MediaAdapterEventMap {
    /** Content available and interaction-ready */
    ready: { durationMs: number | null };
    /** Acquisition failed */
    failed: LoadError;
    /** Intrinsic playback reached its natural end */
    ended: undefined;
    /** Playback stalled waiting for data, or recovered */
    bufferingChange: { isBuffering: boolean };
    [key: string]: unknown;
}

/**
 * Factory for the DOM elements adapters drive.
 */
export interface MediaEnvironment {
    createImage(): HTMLImageElement;
    createVideo(): HTMLVideoElement;
    createAudio(): HTMLAudioElement;
    createFrame(): HTMLIFrameElement;
    createContainer(): HTMLElement;
}

/**
 * Shared collaborators handed to every adapter.
 */
export interface MediaAdapterContext {
    environment: MediaEnvironment;
    commands: ICommandChannel | null;
    /** Base URL for sourceOrigin 'asset' */
    assetBaseUrl: string;
    /** Throw on contract violations instead of logging them */
    assertContracts: boolean;
}
