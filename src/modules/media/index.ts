/**
 * @fileoverview Public exports for the Media module.
 * @module modules/media
 * @version 1.0.0
 */

export { BaseMediaAdapter } from './BaseMediaAdapter';
export { HtmlMediaAdapter } from './HtmlMediaAdapter';
export { ImageAdapter } from './ImageAdapter';
export { VideoAdapter } from './VideoAdapter';
export { AudioAdapter } from './AudioAdapter';
export { TextAdapter } from './TextAdapter';
export { WebAdapter } from './WebAdapter';
export { CustomAdapter } from './CustomAdapter';
export { BackgroundTrack } from './BackgroundTrack';
export { createMediaAdapter } from './MediaAdapterFactory';
export { createDomMediaEnvironment } from './environment';
export {
    audioTrackOf,
    configuredDurationMs,
    effectiveMuted,
    resolveSourceUrl,
    validateStoryItem,
} from './storyItem';
export { createLoadError, mapMediaErrorCodeToLoadError, toLoadError } from './ErrorHandler';
export type { IMediaAdapter, MediaAdapterFactory } from './interfaces';
export type {
    AdapterPhase,
    AudioItemConfig,
    AudioTrackConfig,
    AudioStoryItem,
    CustomStoryItem,
    CustomViewContext,
    CustomViewFactory,
    CustomViewHandle,
    ErrorFallbackRenderer,
    ImageItemConfig,
    ImageStoryItem,
    LoadError,
    MediaAdapterContext,
    MediaAdapterEventMap,
    MediaEnvironment,
    MediaFit,
    SourceOrigin,
    StoryItem,
    StoryItemKind,
    TextItemConfig,
    TextStoryItem,
    VideoItemConfig,
    VideoStoryItem,
    WebItemConfig,
    WebStoryItem,
} from './types';
export {
    AV_ITEM_KINDS,
    DEFAULT_ASSET_BASE_URL,
    DEFAULT_ITEM_DURATION_MS,
    MEDIA_ERROR_CODES,
} from './constants';
