/**
 * @fileoverview Constants for the Media module.
 * @module modules/media/constants
 * @version 1.0.0
 */

import type { StoryItemKind } from './types';

/** Display time for items without an intrinsic duration */
export const DEFAULT_ITEM_DURATION_MS = 3000;

/** Prefix for sourceOrigin 'asset' locators */
export const DEFAULT_ASSET_BASE_URL = 'assets/';

export const FILE_URL_PREFIX = 'file://';

/**
 * Item kinds backed by an HTML media element. Image, text and custom items
 * also get an AV channel when they carry an `audioTrack`.
 */
export const AV_ITEM_KINDS: ReadonlySet<StoryItemKind> = new Set<StoryItemKind>(['video', 'audio']);

/**
 * HTMLMediaElement.error.code values.
 */
export const MEDIA_ERROR_CODES = {
    MEDIA_ERR_ABORTED: 1,
    MEDIA_ERR_NETWORK: 2,
    MEDIA_ERR_DECODE: 3,
    MEDIA_ERR_SRC_NOT_SUPPORTED: 4,
} as const;

export const MEDIA_ERROR_MESSAGES = {
    ABORTED: 'Media loading aborted',
    NETWORK: 'Network error while loading media',
    DECODE: 'Media decode error',
    UNSUPPORTED: 'Media format not supported',
    IMAGE_FAILED: 'Image failed to load',
    FRAME_FAILED: 'Web content failed to load',
    CUSTOM_FAILED: 'Custom view failed',
} as const;
