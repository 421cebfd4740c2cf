/**
 * @fileoverview Story item validation and source resolution.
 * @module modules/media/storyItem
 * @version 1.0.0
 */

import { AppErrorCode, StoryError } from '../../types/app-errors';
import { DEFAULT_ASSET_BASE_URL, DEFAULT_ITEM_DURATION_MS, FILE_URL_PREFIX } from './constants';
import type { AudioTrackConfig, StoryItem } from './types';

const KNOWN_KINDS = new Set(['image', 'video', 'audio', 'text', 'web', 'custom']);
const PRELOAD_VALUES: ReadonlySet<string> = new Set(['metadata', 'auto']);

/**
 * Reject items the type system cannot rule out (plain JS callers, parsed JSON).
 * @throws StoryError(INVALID_STORY_ITEM)
 */
export function validateStoryItem(item: StoryItem, index: number): void {
    const fail = (reason: string): never => {
        throw new StoryError(AppErrorCode.INVALID_STORY_ITEM, `Item ${index}: ${reason}`);
    };

    if (!KNOWN_KINDS.has(item.kind)) {
        fail(`unknown kind '${String(item.kind)}'`);
    }
    if (item.kind === 'custom') {
        if (typeof item.customView !== 'function') {
            fail('custom items require a customView factory');
        }
    } else if (typeof item.sourceLocator !== 'string' || item.sourceLocator.length === 0) {
        fail(`${item.kind} items require a sourceLocator`);
    }
    if (item.durationMs !== undefined && (!Number.isFinite(item.durationMs) || item.durationMs < 0)) {
        fail('durationMs must be a finite, non-negative number');
    }
    if (item.kind === 'video' || item.kind === 'audio') {
        const preload = item.config?.preload;
        if (preload !== undefined && !PRELOAD_VALUES.has(preload)) {
            fail(`preload must be 'metadata' or 'auto'`);
        }
    }
    const track = audioTrackOf(item);
    if (track !== undefined && (typeof track.sourceLocator !== 'string' || track.sourceLocator.length === 0)) {
        fail('audioTrack requires a sourceLocator');
    }
}

/**
 * Soundtrack of a visual item. Video and audio items carry their own.
 */
export function audioTrackOf(item: StoryItem): AudioTrackConfig | undefined {
    switch (item.kind) {
        case 'image':
        case 'text':
        case 'custom':
            return item.audioTrack;
        default:
            return undefined;
    }
}

/**
 * Configured display time, falling back to the default.
 */
export function configuredDurationMs(item: StoryItem): number {
    return item.durationMs ?? DEFAULT_ITEM_DURATION_MS;
}

/**
 * Effective mute for an item given the session override.
 * Items without an AV channel have no default.
 */
export function effectiveMuted(item: StoryItem, override: boolean | null): boolean {
    if (override !== null) {
        return override;
    }
    if (item.kind === 'video' || item.kind === 'audio') {
        return item.muteByDefault ?? false;
    }
    return audioTrackOf(item)?.muteByDefault ?? false;
}

/**
 * Turn an item's locator into something an element can load.
 *
 * @example
 * ```typescript
 * resolveSourceUrl({ kind: 'image', sourceLocator: 'cover.png', sourceOrigin: 'asset' }, 'static');
 * // 'static/cover.png'
 * ```
 */
export function resolveSourceUrl(item: StoryItem, assetBaseUrl: string = DEFAULT_ASSET_BASE_URL): string {
    const locator = item.sourceLocator ?? '';
    switch (item.sourceOrigin ?? 'network') {
        case 'file':
            if (locator.startsWith('file:')) {
                return locator;
            }
            return FILE_URL_PREFIX + (locator.startsWith('/') ? locator : `/${locator}`);
        case 'asset':
            return joinPath(assetBaseUrl, locator);
        case 'network':
        default:
            return locator;
    }
}

function joinPath(base: string, path: string): string {
    if (base.length === 0) {
        return path;
    }
    return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
