/**
 * @fileoverview HTMLMediaElement wiring shared by AV adapters and background tracks.
 * @module modules/media/mediaElement
 * @version 1.0.0
 */

import { fireAndForget } from '../../utils/async';
import type { IDisposable } from '../../utils/interfaces';
import type { PlaybackStatus } from '../commands/types';

/**
 * Event after which a media element counts as ready.
 */
export type MediaReadyEvent = 'loadeddata' | 'loadedmetadata';

/**
 * Receives the lifecycle signals of one media element.
 */
export interface MediaElementSink {
    ready(): void;
    /** `code` is HTMLMediaElement.error.code, or null when the element reports none */
    error(code: number | null, cause: unknown): void;
    ended(): void;
    buffering(isBuffering: boolean): void;
}

/**
 * Attach lifecycle listeners to `element`. Each listener is handed to `track`
 * as a disposable that removes it.
 *
 * Buffering starts on `waiting` and clears on `playing` or `canplay`.
 * `stalled` is not a buffering signal: browsers fire it when fetching slows
 * while playback continues from the buffer.
 */
export function wireMediaElement(
    element: HTMLMediaElement,
    readyEvent: MediaReadyEvent,
    sink: MediaElementSink,
    track: (resource: IDisposable) => void
): void {
    const on = <K extends keyof HTMLMediaElementEventMap>(
        type: K,
        handler: (event: HTMLMediaElementEventMap[K]) => void
    ): void => {
        element.addEventListener(type, handler);
        track({ dispose: () => element.removeEventListener(type, handler) });
    };

    on(readyEvent, () => sink.ready());
    on('error', (event) => sink.error(element.error?.code ?? null, element.error ?? event));
    on('ended', () => sink.ended());
    on('waiting', () => sink.buffering(true));
    on('playing', () => sink.buffering(false));
    on('canplay', () => sink.buffering(false));
}

/**
 * Track length in ms, or null while unknown or unbounded.
 */
export function mediaDurationMs(element: HTMLMediaElement | null): number | null {
    const duration = element?.duration;
    if (duration === undefined || !Number.isFinite(duration) || duration <= 0) {
        return null;
    }
    return Math.round(duration * 1000);
}

export function applyMediaPlayback(element: HTMLMediaElement, state: PlaybackStatus, label: string): void {
    if (state === 'playing') {
        const result = element.play();
        // Older engines return undefined instead of a promise
        if (result !== undefined) {
            fireAndForget(result, `${label} play()`, 'MediaAdapter');
        }
    } else {
        element.pause();
    }
}

/**
 * Stop playback and drop the source so the element frees its decoder.
 */
export function resetMediaElement(element: HTMLMediaElement): void {
    element.pause();
    element.removeAttribute('src');
    element.load();
}
