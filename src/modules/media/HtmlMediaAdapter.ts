/**
 * @fileoverview Adapter base for items backed by an HTMLMediaElement.
 * @module modules/media/HtmlMediaAdapter
 * @version 1.0.0
 */

import type { PlaybackStatus } from '../commands/types';
import { BaseMediaAdapter } from './BaseMediaAdapter';
import { mapMediaErrorCodeToLoadError } from './ErrorHandler';
import {
    applyMediaPlayback,
    mediaDurationMs,
    resetMediaElement,
    wireMediaElement,
    type MediaReadyEvent,
} from './mediaElement';
import type { AudioStoryItem, VideoStoryItem } from './types';

/**
 * Video and audio share element wiring; they differ in the element they create
 * and the event that means "ready".
 */
export abstract class HtmlMediaAdapter<
    TItem extends VideoStoryItem | AudioStoryItem,
    TElement extends HTMLMediaElement,
> extends BaseMediaAdapter<TItem> {
    protected element: TElement | null = null;

    /** Event after which the item can be shown */
    protected abstract readyEvent(): MediaReadyEvent;

    protected abstract createElement(): TElement;

    /** Kind-specific attributes, set before the source is assigned */
    protected configureElement(_element: TElement): void {
        // none by default
    }

    public getElement(): HTMLElement | null {
        return this.element;
    }

    public intrinsicDurationMs(): number | null {
        return mediaDurationMs(this.element);
    }

    protected acquire(): void {
        const element = this.createElement();
        this.element = element;
        element.preload = this.item.config?.preload ?? 'auto';
        element.loop = this.item.config?.loop ?? false;
        element.muted = this.desiredMuted;
        this.configureElement(element);

        wireMediaElement(
            element,
            this.readyEvent(),
            {
                ready: () => this.markReady(this.intrinsicDurationMs()),
                error: (code, cause) => this.fail(mapMediaErrorCodeToLoadError(code, this.kind, cause)),
                ended: () => this.markEnded(),
                buffering: (isBuffering) => this.setBuffering(isBuffering),
            },
            (resource) => this.track(resource)
        );

        element.src = this.resolveSource();
        element.load();
    }

    protected applyMuted(muted: boolean): void {
        if (this.element) {
            this.element.muted = muted;
        }
    }

    protected applyPlayback(state: PlaybackStatus): void {
        if (this.element) {
            applyMediaPlayback(this.element, state, this.kind);
        }
    }

    protected teardown(): void {
        if (this.element) {
            resetMediaElement(this.element);
            this.element = null;
        }
    }
}
