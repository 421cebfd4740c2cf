/**
 * @fileoverview Soundtrack element for visual items.
 * @module modules/media/BackgroundTrack
 * @version 1.0.0
 */

import type { IDisposable } from '../../utils/interfaces';
import type { PlaybackStatus } from '../commands/types';
import {
    applyMediaPlayback,
    mediaDurationMs,
    resetMediaElement,
    wireMediaElement,
    type MediaElementSink,
} from './mediaElement';
import { resolveSourceUrl } from './storyItem';
import type { AudioTrackConfig, MediaAdapterContext } from './types';

/**
 * An `<audio>` element owned by a visual adapter. Disposing it removes its
 * listeners and frees the element.
 */
export class BackgroundTrack implements IDisposable {
    private readonly _config: AudioTrackConfig;
    private readonly _context: MediaAdapterContext;
    private readonly _listeners: IDisposable[] = [];
    private _element: HTMLAudioElement | null = null;

    constructor(config: AudioTrackConfig, context: MediaAdapterContext) {
        this._config = config;
        this._context = context;
    }

    /**
     * Create the element and start fetching. Ready means metadata is loaded.
     */
    public load(sink: MediaElementSink, muted: boolean): void {
        const element = this._context.environment.createAudio();
        this._element = element;
        element.preload = 'auto';
        element.muted = muted;

        wireMediaElement(element, 'loadedmetadata', sink, (listener) => this._listeners.push(listener));

        element.src = resolveSourceUrl(
            { kind: 'audio', sourceLocator: this._config.sourceLocator, sourceOrigin: this._config.sourceOrigin },
            this._context.assetBaseUrl
        );
        element.load();
    }

    public getElement(): HTMLAudioElement | null {
        return this._element;
    }

    public durationMs(): number | null {
        return mediaDurationMs(this._element);
    }

    public setMuted(muted: boolean): void {
        if (this._element) {
            this._element.muted = muted;
        }
    }

    public setPlaybackState(state: PlaybackStatus): void {
        if (this._element) {
            applyMediaPlayback(this._element, state, 'audio track');
        }
    }

    public dispose(): void {
        for (const listener of this._listeners.splice(0)) {
            listener.dispose();
        }
        if (this._element) {
            resetMediaElement(this._element);
            this._element = null;
        }
    }
}
