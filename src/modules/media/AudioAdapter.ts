/**
 * @fileoverview Audio-only item adapter.
 * @module modules/media/AudioAdapter
 * @version 1.0.0
 */

import { HtmlMediaAdapter } from './HtmlMediaAdapter';
import type { MediaReadyEvent } from './mediaElement';
import type { AudioStoryItem } from './types';

/**
 * Ready once metadata (and so the duration) is known. Nothing is shown; hosts
 * that want a visual with a soundtrack give an image, text or custom item an
 * `audioTrack` instead.
 */
export class AudioAdapter extends HtmlMediaAdapter<AudioStoryItem, HTMLAudioElement> {
    protected readyEvent(): MediaReadyEvent {
        return 'loadedmetadata';
    }

    protected createElement(): HTMLAudioElement {
        return this.context.environment.createAudio();
    }
}
