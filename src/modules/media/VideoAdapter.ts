/**
 * @fileoverview Video item adapter.
 * @module modules/media/VideoAdapter
 * @version 1.0.0
 */

import { HtmlMediaAdapter } from './HtmlMediaAdapter';
import type { MediaReadyEvent } from './mediaElement';
import { resolveSourceUrl } from './storyItem';
import type { VideoStoryItem } from './types';

/**
 * Ready on the first decoded frame. Reports the track length as intrinsic duration.
 *
 * With `preload: 'metadata'` engines fetch no frame data before play(), so
 * readiness moves to `loadedmetadata` and the poster covers the gap.
 */
export class VideoAdapter extends HtmlMediaAdapter<VideoStoryItem, HTMLVideoElement> {
    protected readyEvent(): MediaReadyEvent {
        return this.item.config?.preload === 'metadata' ? 'loadedmetadata' : 'loadeddata';
    }

    protected createElement(): HTMLVideoElement {
        return this.context.environment.createVideo();
    }

    protected configureElement(element: HTMLVideoElement): void {
        const config = this.item.config ?? {};
        element.playsInline = true;
        if (config.posterLocator) {
            element.poster = resolveSourceUrl(
                { kind: 'image', sourceLocator: config.posterLocator, sourceOrigin: this.item.sourceOrigin },
                this.context.assetBaseUrl
            );
        }
        if (config.useVideoAspectRatio !== true) {
            if (config.width !== undefined) element.width = config.width;
            if (config.height !== undefined) element.height = config.height;
            element.style.objectFit = config.fit ?? 'cover';
        }
    }
}
