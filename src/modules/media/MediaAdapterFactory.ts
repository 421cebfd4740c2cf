/**
 * @fileoverview Default adapter factory.
 * @module modules/media/MediaAdapterFactory
 * @version 1.0.0
 */

import type { IMediaAdapter } from './interfaces';
import type { MediaAdapterContext, StoryItem } from './types';
import { AudioAdapter } from './AudioAdapter';
import { CustomAdapter } from './CustomAdapter';
import { ImageAdapter } from './ImageAdapter';
import { TextAdapter } from './TextAdapter';
import { VideoAdapter } from './VideoAdapter';
import { WebAdapter } from './WebAdapter';

/**
 * Create the adapter for an item's kind.
 */
export function createMediaAdapter(item: StoryItem, context: MediaAdapterContext): IMediaAdapter {
    switch (item.kind) {
        case 'image':
            return new ImageAdapter(item, context);
        case 'video':
            return new VideoAdapter(item, context);
        case 'audio':
            return new AudioAdapter(item, context);
        case 'text':
            return new TextAdapter(item, context);
        case 'web':
            return new WebAdapter(item, context);
        case 'custom':
            return new CustomAdapter(item, context);
    }
}
