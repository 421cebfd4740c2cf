/**
 * @fileoverview Image item adapter.
 * @module modules/media/ImageAdapter
 * @version 1.0.0
 */

import { AppErrorCode } from '../../types/app-errors';
import { BaseMediaAdapter } from './BaseMediaAdapter';
import { createLoadError } from './ErrorHandler';
import { MEDIA_ERROR_MESSAGES } from './constants';
import type { ImageStoryItem } from './types';

export class ImageAdapter extends BaseMediaAdapter<ImageStoryItem> {
    private _element: HTMLImageElement | null = null;

    public getElement(): HTMLElement | null {
        return this._element;
    }

    protected acquire(): void {
        const element = this.context.environment.createImage();
        const config = this.item.config ?? {};
        this._element = element;

        element.decoding = 'async';
        element.alt = config.alt ?? '';
        if (config.crossOrigin) element.crossOrigin = config.crossOrigin;
        if (config.width !== undefined) element.width = config.width;
        if (config.height !== undefined) element.height = config.height;
        element.style.objectFit = config.fit ?? 'cover';

        this.listen(element, 'load', () => this.markReady(null));
        this.listen(element, 'error', (event) => {
            this.fail(
                createLoadError(this.kind, AppErrorCode.SOURCE_UNAVAILABLE, MEDIA_ERROR_MESSAGES.IMAGE_FAILED, event)
            );
        });
        element.src = this.resolveSource();
    }

    protected teardown(): void {
        if (this._element) {
            this._element.removeAttribute('src');
            this._element = null;
        }
    }
}
