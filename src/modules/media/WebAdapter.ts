/**
 * @fileoverview Web content item adapter.
 * @module modules/media/WebAdapter
 * @version 1.0.0
 */

import { AppErrorCode } from '../../types/app-errors';
import { BaseMediaAdapter } from './BaseMediaAdapter';
import { createLoadError } from './ErrorHandler';
import { MEDIA_ERROR_MESSAGES } from './constants';
import type { WebStoryItem } from './types';

export class WebAdapter extends BaseMediaAdapter<WebStoryItem> {
    private _element: HTMLIFrameElement | null = null;

    public getElement(): HTMLElement | null {
        return this._element;
    }

    protected acquire(): void {
        const element = this.context.environment.createFrame();
        const config = this.item.config ?? {};
        this._element = element;

        if (config.sandbox !== undefined) element.setAttribute('sandbox', config.sandbox);
        if (config.allow !== undefined) element.allow = config.allow;

        this.listen(element, 'load', () => {
            this.markReady(null);
            this._notifyLoaded(element, true);
        });
        this.listen(element, 'error', (event) => {
            this.fail(
                createLoadError(this.kind, AppErrorCode.SOURCE_UNAVAILABLE, MEDIA_ERROR_MESSAGES.FRAME_FAILED, event)
            );
            this._notifyLoaded(element, false);
        });
        element.src = this.resolveSource();
    }

    /**
     * Hand the frame to the item's onLoaded hook once the adapter has settled.
     * Skipped if a ready listener already released the adapter.
     */
    private _notifyLoaded(element: HTMLIFrameElement, loaded: boolean): void {
        const onLoaded = this.item.config?.onLoaded;
        if (!onLoaded || !this.isLive()) {
            return;
        }
        try {
            onLoaded(element, loaded);
        } catch (error) {
            console.warn('[MediaAdapter] web onLoaded callback threw:', error);
        }
    }

    protected teardown(): void {
        if (this._element) {
            this._element.src = 'about:blank';
            this._element = null;
        }
    }
}
