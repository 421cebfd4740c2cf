/**
 * @fileoverview Text item adapter.
 * @module modules/media/TextAdapter
 * @version 1.0.0
 */

import { BaseMediaAdapter } from './BaseMediaAdapter';
import type { TextStoryItem } from './types';

/**
 * Renders the locator as plain text. Ready during activate().
 */
export class TextAdapter extends BaseMediaAdapter<TextStoryItem> {
    private _element: HTMLElement | null = null;

    public getElement(): HTMLElement | null {
        return this._element;
    }

    protected acquire(): void {
        const element = this.context.environment.createContainer();
        const config = this.item.config ?? {};
        element.textContent = this.item.sourceLocator;
        if (config.backgroundColor) element.style.backgroundColor = config.backgroundColor;
        if (config.textColor) element.style.color = config.textColor;
        element.style.textAlign = config.textAlign ?? 'center';
        this._element = element;
        this.markReady(null);
    }

    protected teardown(): void {
        this._element = null;
    }
}
