/**
 * @fileoverview Adapter for host-provided custom views.
 * @module modules/media/CustomAdapter
 * @version 1.0.0
 */

import { fireAndForget } from '../../utils/async';
import { AppErrorCode } from '../../types/app-errors';
import { BaseMediaAdapter } from './BaseMediaAdapter';
import { toLoadError } from './ErrorHandler';
import type { CustomStoryItem, CustomViewHandle } from './types';

/**
 * Delegates rendering to `item.customView`. The view is aborted through its
 * signal and disposed when the adapter is released.
 */
export class CustomAdapter extends BaseMediaAdapter<CustomStoryItem> {
    private _handle: CustomViewHandle | null = null;
    private _abort: AbortController | null = null;

    public getElement(): HTMLElement | null {
        return this._handle?.element ?? null;
    }

    protected acquisitionErrorCode(): AppErrorCode {
        return AppErrorCode.CUSTOM_VIEW_FAILED;
    }

    protected acquire(): void {
        const abort = new AbortController();
        this._abort = abort;
        const handle = this.item.customView({
            item: this.item,
            commands: this.context.commands,
            signal: abort.signal,
        });
        this._handle = handle ?? {};

        const ready = this._handle.ready;
        if (ready === undefined) {
            this.markReady(null);
            return;
        }
        fireAndForget(
            ready.then(
                () => {
                    if (!abort.signal.aborted) this.markReady(null);
                },
                (error: unknown) => {
                    if (!abort.signal.aborted) {
                        this.fail(toLoadError(error, this.kind, AppErrorCode.CUSTOM_VIEW_FAILED));
                    }
                }
            ),
            'custom view readiness',
            'MediaAdapter'
        );
    }

    protected teardown(): void {
        this._abort?.abort();
        this._abort = null;
        const handle = this._handle;
        this._handle = null;
        handle?.dispose?.();
    }
}
