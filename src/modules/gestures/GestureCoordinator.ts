/**
 * @fileoverview Gesture-to-command coordination with delegate overrides.
 * @module modules/gestures/GestureCoordinator
 * @version 1.0.0
 */

import type { ICommandChannel } from '../commands/interfaces';
import type { IGestureCoordinator } from './interfaces';
import type { GestureDelegate, GestureResult, VerticalDragDetail } from './types';

type OverrideHook = 'onLeftTap' | 'onRightTap' | 'onPauseHold' | 'onResumeRelease';

/**
 * Asks the delegate first and falls back to the default command.
 *
 * Holds carry a token: a release that arrives while the hold's delegate is
 * still pending invalidates it, so a late-resolving hold cannot pause
 * playback after the user has already let go.
 *
 * @example
 * ```typescript
 * const gestures = new GestureCoordinator(orchestrator.getCommandChannel(), {
 *     onRightTap: async () => (await confirmSkip()) === false,
 * });
 * surface.addEventListener('click', (e) =>
 *     void (e.offsetX < surface.clientWidth / 2 ? gestures.leftTap() : gestures.rightTap())
 * );
 * ```
 */
export class GestureCoordinator implements IGestureCoordinator {
    private readonly _commands: ICommandChannel;
    private readonly _delegate: GestureDelegate;
    private _holdToken = 0;

    constructor(commands: ICommandChannel, delegate: GestureDelegate = {}) {
        this._commands = commands;
        this._delegate = delegate;
    }

    public leftTap(): Promise<GestureResult> {
        return this._run('onLeftTap', () => this._commands.previous());
    }

    public rightTap(): Promise<GestureResult> {
        return this._run('onRightTap', () => this._commands.next());
    }

    public holdStart(): Promise<GestureResult> {
        this._holdToken += 1;
        const token = this._holdToken;
        return this._run('onPauseHold', () => this._commands.pause(), () => token === this._holdToken);
    }

    public holdEnd(): Promise<GestureResult> {
        return this._release();
    }

    public holdCancel(): Promise<GestureResult> {
        return this._release();
    }

    public verticalDragStart(detail: VerticalDragDetail): void {
        this._forward(() => this._delegate.onVerticalDragStart?.(detail));
    }

    public verticalDragUpdate(detail: VerticalDragDetail): void {
        this._forward(() => this._delegate.onVerticalDragUpdate?.(detail));
    }

    // ========================================
    // Internals
    // ========================================

    private _release(): Promise<GestureResult> {
        this._holdToken += 1;
        return this._run('onResumeRelease', () => this._commands.play());
    }

    private async _run(
        hook: OverrideHook,
        applyDefault: () => boolean,
        isCurrent: () => boolean = (): boolean => true
    ): Promise<GestureResult> {
        const handledByDelegate = await this._askDelegate(hook);
        if (handledByDelegate || !isCurrent()) {
            return { handledByDelegate, defaultApplied: false };
        }
        return { handledByDelegate, defaultApplied: applyDefault() };
    }

    private async _askDelegate(hook: OverrideHook): Promise<boolean> {
        const override = this._delegate[hook];
        if (!override) {
            return false;
        }
        try {
            return (await override.call(this._delegate)) === true;
        } catch (error) {
            console.warn(`[GestureCoordinator] ${hook} delegate rejected; applying default`, error);
            return false;
        }
    }

    private _forward(callback: () => void): void {
        try {
            callback();
        } catch (error) {
            console.error('[GestureCoordinator] Drag delegate threw:', error);
        }
    }
}
