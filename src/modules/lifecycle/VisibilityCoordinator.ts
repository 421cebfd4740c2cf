/**
 * @fileoverview Background/foreground handling for a playback session.
 * @module modules/lifecycle/VisibilityCoordinator
 * @version 1.0.0
 */

import type { ICommandChannel } from '../commands/interfaces';
import type { IVisibilityCoordinator } from './interfaces';
import type { VisibilityCoordinatorOptions, VisibilityDocument } from './types';

/**
 * Emits pause when the document is hidden and play when it becomes visible again,
 * but only if the pause was its own. A user's pause survives backgrounding.
 */
export class VisibilityCoordinator implements IVisibilityCoordinator {
    private readonly _commands: ICommandChannel;
    private readonly _document: VisibilityDocument;
    private _pausedByVisibility = false;
    private _visibilityHandler: (() => void) | null = null;

    constructor(commands: ICommandChannel, options: VisibilityCoordinatorOptions = {}) {
        this._commands = commands;
        this._document = options.document ?? document;
    }

    public attach(): void {
        if (this._visibilityHandler) {
            return;
        }
        this._visibilityHandler = (): void => {
            if (this._document.hidden) {
                this._handleHidden();
            } else {
                this._handleVisible();
            }
        };
        this._document.addEventListener('visibilitychange', this._visibilityHandler);
    }

    public detach(): void {
        if (this._visibilityHandler) {
            this._document.removeEventListener('visibilitychange', this._visibilityHandler);
            this._visibilityHandler = null;
        }
        this._pausedByVisibility = false;
    }

    public isAttached(): boolean {
        return this._visibilityHandler !== null;
    }

    private _handleHidden(): void {
        if (this._commands.currentStatus() !== 'playing') {
            return;
        }
        this._pausedByVisibility = this._commands.pause();
    }

    private _handleVisible(): void {
        if (!this._pausedByVisibility) {
            return;
        }
        this._pausedByVisibility = false;
        if (this._commands.currentStatus() === 'paused') {
            this._commands.play();
        }
    }
}
