/**
 * @fileoverview Interface definitions for the Command Channel module.
 * @module modules/commands/interfaces
 * @version 1.0.0
 */

import type { IDisposable } from '../../utils/interfaces';
import type { CommandListener, PlaybackStatus, StoryCommand } from './types';

/**
 * Single command surface for app code, gesture handlers and lifecycle hooks.
 */
export interface ICommandChannel {
    /**
     * Submit a command.
     * Rejected commands (out-of-range jumpTo, play/pause equal to the current status)
     * change nothing and notify nobody.
     * @returns true if the command was accepted and delivered
     */
    emit(command: StoryCommand): boolean;

    /**
     * Listen for accepted commands. Listeners run synchronously, in subscription order.
     */
    subscribe(listener: CommandListener): IDisposable;

    /**
     * Current play/pause status.
     */
    currentStatus(): PlaybackStatus;

    /**
     * Bind the jumpTo domain to [0, length). Null removes the upper bound.
     */
    setSequenceLength(length: number | null): void;

    play(): boolean;
    pause(): boolean;
    next(): boolean;
    previous(): boolean;
    mute(): boolean;
    unmute(): boolean;
    jumpTo(index: number): boolean;
}
