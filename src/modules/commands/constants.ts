/**
 * @fileoverview Constants for the Command Channel module.
 * @module modules/commands/constants
 * @version 1.0.0
 */

import type { PlaybackStatus, StoryCommandType } from './types';

export const DEFAULT_PLAYBACK_STATUS: PlaybackStatus = 'playing';

/**
 * Commands that set the play/pause status, mapped to the status they set.
 */
export const STATUS_COMMANDS: Readonly<Partial<Record<StoryCommandType, PlaybackStatus>>> = {
    play: 'playing',
    pause: 'paused',
};
