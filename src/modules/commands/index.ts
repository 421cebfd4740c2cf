/**
 * @fileoverview Public exports for the Command Channel module.
 * @module modules/commands
 * @version 1.0.0
 */

export { CommandChannel } from './CommandChannel';
export { DEFAULT_PLAYBACK_STATUS } from './constants';
export type { ICommandChannel } from './interfaces';
export type {
    PlaybackStatus,
    StoryCommand,
    StoryCommandType,
    CommandEvent,
    CommandListener,
    CommandChannelOptions,
} from './types';
