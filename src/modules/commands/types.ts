/**
 * @fileoverview Type definitions for the Command Channel module.
 * @module modules/commands/types
 * @version 1.0.0
 */

/**
 * Playback status owned by the channel.
 */
export type PlaybackStatus = 'playing' | 'paused';

/**
 * Discrete commands accepted by the channel.
 */
export type StoryCommand =
    | { type: 'play' }
    | { type: 'pause' }
    | { type: 'next' }
    | { type: 'previous' }
    | { type: 'mute' }
    | { type: 'unmute' }
    | { type: 'jumpTo'; index: number };

export type StoryCommandType = StoryCommand['type'];

/**
 * Delivered to subscribers for every accepted command.
 */
export interface CommandEvent {
    /** The accepted command */
    command: StoryCommand;
    /** Status after the command was applied */
    status: PlaybackStatus;
    /** Status before the command was applied */
    previousStatus: PlaybackStatus;
}

export type CommandListener = (event: CommandEvent) => void;

/**
 * Construction options for CommandChannel.
 */
export interface CommandChannelOptions {
    /** Status before any command is emitted. Defaults to 'playing'. */
    initialStatus?: PlaybackStatus;
    /** Number of items jumpTo may address; null leaves the upper bound open */
    sequenceLength?: number | null;
}

/**
 * Internal event map for the channel's emitter.
 */
export interface CommandChannelEventMap {
    command: CommandEvent;
    [key: string]: unknown;
}
