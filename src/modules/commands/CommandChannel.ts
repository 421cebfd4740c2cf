/**
 * @fileoverview Observable command channel.
 * @module modules/commands/CommandChannel
 * @version 1.0.0
 */

import { EventEmitter } from '../../utils/EventEmitter';
import { propagateContractViolations } from '../../utils/contracts';
import type { IDisposable } from '../../utils/interfaces';
import type { ICommandChannel } from './interfaces';
import type {
    CommandChannelEventMap,
    CommandChannelOptions,
    CommandListener,
    PlaybackStatus,
    StoryCommand,
} from './types';
import { DEFAULT_PLAYBACK_STATUS, STATUS_COMMANDS } from './constants';

/**
 * Carries discrete playback commands and the current play/pause status.
 *
 * @example
 * ```typescript
 * const commands = new CommandChannel({ sequenceLength: items.length });
 * commands.subscribe(({ command, status }) => console.log(command.type, status));
 * commands.pause(); // notifies
 * commands.pause(); // already paused: ignored
 * ```
 */
export class CommandChannel implements ICommandChannel {
    private readonly _emitter = new EventEmitter<CommandChannelEventMap>(
        'CommandChannel',
        propagateContractViolations('CommandChannel')
    );
    private _status: PlaybackStatus;
    private _sequenceLength: number | null;

    constructor(options: CommandChannelOptions = {}) {
        this._status = options.initialStatus ?? DEFAULT_PLAYBACK_STATUS;
        this._sequenceLength = options.sequenceLength ?? null;
    }

    public emit(command: StoryCommand): boolean {
        if (command.type === 'jumpTo' && !this._isAddressable(command.index)) {
            return false;
        }

        const previousStatus = this._status;
        const nextStatus = STATUS_COMMANDS[command.type];
        if (nextStatus !== undefined) {
            if (nextStatus === previousStatus) {
                return false;
            }
            this._status = nextStatus;
        }

        this._emitter.emit('command', {
            command,
            status: this._status,
            previousStatus,
        });
        return true;
    }

    public subscribe(listener: CommandListener): IDisposable {
        return this._emitter.on('command', listener);
    }

    public currentStatus(): PlaybackStatus {
        return this._status;
    }

    public setSequenceLength(length: number | null): void {
        this._sequenceLength = length;
    }

    public play(): boolean {
        return this.emit({ type: 'play' });
    }

    public pause(): boolean {
        return this.emit({ type: 'pause' });
    }

    public next(): boolean {
        return this.emit({ type: 'next' });
    }

    public previous(): boolean {
        return this.emit({ type: 'previous' });
    }

    public mute(): boolean {
        return this.emit({ type: 'mute' });
    }

    public unmute(): boolean {
        return this.emit({ type: 'unmute' });
    }

    public jumpTo(index: number): boolean {
        return this.emit({ type: 'jumpTo', index });
    }

    private _isAddressable(index: number): boolean {
        if (!Number.isInteger(index) || index < 0) {
            return false;
        }
        return this._sequenceLength === null || index < this._sequenceLength;
    }
}
