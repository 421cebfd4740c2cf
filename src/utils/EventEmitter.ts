/**
 * @fileoverview Type-safe event emitter with error isolation.
 * One handler's error does not prevent other handlers from executing.
 * @module utils/EventEmitter
 * @version 1.0.0
 */

import type { IEventEmitter, IDisposable } from './interfaces';

type AnyHandler = (payload: unknown) => void;

/**
 * Reports an error thrown by a handler.
 */
export type HandlerErrorReporter = (event: string, error: unknown) => void;

const defaultErrorReporter =
    (scope: string): HandlerErrorReporter =>
    (event, error): void => {
        console.error(`[${scope}] Handler error for event '${event}':`, error);
    };

/**
 * Type-safe event emitter with error isolation.
 *
 * Dispatch is synchronous and follows registration order. The handler list is
 * snapshotted before dispatch, so a handler added during an emit is not called
 * for that emit, and a handler removed during an emit is skipped if it has not
 * run yet.
 *
 * @template TEventMap - A record type mapping event names to payload types
 *
 * @example
 * ```typescript
 * interface ClockEvents {
 *   tick: { progress: number };
 *   expire: undefined;
 * }
 *
 * const emitter = new EventEmitter<ClockEvents>('ProgressClock');
 * emitter.on('tick', ({ progress }) => render(progress));
 * emitter.emit('tick', { progress: 0.5 });
 * ```
 */
export class EventEmitter<TEventMap extends Record<string, unknown>>
    implements IEventEmitter<TEventMap> {
    private readonly _handlers: Map<keyof TEventMap, Set<AnyHandler>> = new Map();
    private readonly _reportError: HandlerErrorReporter;

    /**
     * @param scope - Prefix used when logging handler errors
     * @param reportError - Override for handler error reporting
     */
    constructor(scope: string = 'EventEmitter', reportError?: HandlerErrorReporter) {
        this._reportError = reportError ?? defaultErrorReporter(scope);
    }

    public on<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable {
        let handlerSet = this._handlers.get(event);
        if (!handlerSet) {
            handlerSet = new Set();
            this._handlers.set(event, handlerSet);
        }
        handlerSet.add(handler as AnyHandler);

        let disposed = false;
        return {
            dispose: (): void => {
                if (disposed) return;
                disposed = true;
                this.off(event, handler);
            },
        };
    }

    public off<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): void {
        const handlerSet = this._handlers.get(event);
        if (!handlerSet) {
            return;
        }
        handlerSet.delete(handler as AnyHandler);
        if (handlerSet.size === 0) {
            this._handlers.delete(event);
        }
    }

    public once<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable {
        const wrappedHandler = (payload: TEventMap[K]): void => {
            this.off(event, wrappedHandler);
            handler(payload);
        };
        return this.on(event, wrappedHandler);
    }

    /**
     * Emit an event to all registered handlers.
     * Errors in handlers are reported, NOT propagated.
     */
    public emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): number {
        const handlerSet = this._handlers.get(event);
        if (!handlerSet || handlerSet.size === 0) {
            return 0;
        }

        let invoked = 0;
        for (const handler of Array.from(handlerSet)) {
            if (!handlerSet.has(handler)) {
                continue;
            }
            invoked += 1;
            try {
                handler(payload);
            } catch (error) {
                this._reportError(String(event), error);
            }
        }
        return invoked;
    }

    public removeAllListeners(event?: keyof TEventMap): void {
        if (event !== undefined) {
            this._handlers.delete(event);
        } else {
            this._handlers.clear();
        }
    }

    public listenerCount(event: keyof TEventMap): number {
        return this._handlers.get(event)?.size ?? 0;
    }
}
