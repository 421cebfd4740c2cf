/**
 * @fileoverview Interface definitions for the EventEmitter utility.
 * @module utils/interfaces
 * @version 1.0.0
 */

/**
 * Disposable interface for cleanup.
 * Returned by every subscription in the library.
 */
export interface IDisposable {
    /**
     * Dispose of the resource. Calling it more than once has no further effect.
     */
    dispose(): void;
}

/**
 * Type-safe event emitter with error isolation and ordered, synchronous dispatch.
 *
 * @template TEventMap - A record type mapping event names to payload types
 */
export interface IEventEmitter<TEventMap extends Record<string, unknown>> {
    /**
     * Register an event handler.
     * Handlers run in registration order.
     * @returns A disposable that removes the handler
     */
    on<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable;

    /**
     * Unregister an event handler.
     */
    off<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): void;

    /**
     * Register a handler that is removed after its first invocation.
     */
    once<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable;

    /**
     * Synchronously deliver a payload to every handler registered at the time of the call.
     * Handler errors are reported, never propagated.
     * @returns Number of handlers invoked
     */
    emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): number;

    /**
     * Remove all handlers for one event, or for every event when omitted.
     */
    removeAllListeners(event?: keyof TEventMap): void;

    /**
     * Number of handlers registered for an event.
     */
    listenerCount(event: keyof TEventMap): number;
}
