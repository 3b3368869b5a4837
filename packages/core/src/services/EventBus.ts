/**
 * EventBus - Pub/sub event system
 *
 * Typed domain events for loose coupling between the orchestrator
 * and whatever delivers results (chat adapters, the CLI).
 *
 * Reliability features:
 * - Handler isolation: Snapshots handlers before iteration to prevent modification during emit
 * - Queued recursive emits: Prevents re-entrance by queueing emits during an emit cycle
 * - Error containment: Handler errors don't affect other handlers
 */

import type { EventType, EventPayloads, EventHandler, IEventBus } from '../types/events';
import type { ILogger } from './Logger';

type HandlerMap = { [T in EventType]?: Set<EventHandler<T>> };

/**
 * Event bus implementation with re-entrance protection
 */
export class EventBus implements IEventBus {
  private handlers: HandlerMap = {};
  private logger?: ILogger;

  // Re-entrance protection
  private _isEmitting = false;
  private _eventQueue: Array<() => void> = [];

  constructor(logger?: ILogger) {
    this.logger = logger?.child({ component: 'EventBus' });
  }

  on<T extends EventType>(event: T, handler: EventHandler<T>): void {
    const existing: HandlerMap[T] = this.handlers[event];
    if (existing) {
      existing.add(handler);
      return;
    }
    const created: HandlerMap[T] = new Set([handler]);
    this.handlers[event] = created;
  }

  off<T extends EventType>(event: T, handler: EventHandler<T>): void {
    const eventHandlers: HandlerMap[T] = this.handlers[event];
    eventHandlers?.delete(handler);
  }

  /**
   * Subscribe to an event for one-time execution
   */
  once<T extends EventType>(event: T, handler: EventHandler<T>): void {
    const wrappedHandler: EventHandler<T> = (payload) => {
      this.off(event, wrappedHandler);
      handler(payload);
    };
    this.on(event, wrappedHandler);
  }

  /**
   * Emit an event
   *
   * If called during an emit cycle (re-entrance), the event is queued
   * and processed after the current cycle completes.
   */
  emit<T extends EventType>(event: T, payload: EventPayloads[T]): void {
    if (this._isEmitting) {
      this._eventQueue.push(() => this._emitImmediate(event, payload));
      return;
    }

    this._isEmitting = true;
    try {
      this._emitImmediate(event, payload);

      let next = this._eventQueue.shift();
      while (next) {
        next();
        next = this._eventQueue.shift();
      }
    } finally {
      this._isEmitting = false;
    }
  }

  listenerCount(event: EventType): number {
    return this.handlers[event]?.size ?? 0;
  }

  removeAllListeners(): void {
    this.handlers = {};
  }

  private _emitImmediate<T extends EventType>(event: T, payload: EventPayloads[T]): void {
    const eventHandlers: HandlerMap[T] = this.handlers[event];
    if (!eventHandlers || eventHandlers.size === 0) {
      return;
    }

    // Snapshot handlers to prevent modification during iteration
    for (const handler of Array.from(eventHandlers)) {
      try {
        handler(payload);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger?.error({ err, event }, `Error in event handler for ${event}`);

        // Avoid an infinite loop when an error handler itself throws
        if (event !== 'error:recoverable') {
          this._eventQueue.push(() =>
            this._emitImmediate('error:recoverable', {
              source: 'EventBus',
              code: 'HANDLER_ERROR',
              message: `Handler failed for event ${event}: ${err.message}`,
              context: { event, originalError: err.message },
            })
          );
        }
      }
    }
  }
}
