import { EventEmitter } from 'node:events';
import type { EventSink, SyncEvent, SyncEventType } from './types/events.js';
import type { Logger } from './utils/logger.js';
import { errorMessage } from './errors.js';

export const noopEventSink: EventSink = {
  emit() {},
};

type SyncEventOf<T extends SyncEventType> = Extract<SyncEvent, { type: T }>;

/**
 * Event sink backed by a Node `EventEmitter`. Listeners subscribe per event
 * type, or to every event through `onAny`.
 */
export class EmitterEventSink implements EventSink {
  private readonly emitter = new EventEmitter();

  emit(event: SyncEvent): void {
    this.emitter.emit(event.type, event);
    this.emitter.emit('*', event);
  }

  on<T extends SyncEventType>(type: T, listener: (event: SyncEventOf<T>) => void): () => void {
    this.emitter.on(type, listener);
    return () => {
      this.emitter.off(type, listener);
    };
  }

  onAny(listener: (event: SyncEvent) => void): () => void {
    this.emitter.on('*', listener);
    return () => {
      this.emitter.off('*', listener);
    };
  }
}

/**
 * Deliver an event without letting a misbehaving sink break the engine.
 */
export function safeEmit(sink: EventSink, event: SyncEvent, logger: Logger): void {
  try {
    sink.emit(event);
  } catch (error) {
    logger.warn('Event sink threw', { type: event.type, error: errorMessage(error) });
  }
}
