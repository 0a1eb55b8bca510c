/**
 * Broadcast Bus
 *
 * Ordered fan-out of session events to any number of listeners. Each event
 * is serialized once into an SSE frame and offered to every listener's
 * bounded inbox without waiting. A listener whose inbox is full is dropped
 * after the publish pass; the event it missed is not resent.
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../../utils/logger.js';
import { CapacityError } from '../../types/errors.js';
import type { SSEEvent, SSEEventPayloads, SSEEventType } from '../../types/sse.js';

const logger = createLogger({ module: 'BroadcastBus' });

/** Default inbox capacity per listener */
export const DEFAULT_LISTENER_CAPACITY = 400;

/**
 * Result of waiting on a listener
 */
export type ListenerPoll =
  | { kind: 'frame'; frame: string }
  | { kind: 'idle' }
  | { kind: 'closed' };

/**
 * Format an SSE frame
 * Follows SSE specification: https://html.spec.whatwg.org/multipage/server-sent-events.html
 */
export function formatFrame<K extends SSEEventType>(
  eventType: K,
  data: SSEEventPayloads[K],
  eventId?: string
): string {
  const event: SSEEvent<SSEEventPayloads[K]> = {
    event: eventType,
    data,
    timestamp: new Date().toISOString(),
    ...(eventId && { id: eventId }),
  };

  let message = '';
  if (eventId) {
    message += `id: ${eventId}\n`;
  }
  message += `event: ${eventType}\n`;
  message += `data: ${JSON.stringify(event)}\n\n`;

  return message;
}

/**
 * One subscriber's bounded inbox
 */
export class BusListener {
  readonly id: string;
  readonly capacity: number;
  readonly connectedAt: Date;

  private inbox: string[] = [];
  private closed = false;
  private waiter: ((result: ListenerPoll) => void) | null = null;
  private waiterTimer: NodeJS.Timeout | null = null;

  constructor(capacity: number = DEFAULT_LISTENER_CAPACITY) {
    this.id = uuidv4();
    this.capacity = capacity;
    this.connectedAt = new Date();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Frames waiting to be read */
  get pending(): number {
    return this.inbox.length;
  }

  /**
   * Non-blocking enqueue. Returns false when the listener is closed or full.
   */
  offer(frame: string): boolean {
    if (this.closed) {
      return false;
    }

    // A parked reader means the inbox is empty: hand the frame over directly
    if (this.waiter) {
      this.settle({ kind: 'frame', frame });
      return true;
    }

    if (this.inbox.length >= this.capacity) {
      return false;
    }

    this.inbox.push(frame);
    return true;
  }

  /**
   * Wait for the next frame, at most `timeoutMs`. Frames queued before
   * close are still returned, then `closed`.
   */
  next(timeoutMs: number): Promise<ListenerPoll> {
    const frame = this.inbox.shift();
    if (frame !== undefined) {
      return Promise.resolve({ kind: 'frame', frame });
    }
    if (this.closed) {
      return Promise.resolve({ kind: 'closed' });
    }
    if (this.waiter) {
      return Promise.reject(new Error(`Listener ${this.id} already has a pending reader`));
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
      this.waiterTimer = setTimeout(() => this.settle({ kind: 'idle' }), timeoutMs);
    });
  }

  /**
   * Take every pending frame without waiting
   */
  drain(): string[] {
    const frames = this.inbox;
    this.inbox = [];
    return frames;
  }

  /**
   * Stop accepting frames and wake a parked reader. Unread frames stay
   * readable. Idempotent.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.settle({ kind: 'closed' });
  }

  private settle(result: ListenerPoll): void {
    const waiter = this.waiter;
    if (this.waiterTimer) {
      clearTimeout(this.waiterTimer);
      this.waiterTimer = null;
    }
    this.waiter = null;
    waiter?.(result);
  }
}

export interface BroadcastBusOptions {
  listenerCapacity?: number;
  /** Called after a listener was removed because its inbox was full */
  onListenerDropped?: (listener: BusListener) => void;
}

/**
 * BroadcastBus Class
 * Publishes session events to every subscribed listener in publish order
 */
export class BroadcastBus {
  private listeners: Set<BusListener> = new Set();
  private readonly listenerCapacity: number;
  private readonly onListenerDropped?: (listener: BusListener) => void;
  private sequence = 0;

  constructor(options: BroadcastBusOptions = {}) {
    this.listenerCapacity = options.listenerCapacity ?? DEFAULT_LISTENER_CAPACITY;
    this.onListenerDropped = options.onListenerDropped;
  }

  /** Number of live listeners, used as the viewer count */
  get listenerCount(): number {
    return this.listeners.size;
  }

  /** Id of the last published event */
  get lastEventId(): number {
    return this.sequence;
  }

  subscribe(): BusListener {
    const listener = new BusListener(this.listenerCapacity);
    this.listeners.add(listener);

    logger.debug({ listenerId: listener.id, listeners: this.listeners.size }, 'Listener subscribed');
    return listener;
  }

  /**
   * Remove a listener. Safe to call repeatedly or after it was dropped.
   */
  unsubscribe(listener: BusListener): void {
    const removed = this.listeners.delete(listener);
    listener.close();

    if (removed) {
      logger.debug({ listenerId: listener.id, listeners: this.listeners.size }, 'Listener unsubscribed');
    }
  }

  /**
   * Serialize once and offer to every listener. Never waits on a consumer.
   */
  publish<K extends SSEEventType>(eventType: K, data: SSEEventPayloads[K]): void {
    this.sequence += 1;
    const frame = formatFrame(eventType, data, String(this.sequence));

    const dead: BusListener[] = [];
    for (const listener of this.listeners) {
      if (!listener.offer(frame)) {
        dead.push(listener);
      }
    }

    for (const listener of dead) {
      this.listeners.delete(listener);
      // Whatever it had not read yet is discarded with it
      listener.drain();
      listener.close();
      logger.warn(
        { err: new CapacityError(listener.id, listener.capacity), eventType, listeners: this.listeners.size },
        'Dropped listener with full inbox'
      );
    }

    // Only once every dead listener is gone: the callback may publish again
    for (const listener of dead) {
      this.onListenerDropped?.(listener);
    }
  }

  /**
   * Close every listener; their unread frames stay readable
   */
  shutdown(): void {
    for (const listener of this.listeners) {
      listener.close();
    }
    this.listeners.clear();
  }
}
