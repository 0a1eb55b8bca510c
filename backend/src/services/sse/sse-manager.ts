/**
 * Server-Sent Events (SSE) Manager
 * Binds each viewer's HTTP response to its own broadcast bus listener
 */

import { createLogger } from '../../utils/logger.js';
import { formatFrame, type BroadcastBus, type BusListener } from '../broadcast/broadcast-bus.js';
import type { SessionState } from '../session/session-state.js';

const logger = createLogger({ module: 'SSEManager' });

/**
 * The parts of an HTTP response the manager writes to
 */
export interface SSEResponse {
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  /** False once the socket buffer is full; wait for `drain` before writing more */
  write(chunk: string): boolean;
  once(event: 'drain', listener: () => void): unknown;
  end(): unknown;
  readonly writableEnded: boolean;
}

/**
 * The parts of an HTTP request the manager listens on
 */
export interface SSERequest {
  on(event: 'close', listener: () => void): unknown;
}

interface SSEClient {
  id: string;
  listener: BusListener;
  res: SSEResponse;
  connectedAt: Date;
  /** Wakes a relay parked on `drain` */
  release: (() => void) | null;
}

export interface SSEManagerOptions {
  bus: BroadcastBus;
  state: SessionState;
  /** Idle time before a ping is sent */
  pingIntervalMs: number;
  /** Called whenever a viewer connects or disconnects */
  onViewersChanged?: () => void;
}

/**
 * SSEManager Class
 * Sends a full snapshot first, then relays the listener's frames in order
 */
export class SSEManager {
  /** Map of client ID to SSEClient */
  private clients: Map<string, SSEClient> = new Map();
  /** Relay loop of each client, settled once its response is ended */
  private relays: Map<string, Promise<void>> = new Map();
  private closing = false;

  private readonly bus: BroadcastBus;
  private readonly state: SessionState;
  private readonly pingIntervalMs: number;
  private readonly onViewersChanged?: () => void;

  constructor(options: SSEManagerOptions) {
    this.bus = options.bus;
    this.state = options.state;
    this.pingIntervalMs = options.pingIntervalMs;
    this.onViewersChanged = options.onViewersChanged;
  }

  /**
   * Register a new SSE client connection
   * Sets SSE headers, writes `fullstate` and starts relaying bus frames
   *
   * @returns Client ID (the bus listener id)
   */
  registerClient(req: SSERequest, res: SSEResponse): string {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
    res.flushHeaders();

    // Subscribe before taking the snapshot so no event falls in between
    const listener = this.bus.subscribe();
    const client: SSEClient = { id: listener.id, listener, res, connectedAt: new Date(), release: null };
    this.clients.set(client.id, client);

    const writable = res.write(formatFrame('fullstate', this.state.snapshot(this.bus.listenerCount)));

    logger.info({ clientId: client.id, totalClients: this.clients.size }, 'SSE client registered');

    req.on('close', () => this.unregisterClient(client.id));

    const relay = this.pump(client, writable)
      .catch((error: unknown) => {
        logger.error({ clientId: client.id, error }, 'SSE relay failed');
        this.unregisterClient(client.id);
      })
      .finally(() => this.relays.delete(client.id));
    this.relays.set(client.id, relay);

    this.onViewersChanged?.();
    return client.id;
  }

  /**
   * Unregister a client connection. Safe to call repeatedly.
   */
  unregisterClient(clientId: string): void {
    const client = this.clients.get(clientId);
    if (!client) {
      return;
    }

    this.clients.delete(clientId);
    this.bus.unsubscribe(client.listener);
    client.release?.();

    if (!client.res.writableEnded) {
      client.res.end();
    }

    logger.info(
      {
        clientId,
        totalClients: this.clients.size,
        connectedMs: Date.now() - client.connectedAt.getTime(),
      },
      'SSE client unregistered'
    );

    if (!this.closing) {
      this.onViewersChanged?.();
    }
  }

  /**
   * End the response of a listener the bus dropped for a full inbox
   */
  handleListenerDropped(listenerId: string): void {
    if (this.clients.has(listenerId)) {
      logger.warn({ clientId: listenerId }, 'SSE client too slow, disconnecting');
      this.unregisterClient(listenerId);
    }
  }

  /**
   * Get the number of connected clients
   */
  getClientCount(): number {
    return this.clients.size;
  }

  /**
   * Relay frames until the listener closes: unsubscribed, dropped for a
   * full inbox, or shut down. While the socket is backed up nothing is read,
   * so the listener's inbox fills and the bus drops it.
   */
  private async pump(client: SSEClient, writable: boolean): Promise<void> {
    if (!writable) {
      await this.waitForDrain(client);
    }

    for (;;) {
      const result = await client.listener.next(this.pingIntervalMs);
      if (result.kind === 'closed' || client.res.writableEnded) {
        break;
      }

      const frame =
        result.kind === 'frame'
          ? result.frame
          : formatFrame('ping', {
              timeRemainingMs: this.state.timeRemainingMs(),
              viewers: this.bus.listenerCount,
            });

      if (!client.res.write(frame)) {
        await this.waitForDrain(client);
      }
    }

    this.unregisterClient(client.id);
  }

  /**
   * Resolve on `drain`, or early when the client goes away or the manager
   * shuts down
   */
  private waitForDrain(client: SSEClient): Promise<void> {
    if (this.closing || !this.clients.has(client.id)) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const done = () => {
        client.release = null;
        resolve();
      };
      client.release = done;
      client.res.once('drain', done);
    });
  }

  /**
   * Close every client connection once the frames already queued for it,
   * such as the final `shutdown` event, are written
   */
  async shutdown(): Promise<void> {
    this.closing = true;
    logger.info({ clientCount: this.clients.size }, 'Shutting down SSE manager');

    // Queued frames are written without waiting on slow sockets
    for (const client of this.clients.values()) {
      this.bus.unsubscribe(client.listener);
      client.release?.();
    }
    await Promise.all(this.relays.values());

    for (const client of this.clients.values()) {
      if (!client.res.writableEnded) {
        client.res.end();
      }
    }
    this.clients.clear();

    logger.info('SSE manager shutdown complete');
  }
}
