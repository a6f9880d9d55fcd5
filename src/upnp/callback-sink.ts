import http from 'http';
import { networkInterfaces } from 'os';
import logger from '../utils/logger.js';
import { debugManager } from '../utils/debug-manager.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { HouseholdError } from '../errors/household-errors.js';
import type { CallbackConfig } from '../types/config.js';
import type { EventNotification } from '../types/household.js';
import type { SubscriptionRef } from './subscription-manager.js';

export interface IncomingNotification {
  sid: string;
  seq?: number;
  body: string;
}

export type AcceptResult = 'accepted' | 'unknown-subscription';

export interface SubscriptionResolver {
  lookup(sid: string): SubscriptionRef | undefined;
}

export type NotificationHandler = (notification: EventNotification) => void | Promise<void>;

export interface CallbackSinkStats {
  received: number;
  dispatched: number;
  dropped: number;
  failed: number;
}

export interface CallbackSinkOptions {
  config: CallbackConfig;
  resolver: SubscriptionResolver;
  handler: NotificationHandler;
  clock?: Clock;
}

/**
 * HTTP listener for GENA NOTIFY requests. Answers immediately and hands each
 * notification to a per-device serial queue.
 */
export class CallbackSink {
  private server?: http.Server;
  private readonly config: CallbackConfig;
  private readonly resolver: SubscriptionResolver;
  private readonly handler: NotificationHandler;
  private readonly clock: Clock;
  private readonly queues = new Map<string, Promise<void>>();
  private readonly stats: CallbackSinkStats = { received: 0, dispatched: 0, dropped: 0, failed: 0 };
  private generation = 0;
  private callbackUrl?: string;

  constructor(options: CallbackSinkOptions) {
    this.config = options.config;
    this.resolver = options.resolver;
    this.handler = options.handler;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Listen on the configured port and resolve with the URL devices should call
   */
  async start(): Promise<string> {
    if (this.server && this.callbackUrl) {
      return this.callbackUrl;
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res);
    });
    server.on('clientError', (error, socket) => {
      debugManager.debug('callback', `Client error on callback server: ${error.message}`);
      socket.destroy();
    });

    const port = await new Promise<number>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, () => {
        server.off('error', reject);
        const addr = server.address();
        if (typeof addr === 'object' && addr) {
          resolve(addr.port);
        } else {
          reject(new HouseholdError('Failed to get callback server address', 'CALLBACK_FAILED'));
        }
      });
    });
    server.on('error', (error) => logger.error('Callback server error:', error));

    this.server = server;
    const host = this.config.host ?? getLocalIP();
    this.callbackUrl = `http://${host}:${port}${this.config.path}`;
    debugManager.info('callback', `Callback server listening on ${host}:${port}`);
    return this.callbackUrl;
  }

  /**
   * Close the listener and drop any queued work
   */
  async stop(): Promise<void> {
    this.generation++;
    this.queues.clear();
    const server = this.server;
    this.server = undefined;
    this.callbackUrl = undefined;
    if (!server) {
      return;
    }
    server.closeAllConnections();
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    debugManager.info('callback', 'Callback server stopped');
  }

  getCallbackUrl(): string | undefined {
    return this.callbackUrl;
  }

  getStats(): CallbackSinkStats {
    return { ...this.stats };
  }

  /**
   * Resolve the sid and queue the notification behind earlier ones from the
   * same device. Never waits for the handler.
   */
  accept(notification: IncomingNotification): AcceptResult {
    this.stats.received++;

    const ref = this.resolver.lookup(notification.sid);
    if (!ref) {
      this.stats.dropped++;
      logger.warn(`Notification for unknown subscription ${notification.sid}, dropped`);
      return 'unknown-subscription';
    }

    const event: EventNotification = {
      deviceId: ref.deviceId,
      category: ref.category,
      subscriptionId: notification.sid,
      sequence: notification.seq,
      receivedAt: this.clock.now(),
      body: notification.body
    };

    const generation = this.generation;
    const previous = this.queues.get(ref.deviceId) ?? Promise.resolve();
    const next: Promise<void> = previous.then(async () => {
      await this.dispatch(event, generation);
      if (this.queues.get(ref.deviceId) === next) {
        this.queues.delete(ref.deviceId);
      }
    });
    this.queues.set(ref.deviceId, next);
    return 'accepted';
  }

  /**
   * Resolves once every queue has drained
   */
  async idle(): Promise<void> {
    while (this.queues.size > 0) {
      await Promise.all([...this.queues.values()]);
    }
  }

  private async dispatch(event: EventNotification, generation: number): Promise<void> {
    if (generation !== this.generation) {
      this.stats.dropped++;
      return;
    }
    try {
      await this.handler(event);
      this.stats.dispatched++;
    } catch (error) {
      this.stats.failed++;
      logger.error(`Error processing ${event.category} event from ${event.deviceId}:`, error);
    }
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    if (req.method !== 'NOTIFY') {
      debugManager.debug('callback', `Rejecting ${req.method} request to ${req.url}`);
      res.writeHead(405, { 'Allow': 'NOTIFY' });
      res.end();
      req.resume();
      return;
    }

    const path = (req.url ?? '').split('?')[0];
    if (path !== this.config.path) {
      res.writeHead(404);
      res.end();
      req.resume();
      return;
    }

    const sidHeader = req.headers['sid'];
    const sid = Array.isArray(sidHeader) ? sidHeader[0] : sidHeader;
    if (!sid) {
      res.writeHead(400);
      res.end();
      req.resume();
      return;
    }

    const seqHeader = req.headers['seq'];
    const seqText = Array.isArray(seqHeader) ? seqHeader[0] : seqHeader;
    const seq = seqText !== undefined && /^\d+$/.test(seqText) ? parseInt(seqText, 10) : undefined;

    let body = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => {
      body += chunk;
    });
    req.on('error', (error) => {
      debugManager.warn('callback', `Error reading notification body: ${error.message}`);
    });
    req.on('end', () => {
      debugManager.trace('callback', `NOTIFY ${sid} seq=${seqText ?? '-'} (${body.length} bytes)`);
      const result = this.accept({ sid, seq, body });
      res.writeHead(result === 'unknown-subscription' ? 412 : 200);
      res.end();
    });
  }
}

/**
 * First non-internal IPv4 address, or loopback when there is none
 */
export function getLocalIP(): string {
  const nets = networkInterfaces();

  for (const name of Object.keys(nets)) {
    const interfaces = nets[name];
    if (interfaces) {
      for (const net of interfaces) {
        if (net.family === 'IPv4' && !net.internal) {
          return net.address;
        }
      }
    }
  }

  return '127.0.0.1';
}
