import { EventEmitter } from 'events';
import logger from '../utils/logger.js';
import { debugManager } from '../utils/debug-manager.js';
import { Scheduler } from '../utils/scheduler.js';
import { computeBackoffDelay, withTimeout } from '../utils/retry.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { getErrorMessage } from '../errors/household-errors.js';
import { CATEGORY_EVENT_PATHS, EVENT_CATEGORIES, type Device, type EventCategory } from '../types/household.js';
import type { SubscriptionConfig } from '../types/config.js';
import type { SubscribeResult, SubscriptionTransport } from './gena-transport.js';

const MIN_RENEWAL_DELAY_MS = 1000;

export type SubscriptionState = 'UNSUBSCRIBED' | 'SUBSCRIBING' | 'ACTIVE' | 'RENEWING';

export interface SubscriptionInfo {
  readonly deviceId: string;
  readonly category: EventCategory;
  readonly state: SubscriptionState;
  readonly sid?: string;
  readonly expiresAt?: number;
  readonly attempts: number;
  readonly degraded: boolean;
}

export interface SubscriptionRef {
  readonly deviceId: string;
  readonly category: EventCategory;
}

export interface SubscriptionManagerOptions {
  transport: SubscriptionTransport;
  config: SubscriptionConfig;
  clock?: Clock;
  callbackUrl?: string;
}

interface SubscriptionRecord {
  key: string;
  device: Device;
  category: EventCategory;
  state: SubscriptionState;
  sid?: string;
  expiresAt?: number;
  attempts: number;
  degraded: boolean;
  // Bumped on release or resubscribe so late completions are ignored
  generation: number;
  superseded: string[];
}

const SUPERSEDED_SID_LIMIT = 4;

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export declare interface SubscriptionManager {
  on(event: 'state-change', listener: (info: SubscriptionInfo) => void): this;
  on(event: 'degraded', listener: (info: SubscriptionInfo) => void): this;
}

/**
 * Keeps one GENA subscription per (device, category) alive: subscribe with
 * backoff, renew ahead of expiry, fall back to a fresh subscribe when a renewal
 * is refused.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class SubscriptionManager extends EventEmitter {
  private readonly records = new Map<string, SubscriptionRecord>();
  private readonly sidIndex = new Map<string, string>();
  private readonly transport: SubscriptionTransport;
  private readonly config: SubscriptionConfig;
  private readonly clock: Clock;
  private readonly scheduler: Scheduler;
  private readonly background = new Set<Promise<void>>();
  private callbackUrl?: string;

  constructor(options: SubscriptionManagerOptions) {
    super();
    this.transport = options.transport;
    this.config = options.config;
    this.clock = options.clock ?? systemClock;
    this.scheduler = new Scheduler(this.clock, 'subscriptions');
    this.callbackUrl = options.callbackUrl;

    if (this.config.renewalMarginMs < 2 * this.config.requestTimeoutMs) {
      logger.warn(
        `Subscription renewal margin ${this.config.renewalMarginMs}ms is less than twice the request timeout ` +
        `(${this.config.requestTimeoutMs}ms); renewals may not finish before expiry`
      );
    }
  }

  /**
   * Subscribe every category of the device that is not already subscribed or
   * in progress. Degraded records are given a fresh set of attempts.
   */
  ensure(device: Device): void {
    for (const category of EVENT_CATEGORIES) {
      const key = recordKey(device.id, category);
      let record = this.records.get(key);
      if (!record) {
        record = {
          key,
          device,
          category,
          state: 'UNSUBSCRIBED',
          attempts: 0,
          degraded: false,
          generation: 0,
          superseded: []
        };
        this.records.set(key, record);
      } else {
        record.device = device;
      }

      if (record.state !== 'UNSUBSCRIBED') {
        debugManager.trace('subscription', `${key} is ${record.state}, trigger coalesced`);
        continue;
      }

      record.degraded = false;
      record.attempts = 0;
      this.startSubscribe(record);
    }
  }

  /**
   * Drop every subscription for the device. Pending timers are cancelled and
   * requests still in flight are ignored when they complete.
   */
  async release(deviceId: string, options: { unsubscribe?: boolean } = {}): Promise<void> {
    const unsubscribe = options.unsubscribe ?? true;
    const pending: Promise<void>[] = [];

    for (const category of EVENT_CATEGORIES) {
      const record = this.records.get(recordKey(deviceId, category));
      if (!record) {
        continue;
      }
      if (unsubscribe && record.sid && (record.state === 'ACTIVE' || record.state === 'RENEWING')) {
        pending.push(this.unsubscribeQuietly(record.device, record.category, record.sid));
      }
      this.discard(record);
    }

    await Promise.allSettled(pending);
  }

  lookup(sid: string): SubscriptionRef | undefined {
    const key = this.sidIndex.get(sid);
    const record = key ? this.records.get(key) : undefined;
    if (!record) {
      return undefined;
    }
    return { deviceId: record.device.id, category: record.category };
  }

  getCallbackUrl(): string | undefined {
    return this.callbackUrl;
  }

  /**
   * Point every subscription at a new sink address. Existing records are
   * resubscribed from scratch; their old sids stay resolvable until replaced.
   */
  setCallbackUrl(url: string): void {
    if (url === this.callbackUrl) {
      return;
    }
    const previous = this.callbackUrl;
    this.callbackUrl = url;
    if (previous) {
      logger.info(`Callback URL changed from ${previous} to ${url}, resubscribing ${this.records.size} subscriptions`);
    }

    for (const record of this.records.values()) {
      if (record.sid && (record.state === 'ACTIVE' || record.state === 'RENEWING')) {
        this.track(this.unsubscribeQuietly(record.device, record.category, record.sid));
      }
      record.generation++;
      this.scheduler.clearPrefix(`${record.key}:`);
      record.state = 'UNSUBSCRIBED';
      record.degraded = false;
      record.attempts = 0;
      this.startSubscribe(record);
    }
  }

  getState(deviceId: string, category: EventCategory): SubscriptionState {
    return this.records.get(recordKey(deviceId, category))?.state ?? 'UNSUBSCRIBED';
  }

  getDegraded(): SubscriptionRef[] {
    return [...this.records.values()]
      .filter(record => record.degraded)
      .map(record => ({ deviceId: record.device.id, category: record.category }));
  }

  list(): SubscriptionInfo[] {
    return [...this.records.values()].map(toInfo);
  }

  /**
   * Cancel all timers and make a best-effort UNSUBSCRIBE for every live
   * subscription. Resolves even when devices do not answer.
   */
  async shutdown(): Promise<void> {
    this.scheduler.clearAll();

    const pending: Promise<void>[] = [...this.background];
    for (const record of this.records.values()) {
      record.generation++;
      if (record.sid && (record.state === 'ACTIVE' || record.state === 'RENEWING')) {
        pending.push(this.unsubscribeQuietly(record.device, record.category, record.sid));
      }
    }

    this.records.clear();
    this.sidIndex.clear();
    await Promise.allSettled(pending);
    debugManager.info('subscription', 'Subscription manager shut down');
  }

  private startSubscribe(record: SubscriptionRecord): void {
    const callbackUrl = this.callbackUrl;
    if (!callbackUrl) {
      debugManager.debug('subscription', `No callback URL yet, deferring ${record.key}`);
      return;
    }

    this.setState(record, 'SUBSCRIBING');
    const generation = record.generation;
    const request = this.transport.subscribe(
      record.device,
      CATEGORY_EVENT_PATHS[record.category],
      callbackUrl,
      this.config.timeoutSeconds
    );

    this.settle(
      withTimeout(request, this.config.requestTimeoutMs, `SUBSCRIBE ${record.key}`, this.clock).then(
        (result) => this.onSubscribed(record, generation, result),
        (error: unknown) => this.onSubscribeFailed(record, generation, error)
      )
    );
  }

  private onSubscribed(record: SubscriptionRecord, generation: number, result: SubscribeResult): void {
    if (!this.isCurrent(record, generation)) {
      // Released while in flight; the device holds a subscription nobody tracks
      this.track(this.unsubscribeQuietly(record.device, record.category, result.sid));
      return;
    }

    this.assignSid(record, result.sid);
    record.expiresAt = this.clock.now() + result.timeoutSeconds * 1000;
    record.attempts = 0;
    record.degraded = false;
    this.setState(record, 'ACTIVE');
    this.scheduleRenewal(record, result.timeoutSeconds);
  }

  private onSubscribeFailed(record: SubscriptionRecord, generation: number, error: unknown): void {
    if (!this.isCurrent(record, generation)) {
      return;
    }

    record.attempts++;
    if (record.attempts >= this.config.maxAttempts) {
      record.degraded = true;
      this.setState(record, 'UNSUBSCRIBED');
      logger.warn(`Subscription ${record.key} degraded after ${record.attempts} failed attempts: ${getErrorMessage(error)}`);
      this.emit('degraded', toInfo(record));
      return;
    }

    const delay = computeBackoffDelay(record.attempts, {
      initialDelay: this.config.initialRetryDelayMs,
      maxDelay: this.config.maxRetryDelayMs,
      backoffFactor: this.config.backoffFactor
    });
    debugManager.warn('subscription', `Subscribe ${record.key} failed (attempt ${record.attempts}/${this.config.maxAttempts}), retrying in ${delay}ms: ${getErrorMessage(error)}`);

    this.scheduler.scheduleTimeout(`${record.key}:retry`, () => {
      if (this.isCurrent(record, generation)) {
        this.startSubscribe(record);
      }
    }, delay);
  }

  /**
   * Renew at half the granted duration, or earlier when that would leave less
   * than the configured margin before expiry. Never sooner than one second,
   * so a device granting a zero timeout is not renewed in a tight loop.
   */
  private scheduleRenewal(record: SubscriptionRecord, timeoutSeconds: number): void {
    const durationMs = timeoutSeconds * 1000;
    const delay = Math.max(MIN_RENEWAL_DELAY_MS, Math.min(durationMs / 2, durationMs - this.config.renewalMarginMs));
    const generation = record.generation;

    this.scheduler.scheduleTimeout(`${record.key}:renew`, () => {
      if (this.isCurrent(record, generation)) {
        this.renew(record);
      }
    }, delay);
    debugManager.trace('subscription', `Renewal of ${record.key} scheduled in ${delay}ms`);
  }

  private renew(record: SubscriptionRecord): void {
    const sid = record.sid;
    if (!sid) {
      this.startSubscribe(record);
      return;
    }

    this.setState(record, 'RENEWING');
    const generation = record.generation;
    const request = this.transport.renew(
      record.device,
      CATEGORY_EVENT_PATHS[record.category],
      sid,
      this.config.timeoutSeconds
    );

    this.settle(
      withTimeout(request, this.config.requestTimeoutMs, `RENEW ${record.key}`, this.clock).then(
        (result) => {
          if (!this.isCurrent(record, generation)) {
            return;
          }
          this.assignSid(record, result.sid);
          record.expiresAt = this.clock.now() + result.timeoutSeconds * 1000;
          this.setState(record, 'ACTIVE');
          this.scheduleRenewal(record, result.timeoutSeconds);
          debugManager.info('subscription', `Renewed subscription ${record.key} (SID: ${result.sid})`);
        },
        (error: unknown) => {
          if (!this.isCurrent(record, generation)) {
            return;
          }
          debugManager.warn('subscription', `Renewal of ${record.key} failed, resubscribing: ${getErrorMessage(error)}`);
          record.attempts = 0;
          this.startSubscribe(record);
        }
      )
    );
  }

  private assignSid(record: SubscriptionRecord, sid: string): void {
    if (record.sid && record.sid !== sid) {
      record.superseded.push(record.sid);
      while (record.superseded.length > SUPERSEDED_SID_LIMIT) {
        const dropped = record.superseded.shift();
        if (dropped && this.sidIndex.get(dropped) === record.key) {
          this.sidIndex.delete(dropped);
        }
      }
    }
    record.sid = sid;
    this.sidIndex.set(sid, record.key);
  }

  private discard(record: SubscriptionRecord): void {
    record.generation++;
    this.scheduler.clearPrefix(`${record.key}:`);
    for (const sid of [record.sid, ...record.superseded]) {
      if (sid && this.sidIndex.get(sid) === record.key) {
        this.sidIndex.delete(sid);
      }
    }
    this.records.delete(record.key);
    record.state = 'UNSUBSCRIBED';
    debugManager.debug('subscription', `Released ${record.key}`);
  }

  private isCurrent(record: SubscriptionRecord, generation: number): boolean {
    return record.generation === generation && this.records.get(record.key) === record;
  }

  private setState(record: SubscriptionRecord, state: SubscriptionState): void {
    if (record.state === state) {
      return;
    }
    debugManager.debug('subscription', `${record.key}: ${record.state} -> ${state}`);
    record.state = state;
    this.emit('state-change', toInfo(record));
  }

  private unsubscribeQuietly(device: Device, category: EventCategory, sid: string): Promise<void> {
    const request = this.transport.unsubscribe(device, CATEGORY_EVENT_PATHS[category], sid);
    return withTimeout(request, this.config.requestTimeoutMs, `UNSUBSCRIBE ${device.id}/${category}`, this.clock).catch((error: unknown) => {
      debugManager.debug('subscription', `Unsubscribe of ${sid} failed: ${getErrorMessage(error)}`);
    });
  }

  private settle(promise: Promise<void>): void {
    promise.catch((error: unknown) => {
      logger.error('Subscription task failed:', error);
    });
  }

  // Unsubscribes still running are awaited by shutdown()
  private track(promise: Promise<void>): void {
    const tracked = promise
      .catch((error: unknown) => {
        logger.error('Subscription task failed:', error);
      })
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }
}

function recordKey(deviceId: string, category: EventCategory): string {
  return `${deviceId}/${category}`;
}

function toInfo(record: SubscriptionRecord): SubscriptionInfo {
  return {
    deviceId: record.device.id,
    category: record.category,
    state: record.state,
    sid: record.sid,
    expiresAt: record.expiresAt,
    attempts: record.attempts,
    degraded: record.degraded
  };
}
