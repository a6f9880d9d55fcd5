import { httpRequest, headerValue, type HttpResponse } from '../utils/http.js';
import { debugManager } from '../utils/debug-manager.js';
import { SubscriptionError, TimeoutError, getErrorMessage } from '../errors/household-errors.js';
import type { Device } from '../types/household.js';

export interface SubscribeResult {
  sid: string;
  /** Duration the device actually granted */
  timeoutSeconds: number;
}

/**
 * The three GENA requests the subscription manager needs. Swapped for a fake in tests.
 */
export interface SubscriptionTransport {
  subscribe(device: Device, eventPath: string, callbackUrl: string, timeoutSeconds: number): Promise<SubscribeResult>;
  renew(device: Device, eventPath: string, sid: string, timeoutSeconds: number): Promise<SubscribeResult>;
  unsubscribe(device: Device, eventPath: string, sid: string): Promise<void>;
}

const USER_AGENT = 'Node.js UPnP/1.0 zoneplayer-client';

/**
 * Read "Second-N" (or "infinite") from a TIMEOUT header
 */
export function parseTimeoutHeader(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const match = value.match(/Second-(\d+)/i);
  if (match && match[1]) {
    return parseInt(match[1], 10);
  }
  return fallback;
}

function eventUrl(device: Device, eventPath: string): string {
  return `http://${device.host}:${device.port}${eventPath}`;
}

/**
 * SUBSCRIBE / UNSUBSCRIBE over plain HTTP
 */
export class GenaTransport implements SubscriptionTransport {
  constructor(private readonly requestTimeoutMs = 5000) {}

  async subscribe(device: Device, eventPath: string, callbackUrl: string, timeoutSeconds: number): Promise<SubscribeResult> {
    const result = await this.performSubscribe(device, eventPath, {
      'TIMEOUT': `Second-${timeoutSeconds}`,
      'CALLBACK': `<${callbackUrl}>`,
      'NT': 'upnp:event'
    }, timeoutSeconds);
    debugManager.info('subscription', `Initial subscription successful for ${device.id}${eventPath}, SID: ${result.sid}, timeout: ${result.timeoutSeconds}s`);
    return result;
  }

  async renew(device: Device, eventPath: string, sid: string, timeoutSeconds: number): Promise<SubscribeResult> {
    const result = await this.performSubscribe(device, eventPath, {
      'TIMEOUT': `Second-${timeoutSeconds}`,
      'SID': sid
    }, timeoutSeconds);
    debugManager.debug('subscription', `Renewal successful for ${device.id}${eventPath}, SID: ${result.sid}`);
    return result;
  }

  async unsubscribe(device: Device, eventPath: string, sid: string): Promise<void> {
    try {
      const response = await httpRequest({
        url: eventUrl(device, eventPath),
        method: 'UNSUBSCRIBE',
        headers: { 'SID': sid, 'USER-AGENT': USER_AGENT },
        timeout: this.requestTimeoutMs
      });
      if (response.statusCode !== 200) {
        throw new SubscriptionError(`Unsubscribe failed: ${response.statusCode} ${response.statusMessage}`, 'REJECTED', response.statusCode);
      }
    } catch (error) {
      throw toSubscriptionError(error);
    }
  }

  private async performSubscribe(
    device: Device,
    eventPath: string,
    headers: Record<string, string>,
    requestedSeconds: number
  ): Promise<SubscribeResult> {
    let response: HttpResponse;
    try {
      response = await httpRequest({
        url: eventUrl(device, eventPath),
        method: 'SUBSCRIBE',
        headers: { ...headers, 'USER-AGENT': USER_AGENT },
        timeout: this.requestTimeoutMs
      });
    } catch (error) {
      throw toSubscriptionError(error);
    }

    if (response.statusCode === 412) {
      // Precondition Failed: the device no longer knows this SID
      throw new SubscriptionError(`Subscription expired (412): ${response.statusMessage}`, 'SUBSCRIPTION_EXPIRED', 412);
    }
    if (response.statusCode !== 200) {
      throw new SubscriptionError(`Subscription failed: ${response.statusCode} ${response.statusMessage}`, 'REJECTED', response.statusCode);
    }

    const sid = headerValue(response.headers, 'sid') ?? headers['SID'];
    if (!sid) {
      throw new SubscriptionError('Subscription response carried no SID', 'REJECTED', response.statusCode);
    }
    return {
      sid,
      timeoutSeconds: parseTimeoutHeader(headerValue(response.headers, 'timeout'), requestedSeconds)
    };
  }
}

/**
 * Map a transport-level failure onto a SubscriptionError reason
 */
export function toSubscriptionError(error: unknown): SubscriptionError {
  if (error instanceof SubscriptionError) {
    return error;
  }
  if (error instanceof TimeoutError) {
    return new SubscriptionError('Subscription timeout', 'TIMEOUT', undefined, { cause: error });
  }
  if (isErrnoException(error) && (error.code === 'ECONNREFUSED' || error.code === 'EHOSTUNREACH')) {
    return new SubscriptionError(`Device offline: ${error.message}`, 'DEVICE_OFFLINE', undefined, { cause: error });
  }
  return new SubscriptionError(`Subscription request failed: ${getErrorMessage(error)}`, 'REJECTED', undefined, { cause: error });
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
