import { EventEmitter } from 'events';
import logger from '../utils/logger.js';
import { debugManager } from '../utils/debug-manager.js';
import { httpRequest } from '../utils/http.js';
import { childNode, parseXML, textOf } from '../utils/xml.js';
import { Scheduler } from '../utils/scheduler.js';
import { sleep } from '../utils/retry.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { DiscoveryError, getErrorMessage } from '../errors/household-errors.js';
import { buildSearchMessage, createSsdpSocket, parseSsdpMessage, type DiscoverySocket, type SsdpMessage } from './ssdp.js';
import type { DeviceRegistry, UpsertResult } from '../registry/device-registry.js';
import type { DiscoveryConfig } from '../types/config.js';
import type { Device } from '../types/household.js';

export interface DeviceDescription {
  roomName?: string;
  modelName?: string;
}

export type DeviceDescriber = (location: string) => Promise<DeviceDescription>;

export interface DeviceFoundInfo {
  isNew: boolean;
  becameReachable: boolean;
}

export interface DiscoveryScannerOptions {
  registry: DeviceRegistry;
  config: DiscoveryConfig;
  socket?: DiscoverySocket;
  clock?: Clock;
  /** Description fetcher for new devices; defaults to an HTTP GET of LOCATION */
  describe?: DeviceDescriber;
  httpTimeoutMs?: number;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export declare interface DiscoveryScanner {
  on(event: 'device-found', listener: (device: Device, info: DeviceFoundInfo) => void): this;
  on(event: 'device-lost', listener: (device: Device) => void): this;
}

/**
 * SSDP scanner: fixed-interval M-SEARCH probes plus a passive listener for
 * presence announcements. Feeds the registry and reports reachability changes.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class DiscoveryScanner extends EventEmitter {
  private readonly registry: DeviceRegistry;
  private readonly config: DiscoveryConfig;
  private readonly socket: DiscoverySocket;
  private readonly clock: Clock;
  private readonly scheduler: Scheduler;
  private readonly describe?: DeviceDescriber;
  private bound?: Promise<void>;
  private running = false;
  private responders?: Set<string>;
  private pendingDescriptions = new Map<string, Promise<DeviceDescription>>();

  constructor(options: DiscoveryScannerOptions) {
    super();
    this.registry = options.registry;
    this.config = options.config;
    this.socket = options.socket ?? createSsdpSocket();
    this.clock = options.clock ?? systemClock;
    this.scheduler = new Scheduler(this.clock, 'discovery');
    this.socket.onMessage((text) => {
      this.handleMessage(text).catch((error: unknown) => {
        logger.error('Error handling SSDP message:', error);
      });
    });
    const httpTimeoutMs = options.httpTimeoutMs ?? 5000;
    if (options.describe) {
      this.describe = options.describe;
    } else if (this.config.describeDevices) {
      this.describe = (location) => fetchDeviceDescription(location, httpTimeoutMs);
    }
  }

  get livenessWindowMs(): number {
    return this.config.intervalMs * this.config.livenessIntervals;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Bind the socket, probe once and keep probing at the configured interval
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    await this.ensureBound();
    this.running = true;

    await this.probe();
    this.scheduler.scheduleInterval('probe', () => this.tick(), this.config.intervalMs);
    debugManager.info('discovery', `Background discovery started, probing every ${this.config.intervalMs}ms`);
  }

  stop(): void {
    this.scheduler.clearAll();
    this.running = false;
    if (this.bound) {
      this.socket.close();
      this.bound = undefined;
    }
    debugManager.info('discovery', 'Discovery stopped');
  }

  /**
   * Probe once and collect the devices that answer within the window
   */
  async scanOnce(timeoutMs = (this.config.mx + 1) * 1000): Promise<Device[]> {
    await this.ensureBound();

    const responders = new Set<string>();
    this.responders = responders;
    try {
      await this.probe();
      await sleep(timeoutMs, this.clock);
    } finally {
      if (this.responders === responders) {
        this.responders = undefined;
      }
    }

    return [...responders]
      .map(id => this.registry.get(id))
      .filter((device): device is Device => device !== undefined);
  }

  /**
   * One scheduled cycle: probe, then expire devices outside the liveness window
   */
  async tick(): Promise<void> {
    await this.probe();

    for (const device of this.registry.sweep(this.clock.now(), this.livenessWindowMs)) {
      logger.info(`Device ${device.roomName ?? device.id} not seen for ${this.livenessWindowMs}ms, marking unreachable`);
      this.emit('device-lost', device);
    }
  }

  /**
   * Send one M-SEARCH. Failures are logged; the next interval tries again.
   */
  async probe(): Promise<void> {
    try {
      await this.socket.send(buildSearchMessage(this.config.mx));
      debugManager.debug('discovery', 'SSDP search sent');
    } catch (error) {
      const failure = error instanceof DiscoveryError
        ? error
        : new DiscoveryError(`SSDP probe failed: ${getErrorMessage(error)}`, { cause: error });
      logger.warn(failure.message);
    }
  }

  private ensureBound(): Promise<void> {
    if (!this.bound) {
      this.bound = this.socket.bind().catch((error: unknown) => {
        this.bound = undefined;
        throw error;
      });
    }
    return this.bound;
  }

  async handleMessage(text: string): Promise<void> {
    const message = parseSsdpMessage(text);
    if (!message) {
      return;
    }

    if (message.kind === 'byebye') {
      this.handleByeBye(message.deviceId);
      return;
    }

    if (!message.location) {
      return;
    }

    const description = this.registry.has(message.deviceId)
      ? {}
      : await this.describeOnce(message.deviceId, message.location);

    const result = this.register(message, message.location, description);
    this.responders?.add(result.device.id);
  }

  private register(message: SsdpMessage, location: string, description: DeviceDescription): UpsertResult {
    const result = this.registry.upsert({
      id: message.deviceId,
      location,
      householdId: message.householdId,
      roomName: description.roomName,
      modelName: description.modelName,
      seenAt: this.clock.now()
    });

    if (result.isNew || result.becameReachable) {
      this.emit('device-found', result.device, { isNew: result.isNew, becameReachable: result.becameReachable });
    }
    return result;
  }

  private handleByeBye(deviceId: string): void {
    if (this.registry.markUnreachable(deviceId)) {
      const device = this.registry.get(deviceId);
      if (device) {
        debugManager.info('discovery', `Device ${device.roomName ?? device.id} announced byebye`);
        this.emit('device-lost', device);
      }
    }
  }

  private describeOnce(deviceId: string, location: string): Promise<DeviceDescription> {
    const describe = this.describe;
    if (!describe) {
      return Promise.resolve({});
    }

    let pending = this.pendingDescriptions.get(deviceId);
    if (!pending) {
      pending = describe(location)
        .catch((error: unknown): DeviceDescription => {
          logger.warn(`Could not fetch description for ${deviceId} from ${location}: ${getErrorMessage(error)}`);
          return {};
        })
        .finally(() => {
          this.pendingDescriptions.delete(deviceId);
        });
      this.pendingDescriptions.set(deviceId, pending);
    }
    return pending;
  }
}

/**
 * GET the device description document and read the room and model names
 */
export async function fetchDeviceDescription(location: string, timeoutMs: number): Promise<DeviceDescription> {
  const response = await httpRequest({ url: location, timeout: timeoutMs });
  if (response.statusCode !== 200) {
    throw new DiscoveryError(`Description request failed: ${response.statusCode} ${response.statusMessage}`);
  }

  const parsed = parseXML(response.body);
  const root = parsed ? childNode(parsed, 'root') : undefined;
  const device = root ? childNode(root, 'device') : undefined;
  if (!device) {
    throw new DiscoveryError('Description document has no device element');
  }

  return {
    roomName: textOf(device['roomName']),
    modelName: textOf(device['modelName'])
  };
}
