import logger from './utils/logger.js';
import { debugManager, initializeDebugManager } from './utils/debug-manager.js';
import { formatConfigInfo, loadConfiguration, mergeConfig, defaultConfig, type LoadConfigurationOptions } from './utils/config-loader.js';
import { systemClock, type Clock } from './utils/clock.js';
import { CommandError, DeviceNotFoundError, getErrorMessage } from './errors/household-errors.js';
import { DeviceRegistry } from './registry/device-registry.js';
import { DiscoveryScanner, type DeviceDescriber } from './discovery/discovery-scanner.js';
import type { DiscoverySocket } from './discovery/ssdp.js';
import { GenaTransport, type SubscriptionTransport } from './upnp/gena-transport.js';
import { SubscriptionManager, type SubscriptionRef } from './upnp/subscription-manager.js';
import { CallbackSink, type CallbackSinkStats } from './upnp/callback-sink.js';
import { EventDecoder, type DecoderStats } from './events/event-decoder.js';
import { TopologyCoordinator, type TopologyInconsistency } from './topology/topology-coordinator.js';
import { diffSnapshots, type GroupEvent, type GroupEventType } from './topology/snapshot-diff.js';
import { SoapCommandTransport } from './transport/soap-transport.js';
import type { ClientConfig, DeepPartial } from './types/config.js';
import type {
  CommandTransport,
  Device,
  EventNotification,
  GroupTopologyChanged,
  TopologySnapshot
} from './types/household.js';

export interface HouseholdClientOptions {
  config?: DeepPartial<ClientConfig>;
  clock?: Clock;
  socket?: DiscoverySocket;
  describe?: DeviceDescriber;
  subscriptionTransport?: SubscriptionTransport;
  commandTransport?: CommandTransport;
}

export interface GroupEventFilter {
  events?: readonly GroupEventType[];
  groupIds?: readonly string[];
}

export interface HouseholdStats {
  devices: number;
  groups: number;
  snapshotVersion: number;
  callback: CallbackSinkStats;
  decoder: DecoderStats;
}

type Unsubscribe = () => void;

/**
 * Single entry point: discovery, subscriptions, the callback sink and the
 * topology coordinator wired together, plus outbound commands.
 */
export class HouseholdClient {
  readonly config: ClientConfig;
  readonly registry: DeviceRegistry;
  readonly discovery: DiscoveryScanner;
  readonly subscriptions: SubscriptionManager;
  readonly sink: CallbackSink;
  readonly decoder: EventDecoder;
  readonly topology: TopologyCoordinator;

  private readonly clock: Clock;
  private readonly commandTransport: CommandTransport;
  private readonly topologyListeners = new Set<(snapshot: TopologySnapshot) => void>();
  private readonly groupListeners = new Set<{ callback: (event: GroupEvent) => void; filter: GroupEventFilter }>();
  private lastPublished: TopologySnapshot;
  private started = false;

  /**
   * Load settings.json and the environment, configure logging and build a client
   */
  static fromEnvironment(
    options: Omit<HouseholdClientOptions, 'config'> & LoadConfigurationOptions = {}
  ): HouseholdClient {
    const result = loadConfiguration(options);
    initializeDebugManager({
      logLevel: result.config.logLevel,
      debugCategories: result.config.debugCategories
    });
    logger.info(formatConfigInfo(result));
    return new HouseholdClient({ ...options, config: result.config });
  }

  constructor(options: HouseholdClientOptions = {}) {
    this.config = mergeConfig(defaultConfig, options.config ?? {});
    this.clock = options.clock ?? systemClock;

    this.registry = new DeviceRegistry();
    this.topology = new TopologyCoordinator({
      registry: this.registry,
      config: this.config.topology,
      clock: this.clock
    });
    this.registry.setReferenceCheck((deviceId) => this.topology.isReferenced(deviceId));

    this.discovery = new DiscoveryScanner({
      registry: this.registry,
      config: this.config.discovery,
      socket: options.socket,
      clock: this.clock,
      describe: options.describe,
      httpTimeoutMs: this.config.httpTimeoutMs
    });

    this.subscriptions = new SubscriptionManager({
      transport: options.subscriptionTransport ?? new GenaTransport(this.config.subscription.requestTimeoutMs),
      config: this.config.subscription,
      clock: this.clock
    });

    this.decoder = new EventDecoder();
    this.sink = new CallbackSink({
      config: this.config.callback,
      resolver: this.subscriptions,
      handler: (notification) => this.handleNotification(notification),
      clock: this.clock
    });

    this.commandTransport = options.commandTransport ?? new SoapCommandTransport({ timeoutMs: this.config.httpTimeoutMs });
    this.lastPublished = this.topology.getSnapshot();

    this.discovery.on('device-found', (device) => {
      this.subscriptions.ensure(device);
      this.topology.syncDevices();
    });
    // Subscriptions outlive reachability; only forgetDevice() releases them
    this.discovery.on('device-lost', () => {
      this.topology.syncDevices();
    });
    this.topology.on('topology-change', (snapshot) => this.publish(snapshot));
    this.topology.on('inconsistency', (inconsistency: TopologyInconsistency) => {
      debugManager.warn('topology', `Unresolved claims for ${inconsistency.deviceId}`, inconsistency);
    });
  }

  /**
   * Start the callback sink, point subscriptions at it and begin background discovery
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    const callbackUrl = await this.sink.start();
    this.subscriptions.setCallbackUrl(callbackUrl);
    await this.discovery.start();
    this.started = true;
    logger.always(`Household client started, callback URL ${callbackUrl}`);
  }

  startBackgroundDiscovery(): Promise<void> {
    return this.discovery.start();
  }

  /**
   * One probe; resolves with the devices that answered
   */
  discoverOnce(timeoutMs?: number): Promise<Device[]> {
    return this.discovery.scanOnce(timeoutMs);
  }

  getSnapshot(): TopologySnapshot {
    return this.topology.getSnapshot();
  }

  subscribeToChanges(callback: (snapshot: TopologySnapshot) => void): Unsubscribe {
    this.topologyListeners.add(callback);
    return () => {
      this.topologyListeners.delete(callback);
    };
  }

  onTopologyChange(callback: (snapshot: TopologySnapshot) => void): Unsubscribe {
    return this.subscribeToChanges(callback);
  }

  /**
   * Per-group added / removed / updated notifications, optionally narrowed
   * to some event types or group ids
   */
  onGroupEvent(callback: (event: GroupEvent) => void, filter: GroupEventFilter = {}): Unsubscribe {
    const entry = { callback, filter };
    this.groupListeners.add(entry);
    return () => {
      this.groupListeners.delete(entry);
    };
  }

  async sendCommand(deviceId: string, action: string, args: Readonly<Record<string, unknown>> = {}): Promise<Record<string, unknown>> {
    const device = this.registry.get(deviceId);
    if (!device) {
      throw new DeviceNotFoundError(deviceId);
    }
    if (!device.reachable) {
      throw new CommandError(`Device ${deviceId} is unreachable`, device.id, action, 'DEVICE_UNREACHABLE');
    }

    debugManager.info('command', `${action} -> ${device.roomName ?? device.id}`);
    try {
      return await this.commandTransport.sendAction(device, action, args);
    } catch (error) {
      if (error instanceof CommandError) {
        throw error;
      }
      throw new CommandError(`${action} failed on ${device.id}: ${getErrorMessage(error)}`, device.id, action, 'COMMAND_FAILED', { cause: error });
    }
  }

  /**
   * Send an action to the coordinator of a group
   */
  async sendGroupCommand(groupId: string, action: string, args: Readonly<Record<string, unknown>> = {}): Promise<Record<string, unknown>> {
    const group = this.topology.getSnapshot().groups.get(groupId);
    if (!group) {
      throw new CommandError(`Group not found: ${groupId}`, groupId, action, 'GROUP_NOT_FOUND');
    }
    return this.sendCommand(group.coordinatorId, action, args);
  }

  /**
   * Drop an unreachable device from the household. Returns false when it is
   * unknown, still reachable, or still placed in a group.
   */
  async forgetDevice(deviceId: string): Promise<boolean> {
    const device = this.registry.get(deviceId);
    if (!device || device.reachable) {
      return false;
    }
    await this.subscriptions.release(device.id, { unsubscribe: false });
    this.topology.forget(device.id);
    const removed = this.registry.remove(device.id);
    if (removed) {
      this.topology.syncDevices();
      debugManager.info('discovery', `Forgot device ${device.roomName ?? device.id}`);
    }
    return removed;
  }

  getDegradedSubscriptions(): SubscriptionRef[] {
    return this.subscriptions.getDegraded();
  }

  getStats(): HouseholdStats {
    const snapshot = this.topology.getSnapshot();
    return {
      devices: this.registry.size,
      groups: snapshot.groups.size,
      snapshotVersion: snapshot.version,
      callback: this.sink.getStats(),
      decoder: this.decoder.getStats()
    };
  }

  /**
   * Stop everything. Every step runs even when an earlier one fails.
   */
  async shutdown(): Promise<void> {
    const steps: Array<[string, () => void | Promise<void>]> = [
      ['discovery', () => this.discovery.stop()],
      ['topology', () => this.topology.stop()],
      ['subscriptions', () => this.subscriptions.shutdown()],
      ['callback sink', () => this.sink.stop()]
    ];

    for (const [name, step] of steps) {
      try {
        await step();
      } catch (error) {
        logger.error(`Error stopping ${name}:`, error);
      }
    }

    this.topologyListeners.clear();
    this.groupListeners.clear();
    this.started = false;
    logger.always('Household client stopped');
  }

  /**
   * One notification cycle: decode, register members we have not discovered
   * yet, then fold the delta into the topology
   */
  private handleNotification(notification: EventNotification): void {
    const delta = this.decoder.decode(notification);
    const bootstrapped = delta.kind === 'topology' ? this.bootstrapMembers(delta) : false;
    this.topology.apply({ deltas: [delta], devices: bootstrapped });
  }

  private bootstrapMembers(delta: GroupTopologyChanged): boolean {
    let registered = false;
    for (const claim of delta.groups) {
      for (const member of claim.members) {
        if (!member.location || this.registry.has(member.id)) {
          continue;
        }
        let device: Device;
        try {
          ({ device } = this.registry.upsert({
            id: member.id,
            location: member.location,
            roomName: member.roomName,
            seenAt: this.clock.now()
          }));
        } catch (error) {
          logger.warn(`Skipping ${member.id} from topology of ${delta.deviceId}: ${getErrorMessage(error)}`);
          continue;
        }
        debugManager.info('topology', `Registered ${device.roomName ?? device.id} from topology of ${delta.deviceId}`);
        this.subscriptions.ensure(device);
        registered = true;
      }
    }
    return registered;
  }

  private publish(snapshot: TopologySnapshot): void {
    const previous = this.lastPublished;
    this.lastPublished = snapshot;

    for (const listener of [...this.topologyListeners]) {
      try {
        listener(snapshot);
      } catch (error) {
        logger.error('Error in topology listener:', error);
      }
    }

    if (this.groupListeners.size === 0) {
      return;
    }
    const events = diffSnapshots(previous, snapshot);
    for (const { callback, filter } of [...this.groupListeners]) {
      for (const event of events) {
        if (filter.events && !filter.events.includes(event.type)) {
          continue;
        }
        if (filter.groupIds && !filter.groupIds.includes(event.groupId)) {
          continue;
        }
        try {
          callback(event);
        } catch (error) {
          logger.error('Error in group event listener:', error);
        }
      }
    }
  }
}
