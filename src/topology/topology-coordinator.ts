import { EventEmitter } from 'events';
import { isDeepStrictEqual } from 'util';
import logger from '../utils/logger.js';
import { debugManager } from '../utils/debug-manager.js';
import { Scheduler } from '../utils/scheduler.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { TopologyInconsistencyError } from '../errors/household-errors.js';
import { deriveGroups, type DerivedGroup, type SourceClaims } from './derive-groups.js';
import {
  groupIdFor,
  type Device,
  type EventDelta,
  type Group,
  type GroupPlayback,
  type PlaybackState,
  type PlayMode,
  type RenderingState,
  type TopologySnapshot,
  type TrackReference
} from '../types/household.js';
import type { DeviceRegistry } from '../registry/device-registry.js';
import type { TopologyConfig } from '../types/config.js';

export interface TopologyCycle {
  /** Re-read reachability from the registry before deriving */
  devices?: boolean;
  deltas?: readonly EventDelta[];
}

export interface TopologyInconsistency {
  readonly deviceId: string;
  readonly coordinatorIds: readonly string[];
  readonly since: number;
}

export interface TopologyCoordinatorOptions {
  registry: DeviceRegistry;
  config: TopologyConfig;
  clock?: Clock;
}

interface PlaybackRecord {
  state?: PlaybackState;
  track?: TrackReference | null;
  playMode?: PlayMode;
}

interface SequenceMark {
  subscriptionId: string;
  sequence: number;
}

// SEQ is a 32-bit counter that wraps to 1 after 4294967295
const SEQUENCE_WRAP_DISTANCE = 2 ** 31;

const EMPTY_PLAYBACK: GroupPlayback = Object.freeze({ state: 'STOPPED', track: null });

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export declare interface TopologyCoordinator {
  on(event: 'topology-change', listener: (snapshot: TopologySnapshot) => void): this;
  on(event: 'inconsistency', listener: (inconsistency: TopologyInconsistency) => void): this;
}

/**
 * Owns the group table. Each apply() is one cycle that folds deltas and
 * reachability changes in, derives the groups and publishes at most one
 * immutable snapshot.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class TopologyCoordinator extends EventEmitter {
  private readonly registry: DeviceRegistry;
  private readonly config: TopologyConfig;
  private readonly clock: Clock;
  private readonly scheduler: Scheduler;

  private readonly claims = new Map<string, SourceClaims>();
  private readonly sequences = new Map<string, SequenceMark>();
  private readonly playback = new Map<string, PlaybackRecord>();
  private readonly rendering = new Map<string, RenderingState>();
  // Unreachable devices whose grace period ran out
  private readonly expired = new Set<string>();
  private readonly conflicts = new Map<string, TopologyInconsistency>();
  private readonly reported = new Set<string>();
  private snapshot: TopologySnapshot;

  constructor(options: TopologyCoordinatorOptions) {
    super();
    this.registry = options.registry;
    this.config = options.config;
    this.clock = options.clock ?? systemClock;
    this.scheduler = new Scheduler(this.clock, 'topology');
    this.snapshot = Object.freeze({
      version: 0,
      groups: new Map(),
      devices: new Map(),
      rendering: new Map(),
      createdAt: this.clock.now()
    });
  }

  getSnapshot(): TopologySnapshot {
    return this.snapshot;
  }

  /**
   * True while the device is a member of a group in the current snapshot
   */
  isReferenced(deviceId: string): boolean {
    for (const group of this.snapshot.groups.values()) {
      if (group.memberIds.includes(deviceId)) {
        return true;
      }
    }
    return false;
  }

  applyDeltas(deltas: readonly EventDelta[]): TopologySnapshot {
    return this.apply({ deltas });
  }

  syncDevices(): TopologySnapshot {
    return this.apply({ devices: true });
  }

  /**
   * Run one cycle. Returns the current snapshot, which is a new version only
   * when something visible changed.
   */
  apply(cycle: TopologyCycle): TopologySnapshot {
    for (const delta of cycle.deltas ?? []) {
      this.fold(delta);
    }
    if (cycle.devices) {
      this.trackReachability();
    }
    return this.publish();
  }

  /**
   * Drop everything known about a device so the registry may remove it. An
   * unreachable device leaves its group at once instead of after the grace period.
   */
  forget(deviceId: string): TopologySnapshot {
    this.scheduler.clearTask(`grace:${deviceId}`);
    this.claims.delete(deviceId);
    this.purgeCoordinator(deviceId);
    this.playback.delete(deviceId);
    this.rendering.delete(deviceId);
    if (this.registry.get(deviceId)?.reachable === false) {
      this.expired.add(deviceId);
    } else {
      this.expired.delete(deviceId);
    }
    for (const key of [...this.sequences.keys()]) {
      if (key.startsWith(`${deviceId}/`)) {
        this.sequences.delete(key);
      }
    }
    return this.publish();
  }

  stop(): void {
    this.scheduler.clearAll();
  }

  private fold(delta: EventDelta): void {
    if (delta.kind === 'other') {
      debugManager.trace('topology', `Ignoring ${delta.category} delta from ${delta.deviceId}: ${delta.reason}`);
      return;
    }
    if (this.isStale(delta)) {
      debugManager.debug('topology', `Skipping stale ${delta.category} delta ${delta.subscriptionId}#${delta.sequence ?? '-'}`);
      return;
    }

    switch (delta.kind) {
      case 'topology':
        // Each source's latest payload replaces everything it said before
        this.claims.set(delta.deviceId, {
          sourceId: delta.deviceId,
          timestamp: delta.timestamp,
          groups: delta.groups
        });
        break;
      case 'transport': {
        const previous = this.playback.get(delta.deviceId) ?? {};
        this.playback.set(delta.deviceId, {
          state: delta.state ?? previous.state,
          track: delta.track !== undefined ? delta.track : previous.track,
          playMode: delta.playMode ?? previous.playMode
        });
        break;
      }
      case 'volume': {
        const previous = this.rendering.get(delta.deviceId) ?? {};
        this.rendering.set(delta.deviceId, Object.freeze({
          volume: delta.volume ?? previous.volume,
          muted: delta.muted ?? previous.muted
        }));
        break;
      }
    }
  }

  /**
   * A delta is stale when it repeats or precedes the last sequence applied
   * for the same subscription. A large backwards jump is the 32-bit counter
   * wrapping, not an old event.
   */
  private isStale(delta: EventDelta): boolean {
    if (delta.sequence === undefined) {
      return false;
    }
    const key = `${delta.deviceId}/${delta.category}`;
    const mark = this.sequences.get(key);
    if (
      mark &&
      mark.subscriptionId === delta.subscriptionId &&
      delta.sequence <= mark.sequence &&
      mark.sequence - delta.sequence < SEQUENCE_WRAP_DISTANCE
    ) {
      return true;
    }
    this.sequences.set(key, { subscriptionId: delta.subscriptionId, sequence: delta.sequence });
    return false;
  }

  private trackReachability(): void {
    for (const device of this.registry.list()) {
      const graceTask = `grace:${device.id}`;
      if (device.reachable) {
        if (this.scheduler.has(graceTask)) {
          debugManager.info('topology', `${describe(device)} is back within its grace period`);
        }
        this.scheduler.clearTask(graceTask);
        this.expired.delete(device.id);
      } else if (!this.expired.has(device.id) && !this.scheduler.has(graceTask)) {
        debugManager.info('topology', `${describe(device)} unreachable, holding its groups for ${this.config.graceMs}ms`);
        this.scheduler.scheduleTimeout(graceTask, () => this.expire(device.id), this.config.graceMs);
      }
    }
  }

  private expire(deviceId: string): void {
    const device = this.registry.get(deviceId);
    if (!device || device.reachable) {
      return;
    }
    logger.info(`Grace period for ${describe(device)} ran out, dissolving its groups`);
    this.expired.add(deviceId);
    this.claims.delete(deviceId);
    this.purgeCoordinator(deviceId);
    this.publish();
  }

  /**
   * Remove every claim that names the device as coordinator, and the device
   * from every member list
   */
  private purgeCoordinator(deviceId: string): void {
    for (const [sourceId, source] of this.claims) {
      const groups = source.groups
        .filter(claim => claim.coordinatorId !== deviceId)
        .map(claim => claim.members.some(m => m.id === deviceId)
          ? { ...claim, members: claim.members.filter(m => m.id !== deviceId) }
          : claim);
      this.claims.set(sourceId, { ...source, groups });
    }
  }

  private eligibleDevices(): Set<string> {
    const eligible = new Set<string>();
    for (const device of this.registry.list()) {
      if (device.reachable || !this.expired.has(device.id)) {
        eligible.add(device.id);
      }
    }
    return eligible;
  }

  private publish(): TopologySnapshot {
    const now = this.clock.now();
    const derivation = deriveGroups(this.claims.values(), this.eligibleDevices());
    this.trackConflicts(derivation.conflicts, now);

    const devices = new Map<string, Device>(this.registry.list().map(d => [d.id, d]));
    const groups = new Map<string, Group>();
    for (const derived of derivation.groups) {
      const group = this.buildGroup(derived, devices, now);
      groups.set(group.id, group);
    }
    const rendering = new Map(this.rendering);

    try {
      checkInvariants(groups, devices);
    } catch (error) {
      if (error instanceof TopologyInconsistencyError) {
        logger.error(`Derived topology rejected: ${error.message}`);
        return this.snapshot;
      }
      throw error;
    }

    if (
      isDeepStrictEqual(groups, this.snapshot.groups) &&
      isDeepStrictEqual(rendering, this.snapshot.rendering) &&
      sameDevices(devices, this.snapshot.devices)
    ) {
      return this.snapshot;
    }

    this.snapshot = Object.freeze({
      version: this.snapshot.version + 1,
      groups,
      devices,
      rendering,
      createdAt: now
    });
    debugManager.info('topology', `Topology v${this.snapshot.version}: ${groups.size} groups, ${devices.size} devices`);
    this.emit('topology-change', this.snapshot);
    return this.snapshot;
  }

  private buildGroup(derived: DerivedGroup, devices: ReadonlyMap<string, Device>, now: number): Group {
    const id = groupIdFor(derived.coordinatorId);
    const record = this.playback.get(derived.coordinatorId);
    const playback: GroupPlayback = record
      ? {
        state: record.state ?? EMPTY_PLAYBACK.state,
        track: record.track ?? null,
        ...(record.playMode ? { playMode: record.playMode } : {})
      }
      : EMPTY_PLAYBACK;

    const volumes = derived.memberIds
      .map(memberId => this.rendering.get(memberId)?.volume)
      .filter((volume): volume is number => volume !== undefined);

    const draft: Omit<Group, 'updatedAt'> = {
      id,
      name: groupName(derived.memberIds, devices),
      coordinatorId: derived.coordinatorId,
      memberIds: derived.memberIds,
      playback,
      ...(volumes.length > 0
        ? { volume: Math.round(volumes.reduce((sum, v) => sum + v, 0) / volumes.length) }
        : {})
    };

    // An unchanged group keeps its object, and with it its updatedAt
    const previous = this.snapshot.groups.get(id);
    if (previous) {
      const { updatedAt: _updatedAt, ...rest } = previous;
      if (isDeepStrictEqual(rest, draft)) {
        return previous;
      }
    }
    return Object.freeze({ ...draft, updatedAt: now });
  }

  private trackConflicts(current: ReadonlyMap<string, readonly string[]>, now: number): void {
    for (const deviceId of [...this.conflicts.keys()]) {
      if (!current.has(deviceId)) {
        this.conflicts.delete(deviceId);
        this.reported.delete(deviceId);
        this.scheduler.clearTask(`conflict:${deviceId}`);
        debugManager.debug('topology', `Conflicting claims for ${deviceId} resolved`);
      }
    }

    for (const [deviceId, coordinatorIds] of current) {
      const known = this.conflicts.get(deviceId);
      if (known) {
        this.conflicts.set(deviceId, { ...known, coordinatorIds });
        continue;
      }
      this.conflicts.set(deviceId, { deviceId, coordinatorIds, since: now });
      debugManager.debug('topology', `${deviceId} claimed by ${coordinatorIds.join(', ')}`);
      this.scheduler.scheduleTimeout(`conflict:${deviceId}`, () => this.reportConflict(deviceId), this.config.conflictWindowMs);
    }
  }

  private reportConflict(deviceId: string): void {
    const conflict = this.conflicts.get(deviceId);
    if (!conflict || this.reported.has(deviceId)) {
      return;
    }
    this.reported.add(deviceId);
    const error = new TopologyInconsistencyError(
      `${deviceId} claimed by coordinators ${conflict.coordinatorIds.join(', ')} for over ${this.config.conflictWindowMs}ms`,
      [deviceId, ...conflict.coordinatorIds]
    );
    logger.warn(error.message);
    this.emit('inconsistency', conflict);
  }
}

/**
 * Room names of the members in order, without repeats (stereo pairs and
 * satellites share a room name)
 */
export function groupName(memberIds: readonly string[], devices: ReadonlyMap<string, Device>): string {
  const names: string[] = [];
  for (const id of memberIds) {
    const name = devices.get(id)?.roomName ?? id;
    if (!names.includes(name)) {
      names.push(name);
    }
  }
  return names.join(' + ');
}

/**
 * Every group has members, its coordinator is one of them exactly once, and
 * no device sits in two groups
 */
export function checkInvariants(groups: ReadonlyMap<string, Group>, devices: ReadonlyMap<string, Device>): void {
  const seen = new Map<string, string>();
  for (const group of groups.values()) {
    if (group.memberIds.length === 0) {
      throw new TopologyInconsistencyError(`Group ${group.id} has no members`, [group.coordinatorId]);
    }
    if (group.memberIds.filter(id => id === group.coordinatorId).length !== 1) {
      throw new TopologyInconsistencyError(`Coordinator of ${group.id} is not exactly one of its members`, [group.coordinatorId]);
    }
    if (group.id !== groupIdFor(group.coordinatorId)) {
      throw new TopologyInconsistencyError(`Group ${group.id} does not match coordinator ${group.coordinatorId}`, [group.coordinatorId]);
    }
    for (const id of group.memberIds) {
      const other = seen.get(id);
      if (other !== undefined) {
        throw new TopologyInconsistencyError(`${id} is in both ${other} and ${group.id}`, [id]);
      }
      if (!devices.has(id)) {
        throw new TopologyInconsistencyError(`${group.id} names unknown device ${id}`, [id]);
      }
      seen.set(id, group.id);
    }
  }
}

function sameDevices(a: ReadonlyMap<string, Device>, b: ReadonlyMap<string, Device>): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const [id, device] of a) {
    const other = b.get(id);
    if (!other) {
      return false;
    }
    const { lastSeen: _a, ...left } = device;
    const { lastSeen: _b, ...right } = other;
    if (!isDeepStrictEqual(left, right)) {
      return false;
    }
  }
  return true;
}

function describe(device: Device): string {
  return device.roomName ? `${device.roomName} (${device.id})` : device.id;
}
