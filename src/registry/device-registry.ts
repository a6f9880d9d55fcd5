import { URL } from 'url';
import { debugManager } from '../utils/debug-manager.js';
import { DiscoveryError } from '../errors/household-errors.js';
import { normalizeDeviceId, type Device, type DeviceAnnouncement } from '../types/household.js';

export interface UpsertResult {
  device: Device;
  isNew: boolean;
  /** The device was known but unreachable before this announcement */
  becameReachable: boolean;
}

export interface DeviceRegistryOptions {
  /** Reports whether a device is still a member of a live group */
  isReferenced?: (deviceId: string) => boolean;
}

/**
 * Holds discovered devices. Every write swaps in a new map of frozen records,
 * so a list() taken before a write is never affected by it.
 */
export class DeviceRegistry {
  private devices: ReadonlyMap<string, Device> = new Map();
  private isReferenced: (deviceId: string) => boolean;

  constructor(options: DeviceRegistryOptions = {}) {
    this.isReferenced = options.isReferenced ?? (() => false);
  }

  setReferenceCheck(check: (deviceId: string) => boolean): void {
    this.isReferenced = check;
  }

  upsert(announcement: DeviceAnnouncement): UpsertResult {
    const id = normalizeDeviceId(announcement.id);
    const { host, port } = parseLocation(announcement.location);
    const existing = this.devices.get(id);

    const device: Device = Object.freeze({
      id,
      host,
      port,
      location: announcement.location,
      roomName: announcement.roomName ?? existing?.roomName,
      modelName: announcement.modelName ?? existing?.modelName,
      householdId: announcement.householdId ?? existing?.householdId,
      reachable: true,
      firstSeen: existing?.firstSeen ?? announcement.seenAt,
      lastSeen: Math.max(announcement.seenAt, existing?.lastSeen ?? 0)
    });

    this.write(id, device);

    const isNew = existing === undefined;
    const becameReachable = existing !== undefined && !existing.reachable;

    if (isNew) {
      debugManager.info('discovery', `Registered device ${describe(device)} at ${host}:${port}`);
    } else if (becameReachable) {
      debugManager.info('discovery', `Device ${describe(device)} is reachable again`);
    } else if (existing && (existing.host !== host || existing.port !== port)) {
      debugManager.info('discovery', `Device ${describe(device)} moved to ${host}:${port}`);
    }

    return { device, isNew, becameReachable };
  }

  /**
   * Flip a device to unreachable. Returns false when it is unknown or already unreachable.
   */
  markUnreachable(id: string): boolean {
    const key = normalizeDeviceId(id);
    const existing = this.devices.get(key);
    if (!existing || !existing.reachable) {
      return false;
    }
    this.write(key, Object.freeze({ ...existing, reachable: false }));
    debugManager.info('discovery', `Device ${describe(existing)} marked unreachable`);
    return true;
  }

  /**
   * Mark every reachable device not seen within the window as unreachable
   */
  sweep(now: number, livenessWindowMs: number): Device[] {
    const expired: Device[] = [];
    for (const device of this.devices.values()) {
      if (device.reachable && now - device.lastSeen > livenessWindowMs) {
        this.markUnreachable(device.id);
        const updated = this.devices.get(device.id);
        if (updated) {
          expired.push(updated);
        }
      }
    }
    return expired;
  }

  /**
   * Delete a device that no live group references
   */
  remove(id: string): boolean {
    const key = normalizeDeviceId(id);
    if (!this.devices.has(key)) {
      return false;
    }
    if (this.isReferenced(key)) {
      debugManager.debug('discovery', `Not removing ${key}: still referenced by a group`);
      return false;
    }
    const next = new Map(this.devices);
    next.delete(key);
    this.devices = next;
    return true;
  }

  get(id: string): Device | undefined {
    return this.devices.get(normalizeDeviceId(id));
  }

  has(id: string): boolean {
    return this.devices.has(normalizeDeviceId(id));
  }

  list(): readonly Device[] {
    return Array.from(this.devices.values());
  }

  get size(): number {
    return this.devices.size;
  }

  private write(id: string, device: Device): void {
    const next = new Map(this.devices);
    next.set(id, device);
    this.devices = next;
  }
}

export function parseLocation(location: string): { host: string; port: number } {
  let url: URL;
  try {
    url = new URL(location);
  } catch (error) {
    throw new DiscoveryError(`Invalid device location: ${location}`, { cause: error });
  }
  return {
    host: url.hostname,
    port: url.port ? parseInt(url.port, 10) : 80
  };
}

function describe(device: Device): string {
  return device.roomName ? `${device.roomName} (${device.id})` : device.id;
}
