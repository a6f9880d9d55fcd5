import { debugManager } from '../utils/debug-manager.js';
import { asArray, attributeOf, childNode, isXmlNode, parseXML, textOf, type XmlNode } from '../utils/xml.js';
import { DecodeError } from '../errors/household-errors.js';
import {
  normalizeDeviceId,
  type EventDelta,
  type EventNotification,
  type GroupClaim,
  type PlaybackState,
  type PlayMode,
  type TopologyMemberClaim,
  type TrackReference,
  type TransportStateChanged,
  type VolumeChanged
} from '../types/household.js';

export interface DecoderStats {
  decoded: number;
  ignored: number;
  errors: number;
}

const PLAYBACK_STATES: readonly PlaybackState[] = ['PLAYING', 'PAUSED_PLAYBACK', 'STOPPED', 'TRANSITIONING', 'NO_MEDIA_PRESENT'];
const PLAY_MODES: readonly PlayMode[] = ['NORMAL', 'REPEAT_ALL', 'REPEAT_ONE', 'SHUFFLE_NOREPEAT', 'SHUFFLE', 'SHUFFLE_REPEAT_ONE'];

type DeltaBase = Pick<EventDelta, 'deviceId' | 'category' | 'subscriptionId' | 'sequence' | 'timestamp'>;

/**
 * Turns raw NOTIFY bodies into typed deltas. Never throws: anything it cannot
 * read becomes an `other` delta and is counted.
 */
export class EventDecoder {
  private readonly stats: DecoderStats = { decoded: 0, ignored: 0, errors: 0 };

  decode(notification: EventNotification): EventDelta {
    const base: DeltaBase = {
      deviceId: notification.deviceId,
      category: notification.category,
      subscriptionId: notification.subscriptionId,
      sequence: notification.sequence,
      timestamp: notification.receivedAt
    };

    try {
      const properties = readPropertySet(notification);
      let delta: EventDelta | undefined;
      switch (notification.category) {
        case 'topology':
          delta = this.decodeTopology(base, properties, notification);
          break;
        case 'transport':
          delta = decodeTransport(base, properties, notification);
          break;
        case 'rendering':
          delta = decodeRendering(base, properties, notification);
          break;
      }

      if (!delta) {
        this.stats.ignored++;
        return { ...base, kind: 'other', reason: `no ${notification.category} state in event` };
      }
      this.stats.decoded++;
      return delta;
    } catch (error) {
      this.stats.errors++;
      const reason = error instanceof Error ? error.message : String(error);
      debugManager.warn('decode', `Dropping ${notification.category} event from ${notification.deviceId}: ${reason}`);
      return { ...base, kind: 'other', reason };
    }
  }

  getStats(): DecoderStats {
    return { ...this.stats };
  }

  private decodeTopology(base: DeltaBase, properties: XmlNode[], notification: EventNotification): EventDelta | undefined {
    const property = properties.find(p => p['ZoneGroupState'] !== undefined);
    if (!property) {
      return undefined;
    }

    // Usually escaped XML text; some senders nest the elements directly
    const raw = property['ZoneGroupState'];
    const document = isXmlNode(raw) && raw['#text'] === undefined
      ? { ZoneGroupState: raw }
      : parseXML(textOf(raw) ?? '');
    if (!document) {
      throw new DecodeError('ZoneGroupState is not well-formed', notification.deviceId, notification.category);
    }

    // Newer firmware wraps ZoneGroups in a ZoneGroupState element
    const state = childNode(document, 'ZoneGroupState') ?? document;
    const zoneGroups = state['ZoneGroups'];
    if (zoneGroups === undefined) {
      throw new DecodeError('ZoneGroupState has no ZoneGroups', notification.deviceId, notification.category);
    }

    const groups: GroupClaim[] = [];
    const groupNodes = isXmlNode(zoneGroups) ? asArray(zoneGroups['ZoneGroup']) : [];
    for (const node of groupNodes) {
      const coordinator = attributeOf(node, 'Coordinator');
      if (!isXmlNode(node) || !coordinator) {
        this.stats.errors++;
        debugManager.debug('decode', `Skipping zone group without coordinator from ${notification.deviceId}`);
        continue;
      }

      const members: TopologyMemberClaim[] = [];
      for (const member of asArray(node['ZoneGroupMember'])) {
        const uuid = attributeOf(member, 'UUID');
        if (!uuid) {
          continue;
        }
        members.push({
          id: normalizeDeviceId(uuid),
          roomName: attributeOf(member, 'ZoneName'),
          location: attributeOf(member, 'Location'),
          invisible: attributeOf(member, 'Invisible') === '1'
        });
      }

      groups.push({
        groupId: attributeOf(node, 'ID'),
        coordinatorId: normalizeDeviceId(coordinator),
        members
      });
    }

    debugManager.debug('topology', `Decoded ${groups.length} group claims from ${notification.deviceId}`);
    return { ...base, kind: 'topology', groups };
  }
}

function readPropertySet(notification: EventNotification): XmlNode[] {
  const parsed = parseXML(notification.body);
  if (!parsed) {
    throw new DecodeError('Event body is not well-formed XML', notification.deviceId, notification.category);
  }
  const propertySet = childNode(parsed, 'e:propertyset');
  if (!propertySet) {
    throw new DecodeError('No e:propertyset in event', notification.deviceId, notification.category);
  }
  return asArray(propertySet['e:property']).filter(isXmlNode);
}

/**
 * Parse the LastChange document and return the InstanceID 0 element
 */
function readLastChange(properties: XmlNode[], notification: EventNotification): XmlNode | undefined {
  const property = properties.find(p => p['LastChange'] !== undefined);
  if (!property) {
    return undefined;
  }

  const document = parseXML(textOf(property['LastChange']) ?? '');
  const event = document ? childNode(document, 'Event') : undefined;
  if (!event) {
    throw new DecodeError('LastChange is not a well-formed Event document', notification.deviceId, notification.category);
  }

  const instances = asArray(event['InstanceID']).filter(isXmlNode);
  const instance = instances.find(i => attributeOf(i, 'val') === '0') ?? instances[0];
  if (!instance) {
    throw new DecodeError('LastChange has no InstanceID', notification.deviceId, notification.category);
  }
  return instance;
}

function valueOf(instance: XmlNode, name: string): string | undefined {
  return attributeOf(instance[name], 'val');
}

function decodeTransport(base: DeltaBase, properties: XmlNode[], notification: EventNotification): TransportStateChanged | undefined {
  const instance = readLastChange(properties, notification);
  if (!instance) {
    return undefined;
  }

  const delta: { -readonly [K in keyof TransportStateChanged]: TransportStateChanged[K] } = { ...base, kind: 'transport' };

  const state = valueOf(instance, 'TransportState');
  if (state !== undefined) {
    delta.state = PLAYBACK_STATES.find(s => s === state);
    if (!delta.state) {
      throw new DecodeError(`Unknown transport state ${state}`, notification.deviceId, notification.category);
    }
  }

  const playMode = valueOf(instance, 'CurrentPlayMode');
  if (playMode !== undefined) {
    delta.playMode = PLAY_MODES.find(m => m === playMode);
  }

  const uri = valueOf(instance, 'CurrentTrackURI');
  if (uri !== undefined) {
    delta.track = uri === ''
      ? null
      : buildTrack(uri, valueOf(instance, 'CurrentTrackMetaData'), valueOf(instance, 'CurrentTrackDuration'));
  }

  return delta;
}

function buildTrack(uri: string, metadata: string | undefined, duration: string | undefined): TrackReference {
  const item = metadata ? readDidlItem(metadata) : undefined;
  return {
    uri,
    title: item ? textOf(item['dc:title']) : undefined,
    artist: item ? textOf(item['dc:creator']) : undefined,
    album: item ? textOf(item['upnp:album']) : undefined,
    duration: parseDuration(duration)
  };
}

function readDidlItem(metadata: string): XmlNode | undefined {
  if (metadata === '' || metadata === 'NOT_IMPLEMENTED') {
    return undefined;
  }
  const document = parseXML(metadata);
  const didl = document ? childNode(document, 'DIDL-Lite') : undefined;
  if (!didl) {
    return undefined;
  }
  return asArray(didl['item']).find(isXmlNode);
}

/**
 * H:MM:SS (optionally with a fraction) to whole seconds
 */
export function parseDuration(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const match = value.match(/^(\d+):(\d{2}):(\d{2})(?:\.\d+)?$/);
  if (!match || !match[1] || !match[2] || !match[3]) {
    return undefined;
  }
  return parseInt(match[1], 10) * 3600 + parseInt(match[2], 10) * 60 + parseInt(match[3], 10);
}

function masterValue(instance: XmlNode, name: string): string | undefined {
  const master = asArray(instance[name]).find(node => attributeOf(node, 'channel') === 'Master');
  return attributeOf(master, 'val');
}

function decodeRendering(base: DeltaBase, properties: XmlNode[], notification: EventNotification): VolumeChanged | undefined {
  const instance = readLastChange(properties, notification);
  if (!instance) {
    return undefined;
  }

  const delta: { -readonly [K in keyof VolumeChanged]: VolumeChanged[K] } = { ...base, kind: 'volume' };

  const volume = masterValue(instance, 'Volume');
  if (volume !== undefined) {
    const parsed = parseInt(volume, 10);
    if (Number.isNaN(parsed)) {
      throw new DecodeError(`Invalid volume ${volume}`, notification.deviceId, notification.category);
    }
    delta.volume = Math.max(0, Math.min(100, parsed));
  }

  const mute = masterValue(instance, 'Mute');
  if (mute !== undefined) {
    delta.muted = mute === '1';
  }

  return delta;
}
