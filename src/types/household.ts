export type EventCategory = 'topology' | 'transport' | 'rendering';

export const EVENT_CATEGORIES: readonly EventCategory[] = ['topology', 'transport', 'rendering'];

/**
 * GENA event paths for each category, relative to the device base URL
 */
export const CATEGORY_EVENT_PATHS: Readonly<Record<EventCategory, string>> = {
  topology: '/ZoneGroupTopology/Event',
  transport: '/MediaRenderer/AVTransport/Event',
  rendering: '/MediaRenderer/RenderingControl/Event'
};

export interface Device {
  readonly id: string;
  readonly host: string;
  readonly port: number;
  readonly location: string;
  readonly roomName?: string;
  readonly modelName?: string;
  readonly householdId?: string;
  readonly reachable: boolean;
  readonly firstSeen: number;
  readonly lastSeen: number;
}

/**
 * What a discovery response (or a topology member entry) tells us about a device
 */
export interface DeviceAnnouncement {
  id: string;
  location: string;
  roomName?: string;
  modelName?: string;
  householdId?: string;
  seenAt: number;
}

export type PlaybackState =
  | 'PLAYING'
  | 'PAUSED_PLAYBACK'
  | 'STOPPED'
  | 'TRANSITIONING'
  | 'NO_MEDIA_PRESENT';

export type PlayMode =
  | 'NORMAL'
  | 'REPEAT_ALL'
  | 'REPEAT_ONE'
  | 'SHUFFLE_NOREPEAT'
  | 'SHUFFLE'
  | 'SHUFFLE_REPEAT_ONE';

export interface TrackReference {
  readonly uri: string;
  readonly title?: string;
  readonly artist?: string;
  readonly album?: string;
  readonly duration?: number; // seconds
}

export interface TransportState {
  readonly state: PlaybackState;
  readonly track: TrackReference | null;
  readonly playMode?: PlayMode;
}

export interface RenderingState {
  readonly volume?: number;
  readonly muted?: boolean;
}

interface DeltaBase {
  readonly deviceId: string;
  readonly category: EventCategory;
  readonly subscriptionId: string;
  readonly sequence?: number;
  readonly timestamp: number;
}

export interface TransportStateChanged extends DeltaBase {
  readonly kind: 'transport';
  readonly state?: PlaybackState;
  // null clears the track, undefined leaves it unchanged
  readonly track?: TrackReference | null;
  readonly playMode?: PlayMode;
}

export interface VolumeChanged extends DeltaBase {
  readonly kind: 'volume';
  readonly volume?: number;
  readonly muted?: boolean;
}

export interface TopologyMemberClaim {
  readonly id: string;
  readonly roomName?: string;
  readonly location?: string;
  readonly invisible: boolean;
}

export interface GroupClaim {
  readonly groupId?: string;
  readonly coordinatorId: string;
  readonly members: readonly TopologyMemberClaim[];
}

export interface GroupTopologyChanged extends DeltaBase {
  readonly kind: 'topology';
  readonly groups: readonly GroupClaim[];
}

export interface OtherDelta extends DeltaBase {
  readonly kind: 'other';
  readonly reason: string;
}

export type EventDelta = TransportStateChanged | VolumeChanged | GroupTopologyChanged | OtherDelta;

export interface GroupPlayback {
  readonly state: PlaybackState;
  readonly track: TrackReference | null;
  readonly playMode?: PlayMode;
}

export interface Group {
  readonly id: string;
  readonly name: string;
  readonly coordinatorId: string;
  readonly memberIds: readonly string[];
  readonly playback: GroupPlayback;
  readonly volume?: number;
  readonly updatedAt: number;
}

export interface TopologySnapshot {
  readonly version: number;
  readonly groups: ReadonlyMap<string, Group>;
  readonly devices: ReadonlyMap<string, Device>;
  readonly rendering: ReadonlyMap<string, RenderingState>;
  readonly createdAt: number;
}

/**
 * Raw NOTIFY delivery after the sink has resolved the subscription
 */
export interface EventNotification {
  readonly deviceId: string;
  readonly category: EventCategory;
  readonly subscriptionId: string;
  readonly sequence?: number;
  readonly receivedAt: number;
  readonly body: string;
}

/**
 * Outbound command capability. Timeouts and retries belong to the implementation.
 */
export interface CommandTransport {
  sendAction(device: Device, action: string, args: Readonly<Record<string, unknown>>): Promise<Record<string, unknown>>;
}

export function groupIdFor(coordinatorId: string): string {
  return `${coordinatorId}:group`;
}

export function normalizeDeviceId(id: string): string {
  return id.startsWith('uuid:') ? id.substring(5) : id;
}
