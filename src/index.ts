export { HouseholdClient } from './household-client.js';
export type { HouseholdClientOptions, GroupEventFilter, HouseholdStats } from './household-client.js';

export { DeviceRegistry } from './registry/device-registry.js';
export { DiscoveryScanner, fetchDeviceDescription } from './discovery/discovery-scanner.js';
export { createSsdpSocket, parseSsdpMessage, buildSearchMessage } from './discovery/ssdp.js';
export type { DiscoverySocket, SsdpMessage } from './discovery/ssdp.js';
export { SubscriptionManager } from './upnp/subscription-manager.js';
export type { SubscriptionInfo, SubscriptionRef, SubscriptionState } from './upnp/subscription-manager.js';
export { GenaTransport } from './upnp/gena-transport.js';
export type { SubscriptionTransport, SubscribeResult } from './upnp/gena-transport.js';
export { CallbackSink } from './upnp/callback-sink.js';
export { EventDecoder } from './events/event-decoder.js';
export { TopologyCoordinator } from './topology/topology-coordinator.js';
export type { TopologyInconsistency } from './topology/topology-coordinator.js';
export { deriveGroups } from './topology/derive-groups.js';
export { diffSnapshots } from './topology/snapshot-diff.js';
export type { GroupEvent, GroupEventType } from './topology/snapshot-diff.js';
export { SoapCommandTransport } from './transport/soap-transport.js';
export { loadConfiguration, defaultConfig } from './utils/config-loader.js';
export { systemClock } from './utils/clock.js';
export type { Clock, TimerHandle } from './utils/clock.js';

export * from './errors/household-errors.js';
export * from './types/household.js';
export type * from './types/config.js';
