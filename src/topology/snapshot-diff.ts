import { isDeepStrictEqual } from 'util';
import type { Group, TopologySnapshot } from '../types/household.js';

export type GroupEventType = 'group-added' | 'group-removed' | 'group-updated';

export interface GroupEvent {
  readonly type: GroupEventType;
  readonly groupId: string;
  /** The group as it is now; absent for removals */
  readonly group?: Group;
  /** The group as it was; absent for additions */
  readonly previous?: Group;
  readonly version: number;
}

/**
 * Per-group changes between two consecutive snapshots. Removals come first,
 * then additions and updates in the order of the newer snapshot.
 */
export function diffSnapshots(previous: TopologySnapshot, next: TopologySnapshot): GroupEvent[] {
  const events: GroupEvent[] = [];

  for (const [groupId, group] of previous.groups) {
    if (!next.groups.has(groupId)) {
      events.push({ type: 'group-removed', groupId, previous: group, version: next.version });
    }
  }

  for (const [groupId, group] of next.groups) {
    const before = previous.groups.get(groupId);
    if (!before) {
      events.push({ type: 'group-added', groupId, group, version: next.version });
    } else if (!isDeepStrictEqual(before, group)) {
      events.push({ type: 'group-updated', groupId, group, previous: before, version: next.version });
    }
  }

  return events;
}
