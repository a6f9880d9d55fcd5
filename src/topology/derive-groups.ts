import type { GroupClaim } from '../types/household.js';

/**
 * Everything one device last said about the household's groups
 */
export interface SourceClaims {
  readonly sourceId: string;
  readonly timestamp: number;
  readonly groups: readonly GroupClaim[];
}

export interface DerivedGroup {
  readonly coordinatorId: string;
  readonly memberIds: readonly string[];
}

export interface Derivation {
  readonly groups: readonly DerivedGroup[];
  /** Device id to the distinct coordinators claiming it, for devices claimed by more than one */
  readonly conflicts: ReadonlyMap<string, readonly string[]>;
}

interface RankedClaim {
  sourceId: string;
  timestamp: number;
  order: number;
  claim: GroupClaim;
}

/**
 * Newest first; on equal stamps the coordinator's own claim wins; then source id
 */
export function compareClaims(a: RankedClaim, b: RankedClaim): number {
  if (a.timestamp !== b.timestamp) {
    return b.timestamp - a.timestamp;
  }
  const aOwn = a.sourceId === a.claim.coordinatorId;
  const bOwn = b.sourceId === b.claim.coordinatorId;
  if (aOwn !== bOwn) {
    return aOwn ? -1 : 1;
  }
  if (a.sourceId !== b.sourceId) {
    return a.sourceId < b.sourceId ? -1 : 1;
  }
  return a.order - b.order;
}

/**
 * Build the group table from the claims of every source. Claims are applied
 * greedily in rank order: a claim is skipped when its coordinator is not
 * eligible or already placed, otherwise its coordinator and every eligible,
 * unplaced member form a group. Eligible devices nobody placed stand alone.
 */
export function deriveGroups(claims: Iterable<SourceClaims>, eligible: ReadonlySet<string>): Derivation {
  const ranked: RankedClaim[] = [];
  const claimants = new Map<string, Set<string>>();

  for (const source of claims) {
    source.groups.forEach((claim, order) => {
      ranked.push({ sourceId: source.sourceId, timestamp: source.timestamp, order, claim });

      for (const id of [claim.coordinatorId, ...claim.members.map(m => m.id)]) {
        if (!eligible.has(id) || !eligible.has(claim.coordinatorId)) {
          continue;
        }
        let coordinators = claimants.get(id);
        if (!coordinators) {
          coordinators = new Set();
          claimants.set(id, coordinators);
        }
        coordinators.add(claim.coordinatorId);
      }
    });
  }

  ranked.sort(compareClaims);

  const placed = new Set<string>();
  const groups: DerivedGroup[] = [];

  for (const { claim } of ranked) {
    const coordinatorId = claim.coordinatorId;
    if (!eligible.has(coordinatorId) || placed.has(coordinatorId)) {
      continue;
    }

    const memberIds = [coordinatorId];
    placed.add(coordinatorId);
    for (const member of claim.members) {
      if (eligible.has(member.id) && !placed.has(member.id)) {
        memberIds.push(member.id);
        placed.add(member.id);
      }
    }
    groups.push({ coordinatorId, memberIds });
  }

  for (const id of [...eligible].sort()) {
    if (!placed.has(id)) {
      groups.push({ coordinatorId: id, memberIds: [id] });
      placed.add(id);
    }
  }

  const conflicts = new Map<string, readonly string[]>();
  for (const [id, coordinators] of claimants) {
    if (coordinators.size > 1) {
      conflicts.set(id, [...coordinators].sort());
    }
  }

  return { groups, conflicts };
}
