import type { DistanceCache } from './distanceCache';
import { distance } from './geometry';
import type { ConnectionFrame, Edge, OpacityTier, SpatialIndex, Vec2 } from './types';

export const DEFAULT_OPACITY_TIERS = 10;
export const DEFAULT_DENSE_FRACTION = 1 / 3;
export const DENSE_CAP_SIMPLE = 5;
export const DENSE_CAP_COMPLEX = 4;

export type ConnectionOptions = {
  lineDistance: number;
  complexMode: boolean;
  /** Overrides the cap that complexMode picks. */
  maxDenseConnections?: number;
  denseFraction: number;
  opacityTiers: number;
};

export type ConnectionInput = {
  positions: readonly Vec2[];
  visibleIds: readonly number[];
  index: Pick<SpatialIndex, 'queryCircle' | 'getDrift'>;
  cache: DistanceCache;
  options: ConnectionOptions;
};

type Candidate = {
  id: number;
  distance: number;
};

export function denseCap(options: Pick<ConnectionOptions, 'complexMode' | 'maxDenseConnections'>): number {
  if (options.maxDenseConnections !== undefined) {
    return Math.max(0, Math.floor(options.maxDenseConnections));
  }
  return options.complexMode ? DENSE_CAP_COMPLEX : DENSE_CAP_SIMPLE;
}

/** Linear falloff: 1 at zero distance, 0 at the threshold. */
export function edgeOpacity(distance: number, lineDistance: number): number {
  if (lineDistance <= 0) {
    return 0;
  }
  return Math.min(1, Math.max(0, 1 - distance / lineDistance));
}

export function opacityTier(opacity: number, tierCount: number): number {
  const tiers = Math.max(1, Math.floor(tierCount));
  return Math.min(tiers - 1, Math.max(0, Math.floor(opacity * tiers)));
}

/** Representative opacity a tier is drawn with: the middle of its range. */
export function tierOpacity(tier: number, tierCount: number): number {
  const tiers = Math.max(1, Math.floor(tierCount));
  return (tier + 0.5) / tiers;
}

export function createTiers<T>(tierCount: number): OpacityTier<T>[] {
  const tiers = Math.max(1, Math.floor(tierCount));
  const out: OpacityTier<T>[] = [];
  for (let tier = 0; tier < tiers; tier += 1) {
    out.push({ tier, opacity: tierOpacity(tier, tiers), edges: [] });
  }
  return out;
}

export function emptyConnectionFrame(tierCount = DEFAULT_OPACITY_TIERS): ConnectionFrame {
  return {
    edges: [],
    tiers: createTiers<Edge>(tierCount),
    stats: { queried: 0, candidates: 0, accepted: 0, capped: 0 }
  };
}

/**
 * Turns the index into a bounded edge list. Each unordered pair is looked at once,
 * from its lower id. Neighbours closer than `denseFraction * lineDistance` count
 * toward a per-particle cap and are taken nearest first; once the cap is reached
 * further dense neighbours are dropped for this frame.
 */
export function selectConnections({
  positions,
  visibleIds,
  index,
  cache,
  options
}: ConnectionInput): ConnectionFrame {
  const frame = emptyConnectionFrame(options.opacityTiers);
  const { lineDistance } = options;
  if (!(lineDistance > 0)) {
    return frame;
  }

  const cap = denseCap(options);
  const denseThreshold = lineDistance * options.denseFraction;
  // A reused tree holds positions up to `drift` old; widen so no current neighbour is missed.
  const searchRadius = lineDistance + index.getDrift();

  for (const id of visibleIds) {
    const origin = positions[id];
    if (!origin) {
      continue;
    }

    frame.stats.queried += 1;
    const nearby = index.queryCircle(origin.x, origin.y, searchRadius);
    const candidates: Candidate[] = [];
    for (const other of nearby) {
      if (other <= id) {
        continue;
      }
      const target = positions[other];
      if (!target) {
        continue;
      }
      const dist = cache.distanceBetween(id, origin, other, target);
      if (dist <= lineDistance) {
        candidates.push({ id: other, distance: dist });
      }
    }

    frame.stats.candidates += candidates.length;
    candidates.sort((a, b) => a.distance - b.distance || a.id - b.id);

    let denseCount = 0;
    for (const candidate of candidates) {
      if (candidate.distance < denseThreshold) {
        if (denseCount >= cap) {
          frame.stats.capped += 1;
          continue;
        }
        denseCount += 1;
      }

      const edge: Edge = { particleA: id, particleB: candidate.id, distance: candidate.distance };
      frame.edges.push(edge);
      frame.tiers[opacityTier(edgeOpacity(edge.distance, lineDistance), frame.tiers.length)].edges.push(edge);
    }
  }

  frame.stats.accepted = frame.edges.length;
  return frame;
}

/** Every pair within lineDistance, no index and no cap. */
export function bruteForceConnections(
  positions: readonly Vec2[],
  ids: readonly number[],
  lineDistance: number
): Edge[] {
  const edges: Edge[] = [];
  if (!(lineDistance > 0)) {
    return edges;
  }

  const sorted = [...ids].sort((a, b) => a - b);
  for (let i = 0; i < sorted.length; i += 1) {
    for (let j = i + 1; j < sorted.length; j += 1) {
      const a = sorted[i];
      const b = sorted[j];
      const dist = distance(positions[a], positions[b]);
      if (dist <= lineDistance) {
        edges.push({ particleA: a, particleB: b, distance: dist });
      }
    }
  }
  return edges;
}
