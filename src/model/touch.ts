import { createTiers, edgeOpacity, opacityTier } from './connections';
import type { DistanceCache } from './distanceCache';
import type { Particle, TouchEdge, TouchFrame, Vec2 } from './types';

export const DEFAULT_TOUCH_FORCE = 0.00115;

export function emptyTouchFrame(tierCount: number): TouchFrame {
  return { edges: [], tiers: createTiers<TouchEdge>(tierCount) };
}

/** Visible particles strictly closer than lineDistance to the pointer. */
export function findTouchTargets(
  particles: readonly Particle[],
  visibleIds: readonly number[],
  pointer: Vec2,
  cache: Pick<DistanceCache, 'betweenPoints'>,
  lineDistance: number
): TouchEdge[] {
  const edges: TouchEdge[] = [];
  if (!(lineDistance > 0)) {
    return edges;
  }
  for (const id of visibleIds) {
    const particle = particles[id];
    if (!particle) {
      continue;
    }
    const dist = cache.betweenPoints(particle.pos, pointer);
    if (dist < lineDistance) {
      edges.push({ particle: id, distance: dist });
    }
  }
  return edges;
}

/**
 * Pulls every particle near the pointer toward it and flags it so kinematics
 * relaxes the velocity back to its baseline on later frames.
 */
export function applyTouchInteraction(
  particles: Particle[],
  visibleIds: readonly number[],
  pointer: Vec2,
  cache: Pick<DistanceCache, 'betweenPoints'>,
  lineDistance: number,
  tierCount: number,
  force = DEFAULT_TOUCH_FORCE
): TouchFrame {
  const frame = emptyTouchFrame(tierCount);
  const targets = findTouchTargets(particles, visibleIds, pointer, cache, lineDistance);

  for (const edge of targets) {
    const particle = particles[edge.particle];
    particle.velocity = {
      x: particle.velocity.x + (pointer.x - particle.pos.x) * force,
      y: particle.velocity.y + (pointer.y - particle.pos.y) * force
    };
    particle.wasAccelerated = true;

    frame.edges.push(edge);
    frame.tiers[opacityTier(edgeOpacity(edge.distance, lineDistance), frame.tiers.length)].edges.push(edge);
  }

  return frame;
}
