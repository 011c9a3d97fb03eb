import type { Particle, Size, Vec2 } from './types';

export const DEFAULT_VISIBILITY_MARGIN = 100;
const VELOCITY_SETTLE_TOLERANCE = 0.05;
const VELOCITY_RECOVERY_RATE = 0.05;

export type SpawnOptions = {
  maxSpeed: number;
  maxSize: number;
};

export function createParticle(id: number, bounds: Size, options: SpawnOptions, random: () => number): Particle {
  const velocity: Vec2 = {
    x: (random() - 0.5) * options.maxSpeed,
    y: (random() - 0.5) * options.maxSpeed
  };

  return {
    id,
    pos: {
      x: random() * bounds.width,
      y: random() * bounds.height
    },
    velocity,
    defaultVelocity: { x: velocity.x, y: velocity.y },
    size: random() * options.maxSize + 1,
    wasAccelerated: false,
    visible: true
  };
}

export function createParticles(
  count: number,
  bounds: Size,
  options: SpawnOptions,
  random: () => number = Math.random
): Particle[] {
  if (bounds.width <= 0 || bounds.height <= 0) {
    return [];
  }
  const particles: Particle[] = [];
  for (let id = 0; id < count; id += 1) {
    particles.push(createParticle(id, bounds, options, random));
  }
  return particles;
}

function speed(v: Vec2): number {
  return Math.hypot(v.x, v.y);
}

function recoverVelocity(particle: Particle): void {
  const current = speed(particle.velocity);
  const target = speed(particle.defaultVelocity);

  if (Math.abs(current - target) < VELOCITY_SETTLE_TOLERANCE) {
    particle.velocity = { x: particle.defaultVelocity.x, y: particle.defaultVelocity.y };
    particle.wasAccelerated = false;
    return;
  }

  particle.velocity = {
    x: particle.velocity.x + (particle.defaultVelocity.x - particle.velocity.x) * VELOCITY_RECOVERY_RATE,
    y: particle.velocity.y + (particle.defaultVelocity.y - particle.velocity.y) * VELOCITY_RECOVERY_RATE
  };
}

export function isInsideViewport(pos: Vec2, bounds: Size, margin: number): boolean {
  return (
    pos.x >= -margin &&
    pos.x <= bounds.width + margin &&
    pos.y >= -margin &&
    pos.y <= bounds.height + margin
  );
}

/** Moves one particle a frame forward: integrate, relax a perturbed velocity, bounce, cull. */
export function stepParticle(particle: Particle, bounds: Size, margin = DEFAULT_VISIBILITY_MARGIN): void {
  particle.pos = {
    x: particle.pos.x + particle.velocity.x,
    y: particle.pos.y + particle.velocity.y
  };

  if (particle.wasAccelerated) {
    recoverVelocity(particle);
  }

  if (particle.pos.x < 0 || particle.pos.x > bounds.width) {
    const sign = particle.pos.x < 0 ? 1 : -1;
    particle.pos.x = particle.pos.x < 0 ? 0 : bounds.width;
    particle.velocity.x = sign * Math.abs(particle.velocity.x);
    particle.defaultVelocity.x = sign * Math.abs(particle.defaultVelocity.x);
  }
  if (particle.pos.y < 0 || particle.pos.y > bounds.height) {
    const sign = particle.pos.y < 0 ? 1 : -1;
    particle.pos.y = particle.pos.y < 0 ? 0 : bounds.height;
    particle.velocity.y = sign * Math.abs(particle.velocity.y);
    particle.defaultVelocity.y = sign * Math.abs(particle.defaultVelocity.y);
  }

  particle.visible = isInsideViewport(particle.pos, bounds, margin);
}

export function getVisibleParticleIds(particles: readonly Particle[]): number[] {
  const ids: number[] = [];
  for (let i = 0; i < particles.length; i += 1) {
    if (particles[i].visible) {
      ids.push(i);
    }
  }
  return ids;
}
