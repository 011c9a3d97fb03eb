import { describe, expect, it } from 'vitest';

import { bruteForceConnections } from '../model/connections';
import { getVisibleParticleIds } from '../model/particles';
import { DEFAULT_NETWORK_OPTIONS, createNetworkStore, validateOptions } from '../model/store';
import type { Edge } from '../model/types';

// Every particle spawns at the centre, standing still.
const centred = () => 0.5;

describe('validateOptions', () => {
  it('accepts the defaults', () => {
    expect(validateOptions(DEFAULT_NETWORK_OPTIONS)).toBeNull();
  });

  it('names the first bad field', () => {
    expect(validateOptions({ ...DEFAULT_NETWORK_OPTIONS, particleCount: 2.5 })).toBe(
      'particleCount must be a non-negative integer'
    );
    expect(validateOptions({ ...DEFAULT_NETWORK_OPTIONS, particleCount: 5000 })).toBe(
      'particleCount must not exceed 2000'
    );
    expect(validateOptions({ ...DEFAULT_NETWORK_OPTIONS, lineDistance: Number.NaN })).toBe(
      'lineDistance must be a finite non-negative number'
    );
    expect(validateOptions({ ...DEFAULT_NETWORK_OPTIONS, opacityTiers: 0 })).toBe(
      'opacityTiers must be an integer of at least 1'
    );
    expect(validateOptions({ ...DEFAULT_NETWORK_OPTIONS, denseFraction: 1.5 })).toBe(
      'denseFraction must be between 0 and 1'
    );
    expect(validateOptions({ ...DEFAULT_NETWORK_OPTIONS, lineColor: 'green' })).toBe('lineColor must be a hex color');
  });
});

describe('createNetworkStore', () => {
  it('falls back to defaults when the initial options are unusable', () => {
    const store = createNetworkStore({ options: { maxSpeed: -1 } });
    const state = store.getState();
    expect(state.options).toEqual(DEFAULT_NETWORK_OPTIONS);
    expect(state.diagnostics.lastRejectedOptions).toBe('maxSpeed must be a finite non-negative number');
  });

  it('refuses to step or regenerate before the canvas has an area', () => {
    const store = createNetworkStore({ random: centred });
    expect(store.step()).toEqual({ ok: false, reason: 'Canvas has no area yet.' });
    expect(store.regenerate()).toEqual({ ok: false, reason: 'Canvas has no area yet.' });
    expect(store.resize(-1, 10)).toEqual({ ok: false, reason: 'Size must be finite and non-negative.' });
  });

  it('spawns on resize and links coincident particles on step', () => {
    const store = createNetworkStore({ random: centred, options: { particleCount: 3 } });
    expect(store.resize(200, 100)).toEqual({ ok: true });

    const spawned = store.getState().particles;
    expect(spawned).toHaveLength(3);
    expect(spawned[0].pos).toEqual({ x: 100, y: 50 });
    expect(spawned[0].size).toBe(2.75);

    expect(store.step()).toEqual({ ok: true });
    const state = store.getState();
    expect(state.connections.edges.map((edge) => [edge.particleA, edge.particleB])).toEqual([
      [0, 1],
      [0, 2],
      [1, 2]
    ]);
    expect(state.diagnostics.frame).toBe(1);
    expect(state.diagnostics.visibleCount).toBe(3);
    expect(state.diagnostics.edgeCount).toBe(3);
    expect(state.diagnostics.rebuilt).toBe(true);
    expect(state.diagnostics.lastBuild).toEqual({ requested: 3, inserted: 3, rejected: 0, grewBounds: false });
    expect(state.diagnostics.cache).toEqual({ size: 3, capacity: 1000, hits: 0, misses: 3 });
    expect(store.getIndex().getStats().pointCount).toBe(3);
  });

  it('skips the network when drawing is off', () => {
    const store = createNetworkStore({ random: centred, options: { particleCount: 3, drawNetwork: false } });
    store.resize(200, 100);
    store.step();
    expect(store.getState().diagnostics.edgeCount).toBe(0);
    expect(store.getState().diagnostics.rebuilt).toBe(false);
  });

  it('links particles to the pointer while touch is on', () => {
    const store = createNetworkStore({ random: centred, options: { particleCount: 3 } });
    store.resize(200, 100);

    store.setPointer({ x: 100, y: 50 });
    store.step();
    expect(store.getState().diagnostics.touchCount).toBe(3);
    expect(store.getState().particles[0].wasAccelerated).toBe(true);

    store.setPointer(null);
    expect(store.getState().touch.edges).toEqual([]);

    store.setOptions({ touchActivation: false });
    store.setPointer({ x: 100, y: 50 });
    store.step();
    expect(store.getState().diagnostics.touchCount).toBe(0);
  });

  it('rejects bad option patches and keeps the previous options', () => {
    const store = createNetworkStore({ random: centred });
    const result = store.setOptions({ particleCount: -1 });

    expect(result).toEqual({ ok: false, reason: 'particleCount must be a non-negative integer' });
    expect(store.getState().options.particleCount).toBe(50);
    expect(store.getState().diagnostics.lastRejectedOptions).toBe('particleCount must be a non-negative integer');

    expect(store.setOptions({ lineDistance: 120 })).toEqual({ ok: true });
    expect(store.getState().diagnostics.lastRejectedOptions).toBeNull();
  });

  it('respawns when the particle count changes and rebuilds tiers when their count changes', () => {
    const store = createNetworkStore({ random: centred, options: { particleCount: 3 } });
    store.resize(200, 100);

    store.setOptions({ particleCount: 5 });
    expect(store.getState().particles).toHaveLength(5);

    store.setOptions({ opacityTiers: 4 });
    expect(store.getState().connections.tiers).toHaveLength(4);
    expect(store.getState().touch.tiers).toHaveLength(4);
  });

  it('keeps adaptive edges equal to brute force while particles move', () => {
    let seed = 11;
    const random = () => {
      seed = (seed * 16807) % 2147483647;
      return seed / 2147483647;
    };
    const store = createNetworkStore({
      random,
      options: { particleCount: 40, maxSpeed: 4, lineDistance: 60, denseFraction: 0, rebuildPolicy: 'adaptive' }
    });
    store.resize(400, 300);

    const pairs = (edges: readonly Edge[]) => edges.map((edge) => `${edge.particleA}-${edge.particleB}`).sort();
    let rebuilds = 0;
    for (let frame = 0; frame < 300; frame += 1) {
      store.step();
      const state = store.getState();
      const positions = state.particles.map((particle) => particle.pos);
      const expected = bruteForceConnections(positions, getVisibleParticleIds(state.particles), 60);
      expect(pairs(state.connections.edges)).toEqual(pairs(expected));
      if (state.diagnostics.rebuilt) {
        rebuilds += 1;
      }
    }
    expect(rebuilds).toBeGreaterThanOrEqual(10);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const store = createNetworkStore({ random: centred });
    let calls = 0;
    const unsubscribe = store.subscribe(() => {
      calls += 1;
    });

    store.resize(200, 100);
    store.resize(200, 100);
    store.setRunning(false);
    store.setRunning(false);
    expect(calls).toBe(2);
    expect(store.getState().running).toBe(false);

    unsubscribe();
    store.setRunning(true);
    expect(calls).toBe(2);
  });
});
