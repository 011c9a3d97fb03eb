import { isHexColor } from './color';
import {
  DEFAULT_DENSE_FRACTION,
  DEFAULT_OPACITY_TIERS,
  emptyConnectionFrame,
  selectConnections
} from './connections';
import { createDistanceCache } from './distanceCache';
import { DEFAULT_VISIBILITY_MARGIN, createParticles, getVisibleParticleIds, stepParticle } from './particles';
import { createSpatialIndex } from './spatialIndex';
import { DEFAULT_TOUCH_FORCE, applyTouchInteraction, emptyTouchFrame } from './touch';
import type {
  NetworkDiagnostics,
  NetworkOptions,
  NetworkStore,
  NetworkStoreState,
  Result,
  SpatialIndex,
  Vec2
} from './types';

export const MAX_PARTICLE_COUNT = 2000;

export const DEFAULT_NETWORK_OPTIONS: NetworkOptions = {
  particleCount: 50,
  maxSpeed: 0.5,
  maxSize: 3.5,
  lineDistance: 180,
  complexMode: false,
  touchActivation: true,
  drawNetwork: true,
  showQuadTree: false,
  rebuildPolicy: 'always',
  opacityTiers: DEFAULT_OPACITY_TIERS,
  denseFraction: DEFAULT_DENSE_FRACTION,
  visibilityMargin: DEFAULT_VISIBILITY_MARGIN,
  touchForce: DEFAULT_TOUCH_FORCE,
  fill: true,
  lineWidth: 1,
  backgroundColor: '#0b0f14',
  particleColor: '#ffffff',
  lineColor: '#69f0ae',
  touchColor: '#ffc107'
};

export type NetworkStoreConfig = {
  options?: Partial<NetworkOptions>;
  random?: () => number;
};

function isNonNegativeNumber(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/** Returns the first problem with a merged option set, or null when it is usable. */
export function validateOptions(options: NetworkOptions): string | null {
  if (!Number.isInteger(options.particleCount) || options.particleCount < 0) {
    return 'particleCount must be a non-negative integer';
  }
  if (options.particleCount > MAX_PARTICLE_COUNT) {
    return `particleCount must not exceed ${MAX_PARTICLE_COUNT}`;
  }
  if (!isNonNegativeNumber(options.maxSpeed)) {
    return 'maxSpeed must be a finite non-negative number';
  }
  if (!isNonNegativeNumber(options.maxSize)) {
    return 'maxSize must be a finite non-negative number';
  }
  if (!isNonNegativeNumber(options.lineDistance)) {
    return 'lineDistance must be a finite non-negative number';
  }
  if (!Number.isInteger(options.opacityTiers) || options.opacityTiers < 1) {
    return 'opacityTiers must be an integer of at least 1';
  }
  if (!Number.isFinite(options.denseFraction) || options.denseFraction < 0 || options.denseFraction > 1) {
    return 'denseFraction must be between 0 and 1';
  }
  if (!isNonNegativeNumber(options.visibilityMargin)) {
    return 'visibilityMargin must be a finite non-negative number';
  }
  if (!isNonNegativeNumber(options.touchForce)) {
    return 'touchForce must be a finite non-negative number';
  }
  if (!isNonNegativeNumber(options.lineWidth)) {
    return 'lineWidth must be a finite non-negative number';
  }
  if (options.rebuildPolicy !== 'always' && options.rebuildPolicy !== 'adaptive') {
    return 'rebuildPolicy must be "always" or "adaptive"';
  }
  for (const key of ['backgroundColor', 'particleColor', 'lineColor', 'touchColor'] as const) {
    if (!isHexColor(options[key])) {
      return `${key} must be a hex color`;
    }
  }
  return null;
}

function createDiagnostics(index: SpatialIndex): NetworkDiagnostics {
  return {
    frame: 0,
    visibleCount: 0,
    edgeCount: 0,
    cappedCount: 0,
    touchCount: 0,
    rebuilt: false,
    lastBuild: null,
    tree: index.getStats(),
    cache: { size: 0, capacity: 0, hits: 0, misses: 0 },
    lastRejectedOptions: null
  };
}

export function createNetworkStore(config: NetworkStoreConfig = {}): NetworkStore {
  const random = config.random ?? Math.random;
  const listeners = new Set<() => void>();
  const initialOptions: NetworkOptions = { ...DEFAULT_NETWORK_OPTIONS, ...config.options };
  const initialProblem = validateOptions(initialOptions);
  const options = initialProblem ? { ...DEFAULT_NETWORK_OPTIONS } : initialOptions;

  let index = createSpatialIndex({ rebuildPolicy: options.rebuildPolicy });
  const cache = createDistanceCache();

  const state: NetworkStoreState = {
    particles: [],
    options,
    bounds: { width: 0, height: 0 },
    pointer: null,
    running: true,
    connections: emptyConnectionFrame(options.opacityTiers),
    touch: emptyTouchFrame(options.opacityTiers),
    diagnostics: createDiagnostics(index)
  };
  state.diagnostics.lastRejectedOptions = initialProblem;

  const notify = (): void => {
    for (const listener of listeners) {
      listener();
    }
  };

  const resetFrames = (): void => {
    state.connections = emptyConnectionFrame(state.options.opacityTiers);
    state.touch = emptyTouchFrame(state.options.opacityTiers);
  };

  const spawn = (): void => {
    state.particles = createParticles(state.options.particleCount, state.bounds, state.options, random);
    index = createSpatialIndex({ rebuildPolicy: state.options.rebuildPolicy });
    cache.reset();
    cache.updateCapacity(state.particles.length);
    resetFrames();
  };

  const step = (): Result => {
    const { bounds } = state;
    if (bounds.width <= 0 || bounds.height <= 0) {
      return { ok: false, reason: 'Canvas has no area yet.' };
    }

    const opts = state.options;
    for (const particle of state.particles) {
      stepParticle(particle, bounds, opts.visibilityMargin);
    }

    const visibleIds = getVisibleParticleIds(state.particles);
    const positions: Vec2[] = state.particles.map((particle) => particle.pos);

    state.touch =
      state.pointer && opts.touchActivation
        ? applyTouchInteraction(
            state.particles,
            visibleIds,
            state.pointer,
            cache,
            opts.lineDistance,
            opts.opacityTiers,
            opts.touchForce
          )
        : emptyTouchFrame(opts.opacityTiers);

    cache.reset();
    let rebuilt = false;
    if (opts.drawNetwork) {
      rebuilt = index.update(positions, visibleIds);
      state.connections = selectConnections({
        positions,
        visibleIds,
        index,
        cache,
        options: {
          lineDistance: opts.lineDistance,
          complexMode: opts.complexMode,
          denseFraction: opts.denseFraction,
          opacityTiers: opts.opacityTiers
        }
      });
    } else {
      state.connections = emptyConnectionFrame(opts.opacityTiers);
    }

    const diagnostics = state.diagnostics;
    diagnostics.frame += 1;
    diagnostics.visibleCount = visibleIds.length;
    diagnostics.edgeCount = state.connections.edges.length;
    diagnostics.cappedCount = state.connections.stats.capped;
    diagnostics.touchCount = state.touch.edges.length;
    diagnostics.rebuilt = rebuilt;
    diagnostics.lastBuild = index.getLastBuildReport();
    diagnostics.tree = index.getStats();
    diagnostics.cache = cache.getStats();

    notify();
    return { ok: true };
  };

  return {
    getState() {
      return state;
    },

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    resize(width, height) {
      if (!Number.isFinite(width) || !Number.isFinite(height) || width < 0 || height < 0) {
        return { ok: false, reason: 'Size must be finite and non-negative.' };
      }
      if (state.bounds.width === width && state.bounds.height === height) {
        return { ok: true };
      }
      state.bounds = { width, height };
      spawn();
      notify();
      return { ok: true };
    },

    setPointer(point) {
      state.pointer = point ? { x: point.x, y: point.y } : null;
      if (!state.pointer) {
        state.touch = emptyTouchFrame(state.options.opacityTiers);
      }
      notify();
    },

    setRunning(running) {
      if (state.running === running) {
        return;
      }
      state.running = running;
      notify();
    },

    setOptions(patch) {
      const next: NetworkOptions = { ...state.options, ...patch };
      const problem = validateOptions(next);
      if (problem) {
        state.diagnostics.lastRejectedOptions = problem;
        notify();
        return { ok: false, reason: problem };
      }

      const previous = state.options;
      state.options = next;
      state.diagnostics.lastRejectedOptions = null;

      if (
        next.particleCount !== previous.particleCount ||
        next.maxSpeed !== previous.maxSpeed ||
        next.maxSize !== previous.maxSize ||
        next.rebuildPolicy !== previous.rebuildPolicy
      ) {
        spawn();
      } else if (next.opacityTiers !== previous.opacityTiers) {
        resetFrames();
      }
      notify();
      return { ok: true };
    },

    regenerate() {
      if (state.bounds.width <= 0 || state.bounds.height <= 0) {
        return { ok: false, reason: 'Canvas has no area yet.' };
      }
      spawn();
      notify();
      return { ok: true };
    },

    step,

    getIndex() {
      return index;
    }
  };
}
