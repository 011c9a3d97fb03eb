import { rectContains, rectFromBounds } from './geometry';
import { CompressedQuadTreeNode } from './quadTreeNode';
import type {
  BuildReport,
  IndexStats,
  IndexedPoint,
  Rect,
  RebuildPolicy,
  SpatialIndex,
  TreeStats,
  Vec2
} from './types';

export const BOUNDS_PADDING_RATIO = 0.15;
export const MIN_BOUNDS_PADDING = 1;
export const REBUILD_DEPTH_CEILING = 12;
export const MIN_COMPRESSION_RATIO = 0.1;
export const MAX_SPARSITY_RATIO = 0.7;
export const AUTO_REBALANCE_COMPRESSION_RATIO = 0.2;
const MORTON_SCALE = 1000;
const MORTON_BITS = 16;

export type SpatialIndexOptions = {
  rebuildPolicy: RebuildPolicy;
  /** Largest distance a live point may move from its indexed position before an adaptive rebuild. */
  staleTolerance: number;
  /** Frames an adaptive index may be reused before it is rebuilt regardless. */
  maxStaleFrames: number;
  /** Queries plus inserts between automatic optimization passes. */
  optimizationInterval: number;
};

export const DEFAULT_SPATIAL_INDEX_OPTIONS: SpatialIndexOptions = {
  rebuildPolicy: 'always',
  staleTolerance: 8,
  maxStaleFrames: 30,
  optimizationInterval: 1000
};

function emptyStats(): IndexStats {
  return {
    nodeCount: 0,
    leafCount: 0,
    pointCount: 0,
    maxDepthSeen: 0,
    compressedNodeCount: 0,
    sparseNodeCount: 0,
    compressionRatio: 0,
    sparsityRatio: 0,
    queryCount: 0,
    insertCount: 0,
    avgQueriesPerNode: 0,
    drift: 0,
    optimizationRuns: 0,
    rebalanceRuns: 0
  };
}

function isLiveId(positions: readonly Vec2[], id: number): boolean {
  return Number.isInteger(id) && id >= 0 && id < positions.length;
}

/**
 * Tight box around the live points, padded by a share of the average side so a
 * point drifting just past the edge next frame still fits.
 */
export function deriveWorldBounds(positions: readonly Vec2[], liveIds: readonly number[]): Rect {
  let minX = Number.POSITIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;
  let seen = 0;

  for (const id of liveIds) {
    if (!isLiveId(positions, id)) {
      continue;
    }
    const { x, y } = positions[id];
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      continue;
    }
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
    seen += 1;
  }

  if (seen === 0) {
    return rectFromBounds(-1, -1, 1, 1);
  }

  const width = maxX - minX;
  const height = maxY - minY;
  const padding = Math.max((width + height) / 2 * BOUNDS_PADDING_RATIO, MIN_BOUNDS_PADDING);

  if (width < padding) {
    const center = minX + width / 2;
    minX = center - padding / 2;
    maxX = center + padding / 2;
  }
  if (height < padding) {
    const center = minY + height / 2;
    minY = center - padding / 2;
    maxY = center + padding / 2;
  }

  return rectFromBounds(minX - padding, minY - padding, maxX + padding, maxY + padding);
}

/** Interleaves the low bits of the scaled coordinates so nearby queries sort together. */
export function mortonCode(x: number, y: number): number {
  const ix = Math.trunc(x * MORTON_SCALE) & 0xffff;
  const iy = Math.trunc(y * MORTON_SCALE) & 0xffff;
  let code = 0;
  for (let bit = 0; bit < MORTON_BITS; bit += 1) {
    code += ((ix >> bit) & 1) * 2 ** (2 * bit);
    code += ((iy >> bit) & 1) * 2 ** (2 * bit + 1);
  }
  return code;
}

export function createSpatialIndex(opts: Partial<SpatialIndexOptions> = {}): SpatialIndex {
  const options: SpatialIndexOptions = { ...DEFAULT_SPATIAL_INDEX_OPTIONS, ...opts };
  let root: CompressedQuadTreeNode | null = null;
  let worldBounds: Rect | null = null;
  let built = false;
  let needsRebalancing = false;
  let queryCount = 0;
  let insertCount = 0;
  let indexedCount = 0;
  let lastBuild: BuildReport | null = null;
  let snapshot = new Map<number, Vec2>();
  let drift = 0;
  let framesSinceBuild = 0;
  let optimizationRuns = 0;
  let rebalanceRuns = 0;

  const initialize = (minX: number, minY: number, maxX: number, maxY: number): void => {
    worldBounds = rectFromBounds(minX, minY, maxX, maxY);
    root = new CompressedQuadTreeNode(worldBounds);
    built = false;
    needsRebalancing = false;
    queryCount = 0;
    insertCount = 0;
    indexedCount = 0;
  };

  const fillTree = (tree: CompressedQuadTreeNode, positions: readonly Vec2[], liveIds: readonly number[]) => {
    tree.clear();
    snapshot = new Map<number, Vec2>();
    let inserted = 0;
    for (const id of liveIds) {
      if (!isLiveId(positions, id)) {
        continue;
      }
      const point: IndexedPoint = { id, x: positions[id].x, y: positions[id].y };
      if (tree.insert(point)) {
        snapshot.set(id, { x: point.x, y: point.y });
        inserted += 1;
      }
    }
    tree.optimizeMemory();
    return inserted;
  };

  const buildFromSnapshot = (positions: readonly Vec2[], liveIds: readonly number[]): BuildReport => {
    if (!root) {
      const bounds = deriveWorldBounds(positions, liveIds);
      initialize(bounds.x, bounds.y, bounds.x + bounds.width, bounds.y + bounds.height);
    }

    let tree = root ?? new CompressedQuadTreeNode(rectFromBounds(-1, -1, 1, 1));
    let inserted = fillTree(tree, positions, liveIds);
    let grewBounds = false;

    const insertable = liveIds.filter((id) => isLiveId(positions, id)).length;
    if (inserted < insertable) {
      const current = worldBounds;
      const bounds = deriveWorldBounds(positions, liveIds);
      const escaped = liveIds.some((id) => {
        if (!isLiveId(positions, id) || current === null) {
          return false;
        }
        const { x, y } = positions[id];
        return Number.isFinite(x) && Number.isFinite(y) && !rectContains(current, x, y);
      });
      if (escaped) {
        const counters = { queryCount, insertCount };
        initialize(bounds.x, bounds.y, bounds.x + bounds.width, bounds.y + bounds.height);
        queryCount = counters.queryCount;
        insertCount = counters.insertCount;
        tree = root ?? tree;
        inserted = fillTree(tree, positions, liveIds);
        grewBounds = true;
      }
    }

    insertCount += inserted;
    indexedCount = liveIds.length;
    built = true;
    needsRebalancing = false;
    drift = 0;
    framesSinceBuild = 0;
    lastBuild = {
      requested: liveIds.length,
      inserted,
      rejected: liveIds.length - inserted,
      grewBounds
    };
    return lastBuild;
  };

  const getTreeStats = (): TreeStats | null => (root ? root.getStats() : null);

  const shouldRebuild = (): boolean => {
    if (needsRebalancing) {
      return true;
    }
    const stats = getTreeStats();
    if (!stats) {
      return true;
    }
    return (
      stats.maxDepthSeen > REBUILD_DEPTH_CEILING ||
      stats.compressionRatio < MIN_COMPRESSION_RATIO ||
      stats.sparsityRatio > MAX_SPARSITY_RATIO
    );
  };

  /**
   * Largest distance any live point has moved since it was indexed. Infinite when a
   * live point was never indexed or has left the world bounds.
   */
  const measureDrift = (positions: readonly Vec2[], liveIds: readonly number[]): number => {
    let largest = 0;
    for (const id of liveIds) {
      if (!isLiveId(positions, id)) {
        continue;
      }
      const indexed = snapshot.get(id);
      const { x, y } = positions[id];
      if (!indexed || worldBounds === null || !rectContains(worldBounds, x, y)) {
        return Number.POSITIVE_INFINITY;
      }
      largest = Math.max(largest, Math.hypot(x - indexed.x, y - indexed.y));
    }
    return largest;
  };

  const checkAutoOptimization = (): void => {
    if (!root || queryCount + insertCount < options.optimizationInterval) {
      return;
    }
    const stats = root.getStats();
    if (stats.compressionRatio < AUTO_REBALANCE_COMPRESSION_RATIO && queryCount > insertCount) {
      root.rebalance();
      rebalanceRuns += 1;
    }
    root.optimizeMemory();
    optimizationRuns += 1;
    queryCount = 0;
    insertCount = 0;
  };

  const queryCircle = (centerX: number, centerY: number, radius: number): number[] => {
    if (!root) {
      return [];
    }
    queryCount += 1;
    return root.queryCircle(centerX, centerY, radius).map((point) => point.id);
  };

  return {
    get isInitialized() {
      return root !== null;
    },

    initialize,

    buildFromSnapshot,

    update(positions, liveIds) {
      let rebuild =
        !built ||
        options.rebuildPolicy === 'always' ||
        liveIds.length !== indexedCount ||
        (lastBuild !== null && lastBuild.rejected > 0) ||
        framesSinceBuild >= options.maxStaleFrames;

      if (!rebuild) {
        drift = measureDrift(positions, liveIds);
        rebuild = drift > options.staleTolerance || shouldRebuild();
      }

      if (rebuild) {
        buildFromSnapshot(positions, liveIds);
      } else {
        framesSinceBuild += 1;
        root?.optimizeMemory();
      }

      if (options.rebuildPolicy === 'adaptive') {
        checkAutoOptimization();
      }
      return rebuild;
    },

    getDrift() {
      return drift;
    },

    shouldRebuild,

    markForRebalance() {
      needsRebalancing = true;
    },

    queryCircle,

    queryRectangle(x, y, width, height) {
      if (!root) {
        return [];
      }
      queryCount += 1;
      return root.queryRange(rectFromBounds(x, y, x + width, y + height)).map((point) => point.id);
    },

    findNearby(x, y, radius) {
      return queryCircle(x, y, radius);
    },

    getCollisionCandidates(id, positions, radius) {
      if (!root || !isLiveId(positions, id)) {
        return [];
      }
      const target = positions[id];
      return queryCircle(target.x, target.y, radius).filter((other) => other !== id);
    },

    batchQuery(queries) {
      const order = queries.map((query, position) => ({ query, position, code: mortonCode(query.x, query.y) }));
      order.sort((a, b) => a.code - b.code);

      const results: number[][] = new Array<number[]>(queries.length);
      for (const entry of order) {
        results[entry.position] = queryCircle(entry.query.x, entry.query.y, entry.query.radius);
      }
      return results;
    },

    getAllIds() {
      return root ? root.getAllPoints().map((point) => point.id) : [];
    },

    getStats() {
      const stats = getTreeStats();
      if (!stats) {
        return emptyStats();
      }
      return {
        ...stats,
        queryCount,
        insertCount,
        avgQueriesPerNode: queryCount / Math.max(1, stats.nodeCount),
        drift,
        optimizationRuns,
        rebalanceRuns
      };
    },

    getWorldBounds() {
      return worldBounds;
    },

    getBoundaries() {
      return root ? root.collectBoundaries() : [];
    },

    getLastBuildReport() {
      return lastBuild;
    },

    optimize() {
      root?.optimizeMemory();
    },

    rebalance() {
      root?.rebalance();
      needsRebalancing = false;
    },

    clear() {
      root?.clear();
      built = false;
      indexedCount = 0;
    }
  };
}
