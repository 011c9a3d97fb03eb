import {
  quadrantOf,
  quadrantRect,
  rectContains,
  rectIntersects,
  rectIntersectsCircle
} from './geometry';
import type { IndexedPoint, Quadrant, Rect, TreeStats } from './types';

export const NODE_CAPACITY = 2;
export const MAX_TREE_DEPTH = 13;

export const QUADRANTS: readonly Quadrant[] = ['nw', 'ne', 'sw', 'se'];

const QUADRANT_SLOT: Record<Quadrant, number> = {
  nw: 0,
  ne: 1,
  sw: 2,
  se: 3
};

type ChildSlots = [
  CompressedQuadTreeNode | null,
  CompressedQuadTreeNode | null,
  CompressedQuadTreeNode | null,
  CompressedQuadTreeNode | null
];

/**
 * Quadtree node with path compression.
 *
 * Children live in four fixed slots (NW, NE, SW, SE); a slot stays empty until a
 * point lands in that quadrant. When every point of an overflowing leaf falls in
 * one quadrant only that child is created, tagged with the quadrant path that led
 * to it, so clustered points form a chain instead of a fan of empty siblings.
 */
export class CompressedQuadTreeNode {
  readonly boundary: Rect;

  readonly depth: number;

  /** Quadrant tags from the nearest uncompressed ancestor; null for nodes made by a full split. */
  readonly compressedPath: readonly Quadrant[] | null;

  private points: IndexedPoint[] = [];

  private children: ChildSlots = [null, null, null, null];

  private childCount = 0;

  constructor(boundary: Rect, depth = 0, compressedPath: readonly Quadrant[] | null = null) {
    this.boundary = boundary;
    this.depth = depth;
    this.compressedPath = compressedPath;
  }

  get isLeaf(): boolean {
    return this.childCount === 0;
  }

  get isCompressed(): boolean {
    return this.compressedPath !== null;
  }

  get pointCount(): number {
    return this.points.length;
  }

  getPoints(): readonly IndexedPoint[] {
    return this.points;
  }

  getChild(quadrant: Quadrant): CompressedQuadTreeNode | null {
    return this.children[QUADRANT_SLOT[quadrant]];
  }

  getChildren(): CompressedQuadTreeNode[] {
    const out: CompressedQuadTreeNode[] = [];
    for (const child of this.children) {
      if (child) {
        out.push(child);
      }
    }
    return out;
  }

  insert(point: IndexedPoint): boolean {
    if (!rectContains(this.boundary, point.x, point.y)) {
      return false;
    }

    if (this.isLeaf && this.points.length < NODE_CAPACITY) {
      this.points.push(point);
      return true;
    }

    if (this.isLeaf && this.depth < MAX_TREE_DEPTH) {
      this.subdivide(point);
    }

    if (!this.isLeaf) {
      return this.insertIntoChild(point);
    }

    // Depth ceiling: capacity no longer applies.
    this.points.push(point);
    return true;
  }

  queryRange(range: Rect, found: IndexedPoint[] = []): IndexedPoint[] {
    if (!rectIntersects(this.boundary, range)) {
      return found;
    }

    for (const point of this.points) {
      if (rectContains(range, point.x, point.y)) {
        found.push(point);
      }
    }

    for (const child of this.children) {
      if (child) {
        child.queryRange(range, found);
      }
    }

    return found;
  }

  queryCircle(centerX: number, centerY: number, radius: number, found: IndexedPoint[] = []): IndexedPoint[] {
    if (radius < 0 || !rectIntersectsCircle(this.boundary, centerX, centerY, radius)) {
      return found;
    }

    const radiusSq = radius * radius;
    for (const point of this.points) {
      const dx = point.x - centerX;
      const dy = point.y - centerY;
      if (dx * dx + dy * dy <= radiusSq) {
        found.push(point);
      }
    }

    for (const child of this.children) {
      if (child) {
        child.queryCircle(centerX, centerY, radius, found);
      }
    }

    return found;
  }

  getAllPoints(out: IndexedPoint[] = []): IndexedPoint[] {
    for (const point of this.points) {
      out.push(point);
    }
    for (const child of this.children) {
      if (child) {
        child.getAllPoints(out);
      }
    }
    return out;
  }

  collectBoundaries(out: Rect[] = []): Rect[] {
    out.push(this.boundary);
    for (const child of this.children) {
      if (child) {
        child.collectBoundaries(out);
      }
    }
    return out;
  }

  clear(): void {
    this.points = [];
    this.children = [null, null, null, null];
    this.childCount = 0;
  }

  getStats(): TreeStats {
    const stats = this.accumulateStats({
      nodeCount: 0,
      leafCount: 0,
      pointCount: 0,
      maxDepthSeen: 0,
      compressedNodeCount: 0,
      sparseNodeCount: 0,
      compressionRatio: 0,
      sparsityRatio: 0
    });
    stats.compressionRatio = stats.compressedNodeCount / stats.nodeCount;
    stats.sparsityRatio = stats.sparseNodeCount / stats.nodeCount;
    return stats;
  }

  /** Drops child slots holding empty leaves. Surviving points never move. */
  optimizeMemory(): void {
    for (let slot = 0; slot < this.children.length; slot += 1) {
      const child = this.children[slot];
      if (!child) {
        continue;
      }
      child.optimizeMemory();
      if (child.isLeaf && child.points.length === 0) {
        this.children[slot] = null;
        this.childCount -= 1;
      }
    }
  }

  rebalance(): void {
    if (this.isLeaf) {
      return;
    }

    const all = this.getAllPoints();
    this.clear();
    for (const point of all) {
      this.insert(point);
    }
  }

  private accumulateStats(stats: TreeStats): TreeStats {
    stats.nodeCount += 1;
    if (this.isLeaf) {
      stats.leafCount += 1;
    } else if (this.childCount < QUADRANTS.length) {
      stats.sparseNodeCount += 1;
    }
    if (this.isCompressed) {
      stats.compressedNodeCount += 1;
    }
    stats.pointCount += this.points.length;
    stats.maxDepthSeen = Math.max(stats.maxDepthSeen, this.depth);

    for (const child of this.children) {
      if (child) {
        child.accumulateStats(stats);
      }
    }
    return stats;
  }

  private subdivide(incoming: IndexedPoint): void {
    const target = quadrantOf(this.boundary, incoming.x, incoming.y);
    const sameQuadrant = this.points.every(
      (point) => quadrantOf(this.boundary, point.x, point.y) === target
    );

    if (sameQuadrant) {
      const child = this.createChild(target, true);
      const moved = this.points;
      this.points = [];
      for (const point of moved) {
        if (!child.insert(point)) {
          this.points.push(point);
        }
      }
      return;
    }

    for (const quadrant of QUADRANTS) {
      this.createChild(quadrant, false);
    }

    const moved = this.points;
    this.points = [];
    for (const point of moved) {
      let placed = false;
      for (const child of this.children) {
        if (child && child.insert(point)) {
          placed = true;
          break;
        }
      }
      if (!placed) {
        this.points.push(point);
      }
    }
  }

  private insertIntoChild(point: IndexedPoint): boolean {
    const quadrant = quadrantOf(this.boundary, point.x, point.y);
    const child = this.children[QUADRANT_SLOT[quadrant]] ?? this.createChild(quadrant, true);
    if (child.insert(point)) {
      return true;
    }

    // Rounding at the far edge can leave a point the parent contains outside every child.
    this.points.push(point);
    return true;
  }

  private createChild(quadrant: Quadrant, compressed: boolean): CompressedQuadTreeNode {
    const path = compressed ? [...(this.compressedPath ?? []), quadrant] : null;
    const child = new CompressedQuadTreeNode(
      quadrantRect(this.boundary, quadrant),
      this.depth + 1,
      path
    );
    const slot = QUADRANT_SLOT[quadrant];
    if (!this.children[slot]) {
      this.childCount += 1;
    }
    this.children[slot] = child;
    return child;
  }
}
