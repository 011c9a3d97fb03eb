export type Vec2 = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

/** Axis-aligned box, left/top origin. Never mutated once created. */
export type Rect = {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
};

/** Read-only snapshot of a particle position taken when the tree is built. */
export type IndexedPoint = {
  readonly id: number;
  readonly x: number;
  readonly y: number;
};

export type Quadrant = 'nw' | 'ne' | 'sw' | 'se';

export type TreeStats = {
  nodeCount: number;
  leafCount: number;
  pointCount: number;
  maxDepthSeen: number;
  compressedNodeCount: number;
  sparseNodeCount: number;
  compressionRatio: number;
  sparsityRatio: number;
};

export type IndexStats = TreeStats & {
  queryCount: number;
  insertCount: number;
  avgQueriesPerNode: number;
  drift: number;
  optimizationRuns: number;
  rebalanceRuns: number;
};

export type BuildReport = {
  requested: number;
  inserted: number;
  rejected: number;
  grewBounds: boolean;
};

export type CircleQuery = {
  x: number;
  y: number;
  radius: number;
};

export type RebuildPolicy = 'always' | 'adaptive';

export interface SpatialIndex {
  readonly isInitialized: boolean;
  initialize(minX: number, minY: number, maxX: number, maxY: number): void;
  buildFromSnapshot(positions: readonly Vec2[], liveIds: readonly number[]): BuildReport;
  update(positions: readonly Vec2[], liveIds: readonly number[]): boolean;
  /** How far indexed points may lag their live positions; widen queries by this much. */
  getDrift(): number;
  shouldRebuild(): boolean;
  markForRebalance(): void;
  queryCircle(centerX: number, centerY: number, radius: number): number[];
  queryRectangle(x: number, y: number, width: number, height: number): number[];
  findNearby(x: number, y: number, radius: number): number[];
  getCollisionCandidates(id: number, positions: readonly Vec2[], radius: number): number[];
  batchQuery(queries: readonly CircleQuery[]): number[][];
  getAllIds(): number[];
  getStats(): IndexStats;
  getWorldBounds(): Rect | null;
  getBoundaries(): Rect[];
  getLastBuildReport(): BuildReport | null;
  optimize(): void;
  rebalance(): void;
  clear(): void;
}

/** Edge between two particles, transient within one frame. */
export type Edge = {
  particleA: number;
  particleB: number;
  distance: number;
};

export type OpacityTier<T> = {
  tier: number;
  opacity: number;
  edges: T[];
};

export type SelectionStats = {
  queried: number;
  candidates: number;
  accepted: number;
  capped: number;
};

export type ConnectionFrame = {
  edges: Edge[];
  tiers: OpacityTier<Edge>[];
  stats: SelectionStats;
};

export type TouchEdge = {
  particle: number;
  distance: number;
};

export type TouchFrame = {
  edges: TouchEdge[];
  tiers: OpacityTier<TouchEdge>[];
};

export type Particle = {
  id: number;
  pos: Vec2;
  velocity: Vec2;
  defaultVelocity: Vec2;
  size: number;
  wasAccelerated: boolean;
  visible: boolean;
};

export type NetworkOptions = {
  particleCount: number;
  maxSpeed: number;
  maxSize: number;
  lineDistance: number;
  complexMode: boolean;
  touchActivation: boolean;
  drawNetwork: boolean;
  showQuadTree: boolean;
  rebuildPolicy: RebuildPolicy;
  opacityTiers: number;
  denseFraction: number;
  visibilityMargin: number;
  touchForce: number;
  fill: boolean;
  lineWidth: number;
  backgroundColor: string;
  particleColor: string;
  lineColor: string;
  touchColor: string;
};

export type CacheStats = {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
};

export type NetworkDiagnostics = {
  frame: number;
  visibleCount: number;
  edgeCount: number;
  cappedCount: number;
  touchCount: number;
  rebuilt: boolean;
  lastBuild: BuildReport | null;
  tree: IndexStats;
  cache: CacheStats;
  lastRejectedOptions: string | null;
};

export type Result = {
  ok: boolean;
  reason?: string;
};

export type NetworkStoreState = {
  particles: Particle[];
  options: NetworkOptions;
  bounds: Size;
  pointer: Vec2 | null;
  running: boolean;
  connections: ConnectionFrame;
  touch: TouchFrame;
  diagnostics: NetworkDiagnostics;
};

export interface NetworkStore {
  getState(): NetworkStoreState;
  subscribe(listener: () => void): () => void;
  resize(width: number, height: number): Result;
  setPointer(point: Vec2 | null): void;
  setRunning(running: boolean): void;
  setOptions(patch: Partial<NetworkOptions>): Result;
  regenerate(): Result;
  step(): Result;
  getIndex(): SpatialIndex;
}
