import { withAlpha } from './color';
import type { ConnectionFrame, NetworkOptions, Particle, Rect, TouchFrame, Vec2 } from './types';

export const QUADTREE_COLOR = 'rgba(255, 255, 255, 0.15)';
export const QUADTREE_LINE_WIDTH = 0.5;

export type NetworkCanvasContext = Pick<
  CanvasRenderingContext2D,
  | 'clearRect'
  | 'fillRect'
  | 'beginPath'
  | 'rect'
  | 'moveTo'
  | 'lineTo'
  | 'arc'
  | 'fill'
  | 'stroke'
  | 'fillStyle'
  | 'strokeStyle'
  | 'lineWidth'
>;

export type NetworkScene = {
  particles: readonly Particle[];
  connections: ConnectionFrame;
  touch: TouchFrame;
  pointer: Vec2 | null;
  boundaries: readonly Rect[];
  options: NetworkOptions;
};

/**
 * Paints one frame. Edges are stroked one opacity tier at a time, so a frame
 * costs at most one stroke() per non-empty tier however many edges it has.
 */
export function renderNetwork(
  ctx: NetworkCanvasContext,
  width: number,
  height: number,
  scene: NetworkScene
): void {
  const { options } = scene;

  ctx.clearRect(0, 0, width, height);
  ctx.fillStyle = options.backgroundColor;
  ctx.fillRect(0, 0, width, height);

  if (options.showQuadTree && scene.boundaries.length > 0) {
    ctx.beginPath();
    for (const rect of scene.boundaries) {
      ctx.rect(rect.x, rect.y, rect.width, rect.height);
    }
    ctx.strokeStyle = QUADTREE_COLOR;
    ctx.lineWidth = QUADTREE_LINE_WIDTH;
    ctx.stroke();
  }

  if (options.drawNetwork) {
    for (const tier of scene.connections.tiers) {
      if (tier.edges.length === 0) {
        continue;
      }
      ctx.beginPath();
      for (const edge of tier.edges) {
        const a = scene.particles[edge.particleA]?.pos;
        const b = scene.particles[edge.particleB]?.pos;
        if (!a || !b) {
          continue;
        }
        ctx.moveTo(a.x, a.y);
        ctx.lineTo(b.x, b.y);
      }
      ctx.strokeStyle = withAlpha(options.lineColor, tier.opacity);
      ctx.lineWidth = options.lineWidth;
      ctx.stroke();
    }
  }

  const pointer = scene.pointer;
  if (pointer) {
    for (const tier of scene.touch.tiers) {
      if (tier.edges.length === 0) {
        continue;
      }
      ctx.beginPath();
      for (const edge of tier.edges) {
        const p = scene.particles[edge.particle]?.pos;
        if (!p) {
          continue;
        }
        ctx.moveTo(p.x, p.y);
        ctx.lineTo(pointer.x, pointer.y);
      }
      ctx.strokeStyle = withAlpha(options.touchColor, tier.opacity);
      ctx.lineWidth = options.lineWidth;
      ctx.stroke();
    }
  }

  for (const particle of scene.particles) {
    if (!particle.visible) {
      continue;
    }
    ctx.beginPath();
    ctx.arc(particle.pos.x, particle.pos.y, particle.size, 0, Math.PI * 2);
    if (options.fill) {
      ctx.fillStyle = options.particleColor;
      ctx.fill();
    } else {
      ctx.strokeStyle = options.particleColor;
      ctx.lineWidth = options.lineWidth;
      ctx.stroke();
    }
  }
}
