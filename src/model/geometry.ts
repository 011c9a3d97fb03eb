import type { Quadrant, Rect, Vec2 } from './types';

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function createRect(x: number, y: number, width: number, height: number): Rect {
  return {
    x,
    y,
    width: Math.max(0, width),
    height: Math.max(0, height)
  };
}

export function rectFromBounds(minX: number, minY: number, maxX: number, maxY: number): Rect {
  return createRect(minX, minY, maxX - minX, maxY - minY);
}

/** Inclusive on all four edges; a zero-size rect contains only its own corner. */
export function rectContains(rect: Rect, px: number, py: number): boolean {
  return px >= rect.x && px <= rect.x + rect.width && py >= rect.y && py <= rect.y + rect.height;
}

/** Boxes that only touch along an edge or corner intersect. */
export function rectIntersects(a: Rect, b: Rect): boolean {
  return !(
    b.x > a.x + a.width ||
    b.x + b.width < a.x ||
    b.y > a.y + a.height ||
    b.y + b.height < a.y
  );
}

export function rectIntersectsCircle(rect: Rect, cx: number, cy: number, radius: number): boolean {
  const closestX = Math.max(rect.x, Math.min(cx, rect.x + rect.width));
  const closestY = Math.max(rect.y, Math.min(cy, rect.y + rect.height));
  const dx = cx - closestX;
  const dy = cy - closestY;
  return dx * dx + dy * dy <= radius * radius;
}

export function quadrantOf(rect: Rect, px: number, py: number): Quadrant {
  const midX = rect.x + rect.width / 2;
  const midY = rect.y + rect.height / 2;

  if (px <= midX && py <= midY) {
    return 'nw';
  }
  if (px > midX && py <= midY) {
    return 'ne';
  }
  if (px <= midX && py > midY) {
    return 'sw';
  }
  return 'se';
}

export function quadrantRect(rect: Rect, quadrant: Quadrant): Rect {
  const halfWidth = rect.width / 2;
  const halfHeight = rect.height / 2;

  switch (quadrant) {
    case 'nw':
      return createRect(rect.x, rect.y, halfWidth, halfHeight);
    case 'ne':
      return createRect(rect.x + halfWidth, rect.y, halfWidth, halfHeight);
    case 'sw':
      return createRect(rect.x, rect.y + halfHeight, halfWidth, halfHeight);
    case 'se':
      return createRect(rect.x + halfWidth, rect.y + halfHeight, halfWidth, halfHeight);
  }
}
