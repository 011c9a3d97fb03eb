import { describe, expect, it } from 'vitest';

import {
  createRect,
  distance,
  quadrantOf,
  quadrantRect,
  rectContains,
  rectFromBounds,
  rectIntersects,
  rectIntersectsCircle
} from '../model/geometry';

describe('rect helpers', () => {
  it('clamps negative sizes to zero', () => {
    expect(createRect(5, 5, -3, 4)).toEqual({ x: 5, y: 5, width: 0, height: 4 });
    expect(rectFromBounds(10, 10, 0, 30)).toEqual({ x: 10, y: 10, width: 0, height: 20 });
  });

  it('contains points on every edge', () => {
    const rect = createRect(0, 0, 100, 50);
    expect(rectContains(rect, 0, 0)).toBe(true);
    expect(rectContains(rect, 100, 50)).toBe(true);
    expect(rectContains(rect, 100.01, 25)).toBe(false);
    expect(rectContains(rect, 50, -0.01)).toBe(false);
  });

  it('treats a zero-size rect as containing only its corner', () => {
    const point = createRect(3, 4, 0, 0);
    expect(rectContains(point, 3, 4)).toBe(true);
    expect(rectContains(point, 3, 4.001)).toBe(false);
  });

  it('counts touching boxes as intersecting', () => {
    const a = createRect(0, 0, 10, 10);
    expect(rectIntersects(a, createRect(10, 0, 5, 5))).toBe(true);
    expect(rectIntersects(a, createRect(10, 10, 5, 5))).toBe(true);
    expect(rectIntersects(a, createRect(10.5, 0, 5, 5))).toBe(false);
    expect(rectIntersects(a, createRect(2, 2, 1, 1))).toBe(true);
  });

  it('tests circles against the closest point of a box', () => {
    const rect = createRect(0, 0, 10, 10);
    expect(rectIntersectsCircle(rect, 13, 14, 5)).toBe(true);
    expect(rectIntersectsCircle(rect, 13, 14, 4.9)).toBe(false);
    expect(rectIntersectsCircle(rect, 5, 5, 0)).toBe(true);
  });
});

describe('quadrants', () => {
  const rect = createRect(0, 0, 100, 100);

  it('sends midline points to the north and west children', () => {
    expect(quadrantOf(rect, 50, 50)).toBe('nw');
    expect(quadrantOf(rect, 50.1, 50)).toBe('ne');
    expect(quadrantOf(rect, 50, 50.1)).toBe('sw');
    expect(quadrantOf(rect, 75, 75)).toBe('se');
  });

  it('splits a box into four half-size boxes', () => {
    expect(quadrantRect(rect, 'nw')).toEqual({ x: 0, y: 0, width: 50, height: 50 });
    expect(quadrantRect(rect, 'ne')).toEqual({ x: 50, y: 0, width: 50, height: 50 });
    expect(quadrantRect(rect, 'sw')).toEqual({ x: 0, y: 50, width: 50, height: 50 });
    expect(quadrantRect(rect, 'se')).toEqual({ x: 50, y: 50, width: 50, height: 50 });
  });

  it('measures euclidean distance', () => {
    expect(distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
  });
});
