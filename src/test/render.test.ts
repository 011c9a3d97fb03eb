import { describe, expect, it } from 'vitest';

import { isHexColor, parseHexColor, withAlpha } from '../model/color';
import { emptyConnectionFrame } from '../model/connections';
import { QUADTREE_COLOR, renderNetwork } from '../model/render';
import type { NetworkScene } from '../model/render';
import { DEFAULT_NETWORK_OPTIONS } from '../model/store';
import { emptyTouchFrame } from '../model/touch';
import type { Particle } from '../model/types';
import { MockCanvasContext2D } from './canvasMock';

function particleAt(id: number, x: number, y: number, size: number, visible = true): Particle {
  return {
    id,
    pos: { x, y },
    velocity: { x: 0, y: 0 },
    defaultVelocity: { x: 0, y: 0 },
    size,
    wasAccelerated: false,
    visible
  };
}

function scene(fill: boolean): NetworkScene {
  const connections = emptyConnectionFrame(2);
  connections.tiers[1].edges.push({ particleA: 0, particleB: 1, distance: 30 });
  const touch = emptyTouchFrame(2);
  touch.tiers[0].edges.push({ particle: 0, distance: 14 });

  return {
    particles: [particleAt(0, 10, 10, 2), particleAt(1, 40, 10, 3), particleAt(2, 70, 10, 1, false)],
    connections,
    touch,
    pointer: { x: 0, y: 0 },
    boundaries: [{ x: 0, y: 0, width: 100, height: 50 }],
    options: { ...DEFAULT_NETWORK_OPTIONS, showQuadTree: true, opacityTiers: 2, fill }
  };
}

describe('color helpers', () => {
  it('parses short and long hex forms', () => {
    expect(isHexColor('#abc')).toBe(true);
    expect(isHexColor('abc')).toBe(false);
    expect(parseHexColor('#abc')).toEqual([170, 187, 204]);
    expect(parseHexColor('#69f0ae')).toEqual([105, 240, 174]);
  });

  it('formats rgba with a clamped, rounded alpha', () => {
    expect(withAlpha('#000000', 0.12345)).toBe('rgba(0, 0, 0, 0.123)');
    expect(withAlpha('not-a-color', 2)).toBe('rgba(255, 255, 255, 1)');
  });
});

describe('renderNetwork', () => {
  it('draws background, overlay, one stroke per tier and visible particles in order', () => {
    const ctx = new MockCanvasContext2D();
    renderNetwork(ctx, 100, 50, scene(true));

    expect(ctx.__ops).toEqual([
      { type: 'clearRect', x: 0, y: 0, width: 100, height: 50 },
      { type: 'fillRect', x: 0, y: 0, width: 100, height: 50, fillStyle: '#0b0f14' },
      { type: 'beginPath' },
      { type: 'rect', x: 0, y: 0, width: 100, height: 50 },
      { type: 'stroke', strokeStyle: QUADTREE_COLOR, lineWidth: 0.5 },
      { type: 'beginPath' },
      { type: 'moveTo', x: 10, y: 10 },
      { type: 'lineTo', x: 40, y: 10 },
      { type: 'stroke', strokeStyle: 'rgba(105, 240, 174, 0.75)', lineWidth: 1 },
      { type: 'beginPath' },
      { type: 'moveTo', x: 10, y: 10 },
      { type: 'lineTo', x: 0, y: 0 },
      { type: 'stroke', strokeStyle: 'rgba(255, 193, 7, 0.25)', lineWidth: 1 },
      { type: 'beginPath' },
      { type: 'arc', x: 10, y: 10, radius: 2, startAngle: 0, endAngle: Math.PI * 2 },
      { type: 'fill', fillStyle: '#ffffff' },
      { type: 'beginPath' },
      { type: 'arc', x: 40, y: 10, radius: 3, startAngle: 0, endAngle: Math.PI * 2 },
      { type: 'fill', fillStyle: '#ffffff' }
    ]);
  });

  it('outlines particles when fill is off and skips the network when drawing is off', () => {
    const ctx = new MockCanvasContext2D();
    const outlined = scene(false);
    outlined.options = { ...outlined.options, drawNetwork: false, showQuadTree: false };
    outlined.pointer = null;
    renderNetwork(ctx, 100, 50, outlined);

    expect(ctx.__ops.map((op) => op.type)).toEqual([
      'clearRect',
      'fillRect',
      'beginPath',
      'arc',
      'stroke',
      'beginPath',
      'arc',
      'stroke'
    ]);
    expect(ctx.__ops[4]).toEqual({ type: 'stroke', strokeStyle: '#ffffff', lineWidth: 1 });
  });
});
