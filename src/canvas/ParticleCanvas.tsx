import { useCallback, useEffect, useRef, useState } from 'react';
import type { PointerEvent as ReactPointerEvent } from 'react';

import { renderNetwork } from '../model/render';
import type { NetworkStore, NetworkStoreState, Vec2 } from '../model/types';

type ParticleCanvasProps = {
  store: NetworkStore;
  state: NetworkStoreState;
  renderNonce: number;
};

function getCanvasPoint(event: ReactPointerEvent<HTMLCanvasElement>, canvas: HTMLCanvasElement): Vec2 {
  const rect = canvas.getBoundingClientRect();
  return {
    x: event.clientX - rect.left,
    y: event.clientY - rect.top
  };
}

export function ParticleCanvas({ store, state, renderNonce }: ParticleCanvasProps): JSX.Element {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const activePointerIdRef = useRef<number | null>(null);
  const [viewport, setViewport] = useState({ width: 0, height: 0 });

  const resizeCanvas = useCallback(() => {
    const canvas = canvasRef.current;
    if (!canvas) {
      return;
    }

    const rect = canvas.getBoundingClientRect();
    const cssWidth = Math.max(1, Math.round(rect.width || 900));
    const cssHeight = Math.max(1, Math.round(rect.height || 600));
    const dpr = window.devicePixelRatio || 1;

    canvas.width = Math.round(cssWidth * dpr);
    canvas.height = Math.round(cssHeight * dpr);

    const ctx = canvas.getContext('2d');
    if (ctx) {
      ctx.setTransform(dpr, 0, 0, dpr, 0, 0);
    }

    setViewport((prev) => {
      if (prev.width === cssWidth && prev.height === cssHeight) {
        return prev;
      }
      return {
        width: cssWidth,
        height: cssHeight
      };
    });
    store.resize(cssWidth, cssHeight);
  }, [store]);

  useEffect(() => {
    resizeCanvas();
    window.addEventListener('resize', resizeCanvas);
    return () => {
      window.removeEventListener('resize', resizeCanvas);
    };
  }, [resizeCanvas]);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) {
      return;
    }

    const ctx = canvas.getContext('2d');
    if (!ctx) {
      return;
    }

    renderNetwork(ctx, viewport.width, viewport.height, {
      particles: state.particles,
      connections: state.connections,
      touch: state.touch,
      pointer: state.options.touchActivation ? state.pointer : null,
      boundaries: state.options.showQuadTree ? store.getIndex().getBoundaries() : [],
      options: state.options
    });
  }, [store, state, viewport.width, viewport.height, renderNonce]);

  const handlePointerDown = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      const canvas = canvasRef.current;
      if (!canvas) {
        return;
      }
      if (event.button !== 0) {
        return;
      }

      activePointerIdRef.current = event.pointerId;
      canvas.setPointerCapture(event.pointerId);
      store.setPointer(getCanvasPoint(event, canvas));
    },
    [store]
  );

  const handlePointerMove = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      const canvas = canvasRef.current;
      if (!canvas) {
        return;
      }
      if (activePointerIdRef.current !== event.pointerId) {
        return;
      }
      store.setPointer(getCanvasPoint(event, canvas));
    },
    [store]
  );

  const finishInteraction = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      const canvas = canvasRef.current;
      if (!canvas) {
        return;
      }
      if (activePointerIdRef.current !== event.pointerId) {
        return;
      }

      canvas.releasePointerCapture(event.pointerId);
      activePointerIdRef.current = null;
      store.setPointer(null);
    },
    [store]
  );

  return (
    <canvas
      ref={canvasRef}
      data-testid="particle-canvas"
      className="particle-canvas"
      onPointerDown={handlePointerDown}
      onPointerMove={handlePointerMove}
      onPointerUp={finishInteraction}
      onPointerCancel={finishInteraction}
    />
  );
}
