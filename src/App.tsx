import { useEffect, useRef, useState } from 'react';

import { ParticleCanvas } from './canvas/ParticleCanvas';
import { createNetworkStore } from './model/store';
import type { NetworkOptions, NetworkStore } from './model/types';
import { Toolbar } from './ui/Toolbar';

type AppProps = {
  store?: NetworkStore;
};

function useStoreVersion(store: NetworkStore): number {
  const [version, setVersion] = useState(0);

  useEffect(() => {
    const unsubscribe = store.subscribe(() => {
      setVersion((previous) => previous + 1);
    });
    // Child effects (the canvas resize) may have notified before this subscription existed.
    setVersion((previous) => previous + 1);
    return unsubscribe;
  }, [store]);

  return version;
}

export default function App({ store }: AppProps): JSX.Element {
  const localStoreRef = useRef<NetworkStore | null>(null);
  if (!store && !localStoreRef.current) {
    localStoreRef.current = createNetworkStore();
  }

  const networkStore = store ?? localStoreRef.current ?? createNetworkStore();
  const version = useStoreVersion(networkStore);
  const state = networkStore.getState();
  const { diagnostics } = state;

  useEffect(() => {
    if (!state.running) {
      return;
    }

    let frameId = 0;
    const tick = (): void => {
      networkStore.step();
      frameId = window.requestAnimationFrame(tick);
    };

    frameId = window.requestAnimationFrame(tick);

    return () => {
      window.cancelAnimationFrame(frameId);
    };
  }, [networkStore, state.running]);

  return (
    <div className="app-shell">
      <Toolbar
        options={state.options}
        running={state.running}
        error={diagnostics.lastRejectedOptions}
        onToggle={(option) => {
          const patch: Partial<NetworkOptions> = {};
          patch[option] = !state.options[option];
          networkStore.setOptions(patch);
        }}
        onSetRunning={(running) => {
          networkStore.setRunning(running);
        }}
        onSetNumber={(option, value) => {
          const patch: Partial<NetworkOptions> = {};
          patch[option] = value;
          networkStore.setOptions(patch);
        }}
        onRegenerate={() => {
          networkStore.regenerate();
        }}
      />

      <div className="canvas-wrap">
        <ParticleCanvas store={networkStore} state={state} renderNonce={version} />
      </div>

      <div className="statusbar" data-testid="statusbar">
        <span>
          Particles: <strong data-testid="particle-count">{state.particles.length}</strong>
        </span>
        <span>
          Visible: <strong data-testid="visible-count">{diagnostics.visibleCount}</strong>
        </span>
        <span>
          Edges: <strong data-testid="edge-count">{diagnostics.edgeCount}</strong>
        </span>
        <span>
          Touch: <strong data-testid="touch-count">{diagnostics.touchCount}</strong>
        </span>
        <span>
          Frame: <strong data-testid="frame-count">{diagnostics.frame}</strong>
        </span>
        <span>
          Mode: <strong data-testid="run-mode">{state.running ? 'play' : 'pause'}</strong>
        </span>
      </div>

      <pre data-testid="diagnostics-debug" className="scene-debug">
        {JSON.stringify(diagnostics)}
      </pre>
    </div>
  );
}
