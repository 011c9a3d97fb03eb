import { useEffect, useState } from 'react';

import type { NetworkOptions } from '../model/types';

type ToggleOption = 'complexMode' | 'touchActivation' | 'drawNetwork' | 'showQuadTree';

type ToolbarProps = {
  options: NetworkOptions;
  running: boolean;
  error: string | null;
  onToggle: (option: ToggleOption) => void;
  onSetRunning: (running: boolean) => void;
  onSetNumber: (option: 'particleCount' | 'lineDistance', value: number) => void;
  onRegenerate: () => void;
};

const TOGGLES: Array<{ option: ToggleOption; label: string }> = [
  { option: 'complexMode', label: 'Complex' },
  { option: 'touchActivation', label: 'Touch' },
  { option: 'drawNetwork', label: 'Network' },
  { option: 'showQuadTree', label: 'Quadtree' }
];

function NumberField({
  id,
  label,
  value,
  onCommit
}: {
  id: 'particleCount' | 'lineDistance';
  label: string;
  value: number;
  onCommit: (value: number) => void;
}): JSX.Element {
  const [draft, setDraft] = useState(String(value));

  useEffect(() => {
    setDraft(String(value));
  }, [value]);

  return (
    <label className="toolbar-field" htmlFor={`option-${id}`}>
      {label}
      <input
        id={`option-${id}`}
        data-testid={`option-${id}`}
        type="number"
        value={draft}
        onChange={(event) => {
          setDraft(event.target.value);
        }}
        onBlur={() => {
          onCommit(Number(draft));
        }}
        onKeyDown={(event) => {
          if (event.key === 'Enter') {
            onCommit(Number(draft));
          }
        }}
      />
    </label>
  );
}

export function Toolbar({
  options,
  running,
  error,
  onToggle,
  onSetRunning,
  onSetNumber,
  onRegenerate
}: ToolbarProps): JSX.Element {
  return (
    <div className="toolbar">
      <div className="toolbar-left">
        {TOGGLES.map(({ option, label }) => (
          <button
            key={option}
            type="button"
            data-testid={`toggle-${option}`}
            aria-pressed={options[option]}
            className={options[option] ? 'active' : ''}
            onClick={() => onToggle(option)}
          >
            {label}
          </button>
        ))}
        <NumberField
          id="particleCount"
          label="Particles"
          value={options.particleCount}
          onCommit={(value) => onSetNumber('particleCount', value)}
        />
        <NumberField
          id="lineDistance"
          label="Line distance"
          value={options.lineDistance}
          onCommit={(value) => onSetNumber('lineDistance', value)}
        />
        {error ? (
          <span className="toolbar-error" data-testid="options-error" role="alert">
            {error}
          </span>
        ) : null}
      </div>
      <div className="toolbar-right">
        <button type="button" data-testid="regenerate" onClick={onRegenerate}>
          Regenerate
        </button>
        <button
          type="button"
          data-testid="play"
          aria-pressed={running}
          className={running ? 'active' : ''}
          onClick={() => onSetRunning(true)}
        >
          <span aria-hidden="true">▶</span> Play
        </button>
        <button
          type="button"
          data-testid="pause"
          aria-pressed={!running}
          className={!running ? 'active' : ''}
          onClick={() => onSetRunning(false)}
        >
          <span aria-hidden="true">❚❚</span> Pause
        </button>
      </div>
    </div>
  );
}
