import { useState } from 'react';
import { GameCanvas, type JoystickVariant } from '../components/GameCanvas';
import { idleEvent, toDegrees, type JoystickEvent, type JoystickSnapshot } from '../game/core';

const variantLabels: Record<JoystickVariant, string> = {
  default: 'Default',
  custom: 'Custom elements',
};

const isVariant = (value: string): value is JoystickVariant => value === 'default' || value === 'custom';

export function App() {
  const [variant, setVariant] = useState<JoystickVariant>('default');
  const [event, setEvent] = useState<JoystickEvent>(() => idleEvent());
  const [dragging, setDragging] = useState(false);

  const handleEvent = (next: JoystickEvent, snapshot: JoystickSnapshot) => {
    setEvent((prev) => (
      prev.direction === next.direction && prev.intensity === next.intensity && prev.angle === next.angle ? prev : next
    ));
    setDragging(snapshot.active);
  };

  return (
    <div className="app-shell">
      <section className="game-panel">
        <GameCanvas variant={variant} onEvent={handleEvent} />

        <div className="hud">
          <div>Direction: {event.direction}</div>
          <div>Intensity: {event.intensity.toFixed(2)}</div>
          <div>Angle: {toDegrees(event.angle).toFixed(1)}&deg;</div>
          <div>{dragging ? 'Dragging' : 'Idle'}</div>
        </div>

        <div className="hud-actions">
          <label>
            Style
            <select
              value={variant}
              onChange={(e) => {
                if (isVariant(e.target.value)) setVariant(e.target.value);
              }}
            >
              {Object.entries(variantLabels).map(([key, label]) => (
                <option key={key} value={key}>{label}</option>
              ))}
            </select>
          </label>
        </div>
      </section>
    </div>
  );
}
