import { add, scale } from './math';
import type { JoystickDirection, JoystickEvent, Vec2 } from './types';

/**
 * Quantizes an angle in degrees (0 = +x, clockwise-positive in screen space) into one of
 * eight 45° sectors. Each sector owns its upper bound.
 */
export const classifyDegrees = (degrees: number): JoystickDirection => {
  if (degrees > -22.5 && degrees <= 22.5) return 'right';
  if (degrees > 22.5 && degrees <= 67.5) return 'down-right';
  if (degrees > 67.5 && degrees <= 112.5) return 'down';
  if (degrees > 112.5 && degrees <= 157.5) return 'down-left';
  // atan2(-0, x < 0) yields -180, which belongs with 180.
  if ((degrees > 157.5 && degrees <= 180) || degrees === -180) return 'left';
  if (degrees > -180 && degrees <= -157.5) return 'left';
  if (degrees > -157.5 && degrees <= -112.5) return 'up-left';
  if (degrees > -112.5 && degrees <= -67.5) return 'up';
  if (degrees > -67.5 && degrees <= -22.5) return 'up-right';
  return 'idle';
};

const localVectors: Record<JoystickDirection, Vec2> = {
  up: { x: 0, y: -1 },
  'up-right': { x: 1, y: -1 },
  right: { x: 1, y: 0 },
  'down-right': { x: 1, y: 1 },
  down: { x: 0, y: 1 },
  'down-left': { x: -1, y: 1 },
  left: { x: -1, y: 0 },
  'up-left': { x: -1, y: -1 },
  idle: { x: 0, y: 0 },
};

/** Diagonals are (±1, ±1), not unit length, so diagonal movement is faster. */
export const directionToLocal = (direction: JoystickDirection): Vec2 => ({ ...localVectors[direction] });

export const idleEvent = (): JoystickEvent => ({ direction: 'idle', intensity: 0, angle: 0 });

export const applyJoystickEvent = (position: Vec2, event: JoystickEvent, speed: number): Vec2 =>
  add(position, scale(directionToLocal(event.direction), event.intensity * speed));
