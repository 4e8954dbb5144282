import type { Color } from './types';

export const BACKGROUND_COLOR: Color = { rgb: 0x607d8b, alpha: 128 / 255 };
export const KNOB_COLOR: Color = { rgb: 0x607d8b, alpha: 168 / 255 };

/** Radii as a fraction of the joystick's overall size (the background diameter). */
export const BACKGROUND_RADIUS_RATIO = 0.5;
export const KNOB_RADIUS_RATIO = 0.25;

export const demoConfig = {
  arena: { width: 960, height: 540 },
  markerRadius: 50,
  markerColor: 0xffd400,
  speed: 2.5,
  joystick: { x: 100, y: 200, size: 100 },
  custom: { backgroundRadius: 50, knobRadius: 32 },
} as const;
