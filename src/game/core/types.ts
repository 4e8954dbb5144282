export type Vec2 = { x: number; y: number };

/** `rgb` is a 0xRRGGBB integer, `alpha` in [0, 1]. */
export type Color = { rgb: number; alpha: number };

export type JoystickDirection =
  | 'up'
  | 'up-right'
  | 'right'
  | 'down-right'
  | 'down'
  | 'down-left'
  | 'left'
  | 'up-left'
  | 'idle';

export type JoystickEvent = Readonly<{
  direction: JoystickDirection;
  /** 0 at the center, 1 at or beyond the background's rim. */
  intensity: number;
  /** Radians from the positive x-axis; screen y grows downward so positive angles turn clockwise. */
  angle: number;
}>;

export type TouchPhase = 'started' | 'moved' | 'stationary' | 'ended' | 'cancelled';

export type TouchPoint = {
  id: number;
  position: Vec2;
  phase: TouchPhase;
};

export type InputSource = {
  touches: () => readonly TouchPoint[];
  mousePosition: () => Vec2;
  isMouseButtonDown: () => boolean;
};

export type CircleRenderer = {
  fillCircle: (x: number, y: number, radius: number, color: Color) => void;
};

export type JoystickHost = InputSource & CircleRenderer;

export type JoystickSnapshot = {
  active: boolean;
  center: Vec2;
  knob: Vec2;
  backgroundRadius: number;
  knobRadius: number;
  event: JoystickEvent;
};
