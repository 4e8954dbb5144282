import type { Color } from '../core/types';

export type ThemeKey = 'slate' | 'signal';

export type JoystickTheme = {
  key: ThemeKey;
  name: string;
  /** Canvas clear color behind the demo world. */
  background: string;
  joystick: {
    background: Color;
    knob: Color;
  };
  debug: {
    travel: Color;
    offset: Color;
  };
};
