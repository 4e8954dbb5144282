import { BACKGROUND_COLOR, KNOB_COLOR } from '../core/config';
import type { JoystickTheme } from './types';

export const slateTheme: JoystickTheme = {
  key: 'slate',
  name: 'Slate',
  background: '#ffffff',
  joystick: {
    background: BACKGROUND_COLOR,
    knob: KNOB_COLOR,
  },
  debug: {
    travel: { rgb: 0x4dff9a, alpha: 1 },
    offset: { rgb: 0xff7f6a, alpha: 0.9 },
  },
};

export const signalTheme: JoystickTheme = {
  ...slateTheme,
  key: 'signal',
  name: 'Signal',
  joystick: {
    background: { rgb: 0xe62937, alpha: 1 },
    knob: { rgb: 0x00e430, alpha: 1 },
  },
};

export const defaultJoystickTheme = slateTheme;
