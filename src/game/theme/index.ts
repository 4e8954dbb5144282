export { defaultJoystickTheme, signalTheme, slateTheme } from './joystickTheme';
export type { JoystickTheme, ThemeKey } from './types';
