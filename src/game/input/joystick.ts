import { BACKGROUND_RADIUS_RATIO, KNOB_RADIUS_RATIO } from '../core/config';
import { classifyDegrees, idleEvent } from '../core/direction';
import { add, dist, fromAngle, len, sub, toDegrees } from '../core/math';
import type { InputSource, JoystickEvent, JoystickHost, JoystickSnapshot, TouchPoint, Vec2 } from '../core/types';
import { defaultJoystickTheme, type JoystickTheme } from '../theme';
import { circleDrawable, DrawableElement, type Drawable, type DrawFn } from './drawable';

type DragSource = { kind: 'mouse' } | { kind: 'touch'; id: number };

/**
 * Fixed on-screen joystick: a background circle bounding a draggable knob.
 * Poll with `update()` once per frame, then call `render()` wherever the draw order needs it.
 */
export class VirtualJoystick {
  private readonly center: Vec2;
  /** Background diameter; the knob travels up to `size / 2` from the center. */
  private readonly size: number;
  private readonly background: DrawableElement;
  private readonly knob: DrawableElement;
  private source: DragSource | null = null;
  private event: JoystickEvent = idleEvent();

  private constructor(
    private readonly input: InputSource,
    x: number,
    y: number,
    size: number,
    background: DrawableElement,
    knob: DrawableElement,
  ) {
    this.center = { x, y };
    this.size = size;
    this.background = background;
    this.knob = knob;
  }

  static create(host: JoystickHost, x: number, y: number, size: number, theme: JoystickTheme = defaultJoystickTheme) {
    const background = new DrawableElement(x, y, size * BACKGROUND_RADIUS_RATIO, circleDrawable(host, theme.joystick.background));
    const knob = new DrawableElement(x, y, size * KNOB_RADIUS_RATIO, circleDrawable(host, theme.joystick.knob));
    return new VirtualJoystick(host, x, y, size, background, knob);
  }

  /** Travel is bounded by `backgroundRadius`. */
  static fromCustomElements(
    input: InputSource,
    x: number,
    y: number,
    backgroundRadius: number,
    knobRadius: number,
    background: Drawable | DrawFn,
    knob: Drawable | DrawFn,
  ) {
    return new VirtualJoystick(
      input,
      x,
      y,
      backgroundRadius * 2,
      new DrawableElement(x, y, backgroundRadius, background),
      new DrawableElement(x, y, knobRadius, knob),
    );
  }

  private get radius() {
    return this.size / 2;
  }

  isDragging() {
    return this.source !== null;
  }

  update(): JoystickEvent {
    const touches = this.input.touches();
    if (touches.length > 0) {
      for (const touch of touches) this.handleTouch(touch);
    } else {
      this.handleMouse();
    }
    return { ...this.event };
  }

  render() {
    this.background.render();
    this.knob.render();
  }

  snapshot(): JoystickSnapshot {
    return {
      active: this.isDragging(),
      center: { ...this.center },
      knob: { ...this.knob.position },
      backgroundRadius: this.background.radius,
      knobRadius: this.knob.radius,
      event: { ...this.event },
    };
  }

  private handleTouch(touch: TouchPoint) {
    const bound = this.source?.kind === 'touch' && this.source.id === touch.id;
    switch (touch.phase) {
      case 'started':
        if (this.source === null && dist(touch.position, this.center) < this.radius) {
          this.source = { kind: 'touch', id: touch.id };
          this.moveTo(touch.position);
        }
        break;
      case 'moved':
        if (bound) this.moveTo(touch.position);
        break;
      case 'ended':
      case 'cancelled':
        if (bound) this.reset();
        break;
      default:
        break;
    }
  }

  private handleMouse() {
    const position = this.input.mousePosition();
    const down = this.input.isMouseButtonDown();
    if (this.source !== null) {
      if (down) this.moveTo(position);
      else this.reset();
      return;
    }
    if (down && dist(position, this.center) <= this.radius) {
      this.source = { kind: 'mouse' };
      this.moveTo(position);
    }
  }

  private moveTo(position: Vec2) {
    const delta = sub(position, this.center);
    const angle = Math.atan2(delta.y, delta.x);
    const distance = Math.min(len(delta), this.radius);
    this.knob.position = add(this.center, fromAngle(angle, distance));
    const intensity = distance / this.radius;
    this.event = {
      direction: intensity === 0 ? 'idle' : classifyDegrees(toDegrees(angle)),
      intensity,
      angle,
    };
  }

  private reset() {
    this.source = null;
    this.knob.position = { ...this.center };
    this.event = idleEvent();
  }
}
