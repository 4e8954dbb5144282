import type { CircleRenderer, Color, Vec2 } from '../core/types';

export type DrawFn = (x: number, y: number, radius: number) => void;

/** Rendering strategy for a joystick element; receives the element's live center and radius. */
export interface Drawable {
  draw(x: number, y: number, radius: number): void;
}

export const toDrawable = (source: Drawable | DrawFn): Drawable =>
  typeof source === 'function' ? { draw: source } : source;

export const circleDrawable = (renderer: CircleRenderer, color: Color): Drawable => ({
  draw: (x, y, radius) => renderer.fillCircle(x, y, radius, color),
});

/**
 * A positioned circle with a fixed radius and drawing strategy.
 * Only the owning joystick moves it; a negative radius is passed through as-is.
 */
export class DrawableElement {
  position: Vec2;
  readonly radius: number;
  private readonly drawable: Drawable;

  constructor(x: number, y: number, radius: number, drawable: Drawable | DrawFn) {
    this.position = { x, y };
    this.radius = radius;
    this.drawable = toDrawable(drawable);
  }

  render() {
    this.drawable.draw(this.position.x, this.position.y, this.radius);
  }
}
