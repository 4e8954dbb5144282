import { describe, expect, it, vi } from 'vitest';
import type { CircleRenderer } from '../core/types';
import { circleDrawable, DrawableElement } from './drawable';

describe('DrawableElement', () => {
  it('renders through a function strategy with the live position', () => {
    const draw = vi.fn();
    const element = new DrawableElement(10, 20, 5, draw);
    element.render();
    element.position = { x: 11, y: 19 };
    element.render();
    expect(draw.mock.calls).toEqual([
      [10, 20, 5],
      [11, 19, 5],
    ]);
  });

  it('renders through an object strategy that keeps its own state', () => {
    class CountingDrawable {
      count = 0;
      draw() {
        this.count += 1;
      }
    }
    const drawable = new CountingDrawable();
    const element = new DrawableElement(0, 0, 1, drawable);
    element.render();
    element.render();
    expect(drawable.count).toBe(2);
  });

  it('passes a negative radius through untouched', () => {
    const draw = vi.fn();
    new DrawableElement(0, 0, -3, draw).render();
    expect(draw).toHaveBeenCalledWith(0, 0, -3);
  });
});

describe('circleDrawable', () => {
  it('fills a circle in the given color', () => {
    const fillCircle = vi.fn<CircleRenderer['fillCircle']>();
    const color = { rgb: 0x112233, alpha: 0.5 };
    circleDrawable({ fillCircle }, color).draw(4, 5, 6);
    expect(fillCircle).toHaveBeenCalledWith(4, 5, 6, color);
  });
});
