import { samePoint } from '../core/math';
import type { TouchPoint, Vec2 } from '../core/types';

export type TouchSample = { id: number; position: Vec2 };

/**
 * Turns per-frame "which touches are down" state into phased touch points.
 * Hosts that only expose live pointer state feed it one `sample` per frame.
 */
export class TouchTracker {
  private tracked = new Map<number, Vec2>();

  sample(samples: readonly TouchSample[]): TouchPoint[] {
    const next = new Map<number, Vec2>();
    const points: TouchPoint[] = [];
    for (const { id, position } of samples) {
      if (next.has(id)) continue;
      const previous = this.tracked.get(id);
      const phase = previous === undefined ? 'started' : samePoint(previous, position) ? 'stationary' : 'moved';
      next.set(id, { ...position });
      points.push({ id, position: { ...position }, phase });
    }
    for (const [id, position] of this.tracked) {
      if (!next.has(id)) points.push({ id, position, phase: 'ended' });
    }
    this.tracked = next;
    return points;
  }

  cancel(): TouchPoint[] {
    const points: TouchPoint[] = [];
    for (const [id, position] of this.tracked) points.push({ id, position, phase: 'cancelled' });
    this.tracked.clear();
    return points;
  }
}
