import Phaser from 'phaser';
import type { Color, JoystickHost, TouchPoint, Vec2 } from '../core/types';
import { TouchTracker } from '../input/touchTracker';

/**
 * Joystick host backed by a Phaser scene. Touch pointers come from the input manager
 * (configure `input.activePointers` on the game for multi-touch); drawing goes to a
 * screen-fixed Graphics layer above the world.
 */
export class PhaserJoystickHost implements JoystickHost {
  private readonly gfx: Phaser.GameObjects.Graphics;
  private readonly tracker = new TouchTracker();
  private frameTouches: TouchPoint[] = [];
  private cancelled: TouchPoint[] = [];

  constructor(private readonly scene: Phaser.Scene, depth = 1000) {
    this.gfx = scene.add.graphics();
    this.gfx.setScrollFactor(0, 0);
    this.gfx.setDepth(depth);
    scene.game.events.on(Phaser.Core.Events.BLUR, this.onBlur, this);
    scene.events.once(Phaser.Scenes.Events.SHUTDOWN, this.destroy, this);
  }

  /** Call once per frame before any joystick update. */
  beginFrame() {
    const samples = this.scene.input.manager.pointers
      .filter((pointer) => pointer.wasTouch && pointer.isDown)
      .map((pointer) => ({ id: pointer.identifier, position: { x: pointer.x, y: pointer.y } }));
    this.frameTouches = [...this.cancelled, ...this.tracker.sample(samples)];
    this.cancelled = [];
    this.gfx.clear();
  }

  touches(): readonly TouchPoint[] {
    return this.frameTouches;
  }

  mousePosition(): Vec2 {
    const pointer = this.scene.input.mousePointer;
    return pointer ? { x: pointer.x, y: pointer.y } : { x: 0, y: 0 };
  }

  isMouseButtonDown(): boolean {
    return this.scene.input.mousePointer?.leftButtonDown() ?? false;
  }

  fillCircle(x: number, y: number, radius: number, color: Color) {
    this.gfx.fillStyle(color.rgb, color.alpha);
    this.gfx.fillCircle(x, y, radius);
  }

  destroy() {
    this.scene.game.events.off(Phaser.Core.Events.BLUR, this.onBlur, this);
    this.gfx.destroy();
  }

  private onBlur() {
    this.cancelled = this.tracker.cancel();
  }
}
