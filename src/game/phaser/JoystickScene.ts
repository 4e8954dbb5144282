import Phaser from 'phaser';
import { demoConfig } from '../core/config';
import { applyJoystickEvent } from '../core/direction';
import { clamp } from '../core/math';
import type { JoystickEvent, JoystickSnapshot, Vec2 } from '../core/types';
import { VirtualJoystick } from '../input/joystick';
import { signalTheme, type JoystickTheme } from '../theme';
import { PhaserJoystickHost } from './phaserHost';

export type JoystickVariant = 'default' | 'custom';

export type SceneBridge = {
  getVariant: () => JoystickVariant;
  onEvent: (event: JoystickEvent, snapshot: JoystickSnapshot) => void;
};

export class JoystickScene extends Phaser.Scene {
  private bridge!: SceneBridge;
  private theme!: JoystickTheme;
  private host!: PhaserJoystickHost;
  private joystick!: VirtualJoystick;
  private variant: JoystickVariant = 'default';
  private gfx!: Phaser.GameObjects.Graphics;
  private debugGfx!: Phaser.GameObjects.Graphics;
  private marker: Vec2 = { x: 0, y: 0 };
  private debugGeometry = false;

  constructor() {
    super('JoystickScene');
  }

  init(data: { bridge: SceneBridge; theme: JoystickTheme }) {
    this.bridge = data.bridge;
    this.theme = data.theme;
  }

  create() {
    this.cameras.main.setBackgroundColor(this.theme.background);
    this.gfx = this.add.graphics();
    this.gfx.setDepth(0);
    this.host = new PhaserJoystickHost(this);
    this.debugGfx = this.add.graphics();
    this.debugGfx.setScrollFactor(0, 0);
    this.debugGfx.setDepth(1001);
    this.marker = { x: demoConfig.arena.width / 2, y: demoConfig.arena.height / 4 };
    this.buildJoystick(this.bridge.getVariant());
    this.input.keyboard?.on('keydown-G', () => {
      this.debugGeometry = !this.debugGeometry;
    });
  }

  update() {
    const variant = this.bridge.getVariant();
    if (variant !== this.variant) this.buildJoystick(variant);

    this.host.beginFrame();
    const event = this.joystick.update();
    this.moveMarker(event);
    this.bridge.onEvent(event, this.joystick.snapshot());

    this.gfx.clear();
    this.gfx.fillStyle(demoConfig.markerColor, 1);
    this.gfx.fillCircle(this.marker.x, this.marker.y, demoConfig.markerRadius);
    // The host layer ignores camera scroll, so the widget draws last in screen space.
    this.joystick.render();

    this.debugGfx.clear();
    if (this.debugGeometry) this.drawDebugGeometry();
  }

  private buildJoystick(variant: JoystickVariant) {
    this.variant = variant;
    const { x, y, size } = demoConfig.joystick;
    if (variant === 'default') {
      this.joystick = VirtualJoystick.create(this.host, x, y, size, this.theme);
      return;
    }
    const { background, knob } = signalTheme.joystick;
    this.joystick = VirtualJoystick.fromCustomElements(
      this.host,
      x,
      y,
      demoConfig.custom.backgroundRadius,
      demoConfig.custom.knobRadius,
      (cx, cy, radius) => this.host.fillCircle(cx, cy, radius, background),
      (cx, cy, radius) => this.host.fillCircle(cx, cy, radius, knob),
    );
  }

  private moveMarker(event: JoystickEvent) {
    const next = applyJoystickEvent(this.marker, event, demoConfig.speed);
    const r = demoConfig.markerRadius;
    this.marker = {
      x: clamp(next.x, r, demoConfig.arena.width - r),
      y: clamp(next.y, r, demoConfig.arena.height - r),
    };
  }

  private drawDebugGeometry() {
    const g = this.debugGfx;
    const snap = this.joystick.snapshot();
    const { travel, offset } = this.theme.debug;
    g.lineStyle(2, travel.rgb, travel.alpha);
    g.strokeCircle(snap.center.x, snap.center.y, snap.backgroundRadius);
    g.strokeCircle(snap.knob.x, snap.knob.y, snap.knobRadius);
    g.lineStyle(2, offset.rgb, offset.alpha);
    g.strokeLineShape(new Phaser.Geom.Line(snap.center.x, snap.center.y, snap.knob.x, snap.knob.y));
    g.strokeLineShape(new Phaser.Geom.Line(snap.center.x - 5, snap.center.y, snap.center.x + 5, snap.center.y));
    g.strokeLineShape(new Phaser.Geom.Line(snap.center.x, snap.center.y - 5, snap.center.x, snap.center.y + 5));
  }
}
