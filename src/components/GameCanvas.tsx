import { useEffect, useRef } from 'react';
import Phaser from 'phaser';
import { JoystickScene, type JoystickVariant, type SceneBridge } from '../game/phaser/JoystickScene';
import { demoConfig, type JoystickEvent, type JoystickSnapshot } from '../game/core';
import { defaultJoystickTheme } from '../game/theme';

type Props = {
  variant: JoystickVariant;
  onEvent: (event: JoystickEvent, snapshot: JoystickSnapshot) => void;
};

export function GameCanvas(props: Props) {
  const hostRef = useRef<HTMLDivElement | null>(null);
  const gameRef = useRef<Phaser.Game | null>(null);
  const propsRef = useRef(props);
  propsRef.current = props;
  const bridgeRef = useRef<SceneBridge | null>(null);
  if (!bridgeRef.current) {
    bridgeRef.current = {
      getVariant: () => propsRef.current.variant,
      onEvent: (event, snapshot) => propsRef.current.onEvent(event, snapshot),
    };
  }

  useEffect(() => {
    if (!hostRef.current || gameRef.current) return;
    const game = new Phaser.Game({
      type: Phaser.AUTO,
      parent: hostRef.current,
      width: demoConfig.arena.width,
      height: demoConfig.arena.height,
      backgroundColor: defaultJoystickTheme.background,
      scale: {
        mode: Phaser.Scale.FIT,
        autoCenter: Phaser.Scale.CENTER_BOTH,
      },
      input: { activePointers: 3 },
      audio: { noAudio: true },
      fps: { target: 60, forceSetTimeOut: true },
    });
    gameRef.current = game;
    game.scene.add('JoystickScene', JoystickScene, true, { bridge: bridgeRef.current, theme: defaultJoystickTheme });

    return () => {
      game.destroy(true);
      gameRef.current = null;
    };
  }, []);

  return <div className="game-canvas-host" ref={hostRef} aria-label="Joystick demo canvas" />;
}

export type { JoystickVariant };
