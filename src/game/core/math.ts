import type { Vec2 } from './types';

export const clamp = (v: number, min: number, max: number) => Math.max(min, Math.min(max, v));
export const len = (v: Vec2) => Math.hypot(v.x, v.y);
export const scale = (v: Vec2, s: number): Vec2 => ({ x: v.x * s, y: v.y * s });
export const add = (a: Vec2, b: Vec2): Vec2 => ({ x: a.x + b.x, y: a.y + b.y });
export const sub = (a: Vec2, b: Vec2): Vec2 => ({ x: a.x - b.x, y: a.y - b.y });
export const dist = (a: Vec2, b: Vec2) => Math.hypot(a.x - b.x, a.y - b.y);
export const fromAngle = (angle: number, length = 1): Vec2 => ({ x: Math.cos(angle) * length, y: Math.sin(angle) * length });
export const toDegrees = (radians: number) => (radians * 180) / Math.PI;
export const samePoint = (a: Vec2, b: Vec2) => a.x === b.x && a.y === b.y;
