import type { Vec2 } from '../state/types';

const DEG = Math.PI / 180;

export const v2 = {
  zero:   (): Vec2 => ({ x: 0, y: 0 }),
  add:    (a: Vec2, b: Vec2): Vec2 => ({ x: a.x + b.x, y: a.y + b.y }),
  sub:    (a: Vec2, b: Vec2): Vec2 => ({ x: a.x - b.x, y: a.y - b.y }),
  scale:  (a: Vec2, s: number): Vec2 => ({ x: a.x * s, y: a.y * s }),
  len:    (a: Vec2): number => Math.hypot(a.x, a.y),
  dist:   (a: Vec2, b: Vec2): number => Math.hypot(a.x - b.x, a.y - b.y),
  // Zero stays zero; callers decide what a degenerate vector means.
  norm:   (a: Vec2): Vec2 => {
    const l = Math.hypot(a.x, a.y);
    return l > 0 ? { x: a.x / l, y: a.y / l } : { x: 0, y: 0 };
  },
  rotate: (a: Vec2, degrees: number): Vec2 => {
    const c = Math.cos(degrees * DEG);
    const s = Math.sin(degrees * DEG);
    return { x: a.x * c - a.y * s, y: a.x * s + a.y * c };
  },
  clamp:  (v: number, lo: number, hi: number): number => Math.min(Math.max(v, lo), hi),
};
