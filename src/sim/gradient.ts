import type { RGB } from '../state/types';
import { invariant } from './invariant';

export type ColorStop = readonly [position: number, color: RGB];

export interface Gradient {
  stops: readonly ColorStop[];
}

export function createGradient(stops: readonly ColorStop[]): Gradient {
  invariant(stops.length > 0, 'A gradient needs at least one colour stop');
  return { stops: [...stops].sort((a, b) => a[0] - b[0]) };
}

function lerp(lower: ColorStop, upper: ColorStop, value: number): RGB {
  const [min, from] = lower;
  const [max, to] = upper;
  const t = max > min ? (value - min) / (max - min) : 0;
  return [
    Math.trunc(from[0] + (to[0] - from[0]) * t),
    Math.trunc(from[1] + (to[1] - from[1]) * t),
    Math.trunc(from[2] + (to[2] - from[2]) * t),
  ];
}

// Values outside the stop range take the nearest end colour.
export function colorAt(gradient: Gradient, value: number): RGB {
  const { stops } = gradient;
  const first = stops[0];
  const last = stops[stops.length - 1];
  if (value <= first[0]) return [...first[1]];
  if (value >= last[0]) return [...last[1]];
  for (let i = 0; i < stops.length - 1; i++) {
    if (value <= stops[i + 1][0]) return lerp(stops[i], stops[i + 1], value);
  }
  return [...last[1]];
}
