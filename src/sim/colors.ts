import type { HealthState, RGB } from '../state/types';
import { createGradient } from './gradient';

export const STATE_COLORS: Record<HealthState, RGB> = {
  susceptible: [255, 255, 255],
  infected: [255, 0, 0],
  recovered: [100, 255, 100],
  deceased: [100, 100, 100],
};

export const EVENT_COLORS: Record<'distancing' | 'traveling', RGB> = {
  distancing: [0, 255, 255],
  traveling: [255, 128, 0],
};

// Neighbour links: green when far, red when close (input is 0..255 intensity).
export const NETWORK_GRADIENT = createGradient([
  [0, [0, 255, 0]],
  [100, [255, 255, 0]],
  [200, [255, 0, 0]],
  [255, [255, 0, 0]],
]);
