import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';

export type Toggle = 'distancingEnabled' | 'travelingEnabled' | 'communitiesEnabled' | 'showDirections' | 'showNetwork';

export type ControlValues = {
  distancingPercent: number; // 0..100, whole numbers
  distancingStrength: number; // 0..3
} & Record<Toggle, boolean>;

type ControlsState = ControlValues & {
  setDistancingPercent: (percent: number) => void;
  setDistancingStrength: (strength: number) => void;
  setToggle: (k: Toggle, value: boolean) => void;
  toggle: (k: Toggle) => void;
};

export type ControlsStore = StoreApi<ControlsState>;

export const DISTANCING_PERCENT_RANGE = [0, 100] as const;
export const DISTANCING_STRENGTH_RANGE = [0, 3] as const;

export const DEFAULT_CONTROLS: ControlValues = {
  distancingPercent: 100,
  distancingStrength: 1,
  distancingEnabled: false,
  travelingEnabled: true,
  communitiesEnabled: true,
  showDirections: false,
  showNetwork: false,
};

function clamp(v: number, [lo, hi]: readonly [number, number]) {
  return Math.max(lo, Math.min(hi, v));
}

function flag(k: Toggle, value: boolean): Partial<ControlValues> {
  const next: Partial<ControlValues> = {};
  next[k] = value;
  return next;
}

export function createControlsStore(initial: Partial<ControlValues> = {}): ControlsStore {
  return createStore<ControlsState>((set) => ({
    ...DEFAULT_CONTROLS,
    ...initial,
    setDistancingPercent: (percent) => set(() => ({ distancingPercent: Math.round(clamp(percent, DISTANCING_PERCENT_RANGE)) })),
    setDistancingStrength: (strength) => set(() => ({ distancingStrength: clamp(strength, DISTANCING_STRENGTH_RANGE) })),
    setToggle: (k, value) => set(() => flag(k, value)),
    toggle: (k) => set((s) => flag(k, !s[k])),
  }));
}
