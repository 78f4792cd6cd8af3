import type { Params } from './types';

export const DEFAULT_PARAMS: Params = {
  personRadius: 5,
  speed: 120,
  distancingRadius: 125,
  infectionRadius: 50,
  wallMargin: 10,
  wanderChance: 0.5,
  wanderAngle: 10,
  wallTurnChance: 0.5,
  wallTurnAngle: 80,
  proximityCoefficient: 10,

  maxInfectionDuration: 60,
  infectionEventInterval: 3,
  infectionEventJitter: 5,
  spreadChance: 0.33,
  infectionChance: 0.5,
  reinfectionChance: 0.1,
  infectedDistancerChance: 0.7,
  recoveredDistancerChance: 0.6,
  mortalityChance: 0.1,
  earlyTerminationChance: 0.02,

  travelInterval: 2,
  travelSpeedMultiplier: 3,
  hubSize: 30,

  chartWidth: 390,
  chartInterval: 1,

  worldWidth: 1470,
  worldHeight: 1080,
  layoutGap: 10,
  border: 2,

  initialPopulation: 200,
  batchSize: 10,
  maxFrameTime: 0.25,
};

export function resolveParams(overrides: Partial<Params> = {}): Params {
  return { ...DEFAULT_PARAMS, ...overrides };
}
