export type PersonID = number;
export type ZoneID = string;

export type HealthState = 'susceptible' | 'infected' | 'recovered' | 'deceased';

export type HealthCounts = Record<HealthState, number>;

export type RGB = [number, number, number];

export interface Vec2 { x: number; y: number; }
export interface Size { width: number; height: number; }
export interface Rect { left: number; top: number; width: number; height: number; }
export interface Edges { left: number; top: number; right: number; bottom: number; }

// Seconds from an arbitrary origin. Only differences are ever used.
export type Clock = () => number;
export type Rng = () => number;

interface ZoneGeometry {
  id: ZoneID;
  label: string;
  center: Vec2;
  size: Size;
  border: number; // inset applied to every edge
}

export interface Region extends ZoneGeometry {
  kind: 'region';
}

export interface Community extends ZoneGeometry {
  kind: 'community';
  active: boolean;
  hubSize: number; // side of the arrival square in the inner bottom-right corner
}

export type Zone = Region | Community;

// Handles into the world table, never copies.
export interface Bounds {
  community: ZoneID;
  region: ZoneID;
}

export interface World {
  fieldId: ZoneID;
  regions: Record<ZoneID, Region>;
  communities: Record<ZoneID, Community>;
  communityOrder: ZoneID[]; // cycle order for spawning and removal
}

export interface Person {
  id: PersonID;
  position: Vec2;
  direction: Vec2; // unit length
  speed: number;
  radius: number;
  state: HealthState;
  distancing: boolean;
  bounds: Bounds;
  travelTarget: ZoneID | null;
  infectedStart: number | null;
  infectedEnd: number | null;
  lastEvent: number; // last infection roll, clock seconds
  nearby: PersonID[]; // neighbours found on the last tick
}

export interface Params {
  // persons
  personRadius: number;
  speed: number; // units per second
  distancingRadius: number; // neighbour detection distance
  infectionRadius: number; // transmission distance, smaller than distancingRadius
  wallMargin: number;
  wanderChance: number;
  wanderAngle: number; // degrees
  wallTurnChance: number;
  wallTurnAngle: number; // degrees
  proximityCoefficient: number; // repulsion multiplier at zero distance
  // infection
  maxInfectionDuration: number; // seconds
  infectionEventInterval: number; // seconds between spread rolls
  infectionEventJitter: number; // seconds a new infection backdates its last roll by, at most
  spreadChance: number;
  infectionChance: number; // susceptible target
  reinfectionChance: number; // recovered target
  infectedDistancerChance: number;
  recoveredDistancerChance: number;
  mortalityChance: number;
  earlyTerminationChance: number;
  // travel
  travelInterval: number; // seconds between automatic departures
  travelSpeedMultiplier: number;
  hubSize: number;
  // chart
  chartWidth: number; // samples kept
  chartInterval: number; // seconds between samples
  // world
  worldWidth: number;
  worldHeight: number;
  layoutGap: number;
  border: number;
  // population + loop
  initialPopulation: number;
  batchSize: number; // people added or removed per button press
  maxFrameTime: number; // seconds, longer frames are cut
}

export type ChartShares = [infected: number, recovered: number, susceptible: number, deceased: number];

export type ChartSample =
  | { kind: 'share'; values: ChartShares }
  | { kind: 'marker'; color: RGB };

export interface ChartState {
  width: number;
  samples: ChartSample[];
  lastUpdate: number;
  eventMarker: RGB | null;
}

export interface SimContext {
  params: Params;
  world: World;
  rng: Rng;
  now: number;
  log: (text: string) => void;
}

export interface FrameInput {
  frametime: number; // seconds
  distancingEnabled: boolean;
  distancingStrength: number;
}

export interface WorldState {
  t: number; // simulated seconds
  frames: number;
  params: Params;
  world: World;
  persons: Person[];
  nextId: PersonID;
  spawnCursor: number;
  removalCursor: number;
  nextTravelAt: number; // clock seconds
  chart: ChartState;
  events: string[];
}
