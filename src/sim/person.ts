import type {
  Bounds,
  FrameInput,
  HealthState,
  Params,
  Person,
  PersonID,
  Rng,
  SimContext,
  Vec2,
  World,
  ZoneID,
} from '../state/types';
import { invariant } from './invariant';
import { chance, uniform } from './random';
import { effectiveZone, getCommunity, hubRect, rectCenter, rectContains, zoneEdges } from './regions';
import { v2 } from './vec';

export function randomDirection(rng: Rng): Vec2 {
  const d = v2.norm({ x: uniform(rng, -1, 1), y: uniform(rng, -1, 1) });
  return d.x === 0 && d.y === 0 ? { x: 1, y: 0 } : d;
}

export function createPerson(
  id: PersonID,
  bounds: Bounds,
  ctx: SimContext,
  opts: { distancingPercent: number; position?: Vec2; state?: HealthState }
): Person {
  const { params, rng } = ctx;
  const r = params.personRadius;
  const e = zoneEdges(effectiveZone(bounds, ctx.world));
  const position = opts.position
    ? { ...opts.position }
    : { x: uniform(rng, e.left + r, e.right - r), y: uniform(rng, e.top + r, e.bottom - r) };
  const person: Person = {
    id,
    position,
    direction: randomDirection(rng),
    speed: params.speed,
    radius: r,
    state: 'susceptible',
    distancing: chance(rng, opts.distancingPercent / 100),
    bounds: { ...bounds },
    travelTarget: null,
    infectedStart: null,
    infectedEnd: null,
    lastEvent: 0,
    nearby: [],
  };
  if (opts.state === 'infected') getInfected(person, ctx);
  else if (opts.state) person.state = opts.state;
  return person;
}

export function clonePerson(p: Person): Person {
  return {
    ...p,
    position: { ...p.position },
    direction: { ...p.direction },
    bounds: { ...p.bounds },
    nearby: p.nearby.slice(),
  };
}

export function transmissionChance(state: HealthState, params: Params): number {
  switch (state) {
    case 'susceptible': return params.infectionChance;
    case 'recovered': return params.reinfectionChance;
    default: return 0;
  }
}

/**
 * Starts an infection. Only susceptible and recovered persons can be infected;
 * anyone else is left as is and `false` is returned.
 */
export function getInfected(person: Person, ctx: SimContext): boolean {
  if (person.state !== 'susceptible' && person.state !== 'recovered') return false;
  const { params, rng, now } = ctx;
  person.infectedStart = now;
  person.infectedEnd = null;
  // Backdated so a cohort infected together does not roll in lockstep.
  person.lastEvent = Math.max(0, now - rng() * params.infectionEventJitter);
  person.state = 'infected';
  person.distancing = chance(rng, params.infectedDistancerChance);
  ctx.log(`Person ${person.id} infected`);
  return true;
}

export function endInfection(person: Person, ctx: SimContext): HealthState {
  const start = person.infectedStart;
  invariant(person.state === 'infected' && start !== null, `Person ${person.id} ended an infection it never started`);
  const { params, rng, now } = ctx;
  person.infectedEnd = now;
  const seconds = Math.round(now - start);
  if (chance(rng, params.mortalityChance)) {
    person.state = 'deceased';
    ctx.log(`Person ${person.id} died (${seconds}s)`);
  } else {
    person.state = 'recovered';
    person.distancing = chance(rng, params.recoveredDistancerChance);
    ctx.log(`Person ${person.id} recovered (${seconds}s)`);
  }
  return person.state;
}

export function spread(person: Person, nears: readonly Person[], ctx: SimContext): PersonID[] {
  const infected: PersonID[] = [];
  for (const other of nears) {
    if (other.id === person.id) continue;
    if (v2.dist(person.position, other.position) >= ctx.params.infectionRadius) continue;
    if (chance(ctx.rng, transmissionChance(other.state, ctx.params)) && getInfected(other, ctx)) {
      infected.push(other.id);
    }
  }
  return infected;
}

export function handleInfection(person: Person, nears: readonly Person[], ctx: SimContext): void {
  const start = person.infectedStart;
  invariant(start !== null, `Person ${person.id} is infected without a recorded start time`);
  const { params, rng, now } = ctx;
  if (now - start >= params.maxInfectionDuration) {
    endInfection(person, ctx);
    return;
  }
  if (now - person.lastEvent < params.infectionEventInterval) return;
  person.lastEvent = now;
  if (chance(rng, params.spreadChance)) spread(person, nears, ctx);
  if (chance(rng, params.earlyTerminationChance)) endInfection(person, ctx);
}

/**
 * Live, settled persons in the same effective zone closer than `radius`.
 * The axis check runs first and rejects most of the population.
 */
export function findNearby(person: Person, persons: readonly Person[], world: World, radius: number): Person[] {
  const zone = effectiveZone(person.bounds, world);
  const r2 = radius * radius;
  const out: Person[] = [];
  for (const other of persons) {
    if (other.id === person.id) continue;
    const dx = person.position.x - other.position.x;
    const dy = person.position.y - other.position.y;
    if (Math.abs(dx) >= radius || Math.abs(dy) >= radius) continue;
    if (other.state === 'deceased' || other.travelTarget !== null) continue;
    if (effectiveZone(other.bounds, world) !== zone) continue;
    if (dx * dx + dy * dy < r2) out.push(other);
  }
  return out;
}

/**
 * Mean repulsion from the neighbours, each weighted by a quadratic falloff that
 * reaches zero at the distancing radius. Neighbours at the exact same spot add
 * nothing; `null` when nobody contributes.
 */
export function distancingForce(person: Person, nears: readonly Person[], params: Params): Vec2 | null {
  let sum = v2.zero();
  let count = 0;
  for (const other of nears) {
    const diff = v2.sub(person.position, other.position);
    const d = v2.len(diff);
    if (d === 0) continue;
    const falloff = (1 - d / params.distancingRadius) ** 2;
    sum = v2.add(sum, v2.scale(diff, params.proximityCoefficient * falloff));
    count++;
  }
  return count > 0 ? v2.scale(sum, 1 / count) : null;
}

export function socialDistance(person: Person, nears: readonly Person[], strength: number, params: Params): boolean {
  const force = distancingForce(person, nears, params);
  if (!force) return false;
  const blended = v2.add(person.direction, v2.scale(v2.norm(force), strength));
  if (v2.len(blended) === 0) return false;
  person.direction = v2.norm(blended);
  return true;
}

export function avoidWalls(person: Person, ctx: SimContext): boolean {
  const { params, rng } = ctx;
  const e = zoneEdges(effectiveZone(person.bounds, ctx.world));
  const { x, y } = person.position;
  const m = params.wallMargin;
  let heading: Vec2 | null = null;
  if (Math.abs(x - e.left) < m) heading = { x: 1, y: 0 };
  else if (Math.abs(x - e.right) < m) heading = { x: -1, y: 0 };
  else if (Math.abs(y - e.top) < m) heading = { x: 0, y: 1 };
  else if (Math.abs(y - e.bottom) < m) heading = { x: 0, y: -1 };
  if (!heading) return false;
  person.direction = chance(rng, params.wallTurnChance)
    ? v2.rotate(heading, uniform(rng, -params.wallTurnAngle, params.wallTurnAngle))
    : heading;
  return true;
}

export function stayInBounds(person: Person, world: World): void {
  const e = zoneEdges(effectiveZone(person.bounds, world));
  const r = person.radius;
  person.position = {
    x: v2.clamp(person.position.x, e.left + r, e.right - r),
    y: v2.clamp(person.position.y, e.top + r, e.bottom - r),
  };
}

export function startTraveling(person: Person, target: ZoneID): void {
  person.travelTarget = target;
}

/** One step towards the target hub. Returns true on arrival. */
export function travelStep(person: Person, ctx: SimContext, frametime: number): boolean {
  const targetId = person.travelTarget;
  invariant(targetId !== null, `Person ${person.id} is travelling without a target`);
  const hub = hubRect(getCommunity(ctx.world, targetId));
  const goal = rectCenter(hub);
  const toGoal = v2.sub(goal, person.position);
  const remaining = v2.len(toGoal);
  if (remaining > 0) person.direction = v2.norm(toGoal);
  const step = person.speed * ctx.params.travelSpeedMultiplier * frametime;
  person.position = step >= remaining ? goal : v2.add(person.position, v2.scale(person.direction, step));
  if (!rectContains(hub, person.position)) return false;
  person.bounds = { ...person.bounds, community: targetId };
  person.travelTarget = null;
  return true;
}

/** Regular behaviour of a settled, living person for one tick. */
export function operate(person: Person, persons: readonly Person[], ctx: SimContext, frame: FrameInput): void {
  const { params, rng } = ctx;
  if (chance(rng, params.wanderChance)) {
    person.direction = v2.rotate(person.direction, uniform(rng, -params.wanderAngle, params.wanderAngle));
  }
  avoidWalls(person, ctx);
  const nears = findNearby(person, persons, ctx.world, params.distancingRadius);
  person.nearby = nears.map((o) => o.id);
  if (person.state === 'infected') handleInfection(person, nears, ctx);
  if (person.state === 'deceased') return;
  if (frame.distancingEnabled && person.distancing && nears.length > 0) {
    socialDistance(person, nears, frame.distancingStrength, params);
  }
  person.position = v2.add(person.position, v2.scale(person.direction, person.speed * frame.frametime));
  stayInBounds(person, ctx.world);
}

export function stepPerson(person: Person, persons: readonly Person[], ctx: SimContext, frame: FrameInput): void {
  if (person.state === 'deceased') {
    person.nearby = [];
    return;
  }
  if (person.travelTarget !== null) {
    person.nearby = [];
    travelStep(person, ctx, frame.frametime);
    return;
  }
  operate(person, persons, ctx, frame);
}
