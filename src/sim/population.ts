import type { FrameInput, HealthCounts, Person, PersonID, Rng, SimContext, World, ZoneID } from '../state/types';
import { getInfected, startTraveling, stepPerson } from './person';
import { pick, sample } from './random';

/**
 * One sequential pass over the population. Persons later in the array see the
 * positions earlier ones already moved to this tick.
 */
export function stepPopulation(persons: Person[], ctx: SimContext, frame: FrameInput): void {
  for (const person of persons) stepPerson(person, persons, ctx, frame);
}

export function countStates(persons: readonly Person[]): HealthCounts {
  const counts: HealthCounts = { susceptible: 0, infected: 0, recovered: 0, deceased: 0 };
  for (const p of persons) counts[p.state]++;
  return counts;
}

export function countDistancers(persons: readonly Person[]): number {
  return persons.filter((p) => p.distancing).length;
}

export function distancerTarget(percent: number, population: number): number {
  return Math.round((percent / 100) * population);
}

/** Clears every flag, then hands it to a fresh random share of the population. */
export function randomizeDistancers(persons: Person[], percent: number, rng: Rng): number {
  for (const p of persons) p.distancing = false;
  const chosen = sample(rng, persons, distancerTarget(percent, persons.length));
  for (const p of chosen) p.distancing = true;
  return chosen.length;
}

/**
 * Flips only as many persons as needed to reach the target share. Returns the
 * signed change in the number of distancers.
 */
export function rebalanceDistancers(persons: Person[], percent: number, rng: Rng): number {
  const distancers = persons.filter((p) => p.distancing);
  const diff = distancerTarget(percent, persons.length) - distancers.length;
  if (diff === 0) return 0;
  const pool = diff > 0 ? persons.filter((p) => !p.distancing) : distancers;
  const flipped = sample(rng, pool, Math.abs(diff));
  for (const p of flipped) p.distancing = diff > 0;
  return diff > 0 ? flipped.length : -flipped.length;
}

export function infectable(persons: readonly Person[]): Person[] {
  return persons.filter((p) => p.state === 'susceptible' || p.state === 'recovered');
}

export function infectOne(persons: readonly Person[], ctx: SimContext): Person | null {
  const target = pick(ctx.rng, infectable(persons));
  if (!target) return null;
  getInfected(target, ctx);
  return target;
}

export interface RemovalPlan {
  ids: PersonID[];
  cursor: number;
}

/**
 * Picks up to `count` persons to remove. With communities enabled each pick
 * comes from the next non-empty community in the cycle, so removals spread
 * evenly; the whole population is the fallback pool.
 */
export function planRemovals(
  persons: readonly Person[],
  count: number,
  opts: { world: World; rng: Rng; cursor: number; communitiesEnabled: boolean }
): RemovalPlan {
  const { world, rng } = opts;
  const order = world.communityOrder;
  let cursor = opts.cursor;
  let remaining = persons.slice();
  const ids: PersonID[] = [];
  const total = Math.min(Math.max(0, count), persons.length);

  for (let i = 0; i < total; i++) {
    let pool = remaining;
    if (opts.communitiesEnabled && order.length > 0) {
      for (let tries = 0; tries < order.length; tries++) {
        const community = order[cursor % order.length];
        cursor++;
        const inCommunity = remaining.filter((p) => p.bounds.community === community);
        if (inCommunity.length > 0) {
          pool = inCommunity;
          break;
        }
      }
    }
    const chosen = pick(rng, pool);
    if (!chosen) break;
    ids.push(chosen.id);
    remaining = remaining.filter((p) => p.id !== chosen.id);
  }
  return { ids, cursor: order.length > 0 ? cursor % order.length : 0 };
}

export interface TravelPlan {
  person: Person;
  target: ZoneID;
}

/** A live, settled person and a community other than its own. */
export function planTravel(persons: readonly Person[], world: World, rng: Rng): TravelPlan | null {
  const person = pick(rng, persons.filter((p) => p.state !== 'deceased' && p.travelTarget === null));
  if (!person) return null;
  const target = pick(rng, world.communityOrder.filter((id) => id !== person.bounds.community));
  if (target === null) return null;
  startTraveling(person, target);
  return { person, target };
}
