import type { Draft } from 'immer';
import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';

import { createChart, markEvent, sampleChart } from '../sim/chart';
import { EVENT_COLORS } from '../sim/colors';
import { invariant } from '../sim/invariant';
import { createQuadrantWorld } from '../sim/layout';
import { clonePerson, createPerson } from '../sim/person';
import {
  countDistancers,
  countStates,
  infectOne,
  planRemovals,
  planTravel,
  randomizeDistancers,
  rebalanceDistancers,
  stepPopulation,
} from '../sim/population';
import { createRng } from '../sim/random';
import { getCommunity, getRegion, rectContains, zoneRect } from '../sim/regions';
import { createControlsStore } from './controls';
import type { ControlsStore } from './controls';
import { resolveParams } from './params';
import type { Clock, Params, Person, PersonID, RGB, Rng, SimContext, Vec2, World, WorldState, ZoneID } from './types';

type Actions = {
  tick: (dtMs: number) => void;
  addPeople: (count?: number) => PersonID[];
  spawnAt: (point: Vec2) => PersonID | null;
  removePeople: (count?: number) => PersonID[];
  infectOne: () => PersonID | null;
  randomizeDistancers: () => number;
  rebalanceDistancers: () => number;
  travelOne: () => PersonID | null;
  markEvent: (color: RGB) => void;
  addEvent: (text: string) => void;
  reset: () => void;
  dispose: () => void;
};

export type SimulationStore = WorldState & { actions: Actions };

export interface SimulationOptions {
  params?: Partial<Params>;
  controls?: ControlsStore;
  seed?: string | number;
  rng?: Rng; // wins over `seed`
  clock?: Clock;
  world?: World; // copied, the default is the four-quadrant layout
  population?: number;
  onEvent?: (text: string) => void;
}

const MAX_EVENTS = 50;

function plural(n: number) {
  return n === 1 ? 'person' : 'people';
}

// Plain mutable copy for the per-tick pass. The neighbour query reads every
// person for every person, which is far slower through draft proxies.
function thaw(st: WorldState): WorldState {
  return {
    t: st.t,
    frames: st.frames,
    params: st.params,
    world: structuredClone(st.world),
    persons: st.persons.map(clonePerson),
    nextId: st.nextId,
    spawnCursor: st.spawnCursor,
    removalCursor: st.removalCursor,
    nextTravelAt: st.nextTravelAt,
    chart: { ...st.chart, samples: st.chart.samples.slice() },
    events: st.events.slice(),
  };
}

export function createSimulationStore(opts: SimulationOptions = {}) {
  const params = resolveParams(opts.params);
  const rng = opts.rng ?? createRng(opts.seed);
  const clock = opts.clock ?? (() => performance.now() / 1000);
  const controls = opts.controls ?? createControlsStore();

  // Lines reach the host only once the state holding them is committed, so the
  // host can call actions from `onEvent` and a failed update reports nothing.
  const pending: string[] = [];
  const pushEvent = (st: Pick<WorldState, 'events'>, text: string) => {
    st.events.unshift(text);
    if (st.events.length > MAX_EVENTS) st.events.pop();
    pending.push(text);
  };
  const flushEvents = () => {
    for (const text of pending.splice(0)) opts.onEvent?.(text);
  };

  const contextFor = (st: WorldState, now: number): SimContext => ({
    params,
    world: st.world,
    rng,
    now,
    log: (text) => pushEvent(st, text),
  });

  const syncCommunities = (world: World) => {
    const enabled = controls.getState().communitiesEnabled;
    for (const id of world.communityOrder) getCommunity(world, id).active = enabled;
  };

  const nextCommunity = (st: WorldState): ZoneID => {
    const order = st.world.communityOrder;
    invariant(order.length > 0, 'The world has no communities');
    const id = order[st.spawnCursor % order.length];
    st.spawnCursor = (st.spawnCursor + 1) % order.length;
    return id;
  };

  const spawn = (st: WorldState, ctx: SimContext, community: ZoneID, position?: Vec2): Person => {
    const person = createPerson(st.nextId, { community, region: st.world.fieldId }, ctx, {
      distancingPercent: controls.getState().distancingPercent,
      position,
    });
    st.nextId++;
    st.persons.push(person);
    return person;
  };

  const depart = (st: WorldState): PersonID | null => {
    const plan = planTravel(st.persons, st.world, rng);
    if (!plan) return null;
    const target = getCommunity(st.world, plan.target);
    pushEvent(st, `Person ${plan.person.id} travelling to ${target.label}`);
    return plan.person.id;
  };

  const initialState = (): WorldState => {
    const now = clock();
    const world = opts.world ? structuredClone(opts.world) : createQuadrantWorld(params);
    syncCommunities(world);
    const st: WorldState = {
      t: 0,
      frames: 0,
      params,
      world,
      persons: [],
      nextId: 0,
      spawnCursor: 0,
      removalCursor: 0,
      nextTravelAt: now + params.travelInterval,
      chart: createChart(params.chartWidth, now),
      events: [],
    };
    const count = Math.max(0, opts.population ?? params.initialPopulation);
    const ctx = contextFor(st, now);
    for (let i = 0; i < count; i++) spawn(st, ctx, nextCommunity(st));
    pushEvent(st, `Simulation started with ${count} ${plural(count)}`);
    return st;
  };

  const store = createStore<SimulationStore>()(
    immer((set, get) => {
      const commit = (recipe: (st: Draft<SimulationStore>) => void) => {
        pending.length = 0;
        set(recipe);
        flushEvents();
      };

      return {
        ...initialState(),
        actions: {
          tick: (dtMs) => {
            if (!(dtMs > 0)) return;
            const frametime = Math.min(dtMs / 1000, params.maxFrameTime);
            const c = controls.getState();
            const now = clock();
            pending.length = 0;
            const st = thaw(get());
            const ctx = contextFor(st, now);
            syncCommunities(st.world);
            if (now >= st.nextTravelAt) {
              st.nextTravelAt = now + params.travelInterval;
              if (c.communitiesEnabled && c.travelingEnabled) depart(st);
            }
            stepPopulation(st.persons, ctx, {
              frametime,
              distancingEnabled: c.distancingEnabled,
              distancingStrength: c.distancingStrength,
            });
            sampleChart(st.chart, countStates(st.persons), now, params.chartInterval);
            set({
              t: st.t + frametime,
              frames: st.frames + 1,
              world: st.world,
              persons: st.persons,
              nextTravelAt: st.nextTravelAt,
              chart: st.chart,
              events: st.events,
            });
            flushEvents();
          },
          addPeople: (count = params.batchSize) => {
            const ids: PersonID[] = [];
            commit((st) => {
              syncCommunities(st.world);
              const ctx = contextFor(st, clock());
              for (let i = 0; i < count; i++) ids.push(spawn(st, ctx, nextCommunity(st)).id);
            });
            return ids;
          },
          spawnAt: (point) => {
            const ids: PersonID[] = [];
            commit((st) => {
              const field = getRegion(st.world, st.world.fieldId);
              if (!rectContains(zoneRect(field), point)) return;
              syncCommunities(st.world);
              const hovered = controls.getState().communitiesEnabled
                ? st.world.communityOrder
                  .map((id) => getCommunity(st.world, id))
                  .find((community) => rectContains(zoneRect(community), point))
                : undefined;
              const ctx = contextFor(st, clock());
              ids.push(spawn(st, ctx, hovered ? hovered.id : nextCommunity(st), point).id);
            });
            return ids[0] ?? null;
          },
          removePeople: (count = params.batchSize) => {
            const ids: PersonID[] = [];
            commit((st) => {
              const plan = planRemovals(st.persons, count, {
                world: st.world,
                rng,
                cursor: st.removalCursor,
                communitiesEnabled: controls.getState().communitiesEnabled,
              });
              st.removalCursor = plan.cursor;
              if (plan.ids.length === 0) {
                pushEvent(st, 'Nobody left to remove');
                return;
              }
              const gone = new Set(plan.ids);
              st.persons = st.persons.filter((p) => !gone.has(p.id));
              ids.push(...plan.ids);
              pushEvent(st, `Removed ${plan.ids.length} ${plural(plan.ids.length)}`);
            });
            return ids;
          },
          infectOne: () => {
            const ids: PersonID[] = [];
            commit((st) => {
              const person = infectOne(st.persons, contextFor(st, clock()));
              if (person) ids.push(person.id);
              else pushEvent(st, 'Nobody left to infect');
            });
            return ids[0] ?? null;
          },
          randomizeDistancers: () => {
            let chosen = 0;
            commit((st) => {
              chosen = randomizeDistancers(st.persons, controls.getState().distancingPercent, rng);
              pushEvent(st, `Distancers randomized: ${chosen} of ${st.persons.length}`);
            });
            return chosen;
          },
          rebalanceDistancers: () => {
            let diff = 0;
            commit((st) => {
              const percent = controls.getState().distancingPercent;
              diff = rebalanceDistancers(st.persons, percent, rng);
              pushEvent(st, `Distancing rebalanced to ${percent}% (${countDistancers(st.persons)} of ${st.persons.length})`);
            });
            return diff;
          },
          travelOne: () => {
            const ids: PersonID[] = [];
            const c = controls.getState();
            if (!c.communitiesEnabled || !c.travelingEnabled) return null;
            commit((st) => {
              const id = depart(st);
              if (id !== null) ids.push(id);
            });
            return ids[0] ?? null;
          },
          markEvent: (color) => commit((st) => { markEvent(st.chart, color); }),
          addEvent: (text) => commit((st) => { pushEvent(st, text); }),
          reset: () => {
            pending.length = 0;
            set(initialState());
            flushEvents();
          },
          dispose: () => unsubscribe(),
        },
      };
    })
  );
  flushEvents();

  // Fires once per actual change, never per tick.
  const unsubscribe = controls.subscribe((next, prev) => {
    const { actions } = store.getState();
    if (next.distancingPercent !== prev.distancingPercent) actions.rebalanceDistancers();
    if (next.distancingEnabled !== prev.distancingEnabled) actions.markEvent(EVENT_COLORS.distancing);
    if (next.travelingEnabled !== prev.travelingEnabled) actions.markEvent(EVENT_COLORS.traveling);
  });

  return store;
}
