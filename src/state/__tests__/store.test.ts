import { describe, it, expect, vi } from 'vitest';

import { InvariantError } from '../../sim/invariant';
import { countDistancers, countStates } from '../../sim/population';
import { effectiveZone, getCommunity, zoneEdges } from '../../sim/regions';
import { testWorld } from '../../sim/__tests__/fixtures';
import { createControlsStore } from '../controls';
import { createSimulationStore } from '../store';
import type { SimulationOptions } from '../store';

function setup(opts: SimulationOptions = {}) {
  const time = { now: 0 };
  const controls = createControlsStore();
  const sim = createSimulationStore({ controls, clock: () => time.now, seed: 'store', population: 10, ...opts });
  return { sim, controls, time, actions: sim.getState().actions };
}

const communityOf = (sim: ReturnType<typeof setup>['sim'], id: number) =>
  sim.getState().persons.find((p) => p.id === id)?.bounds.community;

describe('Simulation store', () => {
  it('spawns the initial population round-robin across communities', () => {
    const { sim } = setup();
    const st = sim.getState();
    expect(st.persons.map((p) => p.id)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(st.persons.map((p) => p.bounds.community)).toEqual(['TL', 'TR', 'BR', 'BL', 'TL', 'TR', 'BR', 'BL', 'TL', 'TR']);
    expect(countStates(st.persons).susceptible).toBe(10);
    expect(countDistancers(st.persons)).toBe(10);
    expect(st.events).toEqual(['Simulation started with 10 people']);
  });

  it('reports new events to the hook', () => {
    const onEvent = vi.fn();
    setup({ onEvent, population: 1 });
    expect(onEvent).toHaveBeenCalledWith('Simulation started with 1 person');
  });

  it('ignores empty frames and caps long ones', () => {
    const { sim, actions } = setup();
    actions.tick(0);
    actions.tick(-5);
    expect(sim.getState().frames).toBe(0);
    actions.tick(1000);
    expect(sim.getState().t).toBe(0.25);
    expect(sim.getState().frames).toBe(1);
  });

  it('keeps everyone inside their zone while ticking', () => {
    const { sim, controls, time, actions } = setup();
    controls.getState().setToggle('travelingEnabled', false);
    controls.getState().setToggle('distancingEnabled', true);
    for (let i = 0; i < 200; i++) {
      time.now += 0.016;
      actions.tick(16);
      const st = sim.getState();
      for (const p of st.persons) {
        const e = zoneEdges(effectiveZone(p.bounds, st.world));
        expect(p.position.x).toBeGreaterThanOrEqual(e.left + p.radius);
        expect(p.position.x).toBeLessThanOrEqual(e.right - p.radius);
        expect(p.position.y).toBeGreaterThanOrEqual(e.top + p.radius);
        expect(p.position.y).toBeLessThanOrEqual(e.bottom - p.radius);
      }
    }
    expect(sim.getState().frames).toBe(200);
    expect(sim.getState().t).toBeCloseTo(3.2);
  });

  it('keeps a default-sized tick within the frame budget', () => {
    const time = { now: 0 };
    const sim = createSimulationStore({ seed: 'budget', clock: () => time.now });
    const { actions } = sim.getState();
    const frameMs = 1000 / 120;
    const run = (ticks: number) => {
      for (let i = 0; i < ticks; i++) {
        time.now += frameMs / 1000;
        actions.tick(frameMs);
      }
    };
    run(30);
    const started = performance.now();
    run(60);
    const perTick = (performance.now() - started) / 60;
    expect(sim.getState().persons).toHaveLength(200);
    expect(sim.getState().frames).toBe(90);
    expect(perTick).toBeLessThan(frameMs);
  });

  it('infects one person on demand', () => {
    const { sim, actions } = setup();
    const id = actions.infectOne();
    expect(id).not.toBeNull();
    expect(countStates(sim.getState().persons).infected).toBe(1);
    expect(sim.getState().events[0]).toBe(`Person ${id} infected`);
  });

  it('applies actions the host runs while handling an event', () => {
    const host: { onInfected?: () => void } = {};
    const { sim, actions } = setup({
      population: 5,
      onEvent: (text) => {
        if (text.endsWith(' infected')) host.onInfected?.();
      },
    });
    host.onInfected = () => actions.addPeople(1);
    actions.infectOne();
    expect(sim.getState().persons).toHaveLength(6);
    expect(countStates(sim.getState().persons).infected).toBe(1);
  });

  it('reports nothing from a tick that failed', () => {
    const onEvent = vi.fn();
    const { sim, time, actions } = setup({ onEvent });
    sim.setState((st) => {
      for (const p of st.persons) p.state = 'infected';
    });
    time.now = 2;
    expect(() => actions.tick(16)).toThrow(InvariantError);
    expect(onEvent).toHaveBeenCalledTimes(1);
    expect(onEvent).toHaveBeenCalledWith('Simulation started with 10 people');
    const st = sim.getState();
    expect(st.frames).toBe(0);
    expect(st.nextTravelAt).toBe(2);
    expect(st.events).toEqual(['Simulation started with 10 people']);
    expect(st.persons.every((p) => p.travelTarget === null)).toBe(true);
  });

  it('reports when nobody is left to infect or remove', () => {
    const { sim, actions } = setup({ population: 0 });
    expect(actions.infectOne()).toBeNull();
    expect(sim.getState().events[0]).toBe('Nobody left to infect');
    expect(actions.removePeople()).toEqual([]);
    expect(sim.getState().events).toEqual(['Nobody left to remove', 'Nobody left to infect', 'Simulation started with 0 people']);
  });

  it('samples the population shares once per interval', () => {
    const { sim, time, actions } = setup();
    actions.infectOne();
    time.now = 0.5;
    actions.tick(16);
    expect(sim.getState().chart.samples.at(-1)).toEqual({ kind: 'share', values: [0, 0, 1, 0] });
    time.now = 1;
    actions.tick(16);
    const { samples } = sim.getState().chart;
    expect(samples).toHaveLength(390);
    expect(samples.at(-1)).toEqual({ kind: 'share', values: [0.1, 0, 0.9, 0] });
  });

  it('rebalances distancers once per percent change', () => {
    const { sim, controls, time, actions } = setup();
    const rebalances = () => sim.getState().events.filter((e) => e.startsWith('Distancing rebalanced')).length;

    controls.getState().setDistancingPercent(50);
    expect(countDistancers(sim.getState().persons)).toBe(5);
    expect(sim.getState().events[0]).toBe('Distancing rebalanced to 50% (5 of 10)');

    controls.getState().setDistancingPercent(50);
    time.now = 0.5;
    actions.tick(16);
    actions.tick(16);
    expect(rebalances()).toBe(1);
    expect(countDistancers(sim.getState().persons)).toBe(5);
  });

  it('randomizes distancers at the current percent', () => {
    const { sim, controls, actions } = setup();
    controls.getState().setDistancingPercent(30);
    expect(actions.randomizeDistancers()).toBe(3);
    expect(countDistancers(sim.getState().persons)).toBe(3);
    expect(sim.getState().events[0]).toBe('Distancers randomized: 3 of 10');
  });

  it('marks the chart when distancing is toggled', () => {
    const { sim, controls, time, actions } = setup();
    controls.getState().toggle('distancingEnabled');
    expect(sim.getState().chart.eventMarker).toEqual([0, 255, 255]);
    time.now = 1;
    actions.tick(16);
    expect(sim.getState().chart.samples.at(-1)).toEqual({ kind: 'marker', color: [0, 255, 255] });
    expect(sim.getState().chart.eventMarker).toBeNull();
  });

  it('sends one person travelling every interval', () => {
    const { sim, time, actions } = setup();
    time.now = 1.9;
    actions.tick(16);
    expect(sim.getState().persons.filter((p) => p.travelTarget !== null)).toHaveLength(0);
    time.now = 2;
    actions.tick(16);
    expect(sim.getState().persons.filter((p) => p.travelTarget !== null)).toHaveLength(1);
    expect(sim.getState().events[0]).toMatch(/^Person \d+ travelling to (TL|TR|BR|BL)$/);
    expect(sim.getState().nextTravelAt).toBe(4);
    time.now = 3;
    actions.tick(16);
    expect(sim.getState().persons.filter((p) => p.travelTarget !== null)).toHaveLength(1);
  });

  it('sends nobody while travel is off', () => {
    const { sim, controls, time, actions } = setup();
    controls.getState().setToggle('travelingEnabled', false);
    expect(sim.getState().chart.eventMarker).toEqual([255, 128, 0]);
    time.now = 2;
    actions.tick(16);
    expect(sim.getState().persons.every((p) => p.travelTarget === null)).toBe(true);
    expect(actions.travelOne()).toBeNull();
  });

  it('starts a trip on demand', () => {
    const { sim, actions } = setup();
    const id = actions.travelOne();
    const traveller = sim.getState().persons.find((p) => p.id === id);
    expect(traveller?.travelTarget).not.toBeNull();
    expect(traveller?.travelTarget).not.toBe(traveller?.bounds.community);
  });

  it('opens the communities into the field when they are disabled', () => {
    const { sim, controls, actions } = setup();
    controls.getState().setToggle('communitiesEnabled', false);
    actions.tick(16);
    const { world } = sim.getState();
    expect(world.communityOrder.map((id) => getCommunity(world, id).active)).toEqual([false, false, false, false]);
    expect(actions.travelOne()).toBeNull();
  });

  it('removes people evenly across communities', () => {
    const { sim, actions } = setup();
    const before = sim.getState().persons.map((p) => ({ id: p.id, community: p.bounds.community }));
    const removed = actions.removePeople(4);
    expect(removed).toHaveLength(4);
    expect(removed.map((id) => before.find((p) => p.id === id)?.community).sort()).toEqual(['BL', 'BR', 'TL', 'TR']);
    expect(sim.getState().persons).toHaveLength(6);
    expect(sim.getState().events[0]).toBe('Removed 4 people');
  });

  it('adds people with fresh ids continuing the community cycle', () => {
    const { sim, actions } = setup();
    const ids = actions.addPeople(3);
    expect(ids).toEqual([10, 11, 12]);
    expect(ids.map((id) => communityOf(sim, id))).toEqual(['BR', 'BL', 'TL']);
    expect(actions.addPeople()).toHaveLength(10);
  });

  it('spawns at a point in the hovered community or the next one', () => {
    const { sim, actions } = setup();
    const hovered = actions.spawnAt({ x: 1000, y: 275 });
    expect(hovered).toBe(10);
    expect(communityOf(sim, 10)).toBe('TR');
    expect(sim.getState().persons.at(-1)?.position).toEqual({ x: 1000, y: 275 });

    const between = actions.spawnAt({ x: 100, y: 540 });
    expect(communityOf(sim, between ?? -1)).toBe('BR');

    expect(actions.spawnAt({ x: 5, y: 5 })).toBeNull();
    expect(sim.getState().persons).toHaveLength(12);
  });

  it('runs on a caller-supplied world without touching it', () => {
    const world = testWorld();
    const { sim, actions } = setup({ world, population: 4 });
    actions.tick(16);
    expect(sim.getState().persons.map((p) => p.bounds.community)).toEqual(['A', 'B', 'C', 'D']);
    expect(Object.isFrozen(world)).toBe(false);
  });

  it('caps the event log', () => {
    const { sim, actions } = setup();
    for (let i = 0; i < 60; i++) actions.addEvent(`note ${i}`);
    const { events } = sim.getState();
    expect(events).toHaveLength(50);
    expect(events[0]).toBe('note 59');
    expect(events[49]).toBe('note 10');
  });

  it('fails loudly on a corrupted infection', () => {
    const { sim, actions } = setup();
    sim.setState((st) => {
      st.persons[0].state = 'infected';
    });
    expect(() => actions.tick(16)).toThrow(InvariantError);
  });

  it('resets to a fresh population', () => {
    const { sim, actions } = setup();
    actions.infectOne();
    actions.removePeople(4);
    actions.reset();
    const st = sim.getState();
    expect(st.persons).toHaveLength(10);
    expect(countStates(st.persons).susceptible).toBe(10);
    expect(st.events).toEqual(['Simulation started with 10 people']);
  });

  it('stops following the controls once disposed', () => {
    const { sim, controls, actions } = setup();
    actions.dispose();
    controls.getState().setDistancingPercent(0);
    expect(countDistancers(sim.getState().persons)).toBe(10);
  });
});
