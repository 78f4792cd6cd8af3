import { resolveParams } from '../../state/params';
import type { Params, Person, PersonID, Rng, SimContext, World } from '../../state/types';
import { createCommunity, createRegion } from '../regions';

export function sequence(...values: number[]): Rng {
  let i = 0;
  return () => {
    if (i >= values.length) throw new Error(`random source exhausted after ${values.length} draws`);
    return values[i++];
  };
}

export const constant = (v: number): Rng => () => v;

export const noRandom: Rng = () => {
  throw new Error('unexpected random draw');
};

/** 400×400 field split into four 200×200 communities A B / D C, no borders. */
export function testWorld(opts: { active?: boolean } = {}): World {
  const active = opts.active ?? true;
  const field = createRegion('field', { x: 200, y: 200 }, { width: 400, height: 400 });
  const mk = (id: string, x: number, y: number) =>
    createCommunity(id, { x, y }, { width: 200, height: 200 }, { hubSize: 20, active });
  return {
    fieldId: 'field',
    regions: { field },
    communities: { A: mk('A', 100, 100), B: mk('B', 300, 100), C: mk('C', 300, 300), D: mk('D', 100, 300) },
    communityOrder: ['A', 'B', 'C', 'D'],
  };
}

export function makePerson(id: PersonID, overrides: Partial<Person> = {}): Person {
  return {
    id,
    position: { x: 100, y: 100 },
    direction: { x: 1, y: 0 },
    speed: 120,
    radius: 5,
    state: 'susceptible',
    distancing: false,
    bounds: { community: 'A', region: 'field' },
    travelTarget: null,
    infectedStart: null,
    infectedEnd: null,
    lastEvent: 0,
    nearby: [],
    ...overrides,
  };
}

export function makeContext(
  opts: { rng?: Rng; now?: number; world?: World; params?: Partial<Params> } = {}
): SimContext & { lines: string[] } {
  const lines: string[] = [];
  return {
    params: resolveParams(opts.params),
    world: opts.world ?? testWorld(),
    rng: opts.rng ?? noRandom,
    now: opts.now ?? 0,
    log: (text) => lines.push(text),
    lines,
  };
}
