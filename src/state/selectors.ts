import type { ColumnSegment } from '../sim/chart';
import { columnSegments } from '../sim/chart';
import { NETWORK_GRADIENT, STATE_COLORS } from '../sim/colors';
import { colorAt } from '../sim/gradient';
import { countDistancers, countStates } from '../sim/population';
import { v2 } from '../sim/vec';
import type { ControlValues } from './controls';
import type { HealthCounts, PersonID, RGB, Vec2, WorldState } from './types';

export type PersonView = {
  id: PersonID;
  position: Vec2;
  radius: number;
  color: RGB;
  direction: Vec2 | null; // only while shown: directions overlay on, or travelling
  traveling: boolean;
  distancingRing: boolean;
  nearby: PersonID[];
};

export type NetworkLink = { from: Vec2; to: Vec2; color: RGB; alpha: number };

export function selectCounts(st: Pick<WorldState, 'persons'>): HealthCounts {
  return countStates(st.persons);
}

export function selectDistancerCount(st: Pick<WorldState, 'persons'>): number {
  return countDistancers(st.persons);
}

export function selectLabels(st: Pick<WorldState, 'persons' | 't'>): [string, number][] {
  const c = countStates(st.persons);
  return [
    ['timer', Math.round(st.t * 10) / 10],
    ['people', st.persons.length],
    ['distancers', countDistancers(st.persons)],
    ['susceptible', c.susceptible],
    ['infected', c.infected],
    ['recovered', c.recovered],
    ['deceased', c.deceased],
  ];
}

export function selectPersonViews(
  st: Pick<WorldState, 'persons'>,
  controls: Pick<ControlValues, 'showDirections' | 'distancingEnabled'>
): PersonView[] {
  return st.persons.map((p) => {
    const traveling = p.travelTarget !== null;
    const live = p.state !== 'deceased';
    return {
      id: p.id,
      position: { ...p.position },
      radius: p.radius,
      color: [...STATE_COLORS[p.state]],
      direction: live && (traveling || controls.showDirections) ? { ...p.direction } : null,
      traveling,
      distancingRing: live && !traveling && controls.distancingEnabled && p.distancing && p.nearby.length > 0,
      nearby: [...p.nearby],
    };
  });
}

// 255 touching, 0 at the edge of the distancing radius.
export function linkIntensity(distance: number, radius: number): number {
  return Math.abs(Math.trunc(255 * (1 - Math.min(distance, radius) / radius)));
}

/**
 * Half-length lines from every person towards each neighbour; the two halves of
 * a mutual pair meet in the middle.
 */
export function selectNetworkLinks(
  st: Pick<WorldState, 'persons' | 'params'>,
  controls: Pick<ControlValues, 'showNetwork'>
): NetworkLink[] {
  if (!controls.showNetwork) return [];
  const byId = new Map(st.persons.map((p) => [p.id, p]));
  const links: NetworkLink[] = [];
  for (const p of st.persons) {
    for (const id of p.nearby) {
      const other = byId.get(id);
      if (!other) continue;
      const toOther = v2.sub(p.position, other.position);
      const d = v2.len(toOther);
      if (d === 0) continue;
      const alpha = linkIntensity(d, st.params.distancingRadius);
      links.push({
        from: { ...p.position },
        to: v2.sub(p.position, v2.scale(toOther, 0.5)),
        color: colorAt(NETWORK_GRADIENT, alpha),
        alpha,
      });
    }
  }
  return links;
}

export function selectChartColumns(st: Pick<WorldState, 'chart'>, height: number): ColumnSegment[][] {
  return st.chart.samples.map((sample) => columnSegments(sample, height));
}
