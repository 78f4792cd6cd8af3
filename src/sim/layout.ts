import type { Params, World } from '../state/types';
import { createCommunity, createRegion } from './regions';

const QUADRANTS = [
  { id: 'TL', col: 0, row: 0 },
  { id: 'TR', col: 1, row: 0 },
  { id: 'BR', col: 1, row: 1 },
  { id: 'BL', col: 0, row: 1 },
] as const;

type LayoutParams = Pick<Params, 'worldWidth' | 'worldHeight' | 'layoutGap' | 'border' | 'hubSize'>;

/**
 * Default scenario: one field region filling the world (minus the gap) and a
 * square of four communities centred in it, listed clockwise from top-left.
 */
export function createQuadrantWorld(p: LayoutParams): World {
  const { worldWidth: width, worldHeight: height, layoutGap: gap, border, hubSize } = p;
  const field = createRegion('field', { x: width / 2, y: height / 2 }, { width: width - 2 * gap, height: height - 2 * gap }, border, 'Field');

  const side = field.size.height;
  const x0 = field.center.x - side / 2;
  const y0 = field.center.y - side / 2;
  const half = side / 2;

  const world: World = { fieldId: field.id, regions: { [field.id]: field }, communities: {}, communityOrder: [] };
  for (const q of QUADRANTS) {
    world.communities[q.id] = createCommunity(
      q.id,
      { x: x0 + half * q.col + half / 2, y: y0 + half * q.row + half / 2 },
      { width: half - 2 * gap, height: half - 2 * gap },
      { border, hubSize }
    );
    world.communityOrder.push(q.id);
  }
  return world;
}
