import type { Bounds, Community, Edges, Rect, Region, Size, Vec2, World, Zone, ZoneID } from '../state/types';
import { invariant } from './invariant';

export function createRegion(id: ZoneID, center: Vec2, size: Size, border = 0, label = id): Region {
  return { kind: 'region', id, label, center: { ...center }, size: { ...size }, border };
}

export function createCommunity(
  id: ZoneID,
  center: Vec2,
  size: Size,
  opts: { border?: number; hubSize?: number; label?: string; active?: boolean } = {}
): Community {
  return {
    kind: 'community',
    id,
    label: opts.label ?? id,
    center: { ...center },
    size: { ...size },
    border: opts.border ?? 0,
    hubSize: opts.hubSize ?? 30,
    active: opts.active ?? true,
  };
}

/** Inner edges, inset by the zone border on every side. */
export function zoneEdges(zone: Zone): Edges {
  const { center, size, border } = zone;
  return {
    left: center.x - size.width / 2 + border,
    top: center.y - size.height / 2 + border,
    right: center.x + size.width / 2 - border,
    bottom: center.y + size.height / 2 - border,
  };
}

export function zoneRect(zone: Zone): Rect {
  return {
    left: zone.center.x - zone.size.width / 2,
    top: zone.center.y - zone.size.height / 2,
    width: zone.size.width,
    height: zone.size.height,
  };
}

// Flush with the outer bottom-right corner, straddling the border.
export function hubRect(community: Community): Rect {
  const outer = zoneRect(community);
  return {
    left: outer.left + outer.width - community.hubSize,
    top: outer.top + outer.height - community.hubSize,
    width: community.hubSize,
    height: community.hubSize,
  };
}

export function rectCenter(rect: Rect): Vec2 {
  return { x: rect.left + rect.width / 2, y: rect.top + rect.height / 2 };
}

// Half-open on the right and bottom so neighbouring rects never share a point.
export function rectContains(rect: Rect, p: Vec2): boolean {
  return p.x >= rect.left && p.x < rect.left + rect.width && p.y >= rect.top && p.y < rect.top + rect.height;
}

export function resizeZone(zone: Zone, size: Size): void {
  zone.size = { ...size };
}

export function getCommunity(world: World, id: ZoneID): Community {
  const community = world.communities[id];
  invariant(community, `Unknown community "${id}"`);
  return community;
}

export function getRegion(world: World, id: ZoneID): Region {
  const region = world.regions[id];
  invariant(region, `Unknown region "${id}"`);
  return region;
}

/** The community while it is active, otherwise the enclosing region. */
export function effectiveZone(bounds: Bounds, world: World): Zone {
  const community = getCommunity(world, bounds.community);
  return community.active ? community : getRegion(world, bounds.region);
}
