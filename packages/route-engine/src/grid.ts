import type { GridCoordinate, IntersectionId, PixelPosition, PoiId } from "@gridroute/domain";
import { InvalidDimensionError } from "./errors.js";

export type Intersection = GridCoordinate &
  PixelPosition & {
    id: IntersectionId;
    passable: boolean;
  };

export type RoadSegment = {
  id: string;
  fromId: IntersectionId;
  toId: IntersectionId;
  weight: number;
  passable: boolean;
};

export type Neighbor = {
  intersectionId: IntersectionId;
  weight: number;
};

export type GridBounds = {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
};

export function intersectionIdAt(x: number, y: number): IntersectionId {
  return `grid_${x}_${y}`;
}

function segmentKey(fromId: IntersectionId, toId: IntersectionId) {
  return `${fromId}->${toId}`;
}

function clampIndex(value: number, size: number) {
  if (!Number.isFinite(value)) {
    return value > 0 ? size - 1 : 0;
  }
  return Math.max(0, Math.min(Math.trunc(value), size - 1));
}

function assertDimension(label: string, value: number) {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidDimensionError(`Grid ${label} must be a positive integer, got ${value}.`);
  }
}

/**
 * Rectangular road network. Intersections sit on integer grid coordinates and
 * every pair of horizontal or vertical neighbours is joined by two directed
 * segments, one per direction.
 *
 * Passability flags are mutated in place; callers must not block or unblock
 * while a shortest-path query or distance matrix computation is running.
 */
export class GridNetwork {
  readonly width: number;
  readonly height: number;
  readonly cellSize: number;

  private readonly intersectionMap = new Map<IntersectionId, Intersection>();
  private readonly segmentMap = new Map<string, RoadSegment>();
  private readonly outgoing = new Map<IntersectionId, RoadSegment[]>();
  private readonly poiMap = new Map<PoiId, IntersectionId>();

  constructor(width: number, height: number, cellSize: number) {
    assertDimension("width", width);
    assertDimension("height", height);
    if (!Number.isFinite(cellSize) || cellSize <= 0) {
      throw new InvalidDimensionError(`Grid cell size must be a positive number, got ${cellSize}.`);
    }

    this.width = width;
    this.height = height;
    this.cellSize = cellSize;

    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        const id = intersectionIdAt(x, y);
        this.intersectionMap.set(id, {
          id,
          x,
          y,
          px: x * cellSize + cellSize / 2,
          py: y * cellSize + cellSize / 2,
          passable: true
        });
        this.outgoing.set(id, []);
      }
    }

    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        const current = intersectionIdAt(x, y);
        if (x < width - 1) {
          this.connect(current, intersectionIdAt(x + 1, y));
        }
        if (y < height - 1) {
          this.connect(current, intersectionIdAt(x, y + 1));
        }
      }
    }
  }

  private connect(aId: IntersectionId, bId: IntersectionId) {
    this.addSegment(aId, bId);
    this.addSegment(bId, aId);
  }

  private addSegment(fromId: IntersectionId, toId: IntersectionId) {
    const from = this.intersectionMap.get(fromId);
    const to = this.intersectionMap.get(toId);
    if (!from || !to) {
      return;
    }
    const segment: RoadSegment = {
      id: segmentKey(fromId, toId),
      fromId,
      toId,
      weight: Math.hypot(from.px - to.px, from.py - to.py),
      passable: true
    };
    this.segmentMap.set(segment.id, segment);
    this.outgoing.get(fromId)?.push(segment);
  }

  get size() {
    return this.intersectionMap.size;
  }

  /** Maps a POI onto the intersection nearest to (x, y) inside the grid. */
  addPoi(poiId: PoiId, x: number, y: number): IntersectionId {
    const id = intersectionIdAt(clampIndex(x, this.width), clampIndex(y, this.height));
    this.poiMap.set(poiId, id);
    return id;
  }

  poiIntersection(poiId: PoiId): Intersection | undefined {
    const id = this.poiMap.get(poiId);
    return id === undefined ? undefined : this.intersectionMap.get(id);
  }

  pois(): Array<[PoiId, IntersectionId]> {
    return [...this.poiMap.entries()];
  }

  intersection(id: IntersectionId): Intersection | undefined {
    return this.intersectionMap.get(id);
  }

  intersectionAt(x: number, y: number): Intersection | undefined {
    return this.intersectionMap.get(intersectionIdAt(x, y));
  }

  intersections(): Intersection[] {
    return [...this.intersectionMap.values()];
  }

  segment(fromId: IntersectionId, toId: IntersectionId): RoadSegment | undefined {
    return this.segmentMap.get(segmentKey(fromId, toId));
  }

  segments(): RoadSegment[] {
    return [...this.segmentMap.values()];
  }

  neighbors(intersectionId: IntersectionId): Neighbor[] {
    const neighbors: Neighbor[] = [];
    for (const segment of this.outgoing.get(intersectionId) ?? []) {
      if (!segment.passable || !this.intersectionMap.get(segment.toId)?.passable) {
        continue;
      }
      neighbors.push({ intersectionId: segment.toId, weight: segment.weight });
    }
    return neighbors;
  }

  isPassable(intersectionId: IntersectionId) {
    return this.intersectionMap.get(intersectionId)?.passable ?? false;
  }

  blockSegment(fromId: IntersectionId, toId: IntersectionId) {
    return this.setSegmentPassable(fromId, toId, false);
  }

  unblockSegment(fromId: IntersectionId, toId: IntersectionId) {
    return this.setSegmentPassable(fromId, toId, true);
  }

  /** Blocks both directions of the road between two adjacent intersections. */
  blockRoad(aId: IntersectionId, bId: IntersectionId) {
    const forward = this.blockSegment(aId, bId);
    const reverse = this.blockSegment(bId, aId);
    return forward && reverse;
  }

  unblockRoad(aId: IntersectionId, bId: IntersectionId) {
    const forward = this.unblockSegment(aId, bId);
    const reverse = this.unblockSegment(bId, aId);
    return forward && reverse;
  }

  blockIntersection(id: IntersectionId) {
    return this.setIntersectionPassable(id, false);
  }

  unblockIntersection(id: IntersectionId) {
    return this.setIntersectionPassable(id, true);
  }

  bounds(): GridBounds {
    return {
      minX: 0,
      minY: 0,
      maxX: this.width * this.cellSize,
      maxY: this.height * this.cellSize
    };
  }

  private setSegmentPassable(fromId: IntersectionId, toId: IntersectionId, passable: boolean) {
    const segment = this.segmentMap.get(segmentKey(fromId, toId));
    if (!segment) {
      return false;
    }
    segment.passable = passable;
    return true;
  }

  private setIntersectionPassable(id: IntersectionId, passable: boolean) {
    const intersection = this.intersectionMap.get(id);
    if (!intersection) {
      return false;
    }
    intersection.passable = passable;
    return true;
  }
}

export function buildGrid(width: number, height: number, cellSize: number): GridNetwork {
  return new GridNetwork(width, height, cellSize);
}
