import type { PoiId } from "@gridroute/domain";
import { UnmappedPoiError } from "./errors.js";
import type { GridNetwork, Intersection } from "./grid.js";
import type { ShortestPathEngine } from "./shortest-path.js";

function pairKey(fromPoi: PoiId, toPoi: PoiId) {
  return JSON.stringify([fromPoi, toPoi]);
}

/**
 * Shortest distances between ordered POI pairs, frozen at the passability state
 * of the grid when it was computed. Pairs that were never computed read as
 * `Infinity`; a POI to itself reads as 0.
 */
export class DistanceMatrix {
  private readonly entries = new Map<string, number>();

  constructor(readonly pois: readonly PoiId[]) {}

  set(fromPoi: PoiId, toPoi: PoiId, distance: number) {
    this.entries.set(pairKey(fromPoi, toPoi), distance);
  }

  get(fromPoi: PoiId, toPoi: PoiId): number {
    if (fromPoi === toPoi) {
      return 0;
    }
    return this.entries.get(pairKey(fromPoi, toPoi)) ?? Number.POSITIVE_INFINITY;
  }

  pairs(): Array<{ fromPoi: PoiId; toPoi: PoiId; distance: number }> {
    const pairs: Array<{ fromPoi: PoiId; toPoi: PoiId; distance: number }> = [];
    for (const fromPoi of this.pois) {
      for (const toPoi of this.pois) {
        if (fromPoi !== toPoi) {
          pairs.push({ fromPoi, toPoi, distance: this.get(fromPoi, toPoi) });
        }
      }
    }
    return pairs;
  }
}

export function resolvePoiIntersection(grid: GridNetwork, poiId: PoiId): Intersection {
  const intersection = grid.poiIntersection(poiId);
  if (!intersection) {
    throw new UnmappedPoiError(poiId);
  }
  return intersection;
}

export function computeDistanceMatrix(
  grid: GridNetwork,
  pois: readonly PoiId[],
  shortestPath: ShortestPathEngine
): DistanceMatrix {
  const intersections = new Map(pois.map((poi) => [poi, resolvePoiIntersection(grid, poi)]));
  const matrix = new DistanceMatrix([...intersections.keys()]);

  for (const [fromPoi, from] of intersections) {
    for (const [toPoi, to] of intersections) {
      if (fromPoi === toPoi) {
        continue;
      }
      matrix.set(fromPoi, toPoi, shortestPath.distance({ grid, fromId: from.id, toId: to.id }));
    }
  }

  return matrix;
}
