import type { IntersectionId, PoiId } from "@gridroute/domain";
import { resolvePoiIntersection } from "./distance-matrix.js";
import { UnreachableError } from "./errors.js";
import type { GridNetwork } from "./grid.js";
import type { ShortestPathEngine } from "./shortest-path.js";

export type StitchedPath = {
  fullPath: IntersectionId[];
  totalDistance: number;
};

/**
 * Expands a POI visiting order into the intersections actually driven. Each leg
 * after the first drops its opening intersection, which is the previous leg's
 * last one.
 */
export function stitchPath(
  grid: GridNetwork,
  poiOrder: readonly PoiId[],
  shortestPath: ShortestPathEngine
): StitchedPath {
  const intersections = poiOrder.map((poi) => resolvePoiIntersection(grid, poi));
  if (intersections.length === 0) {
    return { fullPath: [], totalDistance: 0 };
  }
  if (intersections.length === 1) {
    return { fullPath: [intersections[0].id], totalDistance: 0 };
  }

  const fullPath: IntersectionId[] = [];
  let totalDistance = 0;

  for (let i = 0; i < intersections.length - 1; i += 1) {
    const leg = shortestPath.findPath({
      grid,
      fromId: intersections[i].id,
      toId: intersections[i + 1].id
    });
    if (leg.intersectionIds.length === 0) {
      throw new UnreachableError(poiOrder[i], poiOrder[i + 1]);
    }

    fullPath.push(...(i === 0 ? leg.intersectionIds : leg.intersectionIds.slice(1)));
    totalDistance += leg.distance;
  }

  return { fullPath, totalDistance };
}
