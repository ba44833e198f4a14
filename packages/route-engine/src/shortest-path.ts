import type { IntersectionId } from "@gridroute/domain";
import type { GridNetwork } from "./grid.js";
import { MinPriorityQueue } from "./priority-queue.js";

export type PathResult = {
  intersectionIds: IntersectionId[];
  distance: number;
};

export type FindPathRequest = {
  grid: GridNetwork;
  fromId: IntersectionId;
  toId: IntersectionId;
};

export interface ShortestPathEngine {
  /** Shortest cumulative weight, or `Infinity` when no passable path exists. */
  distance(request: FindPathRequest): number;
  /** Intersections from source to destination inclusive; empty when unreachable. */
  shortestPath(request: FindPathRequest): IntersectionId[];
  findPath(request: FindPathRequest): PathResult;
}

type SearchState = {
  distances: Map<IntersectionId, number>;
  previous: Map<IntersectionId, IntersectionId>;
};

function search(
  grid: GridNetwork,
  sourceId: IntersectionId,
  targetId?: IntersectionId
): SearchState {
  const distances = new Map<IntersectionId, number>();
  const previous = new Map<IntersectionId, IntersectionId>();
  if (!grid.isPassable(sourceId)) {
    return { distances, previous };
  }

  const settled = new Set<IntersectionId>();
  const open = new MinPriorityQueue<IntersectionId>();
  distances.set(sourceId, 0);
  open.push(sourceId, 0);

  while (open.size > 0) {
    const next = open.pop();
    if (!next) break;
    const { item: currentId, priority: currentDistance } = next;

    // Stale entry left behind by a later relaxation.
    if (settled.has(currentId)) {
      continue;
    }
    settled.add(currentId);
    if (currentId === targetId) {
      break;
    }

    for (const neighbor of grid.neighbors(currentId)) {
      if (settled.has(neighbor.intersectionId)) {
        continue;
      }
      const candidate = currentDistance + neighbor.weight;
      if (candidate < (distances.get(neighbor.intersectionId) ?? Number.POSITIVE_INFINITY)) {
        distances.set(neighbor.intersectionId, candidate);
        previous.set(neighbor.intersectionId, currentId);
        open.push(neighbor.intersectionId, candidate);
      }
    }
  }

  return { distances, previous };
}

function reconstructPath(
  previous: Map<IntersectionId, IntersectionId>,
  sourceId: IntersectionId,
  targetId: IntersectionId
): IntersectionId[] {
  const reversed: IntersectionId[] = [targetId];
  let currentId = targetId;
  while (currentId !== sourceId) {
    const parentId = previous.get(currentId);
    if (parentId === undefined) {
      return [];
    }
    reversed.push(parentId);
    currentId = parentId;
  }
  return reversed.reverse();
}

/** Dijkstra over the grid's passable segments, one search per query. */
export class DijkstraShortestPathEngine implements ShortestPathEngine {
  distance({ grid, fromId, toId }: FindPathRequest): number {
    if (!grid.isPassable(toId)) {
      return Number.POSITIVE_INFINITY;
    }
    const { distances } = search(grid, fromId, toId);
    return distances.get(toId) ?? Number.POSITIVE_INFINITY;
  }

  shortestPath(request: FindPathRequest): IntersectionId[] {
    return this.findPath(request).intersectionIds;
  }

  findPath({ grid, fromId, toId }: FindPathRequest): PathResult {
    const { distances, previous } = search(grid, fromId);
    const distance = distances.get(toId);
    if (distance === undefined) {
      return { intersectionIds: [], distance: Number.POSITIVE_INFINITY };
    }
    return {
      intersectionIds: reconstructPath(previous, fromId, toId),
      distance
    };
  }
}
