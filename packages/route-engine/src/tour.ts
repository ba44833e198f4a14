import type { PoiId } from "@gridroute/domain";
import type { DistanceMatrix } from "./distance-matrix.js";

export const DEFAULT_MAX_ITERATIONS = 1000;

export type TwoOptOptions = {
  maxIterations?: number;
};

export type TwoOptResult = {
  tour: PoiId[];
  iterations: number;
};

export function routeCost(tour: readonly PoiId[], matrix: DistanceMatrix) {
  let total = 0;
  for (let i = 0; i < tour.length - 1; i += 1) {
    total += matrix.get(tour[i], tour[i + 1]);
  }
  return total;
}

/**
 * Greedy open tour from `start`. Ties go to the destination listed first, and
 * unreachable destinations are only chosen once nothing finite is left.
 */
export function nearestNeighborTour(
  start: PoiId,
  destinations: readonly PoiId[],
  matrix: DistanceMatrix
): PoiId[] {
  const unvisited = [...destinations];
  const tour: PoiId[] = [start];
  let current = start;

  while (unvisited.length > 0) {
    let nearestIndex = 0;
    let nearestDistance = matrix.get(current, unvisited[0]);
    for (let i = 1; i < unvisited.length; i += 1) {
      const distance = matrix.get(current, unvisited[i]);
      if (distance < nearestDistance) {
        nearestDistance = distance;
        nearestIndex = i;
      }
    }

    const [next] = unvisited.splice(nearestIndex, 1);
    tour.push(next);
    current = next;
  }

  return tour;
}

function reverseSection(tour: readonly PoiId[], start: number, end: number): PoiId[] {
  return [...tour.slice(0, start), ...tour.slice(start, end).reverse(), ...tour.slice(end)];
}

function firstImprovement(tour: readonly PoiId[], cost: number, matrix: DistanceMatrix) {
  for (let i = 1; i < tour.length - 2; i += 1) {
    for (let j = i + 2; j < tour.length; j += 1) {
      const candidate = reverseSection(tour, i, j);
      const candidateCost = routeCost(candidate, matrix);
      if (candidateCost < cost) {
        return { tour: candidate, cost: candidateCost };
      }
    }
  }
  return undefined;
}

/**
 * First-improvement 2-opt. Each round scans reversals of `[i, j)` with
 * `1 <= i` and `j - i > 1`; the first one that shortens the tour is kept and a
 * new round starts. The count returned includes the final round that found
 * nothing. Position 0 never moves.
 */
export function twoOptTour(
  tour: readonly PoiId[],
  matrix: DistanceMatrix,
  options: TwoOptOptions = {}
): TwoOptResult {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  let best = [...tour];
  let bestCost = routeCost(best, matrix);
  let iterations = 0;

  while (iterations < maxIterations) {
    iterations += 1;
    const improvement = firstImprovement(best, bestCost, matrix);
    if (!improvement) {
      break;
    }
    best = improvement.tour;
    bestCost = improvement.cost;
  }

  return { tour: best, iterations };
}
