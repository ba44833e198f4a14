import type { OptimizedRoute, PoiId, StrategyName } from "@gridroute/domain";
import type { BaseLogger } from "pino";
import { computeDistanceMatrix, type DistanceMatrix } from "./distance-matrix.js";
import type { GridNetwork } from "./grid.js";
import { stitchPath } from "./path-stitcher.js";
import type { ShortestPathEngine } from "./shortest-path.js";
import { DEFAULT_MAX_ITERATIONS, nearestNeighborTour, routeCost, twoOptTour } from "./tour.js";

export interface RouteStrategy {
  readonly name: string;
  readonly algorithmName: string;
  optimize(grid: GridNetwork, start: PoiId, destinations: readonly PoiId[]): OptimizedRoute;
}

export type StrategyOptions = {
  shortestPath: ShortestPathEngine;
  logger?: BaseLogger;
  maxIterations?: number;
};

function constructTour(
  grid: GridNetwork,
  start: PoiId,
  destinations: readonly PoiId[],
  options: StrategyOptions
): { matrix: DistanceMatrix; tour: PoiId[] } {
  const matrix = computeDistanceMatrix(grid, [start, ...destinations], options.shortestPath);
  const tour = nearestNeighborTour(start, destinations, matrix);
  options.logger?.debug(
    { pois: matrix.pois.length, cost: routeCost(tour, matrix) },
    "nearest neighbor tour constructed"
  );
  return { matrix, tour };
}

export class NearestNeighborStrategy implements RouteStrategy {
  readonly name: StrategyName = "nearest_neighbor";
  readonly algorithmName = "TSP Nearest Neighbor";
  private readonly options: StrategyOptions;

  constructor(options: StrategyOptions) {
    this.options = options;
  }

  optimize(grid: GridNetwork, start: PoiId, destinations: readonly PoiId[]): OptimizedRoute {
    const { tour } = constructTour(grid, start, destinations, this.options);
    const { fullPath, totalDistance } = stitchPath(grid, tour, this.options.shortestPath);
    return {
      path: tour,
      fullPath,
      totalDistance,
      algorithmName: this.algorithmName,
      iterations: 0
    };
  }
}

export class TwoOptStrategy implements RouteStrategy {
  readonly name: StrategyName = "2opt";
  readonly algorithmName = "TSP + 2-Opt Local Search";
  private readonly options: StrategyOptions;
  private readonly maxIterations: number;

  constructor(options: StrategyOptions) {
    this.options = options;
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  }

  optimize(grid: GridNetwork, start: PoiId, destinations: readonly PoiId[]): OptimizedRoute {
    const { matrix, tour } = constructTour(grid, start, destinations, this.options);
    const refined = twoOptTour(tour, matrix, { maxIterations: this.maxIterations });
    this.options.logger?.debug(
      {
        iterations: refined.iterations,
        maxIterations: this.maxIterations,
        cost: routeCost(refined.tour, matrix)
      },
      "2-opt refinement finished"
    );

    const { fullPath, totalDistance } = stitchPath(grid, refined.tour, this.options.shortestPath);
    return {
      path: refined.tour,
      fullPath,
      totalDistance,
      algorithmName: this.algorithmName,
      iterations: refined.iterations
    };
  }
}
