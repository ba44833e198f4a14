import type { OptimizedRoute, PoiId } from "@gridroute/domain";
import type { BaseLogger } from "pino";
import { resolvePoiIntersection } from "./distance-matrix.js";
import { DuplicatePoiError, EmptyDestinationsError } from "./errors.js";
import type { GridNetwork } from "./grid.js";
import { DijkstraShortestPathEngine, type ShortestPathEngine } from "./shortest-path.js";
import { createDefaultStrategyRegistry, type StrategyRegistry } from "./strategy-registry.js";

export type RouteOptimizerOptions = {
  registry?: StrategyRegistry;
  shortestPath?: ShortestPathEngine;
  logger?: BaseLogger;
  maxIterations?: number;
};

function validateStops(grid: GridNetwork, start: PoiId, destinations: readonly PoiId[]) {
  if (destinations.length === 0) {
    throw new EmptyDestinationsError();
  }

  const seen = new Set<PoiId>();
  for (const destination of destinations) {
    if (destination === start) {
      throw new DuplicatePoiError(destination, "is the start and cannot also be a destination");
    }
    if (seen.has(destination)) {
      throw new DuplicatePoiError(destination, "is listed more than once as a destination");
    }
    seen.add(destination);
  }

  for (const poi of [start, ...destinations]) {
    resolvePoiIntersection(grid, poi);
  }
}

/**
 * Runs a registered strategy against one grid. The distance matrix is rebuilt
 * on every call, so blocking changes between calls are always picked up.
 */
export class RouteOptimizer {
  private readonly grid: GridNetwork;
  private readonly registry: StrategyRegistry;
  private readonly shortestPath: ShortestPathEngine;
  private readonly logger?: BaseLogger;
  private readonly maxIterations?: number;

  constructor(grid: GridNetwork, options: RouteOptimizerOptions = {}) {
    this.grid = grid;
    this.registry = options.registry ?? createDefaultStrategyRegistry();
    this.shortestPath = options.shortestPath ?? new DijkstraShortestPathEngine();
    this.logger = options.logger;
    this.maxIterations = options.maxIterations;
  }

  strategies(): string[] {
    return this.registry.names();
  }

  optimize(
    start: PoiId,
    destinations: readonly PoiId[],
    strategy = "nearest_neighbor"
  ): OptimizedRoute {
    const instance = this.registry.create(strategy, {
      shortestPath: this.shortestPath,
      logger: this.logger,
      maxIterations: this.maxIterations
    });
    validateStops(this.grid, start, destinations);

    const route = instance.optimize(this.grid, start, destinations);
    this.logger?.debug(
      {
        strategy: instance.name,
        stops: route.path.length,
        intersections: route.fullPath.length,
        totalDistance: route.totalDistance
      },
      "route optimized"
    );
    return route;
  }
}

export function optimizeRoute(
  grid: GridNetwork,
  startPoi: PoiId,
  destinationPois: readonly PoiId[],
  strategy = "nearest_neighbor",
  options?: RouteOptimizerOptions
): OptimizedRoute {
  return new RouteOptimizer(grid, options).optimize(startPoi, destinationPois, strategy);
}
