import type { PoiId } from "@gridroute/domain";

export type RouteEngineErrorCode =
  | "INVALID_DIMENSION"
  | "UNMAPPED_POI"
  | "UNREACHABLE"
  | "UNKNOWN_STRATEGY"
  | "EMPTY_DESTINATIONS"
  | "DUPLICATE_POI"
  | "CONFIG_INVALID";

export class RouteEngineError extends Error {
  readonly code: RouteEngineErrorCode;

  constructor(code: RouteEngineErrorCode, message: string) {
    super(message);
    this.name = "RouteEngineError";
    this.code = code;
  }
}

export class InvalidDimensionError extends RouteEngineError {
  constructor(message: string) {
    super("INVALID_DIMENSION", message);
    this.name = "InvalidDimensionError";
  }
}

export class UnmappedPoiError extends RouteEngineError {
  readonly poiId: PoiId;

  constructor(poiId: PoiId) {
    super("UNMAPPED_POI", `POI '${poiId}' is not mapped to any intersection.`);
    this.name = "UnmappedPoiError";
    this.poiId = poiId;
  }
}

export class UnreachableError extends RouteEngineError {
  readonly fromPoi: PoiId;
  readonly toPoi: PoiId;

  constructor(fromPoi: PoiId, toPoi: PoiId) {
    super("UNREACHABLE", `No path found between POIs '${fromPoi}' and '${toPoi}'.`);
    this.name = "UnreachableError";
    this.fromPoi = fromPoi;
    this.toPoi = toPoi;
  }
}

export class UnknownStrategyError extends RouteEngineError {
  readonly strategy: string;
  readonly validStrategies: string[];

  constructor(strategy: string, validStrategies: string[]) {
    super(
      "UNKNOWN_STRATEGY",
      `Unknown strategy '${strategy}'. Available: ${validStrategies.join(", ")}.`
    );
    this.name = "UnknownStrategyError";
    this.strategy = strategy;
    this.validStrategies = validStrategies;
  }
}

export class EmptyDestinationsError extends RouteEngineError {
  constructor() {
    super("EMPTY_DESTINATIONS", "At least one destination POI is required.");
    this.name = "EmptyDestinationsError";
  }
}

export class DuplicatePoiError extends RouteEngineError {
  readonly poiId: PoiId;

  constructor(poiId: PoiId, reason: string) {
    super("DUPLICATE_POI", `POI '${poiId}' ${reason}.`);
    this.name = "DuplicatePoiError";
    this.poiId = poiId;
  }
}

function formatIssues(issues: string[]) {
  return issues.map((issue) => `  ${issue}`).join("\n");
}

export class ConfigError extends RouteEngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG_INVALID", `Configuration validation failed:\n${formatIssues(issues)}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function isRouteEngineError(value: unknown): value is RouteEngineError {
  return value instanceof RouteEngineError;
}
