export type PoiId = string;

export type IntersectionId = string;

export type GridCoordinate = {
  x: number;
  y: number;
};

export type PixelPosition = {
  px: number;
  py: number;
};

export type StrategyName = "nearest_neighbor" | "2opt";

export type OptimizedRoute = {
  readonly path: readonly PoiId[];
  readonly fullPath: readonly IntersectionId[];
  readonly totalDistance: number;
  readonly algorithmName: string;
  readonly iterations: number;
};

export type PoiKind = "distribution_center" | "delivery" | (string & {});

export type PoiDefinition = {
  id: PoiId;
  gridX: number;
  gridY: number;
  type: PoiKind;
  name: string;
};

export type GridSettings = {
  width: number;
  height: number;
  cellSize: number;
  blockedRoads: Array<[IntersectionId, IntersectionId]>;
  blockedIntersections: IntersectionId[];
};

export type DeliveryPlan = {
  grid: GridSettings;
  nodes: PoiDefinition[];
  deliveryAddresses: PoiId[];
  startPoi: PoiId;
  strategy: string;
  maxIterations: number;
};
