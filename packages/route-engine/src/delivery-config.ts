import type { DeliveryPlan } from "@gridroute/domain";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { buildGrid, type GridNetwork } from "./grid.js";
import { DEFAULT_MAX_ITERATIONS } from "./tour.js";

export const DEFAULT_GRID_WIDTH = 15;
export const DEFAULT_GRID_HEIGHT = 12;
export const DEFAULT_CELL_SIZE = 50;
export const DEFAULT_START_POI = "distribution_center";
export const MAX_GRID_INTERSECTIONS = 10_000;

const nodeSchema = z.object({
  id: z.string().min(1),
  grid_x: z.number().int(),
  grid_y: z.number().int(),
  type: z.string().min(1).default("delivery"),
  name: z.string().optional()
});

// Non-positive widths and heights are left to the grid itself so they surface
// as InvalidDimensionError; only the overall size is capped here.
const gridSchema = z
  .object({
    width: z.number().int().default(DEFAULT_GRID_WIDTH),
    height: z.number().int().default(DEFAULT_GRID_HEIGHT),
    cell_size: z.number().positive().default(DEFAULT_CELL_SIZE),
    blocked_roads: z.array(z.tuple([z.string(), z.string()])).default([]),
    blocked_intersections: z.array(z.string()).default([])
  })
  .superRefine((grid, ctx) => {
    const intersections = grid.width * grid.height;
    if (grid.width > 0 && grid.height > 0 && intersections > MAX_GRID_INTERSECTIONS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${grid.width}x${grid.height} grid has ${intersections} intersections, the limit is ${MAX_GRID_INTERSECTIONS}`
      });
    }
  })
  .default({});

const deliveryConfigSchema = z.object({
  grid: gridSchema,
  nodes: z.array(nodeSchema),
  delivery_addresses: z.array(z.string().min(1)),
  start_poi: z.string().min(1).default(DEFAULT_START_POI),
  strategy: z.string().min(1).default("nearest_neighbor"),
  max_iterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS)
});

export type DeliveryConfigInput = z.input<typeof deliveryConfigSchema>;

export function parseDeliveryConfig(raw: unknown): DeliveryPlan {
  const result = deliveryConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const config = result.data;
  return {
    grid: {
      width: config.grid.width,
      height: config.grid.height,
      cellSize: config.grid.cell_size,
      blockedRoads: config.grid.blocked_roads,
      blockedIntersections: config.grid.blocked_intersections
    },
    nodes: config.nodes.map((node) => ({
      id: node.id,
      gridX: node.grid_x,
      gridY: node.grid_y,
      type: node.type,
      name: node.name ?? node.id
    })),
    deliveryAddresses: config.delivery_addresses,
    startPoi: config.start_poi,
    strategy: config.strategy,
    maxIterations: config.max_iterations
  };
}

/** Builds the grid, maps every configured node and applies the configured blocks. */
export function buildGridFromPlan(plan: DeliveryPlan): GridNetwork {
  const grid = buildGrid(plan.grid.width, plan.grid.height, plan.grid.cellSize);
  for (const node of plan.nodes) {
    grid.addPoi(node.id, node.gridX, node.gridY);
  }

  const issues: string[] = [];
  plan.grid.blockedRoads.forEach(([fromId, toId], index) => {
    if (!grid.blockRoad(fromId, toId)) {
      issues.push(`grid.blocked_roads.${index}: no road between '${fromId}' and '${toId}'`);
    }
  });
  plan.grid.blockedIntersections.forEach((id, index) => {
    if (!grid.blockIntersection(id)) {
      issues.push(`grid.blocked_intersections.${index}: unknown intersection '${id}'`);
    }
  });

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return grid;
}
