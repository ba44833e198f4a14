import { describe, expect, it } from "vitest";
import { buildGridFromPlan, parseDeliveryConfig, type DeliveryConfigInput } from "./delivery-config.js";
import { ConfigError, InvalidDimensionError } from "./errors.js";

const minimal: DeliveryConfigInput = {
  nodes: [
    { id: "distribution_center", grid_x: 1, grid_y: 1, type: "warehouse" },
    { id: "bakery", grid_x: 0, grid_y: 0, name: "Corner Bakery" }
  ],
  delivery_addresses: ["bakery"]
};

function configIssues(raw: unknown) {
  try {
    parseDeliveryConfig(raw);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe("parseDeliveryConfig", () => {
  it("fills in defaults", () => {
    const plan = parseDeliveryConfig(minimal);

    expect(plan.grid).toEqual({
      width: 15,
      height: 12,
      cellSize: 50,
      blockedRoads: [],
      blockedIntersections: []
    });
    expect(plan.startPoi).toBe("distribution_center");
    expect(plan.strategy).toBe("nearest_neighbor");
    expect(plan.maxIterations).toBe(1000);
  });

  it("maps nodes to camel case and names them after their id when unnamed", () => {
    const plan = parseDeliveryConfig(minimal);

    expect(plan.nodes).toEqual([
      {
        id: "distribution_center",
        gridX: 1,
        gridY: 1,
        type: "warehouse",
        name: "distribution_center"
      },
      { id: "bakery", gridX: 0, gridY: 0, type: "delivery", name: "Corner Bakery" }
    ]);
    expect(plan.deliveryAddresses).toEqual(["bakery"]);
  });

  it("reports every missing field", () => {
    expect(configIssues({})).toEqual(["nodes: Required", "delivery_addresses: Required"]);
  });

  it("rejects a config that is not an object", () => {
    expect(() => parseDeliveryConfig(null)).toThrow(ConfigError);
    expect(() => parseDeliveryConfig(null)).toThrow(/^Configuration validation failed:\n {2}\(root\): /);
  });

  it("caps the number of intersections", () => {
    expect(configIssues({ ...minimal, grid: { width: 1200, height: 1200 } })).toEqual([
      "grid: 1200x1200 grid has 1440000 intersections, the limit is 10000"
    ]);
    expect(parseDeliveryConfig({ ...minimal, grid: { width: 100, height: 100 } }).grid).toMatchObject({
      width: 100,
      height: 100
    });
  });

  it("rejects a non-positive iteration cap", () => {
    expect(configIssues({ ...minimal, max_iterations: 0 })).toHaveLength(1);
    expect(configIssues({ ...minimal, max_iterations: 0 })[0]).toMatch(/^max_iterations: /);
  });
});

describe("buildGridFromPlan", () => {
  it("maps nodes and applies blocks", () => {
    const grid = buildGridFromPlan(
      parseDeliveryConfig({
        ...minimal,
        grid: {
          width: 3,
          height: 3,
          cell_size: 40,
          blocked_roads: [["grid_0_0", "grid_1_0"]],
          blocked_intersections: ["grid_2_2"]
        }
      })
    );

    expect(grid.poiIntersection("bakery")?.id).toBe("grid_0_0");
    expect(grid.segment("grid_0_0", "grid_1_0")?.passable).toBe(false);
    expect(grid.segment("grid_1_0", "grid_0_0")?.passable).toBe(false);
    expect(grid.isPassable("grid_2_2")).toBe(false);
    expect(grid.cellSize).toBe(40);
  });

  it("rejects blocks that name no road or intersection", () => {
    const plan = parseDeliveryConfig({
      ...minimal,
      grid: {
        width: 3,
        height: 3,
        blocked_roads: [["grid_0_0", "grid_2_2"]],
        blocked_intersections: ["grid_7_7"]
      }
    });

    let caught: unknown;
    try {
      buildGridFromPlan(plan);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      issues: [
        "grid.blocked_roads.0: no road between 'grid_0_0' and 'grid_2_2'",
        "grid.blocked_intersections.0: unknown intersection 'grid_7_7'"
      ]
    });
  });

  it("surfaces bad grid sizes as dimension errors", () => {
    const plan = parseDeliveryConfig({ ...minimal, grid: { width: 0 } });

    expect(() => buildGridFromPlan(plan)).toThrow(InvalidDimensionError);
  });
});
