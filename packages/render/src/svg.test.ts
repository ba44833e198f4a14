import type { OptimizedRoute, PoiDefinition } from "@gridroute/domain";
import { buildGrid } from "@gridroute/route-engine";
import { describe, expect, it } from "vitest";
import { escapeXml, renderRouteSvg, viewBox } from "./svg.js";

const route: OptimizedRoute = {
  path: ["depot", "bakery"],
  fullPath: ["grid_1_1", "grid_0_1", "grid_0_0"],
  totalDistance: 100,
  algorithmName: "TSP Nearest Neighbor",
  iterations: 0
};

const nodes: PoiDefinition[] = [
  { id: "depot", gridX: 1, gridY: 1, type: "distribution_center", name: "Depot" },
  { id: "bakery", gridX: 0, gridY: 0, type: "delivery", name: "Tom & Jerry's" }
];

function depotGrid() {
  const grid = buildGrid(3, 3, 50);
  grid.addPoi("depot", 1, 1);
  grid.addPoi("bakery", 0, 0);
  return grid;
}

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml(`<a href="x">'&'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;"
    );
  });
});

describe("viewBox", () => {
  it("uses the extent of the bounds rather than their far corner", () => {
    expect(viewBox({ minX: 10, minY: 20, maxX: 110, maxY: 70 })).toBe("10 20 100 50");
  });
});

describe("renderRouteSvg", () => {
  it("sizes the drawing to the grid", () => {
    const svg = renderRouteSvg(depotGrid(), route);

    expect(svg).toMatch(/^<svg xmlns="http:\/\/www\.w3\.org\/2000\/svg" viewBox="0 0 150 150" width="150" height="150">/);
    expect(svg.endsWith("</svg>")).toBe(true);
  });

  it("draws each road once", () => {
    const svg = renderRouteSvg(depotGrid(), route);

    expect(svg.match(/<line /g)).toHaveLength(12);
  });

  it("marks blocked roads and intersections", () => {
    const grid = depotGrid();
    grid.blockRoad("grid_0_0", "grid_1_0");
    grid.blockIntersection("grid_2_2");
    const svg = renderRouteSvg(grid, route);

    expect(svg).toContain('<line class="road blocked" x1="25" y1="25" x2="75" y2="25" />');
    expect(svg.match(/class="road blocked"/g)).toHaveLength(1);
    expect(svg).toContain('<circle class="blocked-intersection" cx="125" cy="125"');
  });

  it("traces the driven path", () => {
    expect(renderRouteSvg(depotGrid(), route)).toContain(
      '<polyline class="route" points="75,75 25,75 25,25" />'
    );
  });

  it("labels stops in visit order with their names", () => {
    const svg = renderRouteSvg(depotGrid(), route, { nodes });

    expect(svg).toContain(
      '<g class="poi distribution-center start" data-poi="depot"><circle cx="75" cy="75" r="10" />' +
        '<text x="87" y="65">0. Depot</text></g>'
    );
    expect(svg).toContain('<text x="37" y="15">1. Tom &amp; Jerry&apos;s</text>');
  });

  it("falls back to POI ids without node names", () => {
    expect(renderRouteSvg(depotGrid(), route)).toContain('<text x="37" y="15">1. bakery</text>');
  });

  it("draws configured POIs that are not on the route", () => {
    const grid = depotGrid();
    grid.addPoi("florist", 2, 2);
    const svg = renderRouteSvg(grid, route, {
      nodes: [...nodes, { id: "florist", gridX: 2, gridY: 2, type: "delivery", name: "Florist" }]
    });

    expect(svg).toContain(
      '<g class="poi delivery off-route" data-poi="florist"><circle cx="125" cy="125" r="10" />' +
        '<text x="137" y="115">Florist</text></g>'
    );
    expect(svg.match(/<g class="poi /g)).toHaveLength(3);
  });

  it("styles markers by node type", () => {
    const withTypes = renderRouteSvg(depotGrid(), route, { nodes });
    const withoutNodes = renderRouteSvg(depotGrid(), route);

    expect(withTypes).toContain('<g class="poi delivery" data-poi="bakery">');
    expect(withoutNodes).toContain('<g class="poi delivery start" data-poi="depot">');
  });

  it("dots every open intersection and highlights the driven ones", () => {
    const grid = depotGrid();
    grid.blockIntersection("grid_2_2");
    const svg = renderRouteSvg(grid, route);

    expect(svg.match(/class="intersection on-route"/g)).toHaveLength(3);
    expect(svg.match(/class="intersection"/g)).toHaveLength(5);
    expect(svg).toContain('<circle class="intersection on-route" cx="25" cy="25" r="3" />');
  });

  it("skips the polyline for a single intersection", () => {
    const svg = renderRouteSvg(depotGrid(), { ...route, path: ["depot"], fullPath: ["grid_1_1"] });

    expect(svg).not.toContain("<polyline");
  });
});
