import type { OptimizedRoute, PoiDefinition, PoiKind } from "@gridroute/domain";
import type { GridBounds, GridNetwork, Intersection } from "@gridroute/route-engine";

export type RenderOptions = {
  nodes?: PoiDefinition[];
};

export function escapeXml(value: string) {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

const SVG_STYLE = [
  ".road { stroke: #d0d4da; stroke-width: 4; stroke-linecap: round; }",
  ".road.blocked { stroke: #e5484d; stroke-dasharray: 6 4; }",
  ".blocked-intersection { fill: #e5484d; }",
  ".intersection { fill: #b0b6bf; }",
  ".intersection.on-route { fill: #2f6fed; }",
  ".route { fill: none; stroke: #2f6fed; stroke-width: 5; stroke-linejoin: round; }",
  ".poi circle { stroke: #1c2024; stroke-width: 2; }",
  ".poi.distribution-center circle { fill: #e5484d; }",
  ".poi.delivery circle { fill: #30a46c; }",
  ".poi.start circle { stroke-width: 4; }",
  ".poi.off-route { opacity: 0.5; }",
  ".poi text { font: 12px sans-serif; fill: #1c2024; }"
].join(" ");

function roadLines(grid: GridNetwork) {
  const lines: string[] = [];
  const drawn = new Set<string>();
  for (const segment of grid.segments()) {
    if (drawn.has(`${segment.toId}->${segment.fromId}`)) {
      continue;
    }
    drawn.add(segment.id);

    const from = grid.intersection(segment.fromId);
    const to = grid.intersection(segment.toId);
    if (!from || !to) {
      continue;
    }
    const blocked = !segment.passable || !grid.segment(segment.toId, segment.fromId)?.passable;
    lines.push(
      `<line class="road${blocked ? " blocked" : ""}" x1="${from.px}" y1="${from.py}" x2="${to.px}" y2="${to.py}" />`
    );
  }
  return lines;
}

function routePolyline(grid: GridNetwork, route: OptimizedRoute) {
  const points = route.fullPath
    .map((id) => grid.intersection(id))
    .filter((intersection): intersection is Intersection => intersection !== undefined)
    .map((intersection) => `${intersection.px},${intersection.py}`);
  if (points.length < 2) {
    return [];
  }
  return [`<polyline class="route" points="${points.join(" ")}" />`];
}

function intersectionDots(grid: GridNetwork, route: OptimizedRoute) {
  const onRoute = new Set(route.fullPath);
  return grid
    .intersections()
    .filter((intersection) => intersection.passable)
    .map(
      (intersection) =>
        `<circle class="intersection${onRoute.has(intersection.id) ? " on-route" : ""}" cx="${intersection.px}" cy="${intersection.py}" r="3" />`
    );
}

function poiKindClass(type: PoiKind | undefined) {
  return type === "distribution_center" ? "distribution-center" : "delivery";
}

// Every mapped POI is drawn; stops on the route carry their visit order.
function poiMarkers(grid: GridNetwork, route: OptimizedRoute, nodes: PoiDefinition[]) {
  const nodeById = new Map(nodes.map((node) => [node.id, node]));
  const visitOrder = new Map(route.path.map((poiId, index) => [poiId, index]));
  const radius = Math.max(4, grid.cellSize / 5);

  return grid.pois().flatMap(([poiId, intersectionId]) => {
    const intersection = grid.intersection(intersectionId);
    if (!intersection) {
      return [];
    }
    const node = nodeById.get(poiId);
    const order = visitOrder.get(poiId);
    const classes = ["poi", poiKindClass(node?.type)];
    if (order === 0) {
      classes.push("start");
    }
    if (order === undefined) {
      classes.push("off-route");
    }

    const name = node?.name ?? poiId;
    const label = escapeXml(order === undefined ? name : `${order}. ${name}`);
    return [
      `<g class="${classes.join(" ")}" data-poi="${escapeXml(poiId)}">` +
        `<circle cx="${intersection.px}" cy="${intersection.py}" r="${radius}" />` +
        `<text x="${intersection.px + radius + 2}" y="${intersection.py - radius}">${label}</text>` +
        "</g>"
    ];
  });
}

export function viewBox({ minX, minY, maxX, maxY }: GridBounds) {
  return `${minX} ${minY} ${maxX - minX} ${maxY - minY}`;
}

/** Draws the street grid with its blocks, the driven path and every mapped POI. */
export function renderRouteSvg(
  grid: GridNetwork,
  route: OptimizedRoute,
  options: RenderOptions = {}
): string {
  const bounds = grid.bounds();
  const blockedIntersections = grid
    .intersections()
    .filter((intersection) => !intersection.passable)
    .map(
      (intersection) =>
        `<circle class="blocked-intersection" cx="${intersection.px}" cy="${intersection.py}" r="${grid.cellSize / 6}" />`
    );

  const body = [
    `<style>${SVG_STYLE}</style>`,
    ...roadLines(grid),
    ...blockedIntersections,
    ...intersectionDots(grid, route),
    ...routePolyline(grid, route),
    ...poiMarkers(grid, route, options.nodes ?? [])
  ];

  return (
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="${viewBox(bounds)}" ` +
    `width="${bounds.maxX - bounds.minX}" height="${bounds.maxY - bounds.minY}">` +
    body.join("") +
    "</svg>"
  );
}
