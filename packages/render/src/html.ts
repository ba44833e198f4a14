import type { OptimizedRoute } from "@gridroute/domain";
import type { GridNetwork } from "@gridroute/route-engine";
import { escapeXml, renderRouteSvg, type RenderOptions } from "./svg.js";

export type HtmlRenderOptions = RenderOptions & {
  title?: string;
};

const LEGEND: Array<[swatch: string, label: string]> = [
  ["road", "Open road"],
  ["road-blocked", "Blocked road or intersection"],
  ["route", "Optimized route"],
  ["distribution-center", "Distribution center"],
  ["delivery", "Delivery address"]
];

function legendItems() {
  return LEGEND.map(
    ([swatch, label]) => `<li><span class="swatch ${swatch}"></span>${label}</li>`
  ).join("\n");
}

export function formatDistance(distance: number) {
  return Number.isFinite(distance) ? distance.toFixed(2) : "unreachable";
}

export function renderRouteHtml(
  grid: GridNetwork,
  route: OptimizedRoute,
  options: HtmlRenderOptions = {}
): string {
  const title = escapeXml(options.title ?? "Optimized Delivery Route");
  const names = new Map((options.nodes ?? []).map((node) => [node.id, node.name]));
  const sequence = route.path.map((poiId) => escapeXml(names.get(poiId) ?? poiId)).join(" → ");

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${title}</title>
<style>
body { font-family: sans-serif; margin: 24px; color: #1c2024; background: #f7f8fa; }
.stats { display: flex; gap: 24px; flex-wrap: wrap; margin-bottom: 16px; }
.stats div { background: #ffffff; padding: 12px 16px; border-radius: 8px; }
.map svg { background: #ffffff; border-radius: 8px; max-width: 100%; height: auto; }
.legend { display: flex; gap: 16px; flex-wrap: wrap; list-style: none; padding: 0; }
.legend li { display: flex; align-items: center; gap: 6px; }
.swatch { display: inline-block; width: 16px; height: 16px; border-radius: 3px; }
.swatch.road { background: #d0d4da; }
.swatch.road-blocked { background: #e5484d; }
.swatch.route { background: #2f6fed; }
.swatch.distribution-center { background: #e5484d; border-radius: 50%; }
.swatch.delivery { background: #30a46c; border-radius: 50%; }
</style>
</head>
<body>
<h1>${title}</h1>
<section class="stats">
<div><strong>Total distance:</strong> ${formatDistance(route.totalDistance)} px</div>
<div><strong>Intersections:</strong> ${route.fullPath.length}</div>
<div><strong>Deliveries:</strong> ${Math.max(0, route.path.length - 1)}</div>
<div><strong>Algorithm:</strong> ${escapeXml(route.algorithmName)}</div>
<div><strong>Iterations:</strong> ${route.iterations}</div>
</section>
<p class="sequence">${sequence}</p>
<section class="map">${renderRouteSvg(grid, route, options)}</section>
<ul class="legend">
${legendItems()}
</ul>
</body>
</html>
`;
}
