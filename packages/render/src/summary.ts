import type { OptimizedRoute } from "@gridroute/domain";
import { formatDistance } from "./html.js";

const RULE = "=".repeat(60);

export function formatRouteSummary(route: OptimizedRoute, options: { outputFile?: string } = {}) {
  const lines = [
    RULE,
    "ROUTE OPTIMIZED",
    RULE,
    `Route: ${route.path.join(" → ")}`,
    `Algorithm: ${route.algorithmName}`,
    `Intersections traversed: ${route.fullPath.length}`,
    `Total distance: ${formatDistance(route.totalDistance)} px`
  ];
  if (route.iterations > 0) {
    lines.push(`Iterations performed: ${route.iterations}`);
  }
  if (options.outputFile) {
    lines.push(`Output file: ${options.outputFile}`);
  }
  lines.push(RULE);
  return lines.join("\n");
}
