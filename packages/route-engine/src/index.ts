export * from "./delivery-config.js";
export * from "./distance-matrix.js";
export * from "./errors.js";
export * from "./grid.js";
export * from "./optimizer.js";
export * from "./path-stitcher.js";
export * from "./priority-queue.js";
export * from "./shortest-path.js";
export * from "./strategies.js";
export * from "./strategy-registry.js";
export * from "./tour.js";
