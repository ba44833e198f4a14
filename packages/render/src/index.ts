export * from "./html.js";
export * from "./summary.js";
export * from "./svg.js";
