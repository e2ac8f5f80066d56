export { healthRoutes } from "./health.js";
export { vconRoutes } from "./vcon.js";
