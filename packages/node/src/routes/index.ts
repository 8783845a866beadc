/**
 * Route barrel.
 */

export { createAssetRoutes } from "./assets.js";
export { createOfferRoutes } from "./offers.js";
export { createPrincipalRoutes } from "./principals.js";
export { createEventRoutes } from "./events.js";
export { createHealthRoutes } from "./health.js";
