/**
 * Route barrel: re-exports all route modules.
 */

export { createAccountRoutes } from "./account.js";
export { createHealthRoutes } from "./health.js";
export { createPendingRoutes, createReconcileRoutes } from "./pending.js";
