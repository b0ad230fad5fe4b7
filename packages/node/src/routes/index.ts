/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createPartyRoutes } from "./parties.js";
export { createAccountRoutes } from "./accounts.js";
export { createCategoryRoutes } from "./categories.js";
export { createTransactionRoutes } from "./transactions.js";
export { createBudgetRoutes } from "./budgets.js";
export { createRolloverRoutes } from "./rollover.js";
