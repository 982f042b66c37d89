/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createWalletRoutes } from "./wallet.js";
export { createDepositRoutes } from "./deposits.js";
export { createTransactionRoutes } from "./transactions.js";
export { createGovernanceRoutes } from "./governance.js";
export { createEventRoutes } from "./events.js";
