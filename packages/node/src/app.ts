/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests create the app without starting the
 * HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { WalletService } from "./services/wallet-service.js";
import type { WalletServiceConfig } from "./services/wallet-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { authMiddleware, callerHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createWalletRoutes } from "./routes/wallet.js";
import { createDepositRoutes } from "./routes/deposits.js";
import { createTransactionRoutes } from "./routes/transactions.js";
import { createGovernanceRoutes } from "./routes/governance.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly wallet: WalletServiceConfig;
  /** Request logs, notification debug logs and unexpected errors */
  readonly logger?: Logger | undefined;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig | undefined;
  readonly clock?: (() => Date) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: WalletService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { logger } = options;
  const service = new WalletService(options.wallet, { logger, clock: options.clock });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (logger !== undefined) {
    app.use("*", loggerMiddleware(logger));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(
    createErrorHandler((err) => {
      logger?.error({ err }, "Unhandled error");
    }),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    app.use("/api/*", callerHeaderMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Mount v1 API routes
  app.route("/api/v1/wallet", createWalletRoutes());
  app.route("/api/v1/deposits", createDepositRoutes());
  app.route("/api/v1/transactions", createTransactionRoutes());
  app.route("/api/v1/governance", createGovernanceRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
