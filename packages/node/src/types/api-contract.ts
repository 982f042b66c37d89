/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { WalletService } from "../services/wallet-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the quorum-vault app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The hosted wallet (set for every /api route) */
    service: WalletService;

    /** Who is calling (set by auth middleware, or from X-Caller-Address) */
    auth: AuthContext;
  };
}
