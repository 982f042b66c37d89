/**
 * @quorum-vault/node — HTTP host for a quorum wallet.
 *
 * @packageDocumentation
 */

export { WalletService } from "./services/wallet-service.js";
export type {
  WalletServiceConfig,
  WalletServiceOptions,
  TransactionView,
  ApprovalsView,
  WalletSummary,
  ProposalInput,
} from "./services/wallet-service.js";
export { loadConfig, parseApiKeys, parseOwnerList, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
