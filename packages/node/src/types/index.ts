/**
 * Type barrel — re-exports all public types from @quorum-vault/node.
 */

// DTOs
export {
  DecimalValueSchema,
  HexPayloadSchema,
  TransactionIdParamSchema,
  DepositSchema,
  ProposeTransactionSchema,
  ListTransactionsQuerySchema,
  ProposeOwnerUpdateSchema,
  ProposeDeclineSchema,
  ListEventsQuerySchema,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export type { AuthContext, ApiKeyRecord, JwtClaims } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
