/**
 * Request DTOs with Zod validation schemas.
 *
 * Routes read the parsed output through validateBody and safeParse.
 * Amounts travel as decimal strings and payloads as 0x-hex, so no value
 * loses precision in JSON.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const DecimalValueSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative decimal integer string");

export const HexPayloadSchema = z
  .string()
  .regex(/^0x(?:[0-9a-fA-F]{2})*$/, "Expected 0x-prefixed hex bytes");

export const TransactionIdParamSchema = z
  .string()
  .regex(/^\d+$/, "Transaction id must be a non-negative integer")
  .transform((raw) => Number(raw));

// =============================================================================
// Deposits
// =============================================================================

export const DepositSchema = z.object({
  value: DecimalValueSchema,
});

// =============================================================================
// Transactions
// =============================================================================

export const ProposeTransactionSchema = z.object({
  destination: z.string().min(1),
  value: DecimalValueSchema,
  payload: HexPayloadSchema.optional(),
  /** Also approve as the proposer */
  approve: z.boolean().default(false),
});

export const ListTransactionsQuerySchema = z.object({
  start: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Governance
// =============================================================================

export const ProposeOwnerUpdateSchema = z.object({
  owners: z.array(z.string()).min(1),
  threshold: z.number().int().min(1),
  approve: z.boolean().default(false),
});

export const ProposeDeclineSchema = z.object({
  transactionId: z.number().int().min(0),
  approve: z.boolean().default(false),
});

// =============================================================================
// Events
// =============================================================================

export const ListEventsQuerySchema = z.object({
  fromPosition: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});
