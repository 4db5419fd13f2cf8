/**
 * Escrow Factory Query API Contract
 *
 * Read-only procedures over the factory and its escrows. Amounts and
 * timestamps travel as decimal strings.
 */

import { type Address, getAddress, type Hex, isAddress } from "viem";
import { z } from "zod";
import { EscrowRole, EscrowStatus } from "../../types/index.ts";

// ============================================================================
// Schemas
// ============================================================================

export const AddressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, "Invalid Ethereum address")
  .refine((value) => isAddress(value, { strict: false }), "Invalid Ethereum address")
  .transform((value): Address => getAddress(value));

export const Bytes32Schema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{64}$/, "Must be 32 bytes of hex")
  .transform((value): Hex => `0x${value.slice(2)}`);

export const HexDataSchema = z
  .string()
  .regex(/^0x([a-fA-F0-9]{2})*$/, "Must be hex encoded bytes")
  .transform((value): Hex => `0x${value.slice(2)}`);

export const UintStringSchema = z
  .string()
  .regex(/^\d+$/, "Must be a non-negative integer string")
  .transform((value) => BigInt(value));

export const ImmutablesInputSchema = z.object({
  orderHash: Bytes32Schema,
  hashlock: Bytes32Schema,
  maker: AddressSchema,
  taker: AddressSchema,
  token: AddressSchema,
  amount: UintStringSchema.describe("Amount in base units"),
  safetyDeposit: UintStringSchema.describe("Native safety deposit in wei"),
  timelocks: UintStringSchema.describe("Packed timelock schedule"),
  parameters: HexDataSchema.default("0x"),
});

export const EscrowRoleSchema = z.nativeEnum(EscrowRole);

export const EscrowPhaseSchema = z.enum([
  "WITHDRAWAL_PENDING",
  "PRIVATE_WITHDRAWAL",
  "PUBLIC_WITHDRAWAL",
  "PRIVATE_CANCELLATION",
  "PUBLIC_CANCELLATION",
]);

/**
 * Health check output schema
 */
export const HealthOutputSchema = z.object({
  status: z.literal("healthy"),
  service: z.literal("escrow-engine"),
  chainId: z.number(),
  factory: z.string(),
  paused: z.boolean(),
  escrows: z.number().describe("Escrows deployed by this process"),
  timestamp: z.string().describe("Current timestamp in ISO format"),
  uptime: z.number().describe("Service uptime in seconds"),
});

export const PredictAddressInputSchema = z.object({
  immutables: ImmutablesInputSchema,
  role: EscrowRoleSchema,
});

export const PredictAddressOutputSchema = z.object({
  address: z.string(),
  digest: z.string(),
  implementation: z.string(),
});

export const EscrowForInputSchema = z.object({
  hashlock: Bytes32Schema,
});

export const EscrowForOutputSchema = z.object({
  hashlock: z.string(),
  escrow: z.string(),
});

export const EscrowStateInputSchema = z.object({
  escrow: AddressSchema,
});

export const EscrowStateOutputSchema = z.object({
  escrow: z.string(),
  role: EscrowRoleSchema,
  status: z.nativeEnum(EscrowStatus),
  phase: EscrowPhaseSchema,
  hashlock: z.string(),
  deployedAt: z.string(),
  balances: z.object({
    token: z.string(),
    native: z.string(),
  }),
});

export const JournalInputSchema = z.object({
  escrow: AddressSchema.optional().describe("Escrow journal to read; the factory journal when omitted"),
  fromSequence: z.number().int().min(0).default(0),
});

export const JournalOutputSchema = z.object({
  journal: z.string(),
  length: z.number(),
  entries: z.array(
    z.object({
      sequence: z.number(),
      type: z.string(),
      entry: z.record(z.string(), z.unknown()),
    })
  ),
});

// ============================================================================
// Error Schemas
// ============================================================================

export const ErrorCodes = {
  INPUT_VALIDATION_FAILED: {
    status: 422,
    message: "Input validation failed",
    data: z.object({
      formErrors: z.array(z.string()),
      fieldErrors: z.record(z.string(), z.array(z.string()).optional()),
    }),
  },
  ESCROW_NOT_FOUND: {
    status: 404,
    message: "Escrow not found",
    data: z.object({
      hashlock: z.string().optional(),
      escrow: z.string().optional(),
    }),
  },
} as const;
