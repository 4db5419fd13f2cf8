// System-wide constants for the escrow engine

import type { Address } from "viem";

// Native asset marker (safety deposits are always paid in it)
export const NATIVE_ASSET: Address = "0x0000000000000000000000000000000000000000";

// Timelock packing
export const TIMELOCK_FIELD_BITS = 32n;
export const TIMELOCK_FIELD_MASK = 0xffffffffn;
export const DEPLOYED_AT_SHIFT = 224n;

// Callback payload packing (two 128-bit halves)
export const HALF_WORD_BITS = 128n;
export const HALF_WORD_MASK = (1n << 128n) - 1n;

// Rescue delay used by the mainnet deployments: 7 days
export const DEFAULT_RESCUE_DELAY_SECONDS = 7n * 24n * 60n * 60n;

// Gap between a private window and its public counterpart
export const DEFAULT_PUBLIC_ACTION_GAP_SECONDS = 60n;

// Nonces at which the factory creates its escrow implementations
export const SRC_IMPLEMENTATION_NONCE = 1n;
export const DST_IMPLEMENTATION_NONCE = 2n;

// EIP-712 domain for public-action endorsements
export const ENDORSEMENT_DOMAIN_NAME = "Escrow";
export const ENDORSEMENT_DOMAIN_VERSION = "1";

// Query API
export const DEFAULT_RPC_PORT = 8787;
export const RPC_PREFIX = "/rpc";

// Lock resource used to serialize factory mutations
export const FACTORY_LOCK_PREFIX = "factory";
export const ESCROW_LOCK_PREFIX = "escrow";
