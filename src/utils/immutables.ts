import {
  encodeAbiParameters,
  type Hex,
  isAddress,
  isHex,
  keccak256,
  parseAbiParameters,
  size,
} from "viem";
import type { Immutables } from "../types/index.ts";

// Encoded as one struct so the dynamic `parameters` field gets a head offset
// and a length prefix, matching abi.encode(immutables) on-chain.
const IMMUTABLES_ABI = parseAbiParameters(
  "(bytes32 orderHash, bytes32 hashlock, address maker, address taker, address token, uint256 amount, uint256 safetyDeposit, uint256 timelocks, bytes parameters)"
);

const UINT256_MAX = (1n << 256n) - 1n;

/**
 * ABI-encode immutables for hashing
 */
export function encodeImmutables(immutables: Immutables): Hex {
  return encodeAbiParameters(IMMUTABLES_ABI, [
    {
      orderHash: immutables.orderHash,
      hashlock: immutables.hashlock,
      maker: immutables.maker,
      taker: immutables.taker,
      token: immutables.token,
      amount: immutables.amount,
      safetyDeposit: immutables.safetyDeposit,
      timelocks: immutables.timelocks,
      parameters: immutables.parameters,
    },
  ]);
}

/**
 * Digest of the full parameter set.
 * Used as the CREATE2 salt and as the integrity check on every escrow call.
 */
export function hashImmutables(immutables: Immutables): Hex {
  return keccak256(encodeImmutables(immutables));
}

/**
 * Structural validation of immutables
 * @throws Error naming the first invalid field
 */
export function validateImmutables(immutables: Immutables): void {
  if (!isHex(immutables.orderHash) || size(immutables.orderHash) !== 32) {
    throw new Error("Invalid order hash");
  }
  if (!isHex(immutables.hashlock) || size(immutables.hashlock) !== 32) {
    throw new Error("Invalid hashlock");
  }
  if (!isAddress(immutables.maker, { strict: false })) {
    throw new Error("Invalid maker address");
  }
  if (!isAddress(immutables.taker, { strict: false })) {
    throw new Error("Invalid taker address");
  }
  if (!isAddress(immutables.token, { strict: false })) {
    throw new Error("Invalid token address");
  }
  if (immutables.amount < 0n || immutables.amount > UINT256_MAX) {
    throw new Error("Amount out of range");
  }
  if (immutables.safetyDeposit < 0n || immutables.safetyDeposit > UINT256_MAX) {
    throw new Error("Safety deposit out of range");
  }
  if (immutables.timelocks < 0n || immutables.timelocks > UINT256_MAX) {
    throw new Error("Timelocks out of range");
  }
  if (!isHex(immutables.parameters)) {
    throw new Error("Parameters must be hex encoded");
  }
}
