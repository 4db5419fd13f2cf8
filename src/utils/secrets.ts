import { getRandomValues } from "node:crypto";
import { type Hex, isHex, keccak256, size, toHex } from "viem";

/**
 * Generate a random 32-byte secret
 */
export function generateSecret(): Hex {
  const bytes = new Uint8Array(32);
  getRandomValues(bytes);
  return toHex(bytes);
}

/**
 * Compute the keccak256 hashlock of a secret
 */
export function computeHashlock(secret: Hex): Hex {
  return keccak256(secret);
}

/**
 * Validate a secret against a hashlock
 */
export function validateSecret(secret: Hex, hashlock: Hex): boolean {
  if (!isHex(secret) || size(secret) !== 32) return false;
  return computeHashlock(secret).toLowerCase() === hashlock.toLowerCase();
}
