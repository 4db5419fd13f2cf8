import {
  type Address,
  concat,
  getCreate2Address,
  getCreateAddress,
  type Hex,
  isAddressEqual,
  keccak256,
  zeroAddress,
} from "viem";
import {
  DST_IMPLEMENTATION_NONCE,
  SRC_IMPLEMENTATION_NONCE,
} from "../config/constants.ts";
import { EscrowRole } from "../types/index.ts";

// EIP-1167 minimal proxy creation code around the implementation address
const CLONE_PREFIX: Hex = "0x3d602d80600a3d3981f3363d3d373d3d3d363d73";
const CLONE_SUFFIX: Hex = "0x5af43d82803e903d91602b57fd5bf3";

/**
 * Hash of the minimal proxy init code delegating to `implementation`
 */
export function proxyBytecodeHash(implementation: Address): Hex {
  return keccak256(concat([CLONE_PREFIX, implementation, CLONE_SUFFIX]));
}

/**
 * CREATE2 address of a minimal proxy deployed by `deployer` with `salt`.
 * Depends on nothing but its inputs, so every chain computes the same value.
 */
export function predictDeterministicAddress(
  implementation: Address,
  salt: Hex,
  deployer: Address
): Address {
  return getCreate2Address({
    from: deployer,
    salt,
    bytecodeHash: proxyBytecodeHash(implementation),
  });
}

/**
 * Address of the escrow implementation a factory creates for a role
 */
export function implementationAddress(factory: Address, role: EscrowRole): Address {
  return getCreateAddress({
    from: factory,
    nonce: role === EscrowRole.Source ? SRC_IMPLEMENTATION_NONCE : DST_IMPLEMENTATION_NONCE,
  });
}

/**
 * Verify that a computed address matches an actual address
 */
export function verifyAddress(computed: Address, actual: Address): boolean {
  return isAddressEqual(computed, actual);
}

export function isZeroAddress(address: Address): boolean {
  return isAddressEqual(address, zeroAddress);
}
