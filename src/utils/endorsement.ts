import { type Address, type Hex, hashTypedData } from "viem";
import {
  ENDORSEMENT_DOMAIN_NAME,
  ENDORSEMENT_DOMAIN_VERSION,
} from "../config/constants.ts";
import type { PublicActionKind } from "../types/index.ts";

// Domain: verifyingContract is the escrow clone the action targets
export function endorsementDomain(chainId: number, escrow: Address) {
  return {
    name: ENDORSEMENT_DOMAIN_NAME,
    version: ENDORSEMENT_DOMAIN_VERSION,
    chainId,
    verifyingContract: escrow,
  } as const;
}

export const PUBLIC_ACTION_TYPES = {
  PublicAction: [
    { name: "orderHash", type: "bytes32" },
    { name: "caller", type: "address" },
    { name: "action", type: "string" },
  ],
} as const;

export interface PublicActionMessage {
  orderHash: Hex;
  caller: Address;
  action: PublicActionKind;
}

/**
 * EIP-712 digest a whitelisted resolver signs to let `caller` run a public action
 */
export function publicActionDigest(
  chainId: number,
  escrow: Address,
  message: PublicActionMessage
): Hex {
  return hashTypedData(publicActionTypedData(chainId, escrow, message));
}

/**
 * Typed-data payload to hand to a wallet or local account for signing
 */
export function publicActionTypedData(
  chainId: number,
  escrow: Address,
  message: PublicActionMessage
) {
  return {
    domain: endorsementDomain(chainId, escrow),
    types: PUBLIC_ACTION_TYPES,
    primaryType: "PublicAction",
    message,
  } as const;
}
