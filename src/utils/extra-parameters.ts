import {
  type Address,
  decodeAbiParameters,
  encodeAbiParameters,
  type Hex,
  parseAbiParameters,
} from "viem";
import { HALF_WORD_BITS, HALF_WORD_MASK } from "../config/constants.ts";
import type { EscrowExtraParameters } from "../types/index.ts";
import { EscrowError, EscrowErrorType } from "./escrow-errors.ts";

/**
 * Extra parameters handed to the factory after a fill.
 * Layout: abi.encode(bytes32, uint256, address, uint256, uint256)
 *   - hashlock
 *   - dstChainId
 *   - dstToken
 *   - deposits  = (dstSafetyDeposit << 128) | srcSafetyDeposit
 *   - timelocks = (srcCancellationTimestamp << 128) | dstWithdrawalTimestamp
 */
const EXTRA_PARAMETERS_ABI = parseAbiParameters(
  "bytes32 hashlock, uint256 dstChainId, address dstToken, uint256 deposits, uint256 timelocks"
);

export function encodeExtraParameters(params: EscrowExtraParameters): Hex {
  return encodeAbiParameters(EXTRA_PARAMETERS_ABI, [
    params.hashlock,
    params.dstChainId,
    params.dstToken,
    params.deposits,
    params.timelocks,
  ]);
}

/**
 * Decode extra parameters
 * @throws EscrowError INVALID_EXTRA_PARAMETERS when the payload is malformed
 */
export function parseExtraParameters(data: Hex): EscrowExtraParameters {
  try {
    const [hashlock, dstChainId, dstToken, deposits, timelocks] = decodeAbiParameters(
      EXTRA_PARAMETERS_ABI,
      data
    );
    return { hashlock, dstChainId, dstToken, deposits, timelocks };
  } catch (error) {
    throw new EscrowError(
      EscrowErrorType.INVALID_EXTRA_PARAMETERS,
      error instanceof Error ? error.message : String(error)
    );
  }
}

export function packDeposits(srcSafetyDeposit: bigint, dstSafetyDeposit: bigint): bigint {
  return ((dstSafetyDeposit & HALF_WORD_MASK) << HALF_WORD_BITS) | (srcSafetyDeposit & HALF_WORD_MASK);
}

export function unpackDeposits(deposits: bigint): {
  srcSafetyDeposit: bigint;
  dstSafetyDeposit: bigint;
} {
  return {
    srcSafetyDeposit: deposits & HALF_WORD_MASK,
    dstSafetyDeposit: deposits >> HALF_WORD_BITS,
  };
}

/**
 * Pack the two absolute instants a fill carries
 */
export function packFillTimelocks(srcCancellation: bigint, dstWithdrawal: bigint): bigint {
  return ((srcCancellation & HALF_WORD_MASK) << HALF_WORD_BITS) | (dstWithdrawal & HALF_WORD_MASK);
}

export function parseFillTimelocks(timelocks: bigint): {
  srcCancellation: bigint;
  dstWithdrawal: bigint;
} {
  return {
    srcCancellation: timelocks >> HALF_WORD_BITS,
    dstWithdrawal: timelocks & HALF_WORD_MASK,
  };
}

/**
 * Receiver of destination funds: the order receiver, or the maker if unset
 */
export function resolveReceiver(maker: Address, receiver: Address): Address {
  return /^0x0{40}$/i.test(receiver) ? maker : receiver;
}
