import type { Address, Hex } from "viem";

// Timelock stages, in the bit order they occupy inside the packed schedule
export enum TimelockStage {
  SrcWithdrawal = 0,
  SrcPublicWithdrawal = 1,
  SrcCancellation = 2,
  SrcPublicCancellation = 3,
  DstWithdrawal = 4,
  DstPublicWithdrawal = 5,
  DstCancellation = 6,
}

// Stage offsets in seconds, relative to the deployment timestamp
export interface TimelockOffsets {
  srcWithdrawal: bigint;
  srcPublicWithdrawal: bigint;
  srcCancellation: bigint;
  srcPublicCancellation: bigint;
  dstWithdrawal: bigint;
  dstPublicWithdrawal: bigint;
  dstCancellation: bigint;
}

// Frozen parameter record of one escrow instance
export interface Immutables {
  orderHash: Hex;
  hashlock: Hex;
  maker: Address;
  taker: Address;
  token: Address;
  amount: bigint;
  safetyDeposit: bigint;
  timelocks: bigint; // packed TimelockSchedule
  parameters: Hex;
}

// Destination-side fields the source factory derives from a fill
export interface DstImmutablesComplement {
  maker: Address;
  amount: bigint;
  token: Address;
  safetyDeposit: bigint;
  chainId: bigint;
}

export enum EscrowRole {
  Source = "SOURCE",
  Destination = "DESTINATION",
}

export enum EscrowStatus {
  Active = "ACTIVE",
  Withdrawn = "WITHDRAWN",
  Cancelled = "CANCELLED",
}

// Actions that can be taken by a third party once the public windows open
export type PublicActionKind =
  | "SRC_PUBLIC_WITHDRAW"
  | "SRC_PUBLIC_CANCEL"
  | "DST_PUBLIC_WITHDRAW";

// Caller identity for a mutating escrow call
export interface CallContext {
  caller: Address;
  endorsement?: Hex; // EIP-712 signature from a whitelisted resolver
}

// Order as handed over by the order-matching protocol after a fill
export interface FillOrder {
  orderHash: Hex;
  maker: Address;
  receiver: Address; // zero address means the maker receives on the destination chain
  makerAsset: Address;
  takerAsset: Address;
  makingAmount: bigint;
  takingAmount: bigint;
}

// Decoded extra parameters of a fill
export interface EscrowExtraParameters {
  hashlock: Hex;
  dstChainId: bigint;
  dstToken: Address;
  deposits: bigint; // dstSafetyDeposit << 128 | srcSafetyDeposit
  timelocks: bigint; // srcCancellationTimestamp << 128 | dstWithdrawalTimestamp
}

// Record kept by the registry for every deployed escrow
export interface EscrowRecord {
  address: Address;
  hashlock: Hex;
  role: EscrowRole;
  digest: Hex;
  status: EscrowStatus;
  deployedAt: bigint;
}
