import type { Address, Hex } from "viem";
import type { DstImmutablesComplement, Immutables } from "./index.ts";

// Entries appended to an escrow's journal
export interface EscrowWithdrawalEntry {
  type: "EscrowWithdrawal";
  escrow: Address;
  secret: Hex;
  recipient: Address;
  caller: Address;
  timestamp: bigint;
}

export interface EscrowCancelledEntry {
  type: "EscrowCancelled";
  escrow: Address;
  recipient: Address;
  caller: Address;
  timestamp: bigint;
}

export interface FundsRescuedEntry {
  type: "FundsRescued";
  escrow: Address;
  asset: Address;
  amount: bigint;
  timestamp: bigint;
}

export type EscrowJournalEntry =
  | EscrowWithdrawalEntry
  | EscrowCancelledEntry
  | FundsRescuedEntry;

// Entries appended to a factory's journal
export interface SrcEscrowCreatedEntry {
  type: "SrcEscrowCreated";
  escrow: Address;
  immutables: Immutables;
  dstComplement: DstImmutablesComplement;
  timestamp: bigint;
}

export interface DstEscrowCreatedEntry {
  type: "DstEscrowCreated";
  escrow: Address;
  hashlock: Hex;
  taker: Address;
  timestamp: bigint;
}

export interface ResolverWhitelistChangedEntry {
  type: "ResolverAdded" | "ResolverRemoved";
  resolver: Address;
  timestamp: bigint;
}

export interface FactoryFlagChangedEntry {
  type: "PausedChanged" | "WhitelistBypassChanged";
  value: boolean;
  timestamp: bigint;
}

export type FactoryJournalEntry =
  | SrcEscrowCreatedEntry
  | DstEscrowCreatedEntry
  | ResolverWhitelistChangedEntry
  | FactoryFlagChangedEntry;

// A journal entry together with its position in the journal
export interface Sequenced<T> {
  sequence: number;
  entry: T;
}
