import { ResourceLock } from "../state/locks.ts";
import { type Clock, SystemClock } from "./clock.ts";
import { type AssetLedger, InMemoryLedger } from "./ledger.ts";

/**
 * Everything an escrow or factory needs from the chain it lives on
 */
export interface ChainContext {
  chainId: number;
  clock: Clock;
  ledger: AssetLedger;
  locks: ResourceLock;
}

export function createChainContext(
  chainId: number,
  overrides: Partial<Omit<ChainContext, "chainId">> = {}
): ChainContext {
  return {
    chainId,
    clock: overrides.clock ?? new SystemClock(),
    ledger: overrides.ledger ?? new InMemoryLedger(),
    locks: overrides.locks ?? new ResourceLock(`chain-${chainId}`),
  };
}
