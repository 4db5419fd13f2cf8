/**
 * Atomic Swap Flow Integration Tests
 *
 * A full cross-chain swap between a source factory (chain 1) and a destination
 * factory (chain 10) deployed at the same address, driven by the resolver and
 * settled through the secret relay; plus the refund path when no secret is revealed.
 */

import { beforeEach, describe, expect, it } from "vitest";
import { ManualClock } from "../../src/chain/clock.ts";
import { NATIVE_ASSET } from "../../src/config/constants.ts";
import { EscrowDst } from "../../src/escrow/escrow-dst.ts";
import { EscrowSrc } from "../../src/escrow/escrow-src.ts";
import { SecretRelay } from "../../src/resolver/secret-relay.ts";
import { EscrowRole, EscrowStatus, type Immutables, TimelockStage } from "../../src/types/index.ts";
import { unlockInstant } from "../../src/utils/timelocks.ts";
import {
  completeFill,
  createTestFactory,
  prepareSourceFill,
  TEST_ADDRESSES,
  TEST_HASHLOCK,
  TEST_VALUES,
  type TestFactoryEnvironment,
} from "../setup.ts";

const { MAKER, TAKER, SRC_TOKEN, DST_TOKEN } = TEST_ADDRESSES;
const { T0, SECRET } = TEST_VALUES;

interface DeployedSwap {
  source: EscrowSrc;
  sourceImmutables: Immutables;
  destination: EscrowDst;
  destinationImmutables: Immutables;
}

describe("atomic swap flow", () => {
  let clock: ManualClock;
  let srcEnv: TestFactoryEnvironment;
  let dstEnv: TestFactoryEnvironment;

  beforeEach(async () => {
    clock = new ManualClock(T0);
    srcEnv = await createTestFactory({ chainId: TEST_VALUES.SRC_CHAIN_ID, clock });
    dstEnv = await createTestFactory({ chainId: TEST_VALUES.DST_CHAIN_ID, clock });
  });

  /**
   * Fill on the source chain, then mirror the escrow on the destination chain
   */
  async function deploySwap(): Promise<DeployedSwap> {
    prepareSourceFill(srcEnv);
    const creation = await completeFill(srcEnv.factory);
    const source = srcEnv.factory.getEscrow(creation.escrow);
    if (!(source instanceof EscrowSrc)) throw new Error("source escrow missing");

    const { dstComplement } = creation;
    dstEnv.ledger.mint(NATIVE_ASSET, TAKER, dstComplement.safetyDeposit);
    dstEnv.ledger.mint(dstComplement.token, TAKER, dstComplement.amount);
    dstEnv.ledger.approve(dstComplement.token, TAKER, dstEnv.factory.address, dstComplement.amount);

    const address = await dstEnv.factory.createDstEscrow(
      TAKER,
      {
        orderHash: creation.immutables.orderHash,
        hashlock: creation.immutables.hashlock,
        maker: dstComplement.maker,
        taker: TAKER,
        token: dstComplement.token,
        amount: dstComplement.amount,
        safetyDeposit: dstComplement.safetyDeposit,
        timelocks: creation.immutables.timelocks,
        parameters: "0x",
      },
      unlockInstant(creation.immutables.timelocks, TimelockStage.SrcCancellation)
    );
    const destination = dstEnv.factory.getEscrow(address);
    if (!(destination instanceof EscrowDst)) throw new Error("destination escrow missing");

    return {
      source,
      sourceImmutables: source.getImmutables(),
      destination,
      destinationImmutables: destination.getImmutables(),
    };
  }

  it("predicts the same address on both chains", () => {
    const immutables = {
      orderHash: TEST_VALUES.ORDER_HASH,
      hashlock: TEST_HASHLOCK,
      maker: MAKER,
      taker: TAKER,
      token: SRC_TOKEN,
      amount: 1n,
      safetyDeposit: 1n,
      timelocks: 0n,
      parameters: "0x",
    } satisfies Immutables;

    expect(srcEnv.factory.predictAddress(immutables, EscrowRole.Source)).toBe(
      dstEnv.factory.predictAddress(immutables, EscrowRole.Source)
    );
  });

  it("swaps both legs once the secret is revealed", async () => {
    const swap = await deploySwap();
    const relay = new SecretRelay({
      source: swap.source,
      sourceImmutables: swap.sourceImmutables,
      destination: swap.destination,
      ctx: { caller: TAKER },
    });
    relay.start();

    expect(swap.destination.address).toBe(dstEnv.factory.escrowFor(TEST_HASHLOCK));
    expect(await swap.destination.balances()).toEqual({
      token: TEST_VALUES.DST_AMOUNT,
      native: TEST_VALUES.DST_SAFETY_DEPOSIT,
    });

    // Destination withdrawal opens 300 s after the fill
    await expect(
      swap.destination.withdraw({ caller: TAKER }, SECRET, swap.destinationImmutables)
    ).rejects.toMatchObject({ message: "Action is outside its timelock window: DstWithdrawal opens in 5m" });

    clock.set(T0 + 300n);
    await swap.destination.withdraw({ caller: TAKER }, SECRET, swap.destinationImmutables);

    await expect(relay.whenSettled()).resolves.toEqual({ status: "COMPLETED", secret: SECRET });

    // Maker received the destination tokens; resolver the source tokens and both deposits
    expect(await dstEnv.ledger.balanceOf(DST_TOKEN, MAKER)).toBe(TEST_VALUES.DST_AMOUNT);
    expect(await srcEnv.ledger.balanceOf(SRC_TOKEN, TAKER)).toBe(TEST_VALUES.AMOUNT);
    expect(await dstEnv.ledger.balanceOf(NATIVE_ASSET, TAKER)).toBe(TEST_VALUES.DST_SAFETY_DEPOSIT);
    expect(await srcEnv.ledger.balanceOf(NATIVE_ASSET, TAKER)).toBe(TEST_VALUES.SAFETY_DEPOSIT);

    expect(srcEnv.registry.getRecord(swap.source.address)?.status).toBe(EscrowStatus.Withdrawn);
    expect(dstEnv.registry.getRecord(swap.destination.address)?.status).toBe(EscrowStatus.Withdrawn);
  });

  it("refunds both sides when the secret is never revealed", async () => {
    const swap = await deploySwap();

    clock.set(T0 + 3600n);
    await swap.destination.cancel({ caller: TAKER }, swap.destinationImmutables);
    await swap.source.cancel({ caller: TAKER }, swap.sourceImmutables);

    expect(await dstEnv.ledger.balanceOf(DST_TOKEN, TAKER)).toBe(TEST_VALUES.DST_AMOUNT);
    expect(await srcEnv.ledger.balanceOf(SRC_TOKEN, MAKER)).toBe(TEST_VALUES.AMOUNT);
    expect(swap.source.status).toBe(EscrowStatus.Cancelled);
    expect(swap.destination.status).toBe(EscrowStatus.Cancelled);

    await expect(
      swap.source.withdraw({ caller: TAKER }, SECRET, swap.sourceImmutables)
    ).rejects.toMatchObject({ message: "Escrow is already settled: CANCELLED" });
  });
});
