import type { Hex } from "viem";
import { beforeEach, describe, expect, it } from "vitest";
import type { ManualClock } from "../../../src/chain/clock.ts";
import type { InMemoryLedger } from "../../../src/chain/ledger.ts";
import { NATIVE_ASSET } from "../../../src/config/constants.ts";
import { EscrowDst } from "../../../src/escrow/escrow-dst.ts";
import { EscrowSrc } from "../../../src/escrow/escrow-src.ts";
import { SecretRelay } from "../../../src/resolver/secret-relay.ts";
import { EscrowStatus, type Immutables } from "../../../src/types/index.ts";
import { computeHashlock } from "../../../src/utils/secrets.ts";
import {
  AllowListPolicy,
  createTestChain,
  makeImmutables,
  TEST_ADDRESSES,
  TEST_VALUES,
} from "../../setup.ts";

const { TAKER, KEEPER, SRC_TOKEN, DST_TOKEN } = TEST_ADDRESSES;
const { T0, SECRET } = TEST_VALUES;
const SRC_ESCROW = TEST_ADDRESSES.ESCROW;
const DST_ESCROW = "0x0000000000000000000000000000000000654321";
const OTHER_SECRET: Hex = "0x00000000000000000000000000000000000000000000000000000000000000ff";

describe("SecretRelay", () => {
  let srcClock: ManualClock;
  let srcLedger: InMemoryLedger;
  let source: EscrowSrc;
  let sourceImmutables: Immutables;

  function deployDestination(secret: Hex = SECRET): { destination: EscrowDst; immutables: Immutables } {
    const { ledger, chain } = createTestChain(TEST_VALUES.DST_CHAIN_ID);
    const immutables = makeImmutables({
      hashlock: computeHashlock(secret),
      token: DST_TOKEN,
      amount: TEST_VALUES.DST_AMOUNT,
      safetyDeposit: TEST_VALUES.DST_SAFETY_DEPOSIT,
    });
    ledger.mint(DST_TOKEN, DST_ESCROW, TEST_VALUES.DST_AMOUNT);
    ledger.mint(NATIVE_ASSET, DST_ESCROW, TEST_VALUES.DST_SAFETY_DEPOSIT);
    const destination = new EscrowDst({
      address: DST_ESCROW,
      immutables,
      chain,
      rescueDelay: TEST_VALUES.RESCUE_DELAY,
      policy: new AllowListPolicy([]),
    });
    return { destination, immutables };
  }

  beforeEach(() => {
    const srcChain = createTestChain(TEST_VALUES.SRC_CHAIN_ID);
    srcClock = srcChain.clock;
    srcLedger = srcChain.ledger;
    sourceImmutables = makeImmutables();
    srcLedger.mint(SRC_TOKEN, SRC_ESCROW, TEST_VALUES.AMOUNT);
    srcLedger.mint(NATIVE_ASSET, SRC_ESCROW, TEST_VALUES.SAFETY_DEPOSIT);
    source = new EscrowSrc({
      address: SRC_ESCROW,
      immutables: sourceImmutables,
      chain: srcChain.chain,
      rescueDelay: TEST_VALUES.RESCUE_DELAY,
      policy: new AllowListPolicy([KEEPER]),
    });
  });

  it("withdraws the source once the destination reveals the secret", async () => {
    const { destination, immutables } = deployDestination();
    const relay = new SecretRelay({ source, sourceImmutables, destination, ctx: { caller: TAKER } });

    relay.start();
    expect(relay.status).toEqual({ status: "WATCHING" });

    await destination.withdraw({ caller: TAKER }, SECRET, immutables);

    await expect(relay.whenSettled()).resolves.toEqual({ status: "COMPLETED", secret: SECRET });
    expect(source.status).toBe(EscrowStatus.Withdrawn);
    expect(await srcLedger.balanceOf(SRC_TOKEN, TAKER)).toBe(TEST_VALUES.AMOUNT);
  });

  it("picks up a secret revealed before it started", async () => {
    const { destination, immutables } = deployDestination();
    await destination.withdraw({ caller: TAKER }, SECRET, immutables);

    const relay = new SecretRelay({ source, sourceImmutables, destination, ctx: { caller: TAKER } });
    relay.start();

    await expect(relay.whenSettled()).resolves.toMatchObject({ status: "COMPLETED" });
    expect(source.status).toBe(EscrowStatus.Withdrawn);
  });

  it("uses the public path in public mode", async () => {
    const { destination, immutables } = deployDestination();
    srcClock.set(T0 + 600n);
    const relay = new SecretRelay({
      source,
      sourceImmutables,
      destination,
      ctx: { caller: KEEPER },
      mode: "public",
    });

    relay.start();
    await destination.withdraw({ caller: TAKER }, SECRET, immutables);

    await expect(relay.whenSettled()).resolves.toMatchObject({ status: "COMPLETED" });
    expect(await srcLedger.balanceOf(SRC_TOKEN, TAKER)).toBe(TEST_VALUES.AMOUNT);
    expect(await srcLedger.balanceOf(NATIVE_ASSET, KEEPER)).toBe(TEST_VALUES.SAFETY_DEPOSIT);
  });

  it("fails when the revealed secret does not open the source", async () => {
    const { destination, immutables } = deployDestination(OTHER_SECRET);
    const relay = new SecretRelay({ source, sourceImmutables, destination, ctx: { caller: TAKER } });

    relay.start();
    await destination.withdraw({ caller: TAKER }, OTHER_SECRET, immutables);

    await expect(relay.whenSettled()).resolves.toEqual({
      status: "FAILED",
      secret: OTHER_SECRET,
      error: "secret does not match hashlock",
    });
    expect(source.status).toBe(EscrowStatus.Active);
  });

  it("reports a source withdrawal that is no longer possible", async () => {
    const { destination, immutables } = deployDestination();
    srcClock.set(T0 + 3600n);
    const relay = new SecretRelay({ source, sourceImmutables, destination, ctx: { caller: TAKER } });

    relay.start();
    await destination.withdraw({ caller: TAKER }, SECRET, immutables);

    await expect(relay.whenSettled()).resolves.toEqual({
      status: "FAILED",
      secret: SECRET,
      error: "Action is outside its timelock window: window closed at 1700003600 (SrcCancellation)",
    });
  });

  it("ignores reveals after being stopped", async () => {
    const { destination, immutables } = deployDestination();
    const relay = new SecretRelay({ source, sourceImmutables, destination, ctx: { caller: TAKER } });

    relay.start();
    relay.stop();
    await destination.withdraw({ caller: TAKER }, SECRET, immutables);

    await expect(relay.whenSettled()).resolves.toEqual({ status: "STOPPED" });
    expect(source.status).toBe(EscrowStatus.Active);
  });
});
