import { size } from "viem";
import { describe, expect, it } from "vitest";
import type { Immutables } from "../../../src/types/index.ts";
import {
  encodeImmutables,
  hashImmutables,
  validateImmutables,
} from "../../../src/utils/immutables.ts";
import { makeImmutables, TEST_ADDRESSES } from "../../setup.ts";

describe("hashImmutables", () => {
  it("is deterministic", () => {
    expect(hashImmutables(makeImmutables())).toBe(hashImmutables(makeImmutables()));
  });

  it("changes when any single field changes", () => {
    const base = hashImmutables(makeImmutables());
    const variants: Partial<Immutables>[] = [
      { orderHash: "0x00000000000000000000000000000000000000000000000000000000000000bb" },
      { hashlock: "0x00000000000000000000000000000000000000000000000000000000000000cc" },
      { maker: TEST_ADDRESSES.OTHER },
      { taker: TEST_ADDRESSES.KEEPER },
      { token: TEST_ADDRESSES.DST_TOKEN },
      { amount: 101n },
      { safetyDeposit: 2n },
      { timelocks: 1n },
      { parameters: "0x01" },
    ];

    const digests = variants.map((variant) => hashImmutables(makeImmutables(variant)));
    for (const digest of digests) {
      expect(digest).not.toBe(base);
    }
    expect(new Set(digests).size).toBe(variants.length);
  });

  it("distinguishes parameter blobs by length", () => {
    expect(hashImmutables(makeImmutables({ parameters: "0x" }))).not.toBe(
      hashImmutables(makeImmutables({ parameters: "0x00" }))
    );
  });
});

describe("encodeImmutables", () => {
  it("encodes the struct with an offset head and a length-prefixed tail", () => {
    const encoded = encodeImmutables(makeImmutables());

    // offset + 9 head words + zero-length bytes
    expect(size(encoded)).toBe(11 * 32);
    expect(encoded.slice(0, 66)).toBe(`0x${"0".repeat(62)}20`);
  });

  it("pads non-empty parameters to a full word", () => {
    const encoded = encodeImmutables(makeImmutables({ parameters: "0xdeadbeef" }));
    expect(size(encoded)).toBe(12 * 32);
  });
});

describe("validateImmutables", () => {
  it("accepts well-formed immutables", () => {
    expect(() => validateImmutables(makeImmutables())).not.toThrow();
  });

  it("rejects a short hashlock", () => {
    expect(() => validateImmutables(makeImmutables({ hashlock: "0x1234" }))).toThrow("Invalid hashlock");
  });

  it("rejects a malformed address", () => {
    expect(() => validateImmutables(makeImmutables({ taker: "0x1234" }))).toThrow(
      "Invalid taker address"
    );
  });

  it("rejects negative amounts", () => {
    expect(() => validateImmutables(makeImmutables({ amount: -1n }))).toThrow("Amount out of range");
  });
});
