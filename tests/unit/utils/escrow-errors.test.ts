import { describe, expect, it } from "vitest";
import {
  EscrowError,
  EscrowErrorHandler,
  EscrowErrorType,
} from "../../../src/utils/escrow-errors.ts";

describe("EscrowError", () => {
  it("builds its message from the error table", () => {
    const error = new EscrowError(EscrowErrorType.INVALID_TIME, "SrcCancellation opens in 5m");

    expect(error.message).toBe("Action is outside its timelock window: SrcCancellation opens in 5m");
    expect(error.name).toBe("EscrowError");
    expect(error.recoverable).toBe(true);
    expect(error.suggestedAction).toBe("Wait for the window to open and resubmit");
  });

  it("uses the bare description without detail", () => {
    const error = new EscrowError(EscrowErrorType.ESCROW_ALREADY_EXISTS);
    expect(error.message).toBe("Escrow already exists for this hashlock");
    expect(error.recoverable).toBe(false);
  });

  it("keeps structured details", () => {
    const error = new EscrowError(EscrowErrorType.INVALID_IMMUTABLES, undefined, { expected: "0x01" });
    expect(error.details).toEqual({ expected: "0x01" });
  });
});

describe("EscrowErrorHandler", () => {
  it("passes escrow errors through", () => {
    const error = new EscrowError(EscrowErrorType.NOT_OWNER);
    expect(EscrowErrorHandler.parseError(error)).toBe(error);
  });

  it("wraps anything else as UNKNOWN_ERROR", () => {
    expect(EscrowErrorHandler.parseError(new Error("boom")).message).toBe("Unknown error: boom");
    expect(EscrowErrorHandler.parseError("plain").type).toBe(EscrowErrorType.UNKNOWN_ERROR);
  });

  it("narrows by type", () => {
    const error = new EscrowError(EscrowErrorType.FACTORY_PAUSED);

    expect(EscrowErrorHandler.isEscrowError(error)).toBe(true);
    expect(EscrowErrorHandler.isEscrowError(error, EscrowErrorType.FACTORY_PAUSED)).toBe(true);
    expect(EscrowErrorHandler.isEscrowError(error, EscrowErrorType.NOT_OWNER)).toBe(false);
    expect(EscrowErrorHandler.isEscrowError(new Error("x"))).toBe(false);
  });

  it("describes every type", () => {
    for (const type of Object.values(EscrowErrorType)) {
      expect(EscrowErrorHandler.describe(type).message.length).toBeGreaterThan(0);
    }
  });
});
