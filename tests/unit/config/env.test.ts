import { getAddress } from "viem";
import { describe, expect, it } from "vitest";
import {
  DEFAULT_PUBLIC_ACTION_GAP_SECONDS,
  DEFAULT_RESCUE_DELAY_SECONDS,
  DEFAULT_RPC_PORT,
} from "../../../src/config/constants.ts";
import { loadConfig } from "../../../src/config/env.ts";
import { TEST_ADDRESSES } from "../../setup.ts";

describe("loadConfig", () => {
  it("fills in defaults", () => {
    expect(loadConfig({})).toEqual({
      chainId: 1337,
      factoryAddress: getAddress("0x00000000000000000000000000000000000fac70"),
      factoryOwner: getAddress("0x0000000000000000000000000000000000000a11"),
      rescueDelay: DEFAULT_RESCUE_DELAY_SECONDS,
      publicActionGap: DEFAULT_PUBLIC_ACTION_GAP_SECONDS,
      whitelistBypassed: false,
      registryFile: undefined,
      rpcPort: DEFAULT_RPC_PORT,
      logFile: undefined,
    });
  });

  it("parses explicit values", () => {
    const config = loadConfig({
      CHAIN_ID: "10",
      FACTORY_ADDRESS: TEST_ADDRESSES.FACTORY,
      FACTORY_OWNER: TEST_ADDRESSES.OWNER,
      ESCROW_RESCUE_DELAY: "3600",
      PUBLIC_ACTION_GAP: "30",
      WHITELIST_BYPASS: "1",
      REGISTRY_FILE: "./data/registry.json",
      RPC_PORT: "9000",
    });

    expect(config).toMatchObject({
      chainId: 10,
      factoryAddress: TEST_ADDRESSES.FACTORY,
      factoryOwner: TEST_ADDRESSES.OWNER,
      rescueDelay: 3600n,
      publicActionGap: 30n,
      whitelistBypassed: true,
      registryFile: "./data/registry.json",
      rpcPort: 9000,
    });
  });

  it("lists every invalid variable", () => {
    expect(() =>
      loadConfig({ FACTORY_ADDRESS: "0x1234", ESCROW_RESCUE_DELAY: "-5" })
    ).toThrow(
      "Invalid configuration: FACTORY_ADDRESS: Invalid Ethereum address; ESCROW_RESCUE_DELAY: Must be a non-negative integer number of seconds"
    );
  });

  it("rejects unknown flag spellings", () => {
    expect(() => loadConfig({ WHITELIST_BYPASS: "yes" })).toThrow("WHITELIST_BYPASS");
  });
});
