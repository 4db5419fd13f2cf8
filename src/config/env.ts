/**
 * Environment configuration, validated with zod
 */

import { type Address, getAddress, isAddress } from "viem";
import { z } from "zod";
import {
  DEFAULT_PUBLIC_ACTION_GAP_SECONDS,
  DEFAULT_RESCUE_DELAY_SECONDS,
  DEFAULT_RPC_PORT,
} from "./constants.ts";

const AddressSchema = z
  .string()
  .refine((value) => isAddress(value), "Invalid Ethereum address")
  .transform((value): Address => getAddress(value));

const SecondsSchema = z
  .string()
  .regex(/^\d+$/, "Must be a non-negative integer number of seconds")
  .transform((value) => BigInt(value));

const BooleanFlagSchema = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

export const EnvSchema = z.object({
  LOG_LEVEL: z.enum(["ERROR", "WARN", "INFO", "DEBUG", "TRACE"]).optional(),
  LOG_FILE: z.string().min(1).optional(),
  CHAIN_ID: z.coerce.number().int().positive().default(1337),
  FACTORY_ADDRESS: AddressSchema.default("0x00000000000000000000000000000000000fac70"),
  FACTORY_OWNER: AddressSchema.default("0x0000000000000000000000000000000000000a11"),
  ESCROW_RESCUE_DELAY: SecondsSchema.default(DEFAULT_RESCUE_DELAY_SECONDS.toString()),
  PUBLIC_ACTION_GAP: SecondsSchema.default(DEFAULT_PUBLIC_ACTION_GAP_SECONDS.toString()),
  WHITELIST_BYPASS: BooleanFlagSchema.default("false"),
  REGISTRY_FILE: z.string().min(1).optional(),
  RPC_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_RPC_PORT),
});

export interface EngineConfig {
  chainId: number;
  factoryAddress: Address;
  factoryOwner: Address;
  rescueDelay: bigint;
  publicActionGap: bigint;
  whitelistBypassed: boolean;
  registryFile?: string;
  rpcPort: number;
  logFile?: string;
}

/**
 * Load engine configuration from environment variables
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    chainId: vars.CHAIN_ID,
    factoryAddress: vars.FACTORY_ADDRESS,
    factoryOwner: vars.FACTORY_OWNER,
    rescueDelay: vars.ESCROW_RESCUE_DELAY,
    publicActionGap: vars.PUBLIC_ACTION_GAP,
    whitelistBypassed: vars.WHITELIST_BYPASS,
    registryFile: vars.REGISTRY_FILE,
    rpcPort: vars.RPC_PORT,
    logFile: vars.LOG_FILE,
  };
}
