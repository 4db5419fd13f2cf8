/**
 * Escrow Node - one chain's escrow factory behind the query API
 *
 * Wires configuration, the chain context, the factory registry and the
 * factory together and serves the read-only oRPC API until a shutdown signal.
 * Run on its own it is a query shell over an empty factory; escrows are
 * created by code that embeds the node and drives `node.factory` and
 * `node.chain.ledger` directly.
 */

import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { FactoryOrpcServer } from "./src/api/factory-orpc-server.ts";
import { createChainContext, type ChainContext } from "./src/chain/context.ts";
import { type EngineConfig, loadConfig } from "./src/config/env.ts";
import { EscrowFactory } from "./src/factory/escrow-factory.ts";
import {
  FactoryRegistry,
  JsonFileRegistryStore,
  MemoryRegistryStore,
} from "./src/state/registry.ts";
import { Logger, rootLogger } from "./src/utils/logger.ts";

export class EscrowNode {
  readonly chain: ChainContext;
  readonly registry: FactoryRegistry;
  readonly factory: EscrowFactory;
  private server: FactoryOrpcServer;
  private logger: Logger;
  private isRunning = false;

  constructor(private config: EngineConfig, chain?: ChainContext) {
    this.logger = rootLogger.child("Node");
    this.chain = chain ?? createChainContext(config.chainId);
    this.registry = new FactoryRegistry({
      owner: config.factoryOwner,
      whitelistBypassed: config.whitelistBypassed,
      store: config.registryFile
        ? new JsonFileRegistryStore(config.registryFile)
        : new MemoryRegistryStore(),
    });
    this.factory = new EscrowFactory({
      address: config.factoryAddress,
      chain: this.chain,
      registry: this.registry,
      rescueDelay: config.rescueDelay,
      publicActionGap: config.publicActionGap,
    });
    this.server = new FactoryOrpcServer({ port: config.rpcPort, factory: this.factory });
  }

  async start(): Promise<void> {
    this.logger.info(`Starting escrow node on chain ${this.config.chainId}`);
    this.logger.info(`Factory ${this.factory.address}, owner ${this.config.factoryOwner}`);

    await this.registry.init();
    await this.server.start();
    this.isRunning = true;

    this.logger.info(`Source implementation ${this.factory.srcImplementation}`);
    this.logger.info(`Destination implementation ${this.factory.dstImplementation}`);
    if (this.registry.whitelistBypassed) {
      this.logger.warn("Resolver whitelist is bypassed");
    }
  }

  async stop(): Promise<void> {
    if (!this.isRunning) return;
    this.logger.info("Stopping escrow node...");
    this.isRunning = false;
    await this.server.stop();
    await this.registry.close();
    this.logger.info("Escrow node stopped");
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const node = new EscrowNode(config);

  const shutdownHandler = (): void => {
    rootLogger.info("Received shutdown signal");
    node.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        rootLogger.error("Shutdown failed", error);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdownHandler);
  process.once("SIGTERM", shutdownHandler);

  await node.start();
}

const entryFile = process.argv[1] ? resolve(process.argv[1]) : undefined;
if (entryFile === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    rootLogger.error("Escrow node failed to start", error);
    process.exit(1);
  });
}
