// Public API of the escrow engine

export * from "./src/types/index.ts";
export * from "./src/types/events.ts";
export * from "./src/config/constants.ts";
export * from "./src/config/env.ts";
export * from "./src/utils/secrets.ts";
export * from "./src/utils/timelocks.ts";
export * from "./src/utils/immutables.ts";
export * from "./src/utils/addresses.ts";
export * from "./src/utils/extra-parameters.ts";
export * from "./src/utils/endorsement.ts";
export * from "./src/utils/escrow-errors.ts";
export { Logger, LogLevel, parseLogLevel } from "./src/utils/logger.ts";
export * from "./src/chain/clock.ts";
export * from "./src/chain/ledger.ts";
export * from "./src/chain/context.ts";
export * from "./src/state/locks.ts";
export * from "./src/state/journal.ts";
export * from "./src/state/registry.ts";
export * from "./src/auth/policies.ts";
export * from "./src/escrow/base-escrow.ts";
export * from "./src/escrow/escrow-src.ts";
export * from "./src/escrow/escrow-dst.ts";
export * from "./src/factory/escrow-factory.ts";
export * from "./src/resolver/secret-relay.ts";
export { createFactoryRouter, FactoryOrpcServer, type FactoryRouter } from "./src/api/factory-orpc-server.ts";
export { EscrowNode } from "./escrow-node.ts";
