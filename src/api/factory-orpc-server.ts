/**
 * Factory oRPC Server
 *
 * Read-only query procedures over an EscrowFactory, served over Node HTTP
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { onError, ORPCError, os, ValidationError } from "@orpc/server";
import { RPCHandler } from "@orpc/server/node";
import { CORSPlugin } from "@orpc/server/plugins";
import { RPC_PREFIX } from "../config/constants.ts";
import type { EscrowFactory } from "../factory/escrow-factory.ts";
import { deploymentTimestamp } from "../utils/timelocks.ts";
import { validateImmutables } from "../utils/immutables.ts";
import { Logger, apiLogger } from "../utils/logger.ts";
import {
  ErrorCodes,
  EscrowForInputSchema,
  EscrowForOutputSchema,
  EscrowStateInputSchema,
  EscrowStateOutputSchema,
  HealthOutputSchema,
  JournalInputSchema,
  JournalOutputSchema,
  PredictAddressInputSchema,
  PredictAddressOutputSchema,
} from "./contracts/factory.contract.ts";

// ============================================================================
// Server Configuration
// ============================================================================

export interface FactoryOrpcServerConfig {
  port: number;
  factory: EscrowFactory;
  logger?: Logger;
}

interface FactoryContext {
  factory: EscrowFactory;
  startTime: number;
}

type WireValue = string | number | boolean | null | WireValue[] | { [key: string]: WireValue };

/**
 * JSON-safe copy of a journal entry, bigints as decimal strings
 */
export function toWire(value: unknown): WireValue {
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) return value.map(toWire);
  if (typeof value === "object" && value !== null) {
    const result: { [key: string]: WireValue } = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toWire(item);
    }
    return result;
  }
  return null;
}

function toWireRecord(value: object): Record<string, WireValue> {
  const result: Record<string, WireValue> = {};
  for (const [key, item] of Object.entries(value)) {
    result[key] = toWire(item);
  }
  return result;
}

// ============================================================================
// Procedure Implementations
// ============================================================================

const base = os.$context<FactoryContext>().errors(ErrorCodes);

const healthProcedure = base
  .output(HealthOutputSchema)
  .handler(({ context }) => ({
    status: "healthy" as const,
    service: "escrow-engine" as const,
    chainId: context.factory.chainId,
    factory: context.factory.address,
    paused: context.factory.paused,
    escrows: context.factory.listEscrows().length,
    timestamp: new Date().toISOString(),
    uptime: Math.floor((Date.now() - context.startTime) / 1000),
  }));

const predictAddressProcedure = base
  .input(PredictAddressInputSchema)
  .output(PredictAddressOutputSchema)
  .handler(({ input, context, errors }) => {
    try {
      validateImmutables(input.immutables);
    } catch (error) {
      throw errors.INPUT_VALIDATION_FAILED({
        data: {
          formErrors: [error instanceof Error ? error.message : String(error)],
          fieldErrors: {},
        },
      });
    }

    const { factory } = context;
    return {
      address: factory.predictAddress(input.immutables, input.role),
      digest: factory.digestOf(input.immutables),
      implementation: factory.implementationFor(input.role),
    };
  });

const escrowForProcedure = base
  .input(EscrowForInputSchema)
  .output(EscrowForOutputSchema)
  .handler(({ input, context, errors }) => {
    const escrow = context.factory.escrowFor(input.hashlock);
    if (!escrow) {
      throw errors.ESCROW_NOT_FOUND({ data: { hashlock: input.hashlock } });
    }
    return { hashlock: input.hashlock, escrow };
  });

const escrowStateProcedure = base
  .input(EscrowStateInputSchema)
  .output(EscrowStateOutputSchema)
  .handler(async ({ input, context, errors }) => {
    const escrow = context.factory.getEscrow(input.escrow);
    if (!escrow) {
      throw errors.ESCROW_NOT_FOUND({ data: { escrow: input.escrow } });
    }

    const balances = await escrow.balances();
    return {
      escrow: escrow.address,
      role: escrow.role,
      status: escrow.status,
      phase: escrow.phase(),
      hashlock: escrow.hashlock,
      deployedAt: deploymentTimestamp(escrow.getImmutables().timelocks).toString(),
      balances: {
        token: balances.token.toString(),
        native: balances.native.toString(),
      },
    };
  });

const journalProcedure = base
  .input(JournalInputSchema)
  .output(JournalOutputSchema)
  .handler(({ input, context, errors }) => {
    const { factory } = context;
    if (input.escrow) {
      const escrow = factory.getEscrow(input.escrow);
      if (!escrow) {
        throw errors.ESCROW_NOT_FOUND({ data: { escrow: input.escrow } });
      }
      return {
        journal: escrow.journal.name,
        length: escrow.journal.length,
        entries: escrow.journal.entries(input.fromSequence).map(({ sequence, entry }) => ({
          sequence,
          type: entry.type,
          entry: toWireRecord(entry),
        })),
      };
    }

    return {
      journal: factory.journal.name,
      length: factory.journal.length,
      entries: factory.journal.entries(input.fromSequence).map(({ sequence, entry }) => ({
        sequence,
        type: entry.type,
        entry: toWireRecord(entry),
      })),
    };
  });

// ============================================================================
// Router Creation
// ============================================================================

/**
 * Create the oRPC router with all procedures
 */
export function createFactoryRouter(config: { factory: EscrowFactory }) {
  const context: FactoryContext = {
    factory: config.factory,
    startTime: Date.now(),
  };

  const router = {
    health: healthProcedure,
    predictAddress: predictAddressProcedure,
    escrowFor: escrowForProcedure,
    escrowState: escrowStateProcedure,
    journal: journalProcedure,
  };

  return { router, context };
}

export type FactoryRouter = ReturnType<typeof createFactoryRouter>["router"];

/**
 * Schema failures surface as INPUT_VALIDATION_FAILED (422) instead of BAD_REQUEST
 */
function rethrowValidationError(error: unknown): void {
  if (
    error instanceof ORPCError &&
    error.code === "BAD_REQUEST" &&
    error.cause instanceof ValidationError
  ) {
    const formErrors: string[] = [];
    const fieldErrors: Record<string, string[]> = {};
    for (const issue of error.cause.issues) {
      const path = (issue.path ?? [])
        .map((segment) => String(typeof segment === "object" ? segment.key : segment))
        .join(".");
      if (path) {
        (fieldErrors[path] ??= []).push(issue.message);
      } else {
        formErrors.push(issue.message);
      }
    }
    throw new ORPCError("INPUT_VALIDATION_FAILED", {
      status: ErrorCodes.INPUT_VALIDATION_FAILED.status,
      message: ErrorCodes.INPUT_VALIDATION_FAILED.message,
      data: { formErrors, fieldErrors },
      cause: error.cause,
    });
  }
}

// ============================================================================
// Server Class
// ============================================================================

export class FactoryOrpcServer {
  private server?: Server;
  private handler: RPCHandler<FactoryContext>;
  private context: FactoryContext;
  private logger: Logger;

  constructor(private config: FactoryOrpcServerConfig) {
    const { router, context } = createFactoryRouter(config);
    this.context = context;
    this.logger = config.logger ?? apiLogger;

    this.handler = new RPCHandler(router, {
      plugins: [
        new CORSPlugin({
          origin: "*",
        }),
      ],
      clientInterceptors: [onError(rethrowValidationError)],
    });
  }

  start(): Promise<void> {
    const server = createServer((req, res) => {
      this.route(req, res).catch((error: unknown) => {
        this.logger.error("Request handling failed", error);
        if (!res.headersSent) {
          res.writeHead(500, { "Content-Type": "application/json" });
        }
        res.end(JSON.stringify({ error: "Internal Server Error" }));
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.config.port, () => {
        server.off("error", reject);
        this.logger.info(`Factory oRPC server started on port ${this.config.port}`);
        this.logger.info(`RPC endpoints under ${RPC_PREFIX}: health, predictAddress, escrowFor, escrowState, journal`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = undefined;
    this.logger.info("Factory oRPC server stopping...");
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private async route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { matched } = await this.handler.handle(req, res, {
      prefix: RPC_PREFIX,
      context: this.context,
    });
    if (matched) return;

    // Plain health probe outside the RPC prefix
    if (req.url === "/health") {
      res.writeHead(200, { "Content-Type": "application/json", "Access-Control-Allow-Origin": "*" });
      res.end(JSON.stringify({
        status: "healthy",
        service: "escrow-engine",
        uptime: Math.floor((Date.now() - this.context.startTime) / 1000),
      }));
      return;
    }

    res.writeHead(404, { "Content-Type": "application/json", "Access-Control-Allow-Origin": "*" });
    res.end(JSON.stringify({ error: "Not Found" }));
  }
}
