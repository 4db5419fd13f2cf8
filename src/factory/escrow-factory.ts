/**
 * EscrowFactory - deploys source and destination escrows at predictable addresses
 *
 * Source escrows are created from the order-matching protocol's post-fill
 * callback; destination escrows are created directly by a resolver. Both are
 * clones at CREATE2 addresses salted with the Immutables digest, so any party
 * can compute an escrow address before it exists.
 */

import type { Address, Hex } from "viem";
import {
  type AuthorizationPolicy,
  AnyOfPolicy,
  EcdsaSignatureVerifier,
  EndorsedSignaturePolicy,
  TokenHolderPolicy,
} from "../auth/policies.ts";
import type { ChainContext } from "../chain/context.ts";
import type { LedgerBatch } from "../chain/ledger.ts";
import {
  DEFAULT_PUBLIC_ACTION_GAP_SECONDS,
  FACTORY_LOCK_PREFIX,
  NATIVE_ASSET,
  TIMELOCK_FIELD_MASK,
} from "../config/constants.ts";
import type { EscrowOptions } from "../escrow/base-escrow.ts";
import { EscrowDst } from "../escrow/escrow-dst.ts";
import { EscrowSrc } from "../escrow/escrow-src.ts";
import { Journal } from "../state/journal.ts";
import type { FactoryRegistry } from "../state/registry.ts";
import type { FactoryJournalEntry } from "../types/events.ts";
import {
  type DstImmutablesComplement,
  EscrowRole,
  EscrowStatus,
  type FillOrder,
  type Immutables,
  type TimelockOffsets,
  TimelockStage,
} from "../types/index.ts";
import { implementationAddress, predictDeterministicAddress } from "../utils/addresses.ts";
import { EscrowError, EscrowErrorType } from "../utils/escrow-errors.ts";
import {
  parseExtraParameters,
  parseFillTimelocks,
  resolveReceiver,
  unpackDeposits,
} from "../utils/extra-parameters.ts";
import { hashImmutables, validateImmutables } from "../utils/immutables.ts";
import { Logger, factoryLogger } from "../utils/logger.ts";
import {
  packTimelocks,
  unlockInstant,
  unpackTimelocks,
  validateTimelockOrdering,
  withDeploymentTimestamp,
} from "../utils/timelocks.ts";

export type Escrow = EscrowSrc | EscrowDst;

const OFFSET_FIELDS: ReadonlyArray<keyof TimelockOffsets> = [
  "srcWithdrawal",
  "srcPublicWithdrawal",
  "srcCancellation",
  "srcPublicCancellation",
  "dstWithdrawal",
  "dstPublicWithdrawal",
  "dstCancellation",
];

export interface EscrowFactoryOptions {
  address: Address;
  chain: ChainContext;
  registry: FactoryRegistry; // must be initialized
  rescueDelay: bigint;
  publicActionGap?: bigint;
  policy?: AuthorizationPolicy;
  accessToken?: Address; // holders may run public actions without an endorsement
  logger?: Logger;
}

export interface SrcEscrowCreation {
  escrow: Address;
  immutables: Immutables;
  dstComplement: DstImmutablesComplement;
}

export class EscrowFactory {
  readonly address: Address;
  readonly srcImplementation: Address;
  readonly dstImplementation: Address;
  readonly journal: Journal<FactoryJournalEntry>;

  private chain: ChainContext;
  private registry: FactoryRegistry;
  private rescueDelay: bigint;
  private publicActionGap: bigint;
  private policy: AuthorizationPolicy;
  private logger: Logger;
  private escrows = new Map<string, Escrow>();

  constructor(options: EscrowFactoryOptions) {
    this.address = options.address;
    this.chain = options.chain;
    this.registry = options.registry;
    this.rescueDelay = options.rescueDelay;
    this.publicActionGap = options.publicActionGap ?? DEFAULT_PUBLIC_ACTION_GAP_SECONDS;
    this.logger = options.logger ?? factoryLogger;
    this.srcImplementation = implementationAddress(this.address, EscrowRole.Source);
    this.dstImplementation = implementationAddress(this.address, EscrowRole.Destination);
    this.journal = new Journal<FactoryJournalEntry>(`factory:${this.address}`, this.logger);
    this.policy = options.policy ?? this.defaultPolicy(options.accessToken);
  }

  get chainId(): number {
    return this.chain.chainId;
  }

  get paused(): boolean {
    return this.registry.paused;
  }

  /**
   * Address the escrow for these Immutables has (or will have) on this factory
   */
  predictAddress(immutables: Immutables, role: EscrowRole): Address {
    return predictDeterministicAddress(
      this.implementationFor(role),
      this.digestOf(immutables),
      this.address
    );
  }

  implementationFor(role: EscrowRole): Address {
    return role === EscrowRole.Source ? this.srcImplementation : this.dstImplementation;
  }

  // Also the CREATE2 salt
  digestOf(immutables: Immutables): Hex {
    return hashImmutables(immutables);
  }

  escrowFor(hashlock: Hex): Address | undefined {
    return this.registry.escrowFor(hashlock);
  }

  getEscrow(escrow: Address): Escrow | undefined {
    return this.escrows.get(escrow.toLowerCase());
  }

  listEscrows(): Escrow[] {
    return [...this.escrows.values()];
  }

  /**
   * Post-fill callback of the order-matching protocol: deploy the source escrow.
   * The resolver must have sent the source safety deposit to the predicted
   * address beforehand, and the maker must have approved this factory.
   */
  onFillCompleted(
    order: FillOrder,
    resolvedTaker: Address,
    filledMakingAmount: bigint,
    filledTakingAmount: bigint,
    extraParameters: Hex
  ): Promise<SrcEscrowCreation> {
    return this.exclusive(async () => {
      this.assertCreationAllowed(resolvedTaker);

      const extra = parseExtraParameters(extraParameters);
      this.assertHashlockUnused(extra.hashlock);

      const now = this.chain.clock.now();
      const { srcSafetyDeposit, dstSafetyDeposit } = unpackDeposits(extra.deposits);
      const offsets = this.deriveOffsets(parseFillTimelocks(extra.timelocks), now);

      const immutables: Immutables = {
        orderHash: order.orderHash,
        hashlock: extra.hashlock,
        maker: order.maker,
        taker: resolvedTaker,
        token: order.makerAsset,
        amount: filledMakingAmount,
        safetyDeposit: srcSafetyDeposit,
        timelocks: withDeploymentTimestamp(packTimelocks(offsets), now),
        parameters: "0x",
      };
      const dstComplement: DstImmutablesComplement = {
        maker: resolveReceiver(order.maker, order.receiver),
        amount: filledTakingAmount,
        token: extra.dstToken,
        safetyDeposit: dstSafetyDeposit,
        chainId: extra.dstChainId,
      };

      const escrowAddress = this.predictAddress(immutables, EscrowRole.Source);
      const prefunded = await this.chain.ledger.balanceOf(NATIVE_ASSET, escrowAddress);
      if (prefunded < srcSafetyDeposit) {
        throw new EscrowError(
          EscrowErrorType.INSUFFICIENT_ESCROW_BALANCE,
          `${escrowAddress} holds ${prefunded}, needs ${srcSafetyDeposit}`,
          { escrow: escrowAddress }
        );
      }

      const batch = this.chain.ledger
        .atomic()
        .transferFrom(order.makerAsset, this.address, order.maker, escrowAddress, filledMakingAmount);
      const escrow = await this.deploy(EscrowSrc, escrowAddress, immutables, now, batch);
      this.journal.append({
        type: "SrcEscrowCreated",
        escrow: escrow.address,
        immutables: escrow.getImmutables(),
        dstComplement,
        timestamp: now,
      });
      this.logger.logEscrowEvent(escrow.address, "SrcEscrowCreated", {
        orderHash: order.orderHash,
        hashlock: extra.hashlock,
        taker: resolvedTaker,
      });

      return { escrow: escrow.address, immutables: escrow.getImmutables(), dstComplement };
    });
  }

  /**
   * Deploy a destination escrow funded by `caller`.
   * @param srcCancellationTimestamp When given, the destination must become
   *   cancellable no later than the source does
   */
  createDstEscrow(
    caller: Address,
    immutables: Immutables,
    srcCancellationTimestamp?: bigint
  ): Promise<Address> {
    return this.exclusive(async () => {
      this.assertCreationAllowed(caller);
      try {
        validateImmutables(immutables);
      } catch (error) {
        throw new EscrowError(
          EscrowErrorType.INVALID_IMMUTABLES,
          error instanceof Error ? error.message : String(error)
        );
      }
      this.assertHashlockUnused(immutables.hashlock);

      const now = this.chain.clock.now();
      const timelocks = withDeploymentTimestamp(immutables.timelocks, now);
      validateTimelockOrdering(unpackTimelocks(timelocks).offsets, EscrowRole.Destination);

      if (srcCancellationTimestamp !== undefined) {
        const dstCancellation = unlockInstant(timelocks, TimelockStage.DstCancellation);
        if (dstCancellation > srcCancellationTimestamp) {
          throw new EscrowError(
            EscrowErrorType.INVALID_CREATION_TIME,
            `destination cancels at ${dstCancellation}, source at ${srcCancellationTimestamp}`
          );
        }
      }

      const deployed: Immutables = { ...immutables, timelocks };
      const escrowAddress = this.predictAddress(deployed, EscrowRole.Destination);

      const batch = this.chain.ledger.atomic();
      if (deployed.token.toLowerCase() === NATIVE_ASSET) {
        batch.transfer(NATIVE_ASSET, caller, escrowAddress, deployed.amount + deployed.safetyDeposit);
      } else {
        batch
          .transfer(NATIVE_ASSET, caller, escrowAddress, deployed.safetyDeposit)
          .transferFrom(deployed.token, this.address, caller, escrowAddress, deployed.amount);
      }
      const escrow = await this.deploy(EscrowDst, escrowAddress, deployed, now, batch);
      this.journal.append({
        type: "DstEscrowCreated",
        escrow: escrow.address,
        hashlock: deployed.hashlock,
        taker: deployed.taker,
        timestamp: now,
      });
      this.logger.logEscrowEvent(escrow.address, "DstEscrowCreated", {
        hashlock: deployed.hashlock,
        caller,
      });

      return escrow.address;
    });
  }

  setPaused(caller: Address, paused: boolean): Promise<void> {
    return this.exclusive(async () => {
      this.assertOwner(caller);
      await this.registry.setPaused(paused);
      this.journal.append({ type: "PausedChanged", value: paused, timestamp: this.chain.clock.now() });
      this.logger.warn(`Factory ${paused ? "paused" : "unpaused"} by ${caller}`);
    });
  }

  setWhitelistBypass(caller: Address, bypassed: boolean): Promise<void> {
    return this.exclusive(async () => {
      this.assertOwner(caller);
      await this.registry.setWhitelistBypass(bypassed);
      this.journal.append({
        type: "WhitelistBypassChanged",
        value: bypassed,
        timestamp: this.chain.clock.now(),
      });
      this.logger.warn(`Whitelist bypass ${bypassed ? "enabled" : "disabled"} by ${caller}`);
    });
  }

  addResolver(caller: Address, resolver: Address): Promise<void> {
    return this.exclusive(async () => {
      this.assertOwner(caller);
      await this.registry.addResolver(resolver);
      this.journal.append({ type: "ResolverAdded", resolver, timestamp: this.chain.clock.now() });
      this.logger.info(`Resolver ${resolver} whitelisted`);
    });
  }

  removeResolver(caller: Address, resolver: Address): Promise<void> {
    return this.exclusive(async () => {
      this.assertOwner(caller);
      await this.registry.removeResolver(resolver);
      this.journal.append({ type: "ResolverRemoved", resolver, timestamp: this.chain.clock.now() });
      this.logger.info(`Resolver ${resolver} removed from whitelist`);
    });
  }

  private defaultPolicy(accessToken?: Address): AuthorizationPolicy {
    const endorsed = new EndorsedSignaturePolicy(
      new EcdsaSignatureVerifier(),
      (signer) => this.registry.isWhitelisted(signer),
      this.logger
    );
    if (!accessToken) return endorsed;
    return new AnyOfPolicy([new TokenHolderPolicy(this.chain.ledger, accessToken), endorsed]);
  }

  /**
   * Offsets relative to `now` from the two absolute instants a fill carries.
   * Destination cancellation is aligned with source cancellation.
   */
  private deriveOffsets(
    instants: { srcCancellation: bigint; dstWithdrawal: bigint },
    now: bigint
  ): TimelockOffsets {
    if (instants.srcCancellation < now || instants.dstWithdrawal < now) {
      throw new EscrowError(EscrowErrorType.INVALID_TIMELOCKS, "timestamp in the past", {
        srcCancellation: instants.srcCancellation,
        dstWithdrawal: instants.dstWithdrawal,
        now,
      });
    }

    const gap = this.publicActionGap;
    const srcCancellation = instants.srcCancellation - now;
    const dstWithdrawal = instants.dstWithdrawal - now;
    const offsets: TimelockOffsets = {
      srcWithdrawal: 0n,
      srcPublicWithdrawal: gap,
      srcCancellation,
      srcPublicCancellation: srcCancellation + gap,
      dstWithdrawal,
      dstPublicWithdrawal: dstWithdrawal + gap,
      dstCancellation: srcCancellation,
    };

    for (const field of OFFSET_FIELDS) {
      if (offsets[field] > TIMELOCK_FIELD_MASK) {
        throw new EscrowError(
          EscrowErrorType.INVALID_TIMELOCKS,
          `${field} offset ${offsets[field]} exceeds 32 bits`
        );
      }
    }
    validateTimelockOrdering(offsets, EscrowRole.Source);
    validateTimelockOrdering(offsets, EscrowRole.Destination);
    return offsets;
  }

  /**
   * Record the escrow, move the funding batch, then make the escrow reachable.
   * A failed commit drops the record again, so nothing is left half-deployed.
   */
  private async deploy<E extends Escrow>(
    EscrowClass: new (options: EscrowOptions) => E,
    escrowAddress: Address,
    immutables: Immutables,
    deployedAt: bigint,
    funding: LedgerBatch
  ): Promise<E> {
    const escrow = new EscrowClass({
      address: escrowAddress,
      immutables,
      chain: this.chain,
      rescueDelay: this.rescueDelay,
      policy: this.policy,
      onStatusChange: (address: Address, status: EscrowStatus) =>
        this.registry.updateStatus(address, status),
      logger: this.logger.child(escrowAddress.slice(0, 10)),
    });

    await this.registry.recordEscrow({
      address: escrow.address,
      hashlock: immutables.hashlock,
      role: escrow.role,
      digest: escrow.digest,
      status: EscrowStatus.Active,
      deployedAt,
    });

    const result = await funding.commit();
    if (!result.ok) {
      await this.registry.forgetEscrow(escrow.address);
      throw new EscrowError(EscrowErrorType.TRANSFER_FAILED, result.reason);
    }

    this.escrows.set(escrow.address.toLowerCase(), escrow);
    return escrow;
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.chain.locks.withLock(`${FACTORY_LOCK_PREFIX}:${this.address.toLowerCase()}`, fn);
  }

  private assertCreationAllowed(resolver: Address): void {
    if (this.registry.paused) {
      throw new EscrowError(EscrowErrorType.FACTORY_PAUSED);
    }
    if (!this.registry.whitelistBypassed && !this.registry.isWhitelisted(resolver)) {
      throw new EscrowError(EscrowErrorType.RESOLVER_NOT_WHITELISTED, resolver);
    }
  }

  private assertHashlockUnused(hashlock: Hex): void {
    const existing = this.registry.escrowFor(hashlock);
    if (existing) {
      throw new EscrowError(EscrowErrorType.ESCROW_ALREADY_EXISTS, existing, { hashlock });
    }
  }

  private assertOwner(caller: Address): void {
    if (caller.toLowerCase() !== this.registry.owner.toLowerCase()) {
      throw new EscrowError(EscrowErrorType.NOT_OWNER, caller);
    }
  }
}
