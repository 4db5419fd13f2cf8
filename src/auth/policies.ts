/**
 * Capability checks for the public escrow actions.
 *
 * Public withdraw and public cancel are open to third parties once their
 * window opens, but only to callers an `AuthorizationPolicy` accepts.
 */

import { type Address, type Hex, recoverAddress } from "viem";
import type { AssetLedger } from "../chain/ledger.ts";
import type { PublicActionKind } from "../types/index.ts";
import { publicActionDigest } from "../utils/endorsement.ts";
import { Logger, rootLogger } from "../utils/logger.ts";

export interface PublicActionRequest {
  chainId: number;
  escrow: Address;
  orderHash: Hex;
  caller: Address;
  action: PublicActionKind;
  endorsement?: Hex;
}

export interface AuthorizationPolicy {
  readonly name: string;
  isAuthorized(request: PublicActionRequest): Promise<boolean>;
}

export interface SignatureVerifier {
  /**
   * Recover the signer of a 32-byte digest
   */
  verify(digest: Hex, signature: Hex): Promise<Address>;
}

export class EcdsaSignatureVerifier implements SignatureVerifier {
  verify(digest: Hex, signature: Hex): Promise<Address> {
    return recoverAddress({ hash: digest, signature });
  }
}

/**
 * Accepts callers holding a positive balance of an access token
 */
export class TokenHolderPolicy implements AuthorizationPolicy {
  readonly name = "token-holder";

  constructor(private ledger: AssetLedger, private accessToken: Address) {}

  async isAuthorized(request: PublicActionRequest): Promise<boolean> {
    const balance = await this.ledger.balanceOf(this.accessToken, request.caller);
    return balance > 0n;
  }
}

/**
 * Accepts callers carrying a PublicAction signature from a whitelisted resolver
 */
export class EndorsedSignaturePolicy implements AuthorizationPolicy {
  readonly name = "endorsed-signature";
  private logger: Logger;

  constructor(
    private verifier: SignatureVerifier,
    private isResolver: (signer: Address) => boolean,
    logger?: Logger
  ) {
    this.logger = logger ?? rootLogger.child("Auth");
  }

  async isAuthorized(request: PublicActionRequest): Promise<boolean> {
    if (!request.endorsement) return false;

    const digest = publicActionDigest(request.chainId, request.escrow, {
      orderHash: request.orderHash,
      caller: request.caller,
      action: request.action,
    });

    let signer: Address;
    try {
      signer = await this.verifier.verify(digest, request.endorsement);
    } catch (error) {
      this.logger.debug(`Unreadable endorsement for ${request.escrow}`, error);
      return false;
    }
    return this.isResolver(signer);
  }
}

/**
 * First accepting policy wins
 */
export class AnyOfPolicy implements AuthorizationPolicy {
  readonly name: string;

  constructor(private policies: AuthorizationPolicy[]) {
    this.name = `any-of(${policies.map((policy) => policy.name).join(",")})`;
  }

  async isAuthorized(request: PublicActionRequest): Promise<boolean> {
    for (const policy of this.policies) {
      if (await policy.isAuthorized(request)) return true;
    }
    return false;
  }
}
