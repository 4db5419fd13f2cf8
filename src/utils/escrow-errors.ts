/**
 * Error taxonomy for escrow and factory operations.
 *
 * Every rejection is synchronous and leaves state untouched, so the
 * `recoverable` flag only tells the caller whether resubmitting can succeed.
 */

export enum EscrowErrorType {
  INVALID_TIME = "INVALID_TIME",
  INVALID_CALLER = "INVALID_CALLER",
  INVALID_SECRET = "INVALID_SECRET",
  INVALID_IMMUTABLES = "INVALID_IMMUTABLES",
  INVALID_STATE = "INVALID_STATE",
  TRANSFER_FAILED = "TRANSFER_FAILED",
  ESCROW_ALREADY_EXISTS = "ESCROW_ALREADY_EXISTS",
  FACTORY_PAUSED = "FACTORY_PAUSED",
  RESOLVER_NOT_WHITELISTED = "RESOLVER_NOT_WHITELISTED",
  INVALID_EXTRA_PARAMETERS = "INVALID_EXTRA_PARAMETERS",
  INVALID_TIMELOCKS = "INVALID_TIMELOCKS",
  INVALID_CREATION_TIME = "INVALID_CREATION_TIME",
  INSUFFICIENT_ESCROW_BALANCE = "INSUFFICIENT_ESCROW_BALANCE",
  NOT_OWNER = "NOT_OWNER",
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

interface ErrorDescription {
  message: string;
  recoverable: boolean;
  suggestedAction?: string;
}

const ERROR_DESCRIPTIONS: Record<EscrowErrorType, ErrorDescription> = {
  [EscrowErrorType.INVALID_TIME]: {
    message: "Action is outside its timelock window",
    recoverable: true,
    suggestedAction: "Wait for the window to open and resubmit",
  },
  [EscrowErrorType.INVALID_CALLER]: {
    message: "Caller is not allowed to perform this action",
    recoverable: false,
    suggestedAction: "Submit from the taker or with a valid capability",
  },
  [EscrowErrorType.INVALID_SECRET]: {
    message: "Secret does not match the hashlock",
    recoverable: false,
  },
  [EscrowErrorType.INVALID_IMMUTABLES]: {
    message: "Immutables do not match the escrow",
    recoverable: false,
    suggestedAction: "Supply the exact immutables captured at deployment",
  },
  [EscrowErrorType.INVALID_STATE]: {
    message: "Escrow is already settled",
    recoverable: false,
  },
  [EscrowErrorType.TRANSFER_FAILED]: {
    message: "Value transfer failed",
    recoverable: true,
    suggestedAction: "Check balances and allowances, then retry",
  },
  [EscrowErrorType.ESCROW_ALREADY_EXISTS]: {
    message: "Escrow already exists for this hashlock",
    recoverable: false,
  },
  [EscrowErrorType.FACTORY_PAUSED]: {
    message: "Factory is paused",
    recoverable: true,
    suggestedAction: "Wait for the factory to be unpaused and retry",
  },
  [EscrowErrorType.RESOLVER_NOT_WHITELISTED]: {
    message: "Resolver is not whitelisted on the factory",
    recoverable: false,
    suggestedAction: "Ask the factory owner to whitelist the resolver",
  },
  [EscrowErrorType.INVALID_EXTRA_PARAMETERS]: {
    message: "Extra parameters could not be decoded",
    recoverable: false,
  },
  [EscrowErrorType.INVALID_TIMELOCKS]: {
    message: "Timelocks are invalid",
    recoverable: false,
  },
  [EscrowErrorType.INVALID_CREATION_TIME]: {
    message: "Destination cancellation would open after source cancellation",
    recoverable: false,
  },
  [EscrowErrorType.INSUFFICIENT_ESCROW_BALANCE]: {
    message: "Escrow address is not funded with the safety deposit",
    recoverable: true,
    suggestedAction: "Send the safety deposit to the predicted escrow address",
  },
  [EscrowErrorType.NOT_OWNER]: {
    message: "Caller is not the factory owner",
    recoverable: false,
  },
  [EscrowErrorType.UNKNOWN_ERROR]: {
    message: "Unknown error",
    recoverable: false,
  },
};

export class EscrowError extends Error {
  readonly type: EscrowErrorType;
  readonly recoverable: boolean;
  readonly suggestedAction?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    type: EscrowErrorType,
    detail?: string,
    details?: Record<string, unknown>
  ) {
    const description = ERROR_DESCRIPTIONS[type];
    super(detail ? `${description.message}: ${detail}` : description.message);
    this.name = "EscrowError";
    this.type = type;
    this.recoverable = description.recoverable;
    this.suggestedAction = description.suggestedAction;
    this.details = details;
  }
}

export class EscrowErrorHandler {
  static describe(type: EscrowErrorType): ErrorDescription {
    return ERROR_DESCRIPTIONS[type];
  }

  /**
   * Normalize any thrown value into an EscrowError
   */
  static parseError(error: unknown): EscrowError {
    if (error instanceof EscrowError) return error;

    const message = error instanceof Error ? error.message : String(error);
    return new EscrowError(EscrowErrorType.UNKNOWN_ERROR, message);
  }

  static isEscrowError(error: unknown, type?: EscrowErrorType): error is EscrowError {
    return error instanceof EscrowError && (type === undefined || error.type === type);
  }
}
