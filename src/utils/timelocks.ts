import {
  DEPLOYED_AT_SHIFT,
  TIMELOCK_FIELD_BITS,
  TIMELOCK_FIELD_MASK,
} from "../config/constants.ts";
import { EscrowRole, TimelockStage, type TimelockOffsets } from "../types/index.ts";
import { EscrowError, EscrowErrorType } from "./escrow-errors.ts";

// Field order inside the packed word, lowest bits first
const STAGE_FIELDS: ReadonlyArray<readonly [TimelockStage, keyof TimelockOffsets]> = [
  [TimelockStage.SrcWithdrawal, "srcWithdrawal"],
  [TimelockStage.SrcPublicWithdrawal, "srcPublicWithdrawal"],
  [TimelockStage.SrcCancellation, "srcCancellation"],
  [TimelockStage.SrcPublicCancellation, "srcPublicCancellation"],
  [TimelockStage.DstWithdrawal, "dstWithdrawal"],
  [TimelockStage.DstPublicWithdrawal, "dstPublicWithdrawal"],
  [TimelockStage.DstCancellation, "dstCancellation"],
];

const DEPLOYED_AT_CLEAR_MASK = (1n << DEPLOYED_AT_SHIFT) - 1n;

/**
 * Pack seven stage offsets into a single uint256, 32 bits per stage.
 * The deployment timestamp (top 32 bits) is left at zero.
 */
export function packTimelocks(offsets: TimelockOffsets): bigint {
  let packed = 0n;
  for (const [stage, field] of STAGE_FIELDS) {
    packed |= (offsets[field] & TIMELOCK_FIELD_MASK) << (BigInt(stage) * TIMELOCK_FIELD_BITS);
  }
  return packed;
}

/**
 * Split a packed schedule back into its offsets and deployment timestamp
 */
export function unpackTimelocks(schedule: bigint): {
  offsets: TimelockOffsets;
  deployedAt: bigint;
} {
  return {
    offsets: {
      srcWithdrawal: stageOffset(schedule, TimelockStage.SrcWithdrawal),
      srcPublicWithdrawal: stageOffset(schedule, TimelockStage.SrcPublicWithdrawal),
      srcCancellation: stageOffset(schedule, TimelockStage.SrcCancellation),
      srcPublicCancellation: stageOffset(schedule, TimelockStage.SrcPublicCancellation),
      dstWithdrawal: stageOffset(schedule, TimelockStage.DstWithdrawal),
      dstPublicWithdrawal: stageOffset(schedule, TimelockStage.DstPublicWithdrawal),
      dstCancellation: stageOffset(schedule, TimelockStage.DstCancellation),
    },
    deployedAt: deploymentTimestamp(schedule),
  };
}

/**
 * Overwrite the deployment timestamp, keeping every offset
 */
export function withDeploymentTimestamp(schedule: bigint, timestamp: bigint): bigint {
  return (schedule & DEPLOYED_AT_CLEAR_MASK) |
    ((timestamp & TIMELOCK_FIELD_MASK) << DEPLOYED_AT_SHIFT);
}

export function deploymentTimestamp(schedule: bigint): bigint {
  return (schedule >> DEPLOYED_AT_SHIFT) & TIMELOCK_FIELD_MASK;
}

export function stageOffset(schedule: bigint, stage: TimelockStage): bigint {
  return (schedule >> (BigInt(stage) * TIMELOCK_FIELD_BITS)) & TIMELOCK_FIELD_MASK;
}

/**
 * Absolute instant (seconds) at which a stage opens
 */
export function unlockInstant(schedule: bigint, stage: TimelockStage): bigint {
  return deploymentTimestamp(schedule) + stageOffset(schedule, stage);
}

/**
 * Absolute instant (seconds) from which stray funds can be rescued
 */
export function rescueInstant(schedule: bigint, rescueDelay: bigint): bigint {
  return deploymentTimestamp(schedule) + rescueDelay;
}

/**
 * Check the conventional ordering of the stages of one side.
 * Equal neighbours are allowed (e.g. an immediately public withdrawal).
 * @returns The first violation, or undefined when the side is ordered
 */
export function findTimelockOrderingViolation(
  offsets: TimelockOffsets,
  role: EscrowRole
): string | undefined {
  const chain: Array<keyof TimelockOffsets> = role === EscrowRole.Source
    ? ["srcWithdrawal", "srcPublicWithdrawal", "srcCancellation", "srcPublicCancellation"]
    : ["dstWithdrawal", "dstPublicWithdrawal", "dstCancellation"];

  for (let i = 1; i < chain.length; i++) {
    const previous = chain[i - 1];
    const current = chain[i];
    if (offsets[previous] > offsets[current]) {
      return `${previous} (${offsets[previous]}) must not be after ${current} (${offsets[current]})`;
    }
  }
  return undefined;
}

/**
 * @throws EscrowError INVALID_TIMELOCKS when the side is out of order
 */
export function validateTimelockOrdering(offsets: TimelockOffsets, role: EscrowRole): void {
  const violation = findTimelockOrderingViolation(offsets, role);
  if (violation) {
    throw new EscrowError(EscrowErrorType.INVALID_TIMELOCKS, violation, { role });
  }
}

/**
 * Format a duration for display
 */
export function formatDuration(seconds: bigint): string {
  const totalSeconds = Number(seconds);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const secs = totalSeconds % 60;

  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);

  return parts.join(" ");
}

export type EscrowPhase =
  | "WITHDRAWAL_PENDING"
  | "PRIVATE_WITHDRAWAL"
  | "PUBLIC_WITHDRAWAL"
  | "PRIVATE_CANCELLATION"
  | "PUBLIC_CANCELLATION";

/**
 * Phase an escrow of the given role is in at `now`.
 * Destination escrows have no public cancellation stage.
 */
export function currentPhase(schedule: bigint, role: EscrowRole, now: bigint): EscrowPhase {
  const [withdrawal, publicWithdrawal, cancellation] = role === EscrowRole.Source
    ? [TimelockStage.SrcWithdrawal, TimelockStage.SrcPublicWithdrawal, TimelockStage.SrcCancellation]
    : [TimelockStage.DstWithdrawal, TimelockStage.DstPublicWithdrawal, TimelockStage.DstCancellation];

  if (now < unlockInstant(schedule, withdrawal)) return "WITHDRAWAL_PENDING";
  if (now < unlockInstant(schedule, publicWithdrawal)) return "PRIVATE_WITHDRAWAL";
  if (now < unlockInstant(schedule, cancellation)) return "PUBLIC_WITHDRAWAL";
  if (role === EscrowRole.Destination) return "PRIVATE_CANCELLATION";
  if (now < unlockInstant(schedule, TimelockStage.SrcPublicCancellation)) {
    return "PRIVATE_CANCELLATION";
  }
  return "PUBLIC_CANCELLATION";
}
