/**
 * Protocol Error Hierarchy
 *
 * Typed error classes for the failure modes of the protocol core.
 * Every operation validates before it mutates, so a thrown error
 * always leaves state untouched.
 */

export type ConfigurationErrorCode =
  | 'INVALID_CONFIG'
  | 'MISSING_DEPENDENCY'
  | 'BUILDER_LOCKED';

export type PreconditionCode =
  | 'INVALID_ADDRESS'
  | 'INVALID_AMOUNT'
  | 'INVALID_TEXT'
  | 'BLOCK_BEFORE_DEPLOYMENT'
  | 'CLOCK_REWIND'
  | 'ALREADY_REGISTERED'
  | 'NOT_REGISTERED'
  | 'USER_DENIED'
  | 'WRONG_USER_TYPE'
  | 'POPULATION_CAP_REACHED'
  | 'INVITATION_REQUIRED'
  | 'INVITATION_EXISTS'
  | 'INVITER_NOT_ALLOWED'
  | 'INVITER_PENALIZED'
  | 'INVITE_NOT_ELIGIBLE'
  | 'AREA_OUT_OF_BOUNDS'
  | 'INSPECTION_PENDING'
  | 'INSPECTION_LIMIT_REACHED'
  | 'INSPECTION_NOT_FOUND'
  | 'INVALID_INSPECTION_STATUS'
  | 'INSPECTOR_BUSY'
  | 'REGENERATOR_ALREADY_INSPECTED'
  | 'NOT_INSPECTION_OWNER'
  | 'INSPECTION_EXPIRED'
  | 'INSPECTION_NOT_EXPIRED'
  | 'RESULT_OUT_OF_RANGE'
  | 'NOT_ON_CONTRACT_POOL'
  | 'RESOURCE_NOT_FOUND'
  | 'RESOURCE_FINALIZED'
  | 'RESOURCE_ALREADY_INVALID'
  | 'UNKNOWN_RESOURCE_TYPE'
  | 'CANNOT_VOTE'
  | 'SELF_VOTE'
  | 'ALREADY_VOTED'
  | 'INSUFFICIENT_POINTS'
  | 'INSUFFICIENT_BALANCE'
  | 'DELATION_NOT_FOUND';

export type TemporalGateCode =
  | 'INVITATION_COOLDOWN'
  | 'REQUEST_COOLDOWN'
  | 'INSPECTOR_COOLDOWN'
  | 'SUBMISSION_COOLDOWN'
  | 'VOTE_COOLDOWN'
  | 'SAFEGUARD_WINDOW';

export type ConsistencyCode =
  | 'LEVEL_UNDERFLOW'
  | 'COUNTER_UNDERFLOW'
  | 'INVARIANT_VIOLATION';

export type ProtocolErrorCode =
  | ConfigurationErrorCode
  | PreconditionCode
  | TemporalGateCode
  | ConsistencyCode;

/**
 * Base class for every error the protocol raises on purpose
 */
export abstract class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly code: ProtocolErrorCode,
    public readonly recoverable: boolean
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Fatal wiring or configuration problem, raised at construction
 */
export class ConfigurationError extends ProtocolError {
  constructor(
    message: string,
    code: ConfigurationErrorCode = 'INVALID_CONFIG',
    public readonly details: string[] = []
  ) {
    super(message, code, false);
  }
}

/**
 * Caller-facing rejection: the operation's preconditions do not hold
 */
export class PreconditionViolation extends ProtocolError {
  constructor(
    public readonly reason: PreconditionCode,
    message: string
  ) {
    super(message, reason, true);
  }
}

/**
 * A cool-down, deadline or window is not satisfied yet.
 * `availableAtBlock` is the first block at which retrying can succeed.
 */
export class TemporalGate extends ProtocolError {
  constructor(
    public readonly reason: TemporalGateCode,
    message: string,
    public readonly availableAtBlock: number
  ) {
    super(message, reason, true);
  }
}

/**
 * Programming error: state reached a shape the preconditions should rule out
 */
export class ConsistencyViolation extends ProtocolError {
  constructor(
    code: ConsistencyCode,
    message: string,
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message, code, false);
  }
}

export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError;
}
