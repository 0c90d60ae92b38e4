/**
 * Strategy error system: every abort carries a kind, a category and an HTTP status.
 * API errors return the same shape: { success: false, message, code }.
 */

export type StrategyErrorCategory = 'validation' | 'precondition' | 'authorization' | 'collaborator';

export type StrategyErrorKind =
  | 'InvalidKink'
  | 'InvalidBaseRate'
  | 'InvalidTierBonus'
  | 'InvalidTierOrdering'
  | 'InvalidLockMultiplier'
  | 'InvalidLockPeriod'
  | 'InvalidFeeRate'
  | 'InvalidRecipient'
  | 'LockAlreadyExists'
  | 'NoLockFound'
  | 'StillLocked'
  | 'InsufficientBalance'
  | 'Unauthorized'
  | 'TransferFailed';

const CATEGORY_OF: Record<StrategyErrorKind, StrategyErrorCategory> = {
  InvalidKink: 'validation',
  InvalidBaseRate: 'validation',
  InvalidTierBonus: 'validation',
  InvalidTierOrdering: 'validation',
  InvalidLockMultiplier: 'validation',
  InvalidLockPeriod: 'validation',
  InvalidFeeRate: 'validation',
  InvalidRecipient: 'validation',
  LockAlreadyExists: 'precondition',
  NoLockFound: 'precondition',
  StillLocked: 'precondition',
  InsufficientBalance: 'precondition',
  Unauthorized: 'authorization',
  TransferFailed: 'collaborator',
};

const STATUS_OF: Record<StrategyErrorCategory, number> = {
  validation: 400,
  precondition: 409,
  authorization: 403,
  collaborator: 502,
};

export class StrategyError extends Error {
  readonly kind: StrategyErrorKind;
  readonly category: StrategyErrorCategory;
  readonly status: number;

  constructor(kind: StrategyErrorKind, message: string) {
    super(message);
    this.name = 'StrategyError';
    this.kind = kind;
    this.category = CATEGORY_OF[kind];
    this.status = STATUS_OF[this.category];
  }
}

export function isStrategyError(err: unknown): err is StrategyError {
  return err instanceof StrategyError;
}

/** Standard API error body – same shape everywhere */
export interface StrategyErrorBody {
  success: false;
  message: string;
  code?: string;
}

/** Generic fallback when we must not expose internal details */
export const GENERIC_MESSAGE = 'Something went wrong. Please try again.';

export function errorBody(message: string, code?: string): StrategyErrorBody {
  const clean = message.trim() || GENERIC_MESSAGE;
  return code ? { success: false, message: clean, code } : { success: false, message: clean };
}

/**
 * Build error body from an unknown error. Only strategy errors expose their message.
 */
export function errorBodyFrom(err: unknown): StrategyErrorBody {
  if (isStrategyError(err)) return errorBody(err.message, err.kind);
  return errorBody(GENERIC_MESSAGE);
}

/** HTTP status for a thrown value: the strategy error's own, 500 otherwise. */
export function statusOf(err: unknown): number {
  return isStrategyError(err) ? err.status : 500;
}
