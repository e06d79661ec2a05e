export type GovernanceErrorCode =
  | 'NotFound'
  | 'Unauthorized'
  | 'InvalidDeadline'
  | 'InvalidWindow'
  | 'InvalidAmount'
  | 'VotingNotStarted'
  | 'VotingClosed'
  | 'AlreadyVoted'
  | 'NoVotingWeight'
  | 'InvalidOption'
  | 'TooEarly'
  | 'AlreadyFinalized'
  | 'InsufficientBalance'
  | 'InsufficientLocked';

/**
 * Validation failure raised by the engine before anything is mutated.
 * None of these are transient, so callers should not retry them as-is.
 */
export class GovernanceError extends Error {
  constructor(
    public readonly code: GovernanceErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'GovernanceError';
  }
}

export function isGovernanceError(err: unknown, code?: GovernanceErrorCode): err is GovernanceError {
  return err instanceof GovernanceError && (code === undefined || err.code === code);
}
