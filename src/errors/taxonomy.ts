export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  ZeroAddress: 'zero_address',
  ChainNotFound: 'chain_not_found',
  Unauthorized: 'unauthorized',
  OnlyGovernance: 'only_governance',
  InvalidThreshold: 'invalid_threshold',
  InvalidQuorum: 'invalid_quorum',
  InvalidDecayRate: 'invalid_decay_rate',
  InvalidDecayWindow: 'invalid_decay_window',
  InsufficientBalance: 'insufficient_balance',
  InsufficientStake: 'insufficient_stake',
  CannotUndelegateWhileStaked: 'cannot_undelegate_while_staked',
  FutureLookup: 'future_lookup',
  NotHubChain: 'not_hub_chain',
  InvalidProposalLength: 'invalid_proposal_length',
  RestrictedProposer: 'restricted_proposer',
  BelowThreshold: 'below_threshold',
  ProposalNotFound: 'proposal_not_found',
  ProposalExists: 'proposal_exists',
  UnexpectedProposalState: 'unexpected_proposal_state',
  AlreadyVoted: 'already_voted',
  UnableToCancel: 'unable_to_cancel',
  TimelockNotReady: 'timelock_not_ready',
  TimelockOperationExists: 'timelock_operation_exists',
  InvalidTimelockDelay: 'invalid_timelock_delay',
  CallReverted: 'call_reverted',
  EmptyRelayPayload: 'empty_relay_payload',
  ProposalAlreadySent: 'proposal_already_sent',
  ProposalAlreadyReceived: 'proposal_already_received',
  UntrustedRemote: 'untrusted_remote',
  MessageIdMismatch: 'message_id_mismatch',
  InsufficientFee: 'insufficient_fee',
  InvalidOptions: 'invalid_options',
  PacketNotFound: 'packet_not_found',
  ClockNotAdjustable: 'clock_not_adjustable',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});
