/**
 * Autonomous Fund Types
 *
 * Decoded shapes of the fund contract's records and multi-value views.
 * All integers are bigint: u64 values exceed the safe integer range.
 */

import type { PROPOSAL_STATUS_NAMES, VOTE_DIRECTION_NAMES } from './constants'

/**
 * Result of a nested decode step: the value and the offset just past it
 */
export interface Decoded<T> {
  value: T

  /**
   * Offset of the first byte not consumed
   */
  offset: number
}

/**
 * Enum byte that is not in the decoder's table
 */
export interface UnknownVariant {
  readonly kind: 'Unknown'
  readonly code: number
}

export type ProposalStatusName = (typeof PROPOSAL_STATUS_NAMES)[number]

export type VoteDirectionName = (typeof VOTE_DIRECTION_NAMES)[number]

/**
 * Proposal lifecycle state
 *
 * Open → Passed → Executable → Executed, with Failed and Cancelled as the
 * other terminal states. The decoder does not check transitions.
 */
export type ProposalStatus = { readonly kind: ProposalStatusName } | UnknownVariant

/**
 * Direction of a recorded vote
 */
export type VoteDirection = { readonly kind: VoteDirectionName } | UnknownVariant

/**
 * Governance proposal, in wire order
 */
export interface Proposal {
  readonly id: bigint

  /**
   * Address that submitted the proposal
   */
  readonly proposer: string

  readonly description: string

  /**
   * Address that receives the funds when the proposal executes
   */
  readonly receiver: string

  /**
   * Requested amount in attoCLAW
   */
  readonly amount: bigint

  readonly status: ProposalStatus

  readonly yesVotes: bigint

  readonly noVotes: bigint

  /**
   * Block timestamp of submission
   */
  readonly createdAt: bigint

  /**
   * Block timestamp when voting ended and the time-lock started (0 while Open)
   */
  readonly passedAt: bigint

  /**
   * Bulletin board post holding the discussion thread
   */
  readonly bulletinPostId: bigint
}

/**
 * A single agent's vote on a proposal
 */
export interface VoteRecord {
  readonly voter: string
  readonly direction: VoteDirection

  /**
   * Share weight the vote was cast with
   */
  readonly weight: bigint
}

/**
 * Result of the fund stats view
 */
export interface FundStats {
  /**
   * Assets under management in attoCLAW
   */
  aum: bigint
  totalShares: bigint
  memberCount: bigint
  proposalCount: bigint
  minUptimeScore: bigint
}

/**
 * Result of the contract config view
 */
export interface ContractConfig {
  /**
   * Minimum deposit in attoCLAW
   */
  minDeposit: bigint
  minUptimeScore: bigint

  /**
   * Voting window in seconds
   */
  votingPeriod: bigint

  /**
   * Delay between passing and execution in seconds
   */
  timelockPeriod: bigint
}

/**
 * Type guard for the unknown variant of an enum
 *
 * @param variant - The decoded enum value
 * @returns True if the byte was not in the table
 */
export function isUnknownVariant(
  variant: ProposalStatus | VoteDirection,
): variant is UnknownVariant {
  return variant.kind === 'Unknown'
}
