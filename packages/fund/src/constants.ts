/**
 * Autonomous Fund Constants
 *
 * Wire widths of the contract runtime's nested encoding, the enum byte tables
 * of the fund contract, and the defaults used when no configuration is given.
 */

// ============================================================================
// Nested Encoding Widths
// ============================================================================

/**
 * Width of a nested u64 field (big-endian)
 */
export const U64_WIDTH = 8

/**
 * Width of the big-endian length prefix in front of variable-length fields
 */
export const LENGTH_PREFIX_WIDTH = 4

/**
 * Width of a public key / address field
 */
export const ADDRESS_LENGTH = 32

/**
 * Width of an enum discriminant or boolean
 */
export const U8_WIDTH = 1

// ============================================================================
// Address Format
// ============================================================================

/**
 * Human-readable prefix of fund addresses (bech32)
 */
export const CLAW_HRP = 'claw'

/**
 * Shape of a canonical fund address: prefix, separator, 52 data characters and
 * a 6 character checksum from the bech32 alphabet
 */
export const CLAW_ADDRESS_REGEX = /^claw1[qpzry9x8gf2tvdw0s3jn54khce6mua7l]{58}$/

/**
 * Prefix of the degraded hexadecimal rendering
 */
export const HEX_ADDRESS_PREFIX = '0x'

// ============================================================================
// Enum Tables
// ============================================================================

/**
 * Proposal status names, indexed by their discriminant byte
 */
export const PROPOSAL_STATUS_NAMES = [
  'Open',
  'Passed',
  'Executable',
  'Executed',
  'Failed',
  'Cancelled',
] as const

/**
 * Vote direction names, indexed by their discriminant byte
 */
export const VOTE_DIRECTION_NAMES = ['Yes', 'No'] as const

/**
 * Statuses returned by the contract's active proposals view
 */
export const ACTIVE_PROPOSAL_STATUSES = ['Open', 'Passed', 'Executable'] as const

// ============================================================================
// Denomination
// ============================================================================

/**
 * Decimals of the native token (1 CLAW = 10^18 attoCLAW)
 */
export const CLAW_DECIMALS = 18

// ============================================================================
// Network Defaults
// ============================================================================

/**
 * Default chain identifier
 */
export const DEFAULT_CHAIN_ID = 'C'

/**
 * Default gas limit of a state-changing call
 */
export const DEFAULT_GAS_LIMIT_CALL = BigInt(10_000_000)

/**
 * Default gas price
 */
export const DEFAULT_GAS_PRICE = BigInt(20_000_000_000_000)

/**
 * Default page size of paginated views
 */
export const DEFAULT_PAGE_SIZE = 50

// ============================================================================
// Contract Endpoints
// ============================================================================

/**
 * Read-only views of the fund contract
 */
export const FUND_VIEWS = {
  FUND_STATS: 'getFundStats',
  SHARE_PRICE: 'getSharePrice',
  PROPOSAL: 'getProposal',
  PROPOSALS: 'getProposals',
  ACTIVE_PROPOSALS: 'getActiveProposals',
  MEMBERS: 'getMembers',
  MEMBER_SHARES: 'getMemberShares',
  EPOCH_SPENT: 'getEpochSpent',
  VOTE_RECORDS: 'getVoteRecords',
  HAS_AGENT_VOTED: 'hasAgentVoted',
  CONTRACT_CONFIG: 'getContractConfig',
} as const

/**
 * State-changing endpoints of the fund contract
 */
export const FUND_ENDPOINTS = {
  DEPOSIT: 'deposit',
  WITHDRAW: 'withdraw',
  SUBMIT_PROPOSAL: 'submitProposal',
  VOTE: 'vote',
  FINALIZE_VOTING: 'finalizeVoting',
  EXECUTE_PROPOSAL: 'executeProposal',
  CANCEL_PROPOSAL: 'cancelProposal',
  EXPIRE_PROPOSAL: 'expireProposal',
} as const

export type FundView = (typeof FUND_VIEWS)[keyof typeof FUND_VIEWS]

export type FundEndpoint = (typeof FUND_ENDPOINTS)[keyof typeof FUND_ENDPOINTS]
