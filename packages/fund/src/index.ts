/**
 * @module @autonomous-fund/sdk - Autonomous Fund contract decoding and client
 *
 * Decodes the binary return values of the fund contract (nested and top-level
 * encodings), renders public keys as `claw1…` addresses, and wraps the
 * contract's views and endpoints in a typed client.
 *
 * ## Architecture
 *
 * This package does not sign or transmit transactions. Integrators supply a
 * ContractBackend that runs queries and submits calls; the client decodes
 * what the backend returns.
 *
 * @example Backend and client:
 * ```typescript
 * import { FundClient, loadFundConfig } from "@autonomous-fund/sdk";
 * import type { ContractBackend } from "@autonomous-fund/sdk";
 *
 * const backend: ContractBackend = {
 *   query: async (contract, functionName, args) => gateway.query(contract, functionName, args),
 *   call: async (contract, functionName, args, options) => wallet.send(contract, functionName, args, options),
 * };
 *
 * const client = new FundClient(backend, loadFundConfig());
 * for (const proposal of await client.getActiveProposals()) {
 *   console.log(proposal.id, proposal.description, formatVariant(proposal.status));
 * }
 * ```
 */

// Client
export { FundClient } from './client'
export type { FundClientConfig } from './client'

// Backend interfaces (implementations provided by integrator)
export {
  isContractBackend,
  u64Arg,
  bigUintArg,
  boolArg,
  addressArg,
  strArg,
} from './backend'
export type { ContractBackend, ContractArgument, CallOptions, CallReceipt } from './backend'

// Configuration
export { loadFundConfig, resolveFundConfig } from './config'
export type { FundConfig } from './config'

// Errors
export { DecodeError, FundConfigError, FundClientError, isDecodeError } from './errors'
export type { DecodeErrorKind, FundClientErrorCode } from './errors'

// Types
export type {
  Decoded,
  Proposal,
  ProposalStatus,
  ProposalStatusName,
  VoteRecord,
  VoteDirection,
  VoteDirectionName,
  UnknownVariant,
  FundStats,
  ContractConfig,
} from './types'
export { isUnknownVariant } from './types'

// Address codec
export {
  encodeAddress,
  decodeAddress,
  encodeHexAddress,
  isValidFundAddress,
  bech32AddressRenderer,
  hexAddressRenderer,
  defaultAddressRenderer,
  createAddressRenderer,
} from './codec/address'
export type { AddressFormat, AddressRenderer } from './codec/address'

// Scalar codec
export {
  readBytes,
  bytesToBigInt,
  decodeTopLevelU64,
  decodeTopLevelBigUint,
  decodeTopLevelBool,
  decodeTopLevelAddress,
  decodeNestedU64,
  decodeNestedU8,
  decodeNestedBool,
  decodeNestedBytes,
  decodeNestedBigUint,
  decodeNestedBuffer,
  decodeNestedAddress,
} from './codec/scalar'

// Record decoders
export {
  decodeProposal,
  decodeVoteRecord,
  decodeProposalStatus,
  decodeVoteDirection,
  formatVariant,
  isProposalActive,
} from './codec/records'

// Return data
export { FundDecoder, decodeBase64, encodeBase64, Base64EncodedRegex } from './codec/return-data'

// Constants
export {
  // Wire widths
  U64_WIDTH,
  U8_WIDTH,
  LENGTH_PREFIX_WIDTH,
  ADDRESS_LENGTH,
  // Addresses
  CLAW_HRP,
  CLAW_ADDRESS_REGEX,
  HEX_ADDRESS_PREFIX,
  // Enum tables
  PROPOSAL_STATUS_NAMES,
  VOTE_DIRECTION_NAMES,
  ACTIVE_PROPOSAL_STATUSES,
  // Denomination
  CLAW_DECIMALS,
  // Defaults
  DEFAULT_CHAIN_ID,
  DEFAULT_GAS_LIMIT_CALL,
  DEFAULT_GAS_PRICE,
  DEFAULT_PAGE_SIZE,
  // Endpoints
  FUND_VIEWS,
  FUND_ENDPOINTS,
} from './constants'
export type { FundView, FundEndpoint } from './constants'

// Utilities
export { convertToAtto, convertFromAtto, formatClaw } from './utils'
