/**
 * Record Decoders
 *
 * The wire format carries no field tags: each record's field order is fixed by
 * the contract and written down once, in its decoder below. Reordering a step
 * shifts every later field.
 */

import {
  ACTIVE_PROPOSAL_STATUSES,
  PROPOSAL_STATUS_NAMES,
  VOTE_DIRECTION_NAMES,
} from "../constants";
import type {
  Decoded,
  Proposal,
  ProposalStatus,
  UnknownVariant,
  VoteDirection,
  VoteRecord,
} from "../types";
import { defaultAddressRenderer, type AddressRenderer } from "./address";
import {
  decodeNestedAddress,
  decodeNestedBigUint,
  decodeNestedBuffer,
  decodeNestedU64,
  decodeNestedU8,
} from "./scalar";

/**
 * Maps a discriminant byte through a name table, keeping unlisted bytes as Unknown
 *
 * @param names - Variant names indexed by byte
 * @param code - The discriminant byte
 * @returns The named variant or an UnknownVariant
 */
function lookupVariant<Name extends string>(
  names: readonly Name[],
  code: number,
): { readonly kind: Name } | UnknownVariant {
  const name = names[code];
  return name === undefined ? { kind: "Unknown", code } : { kind: name };
}

/**
 * Decodes a proposal status byte
 *
 * @param code - The status byte
 * @returns Open, Passed, Executable, Executed, Failed, Cancelled or Unknown(code)
 */
export function decodeProposalStatus(code: number): ProposalStatus {
  return lookupVariant(PROPOSAL_STATUS_NAMES, code);
}

/**
 * Decodes a vote direction byte
 *
 * @param code - The direction byte
 * @returns Yes, No or Unknown(code)
 */
export function decodeVoteDirection(code: number): VoteDirection {
  return lookupVariant(VOTE_DIRECTION_NAMES, code);
}

/**
 * Renders an enum variant as text, e.g. "Passed" or "Unknown(6)"
 *
 * @param variant - A decoded status or direction
 * @returns The display name
 */
export function formatVariant(variant: ProposalStatus | VoteDirection): string {
  return variant.kind === "Unknown" ? `Unknown(${variant.code})` : variant.kind;
}

/**
 * Whether a status is one the contract still acts on (Open, Passed, Executable)
 *
 * @param status - The decoded status
 * @returns True for an active proposal
 */
export function isProposalActive(status: ProposalStatus): boolean {
  return ACTIVE_PROPOSAL_STATUSES.some(name => name === status.kind);
}

/**
 * Decodes a nested Proposal
 *
 * Wire order: id · proposer · description · receiver · amount · status ·
 * yesVotes · noVotes · createdAt · passedAt · bulletinPostId
 *
 * @param data - Source buffer
 * @param offset - Cursor position (default: 0)
 * @param renderer - Address rendering for proposer and receiver
 * @returns The proposal and the cursor after it
 */
export function decodeProposal(
  data: Uint8Array,
  offset = 0,
  renderer: AddressRenderer = defaultAddressRenderer,
): Decoded<Proposal> {
  const id = decodeNestedU64(data, offset);
  const proposer = decodeNestedAddress(data, id.offset, renderer);
  const description = decodeNestedBuffer(data, proposer.offset);
  const receiver = decodeNestedAddress(data, description.offset, renderer);
  const amount = decodeNestedBigUint(data, receiver.offset);
  const status = decodeNestedU8(data, amount.offset);
  const yesVotes = decodeNestedBigUint(data, status.offset);
  const noVotes = decodeNestedBigUint(data, yesVotes.offset);
  const createdAt = decodeNestedU64(data, noVotes.offset);
  const passedAt = decodeNestedU64(data, createdAt.offset);
  const bulletinPostId = decodeNestedU64(data, passedAt.offset);

  return {
    value: {
      id: id.value,
      proposer: proposer.value,
      description: description.value,
      receiver: receiver.value,
      amount: amount.value,
      status: decodeProposalStatus(status.value),
      yesVotes: yesVotes.value,
      noVotes: noVotes.value,
      createdAt: createdAt.value,
      passedAt: passedAt.value,
      bulletinPostId: bulletinPostId.value,
    },
    offset: bulletinPostId.offset,
  };
}

/**
 * Decodes a nested VoteRecord
 *
 * Wire order: voter · direction · weight
 *
 * @param data - Source buffer
 * @param offset - Cursor position (default: 0)
 * @param renderer - Address rendering for the voter
 * @returns The vote record and the cursor after it
 */
export function decodeVoteRecord(
  data: Uint8Array,
  offset = 0,
  renderer: AddressRenderer = defaultAddressRenderer,
): Decoded<VoteRecord> {
  const voter = decodeNestedAddress(data, offset, renderer);
  const direction = decodeNestedU8(data, voter.offset);
  const weight = decodeNestedBigUint(data, direction.offset);

  return {
    value: {
      voter: voter.value,
      direction: decodeVoteDirection(direction.value),
      weight: weight.value,
    },
    offset: weight.offset,
  };
}
