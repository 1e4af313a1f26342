/**
 * Return-data entry points
 *
 * Views return a list of base64 slots. Each slot holds one value; list views
 * return one slot per item, so every item is decoded on its own at offset 0.
 */

import { base64 } from "@scure/base";
import { DecodeError } from "../errors";
import type { Proposal, VoteRecord } from "../types";
import { defaultAddressRenderer, type AddressRenderer } from "./address";
import { decodeProposal, decodeVoteRecord } from "./records";
import {
  decodeTopLevelAddress,
  decodeTopLevelBigUint,
  decodeTopLevelBool,
  decodeTopLevelU64,
} from "./scalar";

export const Base64EncodedRegex = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decodes a padded base64 string to bytes
 *
 * @param text - Base64 text
 * @returns The decoded bytes
 */
export function decodeBase64(text: string): Uint8Array {
  if (!Base64EncodedRegex.test(text) || text.length % 4 !== 0) {
    throw new DecodeError("InvalidInputEncoding", `Malformed base64 input: "${text}"`);
  }
  try {
    return base64.decode(text);
  } catch (error) {
    throw new DecodeError(
      "InvalidInputEncoding",
      `Malformed base64 input: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/**
 * Encodes bytes as padded base64
 *
 * @param data - The bytes to encode
 * @returns Base64 text
 */
export function encodeBase64(data: Uint8Array): string {
  return base64.encode(data);
}

/**
 * Decodes base64 return slots with one fixed address rendering.
 *
 * @example
 * ```typescript
 * const decoder = new FundDecoder();
 * const proposals = decoder.proposals(returnData);
 * ```
 */
export class FundDecoder {
  /**
   * Creates a new FundDecoder instance.
   *
   * @param renderer - Address rendering used for every address this decoder produces
   */
  constructor(readonly renderer: AddressRenderer = defaultAddressRenderer) {}

  u64(slot: string): bigint {
    return decodeTopLevelU64(decodeBase64(slot));
  }

  bigUint(slot: string): bigint {
    return decodeTopLevelBigUint(decodeBase64(slot));
  }

  bool(slot: string): boolean {
    return decodeTopLevelBool(decodeBase64(slot));
  }

  address(slot: string): string {
    return decodeTopLevelAddress(decodeBase64(slot), this.renderer);
  }

  proposal(slot: string): Proposal {
    return decodeProposal(decodeBase64(slot), 0, this.renderer).value;
  }

  voteRecord(slot: string): VoteRecord {
    return decodeVoteRecord(decodeBase64(slot), 0, this.renderer).value;
  }

  proposals(slots: readonly string[]): Proposal[] {
    return slots.map(slot => this.proposal(slot));
  }

  voteRecords(slots: readonly string[]): VoteRecord[] {
    return slots.map(slot => this.voteRecord(slot));
  }

  addresses(slots: readonly string[]): string[] {
    return slots.map(slot => this.address(slot));
  }
}
