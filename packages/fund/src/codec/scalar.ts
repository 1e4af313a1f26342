/**
 * Scalar Codec
 *
 * Decodes the contract runtime's primitives in its two conventions:
 *
 * - top-level: the buffer is the whole value, no framing (one return slot)
 * - nested: fixed widths or a 4-byte big-endian length prefix, so that several
 *   fields can share one buffer
 *
 * The codec cannot tell the conventions apart; the call site picks one.
 * Nested decoders take a cursor and return the value with the advanced cursor.
 */

import {
  ADDRESS_LENGTH,
  LENGTH_PREFIX_WIDTH,
  U64_WIDTH,
  U8_WIDTH,
} from "../constants";
import { DecodeError } from "../errors";
import type { Decoded } from "../types";
import { defaultAddressRenderer, type AddressRenderer } from "./address";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Returns a view of `length` bytes at `offset`, or throws if the buffer is too short
 *
 * @param data - Source buffer
 * @param offset - Cursor position
 * @param length - Number of bytes to take
 * @returns A zero-copy view over the requested range
 */
export function readBytes(data: Uint8Array, offset: number, length: number): Uint8Array {
  if (!Number.isSafeInteger(offset) || !Number.isSafeInteger(length)) {
    throw new DecodeError(
      "InvalidOffset",
      `Cannot read ${length} bytes at offset ${offset}: both must be integers`,
      0,
    );
  }
  if (offset < 0 || length < 0 || offset + length > data.length) {
    throw new DecodeError(
      "Truncated",
      `Cannot read ${length} bytes at offset ${offset}: buffer has ${data.length}`,
      offset,
    );
  }
  return data.subarray(offset, offset + length);
}

/**
 * Interprets bytes as an unsigned big-endian integer
 *
 * @param bytes - Big-endian bytes (may be empty)
 * @returns The integer, 0 for an empty input
 */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  let value = BigInt(0);
  for (const byte of bytes) {
    value = (value << BigInt(8)) | BigInt(byte);
  }
  return value;
}

// ============================================================================
// Top-level
// ============================================================================

/**
 * Decodes a top-level u64
 *
 * @param data - The whole return slot (0 to 8 bytes)
 * @returns The value, 0 for an empty slot
 */
export function decodeTopLevelU64(data: Uint8Array): bigint {
  if (data.length > U64_WIDTH) {
    throw new DecodeError("Overflow", `Top-level u64 cannot span ${data.length} bytes`);
  }
  return bytesToBigInt(data);
}

/**
 * Decodes a top-level unsigned big integer
 *
 * @param data - The whole return slot
 * @returns The value, 0 for an empty slot
 */
export function decodeTopLevelBigUint(data: Uint8Array): bigint {
  return bytesToBigInt(data);
}

/**
 * Decodes a top-level boolean
 *
 * @param data - The whole return slot
 * @returns False for an empty slot, otherwise whether the first byte is non-zero
 */
export function decodeTopLevelBool(data: Uint8Array): boolean {
  return data.length > 0 && data[0] !== 0;
}

/**
 * Decodes a top-level address
 *
 * @param data - The whole return slot (exactly 32 bytes)
 * @param renderer - Address rendering to use
 * @returns The rendered address
 */
export function decodeTopLevelAddress(
  data: Uint8Array,
  renderer: AddressRenderer = defaultAddressRenderer,
): string {
  return renderer.render(data);
}

// ============================================================================
// Nested
// ============================================================================

/**
 * Decodes a nested u64 (8 bytes big-endian)
 *
 * @param data - Source buffer
 * @param offset - Cursor position
 * @returns The value and the cursor after it
 */
export function decodeNestedU64(data: Uint8Array, offset: number): Decoded<bigint> {
  const bytes = readBytes(data, offset, U64_WIDTH);
  return { value: bytesToBigInt(bytes), offset: offset + U64_WIDTH };
}

/**
 * Decodes a nested u8
 *
 * @param data - Source buffer
 * @param offset - Cursor position
 * @returns The byte and the cursor after it
 */
export function decodeNestedU8(data: Uint8Array, offset: number): Decoded<number> {
  const [byte] = readBytes(data, offset, U8_WIDTH);
  return { value: byte, offset: offset + U8_WIDTH };
}

/**
 * Decodes a nested boolean (1 byte, non-zero is true)
 *
 * @param data - Source buffer
 * @param offset - Cursor position
 * @returns The value and the cursor after it
 */
export function decodeNestedBool(data: Uint8Array, offset: number): Decoded<boolean> {
  const { value, offset: next } = decodeNestedU8(data, offset);
  return { value: value !== 0, offset: next };
}

/**
 * Decodes a 4-byte big-endian length prefix followed by that many bytes
 *
 * @param data - Source buffer
 * @param offset - Cursor position
 * @returns A view over the payload and the cursor after it
 */
export function decodeNestedBytes(data: Uint8Array, offset: number): Decoded<Uint8Array> {
  const prefix = readBytes(data, offset, LENGTH_PREFIX_WIDTH);
  const length = Number(bytesToBigInt(prefix));
  const start = offset + LENGTH_PREFIX_WIDTH;
  return { value: readBytes(data, start, length), offset: start + length };
}

/**
 * Decodes a nested unsigned big integer (length prefix + big-endian bytes)
 *
 * @param data - Source buffer
 * @param offset - Cursor position
 * @returns The value (0 for a zero length) and the cursor after it
 */
export function decodeNestedBigUint(data: Uint8Array, offset: number): Decoded<bigint> {
  const { value: bytes, offset: next } = decodeNestedBytes(data, offset);
  return { value: bytesToBigInt(bytes), offset: next };
}

/**
 * Decodes a nested UTF-8 buffer (length prefix + UTF-8 bytes)
 *
 * @param data - Source buffer
 * @param offset - Cursor position
 * @returns The text and the cursor after it
 */
export function decodeNestedBuffer(data: Uint8Array, offset: number): Decoded<string> {
  const { value: bytes, offset: next } = decodeNestedBytes(data, offset);
  let text: string;
  try {
    text = utf8Decoder.decode(bytes);
  } catch (error) {
    throw new DecodeError(
      "InvalidUtf8",
      `Text at offset ${offset} is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`,
      offset,
    );
  }
  return { value: text, offset: next };
}

/**
 * Decodes a nested address (32 raw bytes)
 *
 * @param data - Source buffer
 * @param offset - Cursor position
 * @param renderer - Address rendering to use
 * @returns The rendered address and the cursor after it
 */
export function decodeNestedAddress(
  data: Uint8Array,
  offset: number,
  renderer: AddressRenderer = defaultAddressRenderer,
): Decoded<string> {
  const pubkey = readBytes(data, offset, ADDRESS_LENGTH);
  return { value: renderer.render(pubkey), offset: offset + ADDRESS_LENGTH };
}
