/**
 * Address Codec
 *
 * Renders 32-byte public keys as checksummed bech32 addresses (`claw1…`), and
 * parses them back for argument validation. A hexadecimal rendering exists as
 * a separately named fallback; the two forms do not round-trip into each other.
 */

import { bech32, hex } from "@scure/base";
import {
  ADDRESS_LENGTH,
  CLAW_ADDRESS_REGEX,
  CLAW_HRP,
  HEX_ADDRESS_PREFIX,
} from "../constants";
import { DecodeError } from "../errors";

/**
 * Address rendering formats
 */
export type AddressFormat = "bech32" | "hex";

/**
 * Turns a 32-byte public key into its textual form.
 *
 * One renderer is chosen per configuration; every address decoded through it
 * shares the same format.
 */
export interface AddressRenderer {
  readonly format: AddressFormat;
  render(pubkey: Uint8Array): string;
}

/**
 * Throws unless the key is exactly one address wide
 *
 * @param pubkey - Candidate public key
 */
function assertAddressLength(pubkey: Uint8Array): void {
  if (pubkey.length !== ADDRESS_LENGTH) {
    throw new DecodeError(
      "InvalidLength",
      `Address must be ${ADDRESS_LENGTH} bytes, got ${pubkey.length}`,
    );
  }
}

/**
 * Encodes a 32-byte public key as a bech32 address
 *
 * @param pubkey - The 32-byte public key
 * @param hrp - Human-readable prefix (default: "claw")
 * @returns The checksummed address
 *
 * @example
 * ```typescript
 * encodeAddress(new Uint8Array(32)); // "claw1qqqq…"
 * ```
 */
export function encodeAddress(pubkey: Uint8Array, hrp: string = CLAW_HRP): string {
  assertAddressLength(pubkey);
  return bech32.encode(hrp, bech32.toWords(pubkey));
}

/**
 * Decodes a bech32 address back into its public key
 *
 * @param address - The bech32 address
 * @param hrp - Expected human-readable prefix (default: "claw")
 * @returns The 32-byte public key
 */
export function decodeAddress(address: string, hrp: string = CLAW_HRP): Uint8Array {
  const { prefix, bytes } = bech32.decodeToBytes(address);
  if (prefix !== hrp) {
    throw new DecodeError(
      "InvalidInputEncoding",
      `Address prefix ${prefix} does not match expected ${hrp}`,
    );
  }
  assertAddressLength(bytes);
  return bytes;
}

/**
 * Validates a fund address
 *
 * @param address - The address to validate
 * @returns True if the address is valid
 */
export function isValidFundAddress(address: string): boolean {
  // Check format first
  if (!CLAW_ADDRESS_REGEX.test(address)) {
    return false;
  }

  // Full validation (includes checksum)
  try {
    decodeAddress(address);
    return true;
  } catch {
    return false;
  }
}

/**
 * Renders a public key as `0x`-prefixed lowercase hex
 *
 * @param pubkey - The 32-byte public key
 * @returns The hex rendering
 */
export function encodeHexAddress(pubkey: Uint8Array): string {
  assertAddressLength(pubkey);
  return HEX_ADDRESS_PREFIX + hex.encode(pubkey);
}

/**
 * Creates the canonical bech32 renderer
 *
 * @param hrp - Human-readable prefix (default: "claw")
 * @returns An AddressRenderer producing bech32 addresses
 */
export function bech32AddressRenderer(hrp: string = CLAW_HRP): AddressRenderer {
  return {
    format: "bech32",
    render: (pubkey: Uint8Array) => encodeAddress(pubkey, hrp),
  };
}

/**
 * Degraded renderer: hex instead of bech32
 */
export const hexAddressRenderer: AddressRenderer = {
  format: "hex",
  render: encodeHexAddress,
};

/**
 * Default renderer used when none is configured
 */
export const defaultAddressRenderer: AddressRenderer = bech32AddressRenderer();

/**
 * Creates the renderer for a configured format
 *
 * @param format - The address format
 * @param hrp - Human-readable prefix for bech32 (default: "claw")
 * @returns The matching AddressRenderer
 */
export function createAddressRenderer(
  format: AddressFormat,
  hrp: string = CLAW_HRP,
): AddressRenderer {
  switch (format) {
    case "bech32":
      return hrp === CLAW_HRP ? defaultAddressRenderer : bech32AddressRenderer(hrp);
    case "hex":
      return hexAddressRenderer;
  }
}
