/**
 * Denomination utilities
 *
 * Conversions between decimal CLAW amounts and attoCLAW integers.
 */

import { CLAW_DECIMALS } from "./constants";

/**
 * Converts a decimal amount to atomic units
 *
 * @param decimalAmount - The decimal amount as a string (e.g., "1.50")
 * @param decimals - Number of decimal places (default: 18)
 * @returns Amount in atomic units
 *
 * @example
 * ```typescript
 * convertToAtto("1.5") // 1500000000000000000n
 * convertToAtto("0.10", 6) // 100000n
 * ```
 */
export function convertToAtto(decimalAmount: string, decimals: number = CLAW_DECIMALS): bigint {
  const match = /^(\d+)(?:\.(\d*))?$/.exec(decimalAmount.trim());
  if (!match) {
    throw new Error(`Invalid amount: ${decimalAmount}`);
  }

  const [, intPart, decPart = ""] = match;
  if (decPart.replace(/0+$/, "").length > decimals) {
    throw new Error(`Amount ${decimalAmount} has more than ${decimals} decimal places`);
  }

  const paddedDec = decPart.padEnd(decimals, "0").slice(0, decimals);
  return BigInt(intPart + paddedDec);
}

/**
 * Converts atomic units to a decimal amount
 *
 * @param atomicAmount - Amount in atomic units
 * @param decimals - Number of decimal places (default: 18)
 * @returns Decimal amount as a string, trailing zeros removed
 */
export function convertFromAtto(atomicAmount: bigint, decimals: number = CLAW_DECIMALS): string {
  const digits = atomicAmount.toString().padStart(decimals + 1, "0");
  const split = digits.length - decimals;
  const fraction = digits.slice(split).replace(/0+$/, "");
  return fraction === "" ? digits.slice(0, split) : `${digits.slice(0, split)}.${fraction}`;
}

/**
 * Formats attoCLAW for display: thousands separators, two decimals (truncated)
 *
 * @param atto - Amount in attoCLAW
 * @returns e.g. "1,234.50 CLAW"
 */
export function formatClaw(atto: bigint): string {
  const [intPart, decPart = ""] = convertFromAtto(atto).split(".");
  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return `${grouped}.${decPart.padEnd(2, "0").slice(0, 2)} CLAW`;
}
