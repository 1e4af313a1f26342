/**
 * Contract Backend Types
 *
 * The fund client does not sign or transmit anything itself. Integrators
 * provide a backend that runs queries and submits calls however they like
 * (a CLI wallet, a gateway client, a test double).
 */

/**
 * Typed scalar argument of a contract endpoint
 *
 * The backend decides how each type is serialized for its transport.
 */
export type ContractArgument =
  | { type: "u64"; value: bigint }
  | { type: "bigUint"; value: bigint }
  | { type: "bool"; value: boolean }
  | { type: "address"; value: string }
  | { type: "str"; value: string };

export const u64Arg = (value: bigint | number): ContractArgument => ({
  type: "u64",
  value: BigInt(value),
});

export const bigUintArg = (value: bigint | number): ContractArgument => ({
  type: "bigUint",
  value: BigInt(value),
});

export const boolArg = (value: boolean): ContractArgument => ({ type: "bool", value });

export const addressArg = (value: string): ContractArgument => ({ type: "address", value });

export const strArg = (value: string): ContractArgument => ({ type: "str", value });

/**
 * Transaction parameters of a state-changing call
 */
export interface CallOptions {
  /**
   * Native value transferred with the call, in attoCLAW
   */
  value: bigint;

  gasLimit: bigint;

  gasPrice: bigint;

  chainId: string;
}

/**
 * What the backend reports after submitting a call
 */
export interface CallReceipt {
  /**
   * Hash of the submitted transaction
   */
  txHash: string;

  /**
   * Transaction status as reported by the backend, if known
   */
  status?: string;
}

/**
 * Integrator-implemented access to the deployed fund contract
 */
export interface ContractBackend {
  /**
   * Run a read-only view
   *
   * @param contract - Bech32 address of the contract
   * @param functionName - The view name
   * @param args - Ordered arguments
   * @returns Promise resolving to the base64 return slots
   */
  query(
    contract: string,
    functionName: string,
    args: readonly ContractArgument[],
  ): Promise<string[]>;

  /**
   * Submit a state-changing call
   *
   * @param contract - Bech32 address of the contract
   * @param functionName - The endpoint name
   * @param args - Ordered arguments
   * @param options - Value, gas and chain settings
   * @returns Promise resolving to the submission receipt
   */
  call(
    contract: string,
    functionName: string,
    args: readonly ContractArgument[],
    options: CallOptions,
  ): Promise<CallReceipt>;
}

/**
 * Type guard to check if a value implements ContractBackend
 *
 * @param value - The value to check
 * @returns True if the value has query and call functions
 */
export function isContractBackend(value: unknown): value is ContractBackend {
  return (
    typeof value === "object" &&
    value !== null &&
    "query" in value &&
    typeof value.query === "function" &&
    "call" in value &&
    typeof value.call === "function"
  );
}
