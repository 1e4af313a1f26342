/**
 * Fund configuration, read from environment variables (and a .env file).
 */

import { config as loadDotenv } from "dotenv";
import { isValidFundAddress, type AddressFormat } from "./codec/address";
import {
  DEFAULT_CHAIN_ID,
  DEFAULT_GAS_LIMIT_CALL,
  DEFAULT_GAS_PRICE,
} from "./constants";
import { FundConfigError } from "./errors";

export interface FundConfig {
  /**
   * Bech32 address of the deployed fund contract
   */
  contractAddress: string;

  chainId: string;

  gasLimit: bigint;

  gasPrice: bigint;

  /**
   * How decoded addresses are rendered
   */
  addressFormat: AddressFormat;

  /**
   * Log each request made by the client
   */
  verbose: boolean;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value === undefined || value === "" ? defaultValue : value;
}

function readBigInt(env: Env, key: string, defaultValue: bigint): bigint {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  if (!/^\d+$/.test(value)) {
    throw new FundConfigError(key, `Environment variable ${key} must be a non-negative integer, got: ${value}`);
  }
  return BigInt(value);
}

function readBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  return value.toLowerCase() === "true" || value === "1";
}

function readAddressFormat(env: Env, key: string): AddressFormat {
  const value = readString(env, key, "bech32");
  if (value !== "bech32" && value !== "hex") {
    throw new FundConfigError(key, `Environment variable ${key} must be "bech32" or "hex", got: ${value}`);
  }
  return value;
}

/**
 * Resolves the fund configuration from a set of variables
 *
 * @param env - Variables to read (e.g. process.env)
 * @returns The validated configuration
 */
export function resolveFundConfig(env: Env): FundConfig {
  const contractAddress = env.FUND_CONTRACT_ADDRESS;
  if (contractAddress === undefined || contractAddress === "") {
    throw new FundConfigError(
      "FUND_CONTRACT_ADDRESS",
      "Missing required environment variable: FUND_CONTRACT_ADDRESS",
    );
  }
  if (!isValidFundAddress(contractAddress)) {
    throw new FundConfigError(
      "FUND_CONTRACT_ADDRESS",
      `Environment variable FUND_CONTRACT_ADDRESS must be a claw1... address, got: ${contractAddress}`,
    );
  }

  return {
    contractAddress,
    chainId: readString(env, "FUND_CHAIN_ID", DEFAULT_CHAIN_ID),
    gasLimit: readBigInt(env, "FUND_GAS_LIMIT_CALL", DEFAULT_GAS_LIMIT_CALL),
    gasPrice: readBigInt(env, "FUND_GAS_PRICE", DEFAULT_GAS_PRICE),
    addressFormat: readAddressFormat(env, "FUND_ADDRESS_FORMAT"),
    verbose: readBoolean(env, "FUND_VERBOSE", false),
  };
}

/**
 * Loads a .env file into process.env, then resolves the configuration
 *
 * @param options - Optional path of the .env file
 * @param options.path - Path of the .env file (default: ./.env)
 * @returns The validated configuration
 */
export function loadFundConfig(options: { path?: string } = {}): FundConfig {
  loadDotenv({ path: options.path });
  return resolveFundConfig(process.env);
}
