/**
 * Error types raised by the decoders, the configuration loader and the client.
 */

/**
 * Reasons a decode can fail
 *
 * Unknown enum bytes are not listed: they decode to an `Unknown` variant.
 */
export type DecodeErrorKind =
  | "Truncated"
  | "InvalidUtf8"
  | "InvalidInputEncoding"
  | "Overflow"
  | "InvalidLength"
  | "InvalidOffset";

/**
 * Raised when bytes cannot be decoded into the requested value.
 */
export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;

  /** Byte offset at which decoding failed */
  readonly offset: number;

  constructor(kind: DecodeErrorKind, message: string, offset = 0) {
    super(message);
    this.name = "DecodeError";
    this.kind = kind;
    this.offset = offset;
  }
}

/**
 * Raised by the configuration loader when a variable is missing or malformed.
 */
export class FundConfigError extends Error {
  /** Name of the offending environment variable */
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = "FundConfigError";
    this.variable = variable;
  }
}

export type FundClientErrorCode = "BACKEND_FAILED" | "INVALID_ARGUMENT" | "INVALID_CONFIG";

/**
 * Raised by the fund client when a request cannot be made or is rejected.
 */
export class FundClientError extends Error {
  readonly code: FundClientErrorCode;
  /** View or endpoint the request targeted; absent for configuration errors */
  readonly endpoint?: string;
  readonly cause?: unknown;

  constructor(
    message: string,
    code: FundClientErrorCode,
    options: {
      endpoint?: string;
      cause?: unknown;
    } = {},
  ) {
    super(message);
    this.name = "FundClientError";
    this.code = code;
    this.endpoint = options.endpoint;
    this.cause = options.cause;
  }
}

/**
 * Type guard for decode errors
 *
 * @param error - The value to check
 * @param kind - Optional kind the error must have
 * @returns True if the value is a DecodeError (of the given kind)
 */
export function isDecodeError(error: unknown, kind?: DecodeErrorKind): error is DecodeError {
  return error instanceof DecodeError && (kind === undefined || error.kind === kind);
}
