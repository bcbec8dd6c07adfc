/**
 * Error codes raised by bridge components. The values are stable and part of
 * the public contract: callers and relayers branch on them.
 */
export const ErrorCode = {
  // protocol taxonomy
  UNAUTHORIZED: "Unauthorized",
  UNTRUSTED_ORIGIN: "UntrustedOrigin",
  NOT_WHITELISTED: "NotWhitelisted",
  ALREADY_PROCESSED: "AlreadyProcessed",
  UNMAPPED_TOKEN: "UnmappedToken",
  INSUFFICIENT_BALANCE: "InsufficientBalance",
  INSUFFICIENT_FUNDS: "InsufficientFunds",

  // wire
  MALFORMED_MESSAGE: "MalformedMessage",
  INVALID_MESSAGE_KIND: "InvalidMessageKind",

  // configuration / arguments
  INVALID_ARGUMENT: "InvalidArgument",
  NOT_CONFIGURED: "NotConfigured",
  NOT_FOUND: "NotFound",
  CONFLICT: "Conflict",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class BridgeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BridgeError";
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export const isBridgeError = (err: unknown, code?: ErrorCode): err is BridgeError =>
  err instanceof BridgeError && (code === undefined || err.code === code);

/** Stable code for any thrown value; non-bridge errors have none. */
export const errorCodeOf = (err: unknown): ErrorCode | undefined =>
  err instanceof BridgeError ? err.code : undefined;

export const describeError = (err: unknown): string =>
  err instanceof BridgeError
    ? `${err.code}: ${err.message}`
    : err instanceof Error
      ? err.message
      : String(err);
