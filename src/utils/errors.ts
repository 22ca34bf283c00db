/**
 * Typed errors shared across the engine.
 *
 * Gateway failures carry a TRANSIENT/PERMANENT kind so the execution path
 * can decide between retry and terminal rejection without parsing messages.
 */

export class ConfigurationError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}

export type GatewayErrorKind = "TRANSIENT" | "PERMANENT";

export type GatewayErrorCode =
  | "TIMEOUT"
  | "RATE_LIMITED"
  | "DISCONNECTED"
  | "EXCHANGE_UNAVAILABLE"
  | "TIMESTAMP_SKEW"
  | "REJECTED"
  | "INSUFFICIENT_MARGIN"
  | "INVALID_ORDER"
  | "UNKNOWN";

export class GatewayError extends Error {
  constructor(
    message: string,
    readonly kind: GatewayErrorKind,
    readonly code: GatewayErrorCode,
    readonly exchangeCode?: number
  ) {
    super(message);
    this.name = "GatewayError";
  }

  static transient(code: GatewayErrorCode, message: string, exchangeCode?: number): GatewayError {
    return new GatewayError(message, "TRANSIENT", code, exchangeCode);
  }

  static permanent(code: GatewayErrorCode, message: string, exchangeCode?: number): GatewayError {
    return new GatewayError(message, "PERMANENT", code, exchangeCode);
  }
}

/** Unknown failures are never retried. */
export function isTransient(err: unknown): boolean {
  return err instanceof GatewayError && err.kind === "TRANSIENT";
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
