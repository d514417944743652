/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - fatal, the process exits.
 * Messages name the offending setting, never its value.
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly setting?: string,
    cause?: Error,
  ) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Transport error - socket failure, timeout or non-2xx HTTP status.
 * The only error class the exchange retry policy retries.
 */
export class TransportError extends AppError {
  constructor(
    message: string,
    public readonly endpoint?: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, "TRANSPORT_ERROR", cause);
  }
}

/**
 * Exchange rejected the request with a well-formed error response
 */
export class ExchangeRejectedError extends AppError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly exchangeErrors: string[] = [],
  ) {
    super(message, "EXCHANGE_REJECTED");
  }
}

/**
 * Order notional or reference price is not a positive number
 */
export class InvalidSizeError extends AppError {
  constructor(
    message: string,
    public readonly notionalUsd: number,
    public readonly referencePrice: number,
  ) {
    super(message, "INVALID_SIZE");
  }
}

/**
 * Analysis oracle could not be reached or produced unusable output
 */
export class AnalysisUnavailableError extends AppError {
  constructor(
    message: string,
    public readonly symbol: string,
    cause?: Error,
  ) {
    super(message, "ANALYSIS_UNAVAILABLE", cause);
  }
}

/**
 * Order placed but never filled within the polling window.
 * The order is cancelled best-effort; see ExecutionEngine.
 */
export class NoFillError extends AppError {
  constructor(
    message: string,
    public readonly orderId: string,
    public readonly waitedMs: number,
  ) {
    super(message, "NO_FILL");
  }
}

/**
 * A strike could not be executed; the strike is aborted and capital untouched
 */
export class ExecutionFailedError extends AppError {
  constructor(
    message: string,
    public readonly strikeId: number,
    cause?: Error,
  ) {
    super(message, "EXECUTION_FAILED", cause);
  }
}

/**
 * Illegal strike lifecycle transition (e.g. mutating a resolved strike)
 */
export class InvalidTransitionError extends AppError {
  constructor(
    message: string,
    public readonly strikeId: number,
  ) {
    super(message, "INVALID_TRANSITION");
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
