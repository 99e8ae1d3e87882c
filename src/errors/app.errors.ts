/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown when options are missing or out of range
 */
export class ConfigurationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Market error - thrown when a market payload is unusable
 */
export class MarketError extends AppError {
  constructor(
    message: string,
    public readonly ticker?: string,
    cause?: Error,
  ) {
    super(message, "MARKET_ERROR", cause);
  }
}

/**
 * Network error - thrown when a market-data or price API call fails
 */
export class NetworkError extends AppError {
  constructor(
    message: string,
    public readonly endpoint?: string,
    cause?: Error,
  ) {
    super(message, "NETWORK_ERROR", cause);
  }
}

export type CycleStage = "market" | "price" | "settlement";

/**
 * Cycle fetch error - a collaborator failed while gathering cycle inputs.
 * The cycle is skipped and no engine state is touched.
 */
export class CycleFetchError extends AppError {
  constructor(
    message: string,
    public readonly stage: CycleStage,
    cause?: Error,
  ) {
    super(message, "CYCLE_FETCH_ERROR", cause);
  }
}

/**
 * Cycle in progress - a new cycle was requested before the previous one finished
 */
export class CycleInProgressError extends AppError {
  constructor() {
    super("A cycle is already running", "CYCLE_IN_PROGRESS");
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
