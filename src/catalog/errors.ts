/**
 * Error types raised by the optimizer. Data-quality problems are never
 * errors; they travel as AnalysisWarning values instead.
 */

/**
 * Invalid thresholds, rule names or windows. Raised before any data is
 * fetched and names the offending field.
 */
export class ConfigurationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid configuration at "${field}": ${message}`);
    this.name = "ConfigurationError";
    this.field = field;
  }
}

/**
 * The gateway could not deliver the data an operation depends on.
 */
export class GatewayUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GatewayUnavailableError";
  }
}

/**
 * A gateway call ran past its deadline.
 */
export class GatewayTimeoutError extends GatewayUnavailableError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "GatewayTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
