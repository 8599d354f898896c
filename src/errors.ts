/**
 * Error taxonomy for the monitoring pipeline.
 *
 * Background loops catch these at the task boundary and retry on the next
 * tick; the HTTP layer maps them to status codes.
 */

export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The Kubernetes API could not be reached or rejected our credentials. */
export class PlatformUnavailableError extends MonitorError {}

/** A TCP probe did not connect within its timeout. */
export class ProbeTimeoutError extends MonitorError {
  constructor(
    readonly host: string,
    readonly port: number,
    readonly timeoutMs: number,
  ) {
    super(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`);
  }
}

/** The probed port actively refused the connection. */
export class ProbeRefusedError extends MonitorError {
  constructor(
    readonly host: string,
    readonly port: number,
  ) {
    super(`Connection to ${host}:${port} refused`);
  }
}

/** A read or write against the metrics database failed. */
export class StoreUnavailableError extends MonitorError {}

/** A rollup or retention run failed partway and will be retried next tick. */
export class AggregationSkippedError extends MonitorError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.cause instanceof Error ? `${err.message} (${err.cause.message})` : err.message;
  }
  return String(err);
}
