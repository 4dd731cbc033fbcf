/**
 * Error base classes shared by the store and the monitors
 *
 * Anything extending MonitorError is an expected, recoverable failure:
 * the affected probe is skipped for the round and metrics keep their last
 * value. Any other thrown value is treated as a programming fault.
 */

export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MonitorError';
  }
}

/**
 * The checkpoint store could not be reached or rejected a command
 */
export class StoreUnavailableError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
