import type { IRetryPolicy } from "../interfaces/IRetryPolicy";
import { ConnectionError, TimeoutError } from "../../errors";

/**
 * Linear backoff retry policy for opening the connection
 * Used when the client waits for a NetApp that is still starting up
 */
export class ConnectRetryPolicy implements IRetryPolicy {
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  constructor(maxRetries: number = Infinity, baseDelayMs: number = 1000) {
    this.maxRetries = maxRetries;
    this.baseDelayMs = baseDelayMs;
  }

  /**
   * Only failures to reach the NetApp are retried
   */
  shouldRetry(error: unknown, attempt: number): boolean {
    if (attempt > this.maxRetries) {
      return false;
    }
    return error instanceof ConnectionError || error instanceof TimeoutError;
  }

  /**
   * Delay grows with each attempt, capped at five base delays
   */
  getDelay(attempt: number): number {
    return this.baseDelayMs * Math.min(attempt, 5);
  }

  getMaxRetries(): number {
    return this.maxRetries;
  }
}
