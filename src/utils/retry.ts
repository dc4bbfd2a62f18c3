/**
 * Retry configuration
 */
export interface RetryConfig {
  /**
   * Maximum number of attempts. `Infinity` keeps trying until the deadline.
   */
  maxAttempts: number;

  /**
   * Function to calculate backoff delay in milliseconds
   */
  backoffMs: (attempt: number) => number;

  /**
   * Function to determine if error should trigger retry
   */
  shouldRetry: (error: unknown, attempt: number) => boolean;

  /**
   * Absolute time (ms since epoch) after which no new attempt is started
   */
  deadline?: number;

  /**
   * Called before waiting for the next attempt
   */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Retry an operation with backoff
 * @param operation - The async operation to retry
 * @param config - Retry configuration
 * @returns Promise resolving to operation result
 * @throws Last error if all retries exhausted
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error: unknown) {
      if (!config.shouldRetry(error, attempt) || attempt >= config.maxAttempts) {
        throw error;
      }

      const delay = config.backoffMs(attempt);
      if (config.deadline !== undefined && Date.now() + delay > config.deadline) {
        throw error;
      }

      config.onRetry?.(error, attempt, delay);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
