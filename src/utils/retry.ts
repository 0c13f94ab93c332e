import { Logger, describeError } from './logger';

export interface RetryOptions {
  retries?: number;
  delay?: number;
  backoff?: number;
  logger?: Logger;
  label?: string;
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
  attempt = 1,
): Promise<T> {
  const { retries = 3, delay = 1000, backoff = 2, logger, label = 'operation' } =
    options;
  try {
    return await fn();
  } catch (error) {
    if (retries > 0) {
      logger?.warn(
        `${label} failed (attempt ${attempt}), retrying in ${delay}ms`,
        { error: describeError(error) },
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
      return retry(
        fn,
        { ...options, retries: retries - 1, delay: delay * backoff },
        attempt + 1,
      );
    }
    logger?.error(`${label} failed after ${attempt} attempts`, {
      error: describeError(error),
    });
    throw error;
  }
}
