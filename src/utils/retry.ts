import { logger as defaultLogger, type Logger } from './logger';

export interface RetryOptions {
  maxRetries?: number;
  /** Base delay; attempt n waits delayMs * n */
  delayMs?: number;
  logger?: Logger;
  label?: string;
}

export async function retryOperation<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, delayMs = 500, logger = defaultLogger, label = 'operation' } = options;
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      logger.warn(`⚠️ ${label} attempt ${attempt}/${maxRetries} failed: ${lastError.message}`);

      if (attempt < maxRetries) {
        await new Promise(resolve => setTimeout(resolve, delayMs * attempt));
      }
    }
  }

  throw lastError ?? new Error(`${label} failed after all retries`);
}
