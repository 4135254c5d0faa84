import { logger } from './logger';

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export async function safePageOperation<T>(
  operation: () => Promise<T>,
  defaultValue: T,
  context: string
): Promise<T> {
  try {
    return await operation();
  } catch (e) {
    logger.debug(`[${context}] Operation failed, using default:`, e);
    return defaultValue;
  }
}

export async function timed<T>(
  operation: string,
  fn: () => Promise<T>,
  threshold: number
): Promise<T> {
  const startTime = Date.now();
  try {
    return await fn();
  } finally {
    logger.performance(operation, Date.now() - startTime, threshold);
  }
}
