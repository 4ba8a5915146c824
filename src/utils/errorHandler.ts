import { logger } from './logger';

export class MonitorError extends Error {
  constructor(
    message: string,
    public code: string,
    public recoverable: boolean = false
  ) {
    super(message);
    this.name = 'MonitorError';
  }
}

/**
 * Raised when another invocation still holds the cycle pointer.
 */
export class CycleBusyError extends MonitorError {
  constructor(lockPath: string) {
    super(`Cycle state is locked by another run (${lockPath})`, 'CYCLE_BUSY', true);
    this.name = 'CycleBusyError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Handles errors with appropriate logging
 */
export function handleError(error: unknown, context: string): void {
  if (error instanceof MonitorError) {
    const log = error.recoverable ? logger.warn.bind(logger) : logger.error.bind(logger);
    log(`[${context}] ${error.code}: ${error.message}`);
  } else {
    logger.error(`[${context}] Unexpected error: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) {
      logger.debug(`[${context}] Stack trace: ${error.stack}`);
    }
  }
}
