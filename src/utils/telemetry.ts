/**
 * Timing hooks for sync operations
 */

import { errorMessage } from './syncResult.js';
import { logger } from './logger.js';

export type TelemetryContext = Record<string, string | number | boolean | undefined>;

export interface SyncTelemetry {
  time<T>(operation: string, fn: () => Promise<T>, context?: TelemetryContext): Promise<T>;
}

export const noopTelemetry: SyncTelemetry = {
  time<T>(_operation: string, fn: () => Promise<T>): Promise<T> {
    return fn();
  },
};

export class LoggingTelemetry implements SyncTelemetry {
  async time<T>(operation: string, fn: () => Promise<T>, context?: TelemetryContext): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      logger.debug('Telemetry', `${operation} took ${Date.now() - start}ms`, context);
      return result;
    } catch (error) {
      logger.warn('Telemetry', `${operation} failed after ${Date.now() - start}ms: ${errorMessage(error)}`, context);
      throw error;
    }
  }
}
