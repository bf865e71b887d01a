/**
 * Logging utility for the sync checkpoint core
 * Provides configurable logging for the checkpoint, stream and sync components
 */

export interface LoggingConfig {
  enableCheckpointLogs?: boolean;
  enableStreamLogs?: boolean;
  enableSyncLogs?: boolean;
  enableTestMode?: boolean;
}

export class PipelineLogger {
  constructor(private config: LoggingConfig = {}) {
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  /**
   * Log checkpoint manager messages (adds, flushes, emissions)
   */
  checkpoint(message: string, ...args: unknown[]): void {
    if (this.config.enableCheckpointLogs && !this.config.enableTestMode) {
      console.log(`[CHECKPOINT] ${message}`, ...args);
    }
  }

  /**
   * Log per-stream range tracking messages
   */
  stream(message: string, ...args: unknown[]): void {
    if (this.config.enableStreamLogs && !this.config.enableTestMode) {
      console.log(`[STREAM] ${message}`, ...args);
    }
  }

  /**
   * Log sync run lifecycle messages
   */
  sync(message: string, ...args: unknown[]): void {
    if (this.config.enableSyncLogs && !this.config.enableTestMode) {
      console.log(`[SYNC] ${message}`, ...args);
    }
  }

  /**
   * Log error messages (always shown unless in test mode)
   */
  error(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): PipelineLogger {
  return new PipelineLogger(config);
}

/**
 * Default logger instance for components that were not handed one
 */
export const defaultLogger = new PipelineLogger({
  enableCheckpointLogs: false,
  enableStreamLogs: false,
  enableSyncLogs: false
});
