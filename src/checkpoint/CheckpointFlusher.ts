import { EventEmitter } from 'events';
import { PipelineLogger, defaultLogger } from '../common/logger';

/**
 * The part of the checkpoint manager the flusher drives
 */
export interface FlushableCheckpoints {
  flushReadyCheckpointMessages(): number;
  pendingCheckpointCount(): number;
}

export interface CheckpointFlusherConfig {
  flushInterval?: number; // How often pending checkpoints are checked (ms)
  logger?: PipelineLogger;
}

/**
 * Periodically releases checkpoints whose records have been persisted
 */
export class CheckpointFlusher extends EventEmitter {
  private readonly flushInterval: number;
  private readonly logger: PipelineLogger;
  private flushTimer: NodeJS.Timeout | null = null;
  private totalFlushed = 0;

  constructor(private readonly checkpoints: FlushableCheckpoints, config: CheckpointFlusherConfig = {}) {
    super();
    this.flushInterval = config.flushInterval ?? 1000;
    this.logger = config.logger ?? defaultLogger;

    if (!Number.isFinite(this.flushInterval) || this.flushInterval <= 0) {
      throw new RangeError(`flushInterval must be a positive number, got ${this.flushInterval}`);
    }
  }

  start(): void {
    if (this.flushTimer) return;

    this.flushTimer = setInterval(() => this.scheduledFlush(), this.flushInterval);
    this.flushTimer.unref();

    this.logger.checkpoint(`checkpoint flusher started (every ${this.flushInterval}ms)`);
    this.emit('flusher:started', { flushInterval: this.flushInterval });
  }

  stop(): void {
    if (!this.flushTimer) return;

    clearInterval(this.flushTimer);
    this.flushTimer = null;

    this.logger.checkpoint('checkpoint flusher stopped');
    this.emit('flusher:stopped', { totalFlushed: this.totalFlushed });
  }

  /**
   * Flush immediately; errors propagate to the caller
   */
  flushNow(): number {
    const flushed = this.checkpoints.flushReadyCheckpointMessages();
    if (flushed > 0) {
      this.totalFlushed += flushed;
      this.emit('checkpoints:flushed', {
        flushed,
        pending: this.checkpoints.pendingCheckpointCount()
      });
    }
    return flushed;
  }

  getStatus(): {
    isStarted: boolean;
    flushInterval: number;
    totalFlushed: number;
  } {
    return {
      isStarted: this.flushTimer !== null,
      flushInterval: this.flushInterval,
      totalFlushed: this.totalFlushed
    };
  }

  private scheduledFlush(): void {
    try {
      this.flushNow();
    } catch (error) {
      // A failed flush leaves the run inconsistent; stop and let the owner abort
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`checkpoint flush failed: ${errorMessage}`);
      this.stop();
      this.emit('flush:error', { error });
    }
  }
}
