import { EventEmitter } from 'eventemitter3';
import { EndOfStreamError } from '../common/errors';
import { PipelineLogger, defaultLogger } from '../common/logger';
import { BatchEnvelope, BatchState } from '../message/Batch';
import { PersistedRangeTracker, StreamDescriptor, formatDescriptor } from '../types';
import { RangeSet } from './RangeSet';

/**
 * Tracks records read and batch progress for a single stream.
 *
 * Range sets only ever grow, and readers receive copies, so a snapshot taken
 * by the checkpoint manager never regresses.
 *
 * Events:
 * - `batch:updated` ({ stream, state, ranges }) after ranges are merged
 * - `stream:ended` ({ stream, recordCount }) when end of stream is marked
 */
export class StreamManager extends EventEmitter implements PersistedRangeTracker {
  private recordsRead = 0;
  private endOfStream = false;
  private readonly rangesState = new Map<BatchState, RangeSet>();

  constructor(
    public readonly stream: StreamDescriptor,
    private readonly logger: PipelineLogger = defaultLogger
  ) {
    super();
    for (const state of Object.values(BatchState)) {
      this.rangesState.set(state, new RangeSet());
    }
  }

  /**
   * Count one incoming record and return its index
   */
  countRecordIn(): number {
    if (this.endOfStream) {
      throw new EndOfStreamError(this.stream);
    }
    const index = this.recordsRead;
    this.recordsRead++;
    return index;
  }

  recordCount(): number {
    return this.recordsRead;
  }

  /**
   * Mark that no more records will arrive; returns the final record count
   */
  markEndOfStream(): number {
    if (this.endOfStream) {
      throw new EndOfStreamError(this.stream);
    }
    this.endOfStream = true;
    this.logger.stream(`end of stream ${formatDescriptor(this.stream)} after ${this.recordsRead} records`);
    this.emit('stream:ended', { stream: this.stream, recordCount: this.recordsRead });
    return this.recordsRead;
  }

  endOfStreamRead(): boolean {
    return this.endOfStream;
  }

  updateBatchState(envelope: BatchEnvelope): void {
    const state = envelope.batch.state;
    this.rangesFor(state).addAll(envelope.ranges);
    if (state === BatchState.COMPLETE) {
      this.rangesFor(BatchState.PERSISTED).addAll(envelope.ranges);
    }

    this.logger.stream(
      `stream ${formatDescriptor(this.stream)} marked ${envelope.ranges.toString()} as ${state}`
    );
    this.emit('batch:updated', { stream: this.stream, state, ranges: envelope.ranges.copy() });
  }

  persistedRanges(): RangeSet {
    return this.rangesFor(BatchState.PERSISTED).copy();
  }

  rangesInState(state: BatchState): RangeSet {
    return this.rangesFor(state).copy();
  }

  /**
   * True when every record in `[0, index)` has been persisted
   */
  areRecordsPersistedUntil(index: number): boolean {
    return this.rangesFor(BatchState.PERSISTED).enclosesPrefix(index);
  }

  /**
   * True once the end of stream was read and every record read is COMPLETE
   */
  isBatchProcessingComplete(): boolean {
    return this.endOfStream && this.rangesFor(BatchState.COMPLETE).enclosesPrefix(this.recordsRead);
  }

  private rangesFor(state: BatchState): RangeSet {
    let ranges = this.rangesState.get(state);
    if (!ranges) {
      ranges = new RangeSet();
      this.rangesState.set(state, ranges);
    }
    return ranges;
  }
}
