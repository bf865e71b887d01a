import { ModeConflictError, OutOfOrderError } from '../common/errors';
import { PipelineLogger, defaultLogger } from '../common/logger';
import { RangeSet } from '../state/RangeSet';
import {
  MessageConverter,
  OutputConsumer,
  RangeTrackerProvider,
  StreamDescriptor,
  descriptorKey,
  formatDescriptor
} from '../types';

export enum CheckpointMode {
  UNSET = 'unset',
  PER_STREAM = 'per-stream',
  GLOBAL = 'global'
}

export type StreamIndex = readonly [stream: StreamDescriptor, index: number];

export interface PendingStreamCheckpoint<TOut> {
  readonly stream: StreamDescriptor;
  /** Exclusive upper bound of the records this checkpoint certifies */
  readonly index: number;
  readonly converted: TOut;
}

export interface PendingGlobalCheckpoint<TOut> {
  readonly streamIndexes: ReadonlyMap<string, { stream: StreamDescriptor; index: number }>;
  readonly converted: TOut;
}

interface StreamQueue<TOut> {
  stream: StreamDescriptor;
  queue: PendingStreamCheckpoint<TOut>[];
}

export interface CheckpointManagerConfig<TIn, TOut> {
  syncManager: RangeTrackerProvider;
  converter: MessageConverter<TIn, TOut>;
  consumer: OutputConsumer<TOut>;
  logger?: PipelineLogger;
}

/**
 * Holds checkpoint (state) messages until the records they cover are persisted.
 *
 * A run uses either per-stream or global checkpoints, never both; the first
 * successful add fixes the mode. Checkpoint indices must strictly increase per
 * stream. Pending checkpoints are released to the consumer in the order they
 * were added: per stream in PER_STREAM mode, across all streams in GLOBAL mode.
 */
export class CheckpointManager<TIn, TOut> {
  private mode: CheckpointMode = CheckpointMode.UNSET;
  private readonly lastIndex = new Map<string, number>();
  private readonly streamQueues = new Map<string, StreamQueue<TOut>>();
  private readonly globalQueue: PendingGlobalCheckpoint<TOut>[] = [];

  private readonly syncManager: RangeTrackerProvider;
  private readonly converter: MessageConverter<TIn, TOut>;
  private readonly consumer: OutputConsumer<TOut>;
  private readonly logger: PipelineLogger;

  constructor(config: CheckpointManagerConfig<TIn, TOut>) {
    this.syncManager = config.syncManager;
    this.converter = config.converter;
    this.consumer = config.consumer;
    this.logger = config.logger ?? defaultLogger;
  }

  addStreamCheckpoint(stream: StreamDescriptor, index: number, message: TIn): void {
    if (this.mode === CheckpointMode.GLOBAL) {
      throw new ModeConflictError(this.mode, CheckpointMode.PER_STREAM);
    }

    const key = descriptorKey(stream);
    this.checkIndex(stream, index, this.lastIndex.get(key));

    const converted = this.converter.convert(message);

    let entry = this.streamQueues.get(key);
    if (!entry) {
      entry = { stream, queue: [] };
      this.streamQueues.set(key, entry);
    }
    entry.queue.push({ stream, index, converted });
    this.lastIndex.set(key, index);
    this.mode = CheckpointMode.PER_STREAM;

    this.logger.checkpoint(`added checkpoint for ${formatDescriptor(stream)} at index ${index}`);
  }

  addGlobalCheckpoint(streamIndexes: readonly StreamIndex[], message: TIn): void {
    if (this.mode === CheckpointMode.PER_STREAM) {
      throw new ModeConflictError(this.mode, CheckpointMode.GLOBAL);
    }

    // Validate everything against a staged copy before committing anything
    const staged = new Map<string, { stream: StreamDescriptor; index: number }>();
    for (const [stream, index] of streamIndexes) {
      const key = descriptorKey(stream);
      this.checkIndex(stream, index, staged.get(key)?.index ?? this.lastIndex.get(key));
      staged.set(key, { stream, index });
    }

    const converted = this.converter.convert(message);

    this.globalQueue.push({ streamIndexes: staged, converted });
    for (const [key, { index }] of staged) {
      this.lastIndex.set(key, index);
    }
    this.mode = CheckpointMode.GLOBAL;

    this.logger.checkpoint(`added global checkpoint spanning ${staged.size} streams`);
  }

  /**
   * Emit every pending checkpoint whose records are fully persisted.
   * Returns the number of checkpoints emitted.
   */
  flushReadyCheckpointMessages(): number {
    switch (this.mode) {
      case CheckpointMode.UNSET:
        return 0;
      case CheckpointMode.PER_STREAM:
        return this.flushStreamCheckpoints();
      case CheckpointMode.GLOBAL:
        return this.flushGlobalCheckpoints();
    }
  }

  getMode(): CheckpointMode {
    return this.mode;
  }

  getLastIndex(stream: StreamDescriptor): number | undefined {
    return this.lastIndex.get(descriptorKey(stream));
  }

  pendingCheckpointCount(): number {
    let count = this.globalQueue.length;
    for (const { queue } of this.streamQueues.values()) {
      count += queue.length;
    }
    return count;
  }

  hasPendingCheckpoints(): boolean {
    return this.pendingCheckpointCount() > 0;
  }

  private checkIndex(stream: StreamDescriptor, index: number, lastIndex: number | undefined): void {
    const floor = lastIndex ?? Number.NEGATIVE_INFINITY;
    // NaN fails every comparison, so it is rejected here too
    if (!(index > floor)) {
      throw new OutOfOrderError(stream, index, floor);
    }
  }

  private flushStreamCheckpoints(): number {
    let emitted = 0;

    for (const { stream, queue } of this.streamQueues.values()) {
      if (queue.length === 0) {
        continue;
      }

      const persisted = this.syncManager.getStreamManager(stream).persistedRanges();
      let head: PendingStreamCheckpoint<TOut> | undefined = queue[0];
      while (head !== undefined && persisted.enclosesPrefix(head.index)) {
        this.consumer.accept(head.converted);
        queue.shift();
        emitted++;
        this.logger.checkpoint(`flushed checkpoint for ${formatDescriptor(stream)} at index ${head.index}`);
        head = queue[0];
      }
    }

    return emitted;
  }

  private flushGlobalCheckpoints(): number {
    let emitted = 0;
    const snapshots = new Map<string, RangeSet>();
    const persistedFor = (key: string, stream: StreamDescriptor): RangeSet => {
      let snapshot = snapshots.get(key);
      if (!snapshot) {
        snapshot = this.syncManager.getStreamManager(stream).persistedRanges();
        snapshots.set(key, snapshot);
      }
      return snapshot;
    };

    let head: PendingGlobalCheckpoint<TOut> | undefined = this.globalQueue[0];
    while (head !== undefined) {
      const ready = Array.from(head.streamIndexes).every(([key, { stream, index }]) =>
        persistedFor(key, stream).enclosesPrefix(index)
      );
      if (!ready) {
        break;
      }

      this.consumer.accept(head.converted);
      this.globalQueue.shift();
      emitted++;
      this.logger.checkpoint(`flushed global checkpoint spanning ${head.streamIndexes.size} streams`);
      head = this.globalQueue[0];
    }

    return emitted;
  }
}
