import { DestinationCatalog } from '../catalog/DestinationCatalog';
import { CheckpointFlusher } from '../checkpoint/CheckpointFlusher';
import { CheckpointManager } from '../checkpoint/CheckpointManager';
import { PipelineLogger, createLogger, defaultLogger } from '../common/logger';
import { YamlSyncConfiguration } from '../config/YamlSyncConfiguration';
import { SyncManager } from '../state/SyncManager';
import { MessageConverter, OutputConsumer } from '../types';

export interface SyncRunOptions<TIn, TOut> {
  catalog: DestinationCatalog;
  converter: MessageConverter<TIn, TOut>;
  consumer: OutputConsumer<TOut>;
  flushInterval?: number;
  logger?: PipelineLogger;
}

/**
 * Everything one sync run needs to track and release checkpoints
 */
export interface SyncRun<TIn, TOut> {
  catalog: DestinationCatalog;
  syncManager: SyncManager;
  checkpointManager: CheckpointManager<TIn, TOut>;
  flusher: CheckpointFlusher;
}

/**
 * Wire up the trackers, checkpoint manager and flusher for a single sync run.
 * The flusher is returned stopped.
 */
export function createSyncRun<TIn, TOut>(options: SyncRunOptions<TIn, TOut>): SyncRun<TIn, TOut> {
  const logger = options.logger ?? defaultLogger;
  const syncManager = new SyncManager(options.catalog, logger);
  const checkpointManager = new CheckpointManager<TIn, TOut>({
    syncManager,
    converter: options.converter,
    consumer: options.consumer,
    logger
  });
  const flusher = new CheckpointFlusher(checkpointManager, {
    flushInterval: options.flushInterval,
    logger
  });

  logger.sync(`created sync run over ${options.catalog.size()} streams`);
  return { catalog: options.catalog, syncManager, checkpointManager, flusher };
}

export function createSyncRunFromConfig<TIn, TOut>(
  config: YamlSyncConfiguration,
  converter: MessageConverter<TIn, TOut>,
  consumer: OutputConsumer<TOut>
): SyncRun<TIn, TOut> {
  return createSyncRun({
    catalog: config.toCatalog(),
    converter,
    consumer,
    flushInterval: config.getCheckpointConfig().flushInterval,
    logger: createLogger(config.getLoggingConfig())
  });
}
