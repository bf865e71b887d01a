import { DestinationCatalog } from '../catalog/DestinationCatalog';
import { UnknownStreamError } from '../common/errors';
import { PipelineLogger, defaultLogger } from '../common/logger';
import { RangeTrackerProvider, StreamDescriptor, descriptorKey } from '../types';
import { StreamManager } from './StreamManager';

/**
 * Owns one StreamManager per catalog stream for the lifetime of a sync run
 */
export class SyncManager implements RangeTrackerProvider {
  private readonly streamManagers = new Map<string, StreamManager>();

  constructor(
    public readonly catalog: DestinationCatalog,
    private readonly logger: PipelineLogger = defaultLogger
  ) {
    for (const stream of catalog.streams) {
      this.streamManagers.set(descriptorKey(stream.descriptor), new StreamManager(stream.descriptor, logger));
    }
    this.logger.sync(`sync manager tracking ${catalog.size()} streams`);
  }

  getStreamManager(stream: StreamDescriptor): StreamManager {
    const manager = this.streamManagers.get(descriptorKey(stream));
    if (!manager) {
      throw new UnknownStreamError(stream);
    }
    return manager;
  }

  getStreamManagers(): StreamManager[] {
    return Array.from(this.streamManagers.values());
  }

  allStreamsComplete(): boolean {
    return this.getStreamManagers().every(manager => manager.isBatchProcessingComplete());
  }
}
