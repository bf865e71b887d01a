import { DuplicateStreamError, UnknownStreamError } from '../common/errors';
import { StreamDescriptor, descriptorKey } from '../types';

export interface DestinationStream {
  descriptor: StreamDescriptor;
}

/**
 * The set of streams a sync run writes to
 */
export class DestinationCatalog {
  private readonly byKey = new Map<string, DestinationStream>();

  constructor(public readonly streams: readonly DestinationStream[]) {
    for (const stream of streams) {
      const key = descriptorKey(stream.descriptor);
      if (this.byKey.has(key)) {
        throw new DuplicateStreamError(stream.descriptor);
      }
      this.byKey.set(key, stream);
    }
  }

  static fromDescriptors(descriptors: readonly StreamDescriptor[]): DestinationCatalog {
    return new DestinationCatalog(descriptors.map(descriptor => ({ descriptor })));
  }

  getStream(descriptor: StreamDescriptor): DestinationStream {
    const stream = this.byKey.get(descriptorKey(descriptor));
    if (!stream) {
      throw new UnknownStreamError(descriptor);
    }
    return stream;
  }

  hasStream(descriptor: StreamDescriptor): boolean {
    return this.byKey.has(descriptorKey(descriptor));
  }

  size(): number {
    return this.streams.length;
  }
}
