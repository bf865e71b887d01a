import { MessageConverter, StreamDescriptor } from '../types';

export interface StreamCheckpoint<P> {
  readonly kind: 'stream';
  readonly stream: StreamDescriptor;
  readonly payload: P;
}

export interface GlobalCheckpoint<P> {
  readonly kind: 'global';
  readonly payload: P;
}

/**
 * A checkpoint (state) message, scoped to one stream or spanning several
 */
export type CheckpointMessage<P> = StreamCheckpoint<P> | GlobalCheckpoint<P>;

export function streamCheckpoint<P>(stream: StreamDescriptor, payload: P): StreamCheckpoint<P> {
  return { kind: 'stream', stream, payload };
}

export function globalCheckpoint<P>(payload: P): GlobalCheckpoint<P> {
  return { kind: 'global', payload };
}

/**
 * Converts the payload of a checkpoint message and keeps its variant
 *
 * @example
 * ```typescript
 * const converter = new PayloadMessageConverter((payload: number) => payload.toString());
 * converter.convert(globalCheckpoint(7)); // { kind: 'global', payload: '7' }
 * ```
 */
export class PayloadMessageConverter<A, B> implements MessageConverter<CheckpointMessage<A>, CheckpointMessage<B>> {
  constructor(private readonly mapPayload: (payload: A) => B) {}

  convert(message: CheckpointMessage<A>): CheckpointMessage<B> {
    switch (message.kind) {
      case 'stream':
        return streamCheckpoint(message.stream, this.mapPayload(message.payload));
      case 'global':
        return globalCheckpoint(this.mapPayload(message.payload));
    }
  }
}
