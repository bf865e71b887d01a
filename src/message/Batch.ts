import { ClosedRange } from '../types';
import { RangeSet } from '../state/RangeSet';

/**
 * Lifecycle of a batch of records on its way to the destination.
 * A COMPLETE batch has also been persisted.
 */
export enum BatchState {
  PROCESSED = 'processed',
  LOCAL = 'local',
  PERSISTED = 'persisted',
  COMPLETE = 'complete'
}

export interface Batch {
  state: BatchState;
}

/**
 * A batch together with the record indices it covers
 */
export interface BatchEnvelope {
  batch: Batch;
  ranges: RangeSet;
}

export function createBatchEnvelope(state: BatchState, ranges: Iterable<ClosedRange> | RangeSet): BatchEnvelope {
  const set = new RangeSet();
  set.addAll(ranges);
  return { batch: { state }, ranges: set };
}
