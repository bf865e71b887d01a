/**
 * Type definitions for the sync checkpoint core
 */

import type { RangeSet } from './state/RangeSet';

/**
 * Identifies a stream in the destination catalog
 */
export interface StreamDescriptor {
  readonly namespace?: string;
  readonly name: string;
}

/**
 * Inclusive bounds over record indices
 */
export interface ClosedRange {
  readonly lower: number;
  readonly upper: number;
}

/**
 * Read side of a per-stream persisted-range tracker
 */
export interface PersistedRangeTracker {
  recordCount(): number;
  /** Point-in-time copy of the ranges confirmed durable */
  persistedRanges(): RangeSet;
}

export interface RangeTrackerProvider {
  getStreamManager(stream: StreamDescriptor): PersistedRangeTracker;
}

/**
 * Maps a raw checkpoint message to the form handed to the output consumer.
 * Must be pure: it runs once, when the checkpoint is added.
 */
export interface MessageConverter<TIn, TOut> {
  convert(message: TIn): TOut;
}

export interface OutputConsumer<TOut> {
  accept(output: TOut): void;
}

/**
 * Stable map key for a stream descriptor
 */
export function descriptorKey(stream: StreamDescriptor): string {
  return JSON.stringify([stream.namespace ?? null, stream.name]);
}

export function formatDescriptor(stream: StreamDescriptor): string {
  return stream.namespace === undefined ? stream.name : `${stream.namespace}.${stream.name}`;
}
