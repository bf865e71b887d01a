import { ClosedRange } from '../types';

/**
 * Sorted set of disjoint closed integer intervals.
 *
 * Overlapping and adjacent intervals are coalesced on insert, so `[0, 9]`
 * followed by `[10, 19]` is stored as the single interval `[0, 19]`.
 */
export class RangeSet {
  private ranges: ClosedRange[] = [];

  static of(ranges: Iterable<ClosedRange>): RangeSet {
    const set = new RangeSet();
    set.addAll(ranges);
    return set;
  }

  static closed(lower: number, upper: number): ClosedRange {
    return { lower, upper };
  }

  add(range: ClosedRange): void {
    if (!Number.isSafeInteger(range.lower) || !Number.isSafeInteger(range.upper)) {
      throw new RangeError(`Range bounds must be integers, got [${range.lower}, ${range.upper}]`);
    }
    if (range.lower > range.upper) {
      throw new RangeError(`Invalid range [${range.lower}, ${range.upper}]: lower bound exceeds upper bound`);
    }

    let lower = range.lower;
    let upper = range.upper;
    let placed = false;
    const merged: ClosedRange[] = [];

    for (const existing of this.ranges) {
      if (existing.upper + 1 < lower) {
        merged.push(existing);
      } else if (upper + 1 < existing.lower) {
        if (!placed) {
          merged.push({ lower, upper });
          placed = true;
        }
        merged.push(existing);
      } else {
        lower = Math.min(lower, existing.lower);
        upper = Math.max(upper, existing.upper);
      }
    }

    if (!placed) {
      merged.push({ lower, upper });
    }
    this.ranges = merged;
  }

  addAll(ranges: Iterable<ClosedRange> | RangeSet): void {
    const source = ranges instanceof RangeSet ? ranges.asRanges() : ranges;
    for (const range of source) {
      this.add(range);
    }
  }

  contains(value: number): boolean {
    return this.ranges.some(range => range.lower <= value && value <= range.upper);
  }

  /**
   * True when every index in `[0, end)` is in the set. An empty prefix is always covered.
   */
  enclosesPrefix(end: number): boolean {
    if (end <= 0) {
      return true;
    }
    const first = this.ranges[0];
    if (first === undefined || first.lower > 0) {
      return false;
    }
    // Coalesced, so a covered prefix lives entirely in the first interval
    return first.upper >= end - 1;
  }

  isEmpty(): boolean {
    return this.ranges.length === 0;
  }

  asRanges(): ClosedRange[] {
    return this.ranges.map(range => ({ ...range }));
  }

  copy(): RangeSet {
    const set = new RangeSet();
    set.ranges = this.asRanges();
    return set;
  }

  toString(): string {
    return `{${this.ranges.map(range => `[${range.lower}, ${range.upper}]`).join(', ')}}`;
  }
}
